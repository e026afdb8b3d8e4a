import * as core from '@actions/core'
import { COMMENTS, GITHUB, REGISTRY } from './constants.js'
import { RECONCILE_STATES, ReconcileState } from './types.js'

export type Operation = 'object' | 'imagestream' | 'parse-docker-tag'

const OPERATIONS: readonly Operation[] = ['object', 'imagestream', 'parse-docker-tag']

/**
 * Options of the cluster CLI and of the reconciliation itself
 */
export interface ClusterConfig {
  /** `oc` or `kubectl` binary */
  oc: string
  /** API server URL, passed as `--server` */
  server?: string
  /** Passed as `--v` when greater than zero */
  logLevel: number
  /** User to impersonate, passed as `--as` */
  asUser?: string
  /** `apply --force`, and delete even when the object looks absent */
  force: boolean
  /** Report what would change without mutating anything */
  checkMode: boolean
  /** Registry hosts that are served from inside the cluster */
  localRegistries: readonly string[]
}

/**
 * Options of the pull request report
 */
export interface ReportConfig {
  githubToken?: string
  title: string
  subtitle: string
  maxCommentLength: number
}

/**
 * Every input the action recognises, resolved to a value
 */
export interface ActionConfig {
  operation: Operation
  state: ReconcileState
  kind?: string
  name?: string
  namespace?: string
  content?: string
  declaration?: string
  image?: string
  mirroredBase?: string
  cluster: ClusterConfig
  report: ReportConfig
}

export const DEFAULT_CLUSTER_CONFIG: ClusterConfig = {
  oc: 'oc',
  logLevel: 0,
  force: false,
  checkMode: false,
  localRegistries: REGISTRY.DEFAULT_LOCAL_REGISTRIES
}

export const DEFAULT_REPORT_CONFIG: ReportConfig = {
  title: COMMENTS.DEFAULT_TITLE,
  subtitle: '',
  maxCommentLength: GITHUB.MAX_COMMENT_LENGTH
}

/**
 * Reads the action inputs once and resolves every option to a value.
 */
export function readConfig(): ActionConfig {
  const operation = oneOf('operation', OPERATIONS, 'object')
  const state = oneOf('state', RECONCILE_STATES, 'latest')

  const localRegistries = optionalInput('local_registries')
    ?.split(/[,\n]/)
    .map((host) => host.trim())
    .filter(Boolean)

  return {
    operation,
    state,
    kind: optionalInput('kind'),
    name: optionalInput('name'),
    namespace: optionalInput('namespace'),
    content: optionalInput('content'),
    declaration: optionalInput('declaration'),
    image: optionalInput('image'),
    mirroredBase: optionalInput('mirrored_base'),
    cluster: {
      oc: optionalInput('oc') ?? DEFAULT_CLUSTER_CONFIG.oc,
      server: optionalInput('server'),
      logLevel: integerInput('log_level', DEFAULT_CLUSTER_CONFIG.logLevel),
      asUser: optionalInput('as_user'),
      force: booleanInput('force', DEFAULT_CLUSTER_CONFIG.force),
      checkMode: booleanInput('check_mode', DEFAULT_CLUSTER_CONFIG.checkMode),
      localRegistries:
        localRegistries && localRegistries.length > 0
          ? localRegistries
          : DEFAULT_CLUSTER_CONFIG.localRegistries
    },
    report: {
      githubToken: optionalInput('github_token') ?? process.env.GITHUB_TOKEN,
      title: optionalInput('title') ?? DEFAULT_REPORT_CONFIG.title,
      subtitle: optionalInput('subtitle') ?? DEFAULT_REPORT_CONFIG.subtitle,
      maxCommentLength: integerInput(
        'max_comment_char_len',
        DEFAULT_REPORT_CONFIG.maxCommentLength
      )
    }
  }
}

function optionalInput(name: string): string | undefined {
  const value = core.getInput(name)
  return value ? value : undefined
}

function booleanInput(name: string, fallback: boolean): boolean {
  const value = optionalInput(name)
  if (value === undefined) return fallback
  if (/^(true|yes|on|1)$/i.test(value)) return true
  if (/^(false|no|off|0)$/i.test(value)) return false
  throw new TypeError(`Input "${name}" must be a boolean, got "${value}"`)
}

function integerInput(name: string, fallback: number): number {
  const value = optionalInput(name)
  if (value === undefined) return fallback
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed)) {
    throw new TypeError(`Input "${name}" must be an integer, got "${value}"`)
  }
  return parsed
}

function oneOf<T extends string>(
  name: string,
  allowed: readonly T[],
  fallback: T
): T {
  const value = optionalInput(name)
  if (value === undefined) return fallback
  const match = allowed.find((candidate) => candidate === value)
  if (match === undefined) {
    throw new TypeError(
      `Input "${name}" must be one of ${allowed.join(', ')}, got "${value}"`
    )
  }
  return match
}
