import * as core from '@actions/core'
import execa from 'execa'
import { ClusterConfig } from './config.js'
import { KUBERNETES } from './constants.js'
import { isDocumentMap, parseDocuments, serializeDocument } from './document.js'
import {
  ClusterCommandError,
  ClusterReadError,
  ClusterWriteError
} from './errors.js'
import { Document, DocumentMap, ObjectRef } from './types.js'

/**
 * Outcome of one CLI invocation that ran to completion
 */
export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

/**
 * Runs one external process and waits for it to exit.
 */
export interface CommandRunner {
  run(file: string, args: string[], input?: string): Promise<CommandResult>
}

export const execaRunner: CommandRunner = {
  async run(file, args, input) {
    const result = await execa(file, args, { input, reject: false })
    // No exit code means the process never ran or was killed
    if (result.failed && !result.exitCode) {
      throw new ClusterCommandError(
        `Error running command (${result.command}): ${result.stderr || 'process did not exit normally'}`,
        result.command
      )
    }
    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr
    }
  }
}

/**
 * Reads and writes single cluster objects through the `oc` (or `kubectl`)
 * command line.
 */
export class ClusterAccessor {
  constructor(
    private readonly config: ClusterConfig,
    private readonly runner: CommandRunner = execaRunner
  ) {}

  /**
   * Fetches the live object, or `null` when the cluster says it does not exist.
   */
  async get(ref: ObjectRef): Promise<DocumentMap | null> {
    const args = ['get', ref.kind, ref.name, ...this.namespaceArgs(ref), '-o', 'yaml']
    const { exitCode, stdout, stderr, command } = await this.exec(args)

    if (exitCode !== 0) {
      if (KUBERNETES.NOT_FOUND_PATTERN.test(stderr)) {
        core.debug(`${command}: not found`)
        return null
      }
      throw new ClusterReadError(ref, command, exitCode, stderr)
    }

    let documents: Document[]
    try {
      documents = parseDocuments(stdout)
    } catch (error) {
      throw new ClusterReadError(ref, command, exitCode, `${error}`)
    }
    const [observed] = documents
    if (documents.length !== 1 || !isDocumentMap(observed)) {
      throw new ClusterReadError(
        ref,
        command,
        exitCode,
        'expected exactly one object in the command output'
      )
    }
    return observed
  }

  /**
   * Merges `document` onto the existing object with `oc apply -f -`.
   */
  async apply(ref: ObjectRef, document: DocumentMap): Promise<CommandResult> {
    const args = ['apply', ...this.namespaceArgs(ref)]
    if (this.config.force) {
      args.push('--force')
    }
    return this.write(ref, [...args, '-f', '-'], document)
  }

  /**
   * Creates a new object with `oc create -f -`. An object that appeared in
   * the meantime makes this fail; nothing retries.
   */
  async create(ref: ObjectRef, document: DocumentMap): Promise<CommandResult> {
    return this.write(ref, ['create', ...this.namespaceArgs(ref), '-f', '-'], document)
  }

  async delete(ref: ObjectRef): Promise<CommandResult> {
    return this.write(ref, ['delete', ref.kind, ref.name, ...this.namespaceArgs(ref)])
  }

  /**
   * Has the API server run `document` through a server-side dry-run of
   * `oc apply`, so that it carries the defaults and conversions the server
   * would give it. What the server maintains on its own (status, uid,
   * resource version and the like) is stripped from the result.
   *
   * Nothing is persisted, so this is safe in check mode too.
   */
  async normalize(ref: ObjectRef, document: DocumentMap): Promise<DocumentMap> {
    const args = [
      'apply',
      ...this.namespaceArgs(ref),
      '--dry-run=server',
      '-o',
      'yaml',
      '-f',
      '-'
    ]
    const { stdout, exitCode, command } = await this.write(ref, args, document)

    let documents: Document[]
    try {
      documents = parseDocuments(stdout)
    } catch (error) {
      throw new ClusterWriteError(ref, command, exitCode, `${error}`)
    }
    const [normalized] = documents
    if (documents.length !== 1 || !isDocumentMap(normalized)) {
      throw new ClusterWriteError(
        ref,
        command,
        exitCode,
        'expected exactly one object in the dry-run output'
      )
    }
    return withoutServerFields(normalized)
  }

  private async write(
    ref: ObjectRef,
    args: string[],
    document?: DocumentMap
  ): Promise<CommandResult & { command: string }> {
    const input = document === undefined ? undefined : serializeDocument(document)
    const result = await this.exec(args, input)
    if (result.exitCode !== 0) {
      throw new ClusterWriteError(ref, result.command, result.exitCode, result.stderr)
    }
    return result
  }

  private async exec(
    args: string[],
    input?: string
  ): Promise<CommandResult & { command: string }> {
    const fullArgs = [...this.globalArgs(), ...args]
    const command = [this.config.oc, ...fullArgs].join(' ')
    core.debug(`Running ${command}`)

    const result = await this.runner.run(this.config.oc, fullArgs, input)
    return { ...result, command }
  }

  private globalArgs(): string[] {
    const args: string[] = []
    if (this.config.server) {
      args.push(`--server=${this.config.server}`)
    }
    if (this.config.logLevel > 0) {
      args.push(`--v=${this.config.logLevel}`)
    }
    if (this.config.asUser) {
      args.push(`--as=${this.config.asUser}`)
    }
    return args
  }

  private namespaceArgs(ref: ObjectRef): string[] {
    return ref.namespace ? ['-n', ref.namespace] : []
  }
}

function withoutServerFields(document: DocumentMap): DocumentMap {
  const stripped: DocumentMap = { ...document }
  delete stripped.status
  if (!isDocumentMap(document.metadata)) {
    return stripped
  }

  const metadata: DocumentMap = { ...document.metadata }
  for (const field of KUBERNETES.SERVER_MANAGED_METADATA) {
    delete metadata[field]
  }
  if (isDocumentMap(metadata.annotations)) {
    const annotations: DocumentMap = { ...metadata.annotations }
    delete annotations[KUBERNETES.LAST_APPLIED_ANNOTATION]
    // An empty mapping would demand that the live object has no annotations
    if (Object.keys(annotations).length > 0) {
      metadata.annotations = annotations
    } else {
      delete metadata.annotations
    }
  }
  stripped.metadata = metadata
  return stripped
}
