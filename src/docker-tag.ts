import { REGISTRY } from './constants.js'
import { InvalidImageReferenceError } from './errors.js'
import { DockerTagRef, ExternalDockerTag } from './types.js'

const TAG_PATTERN = /^[\w][\w.-]{0,127}$/
const DIGEST_PATTERN = /^[a-z0-9]+(?:[+._-][a-z0-9]+)*:[a-f0-9]{32,}$/i
const PORT_PATTERN = /^\d+$/

/**
 * Parses an image reference such as `registry.example.com:5000/ns/name:1.2.3`.
 *
 * The first path segment is a registry host only if it contains a `.` or a
 * `:`; `ns/name` is a namespace and a repository, never a registry and a
 * repository.
 */
export function parseDockerTag(reference: string): DockerTagRef {
  const trimmed = reference.trim()
  if (!trimmed) {
    throw new InvalidImageReferenceError(reference, 'empty reference')
  }

  let remainder = trimmed
  let digest: string | undefined
  const at = remainder.indexOf('@')
  if (at !== -1) {
    digest = remainder.slice(at + 1)
    remainder = remainder.slice(0, at)
    if (!DIGEST_PATTERN.test(digest)) {
      throw new InvalidImageReferenceError(reference, `malformed digest "${digest}"`)
    }
  }

  let tag: string = REGISTRY.DEFAULT_TAG
  const lastColon = remainder.lastIndexOf(':')
  if (lastColon > remainder.lastIndexOf('/')) {
    tag = remainder.slice(lastColon + 1)
    remainder = remainder.slice(0, lastColon)
    if (!tag) {
      throw new InvalidImageReferenceError(reference, 'empty tag')
    }
    if (!TAG_PATTERN.test(tag)) {
      throw new InvalidImageReferenceError(reference, `malformed tag "${tag}"`)
    }
  }

  const segments = remainder.split('/')
  if (segments.some((segment) => !segment)) {
    throw new InvalidImageReferenceError(reference, 'empty path segment')
  }

  let registry: string | undefined
  if (segments.length > 1 && /[.:]/.test(segments[0])) {
    registry = segments.shift()
    const port = registry?.split(':')[1]
    if (port !== undefined && !PORT_PATTERN.test(port)) {
      throw new InvalidImageReferenceError(reference, `malformed port "${port}"`)
    }
  }

  const repository = segments.pop()
  if (!repository) {
    throw new InvalidImageReferenceError(reference, 'missing repository')
  }

  const parsed: DockerTagRef = { repository, tag }
  if (registry) parsed.registry = registry
  if (segments.length > 0) parsed.namespace = segments.join('/')
  if (digest) parsed.digest = digest
  return parsed
}

/**
 * Renders a parsed reference back as `registry/namespace/repository:tag`,
 * leaving out the parts that are absent.
 */
export function formatDockerTag(ref: DockerTagRef): string {
  const path = [ref.registry, ref.namespace, ref.repository]
    .filter((part): part is string => Boolean(part))
    .join('/')
  const pinned = ref.digest ? `@${ref.digest}` : ''
  return `${path}:${ref.tag}${pinned}`
}

/**
 * Describes an image from a public registry the way playbooks and
 * ImageStream declarations want to consume it.
 *
 * `"ubuntu:22.04"` yields `uri: docker.io/library/ubuntu`,
 * `qualified: docker.io/library/ubuntu:22.04` and `shortname: ubuntu`;
 * with `mirroredBase` set, `mirrored` names the same image under that prefix.
 */
export function describeExternalDockerTag(
  reference: string,
  mirroredBase?: string
): ExternalDockerTag {
  const ref = parseDockerTag(reference)

  const uriParts = ref.registry
    ? [ref.registry, ref.namespace, ref.repository]
    : [
        REGISTRY.DEFAULT_REGISTRY,
        ref.namespace ?? REGISTRY.DEFAULT_NAMESPACE,
        ref.repository
      ]
  const uri = uriParts
    .filter((part): part is string => Boolean(part))
    .join('/')

  const described: ExternalDockerTag = {
    shortname: ref.repository,
    uri,
    tag: ref.tag,
    qualified: `${uri}:${ref.tag}`
  }
  if (mirroredBase) {
    described.mirrored = `${mirroredBase.replace(/\/+$/, '')}/${ref.repository}:${ref.tag}`
  }
  return described
}
