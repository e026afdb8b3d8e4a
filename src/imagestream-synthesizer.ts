import * as core from '@actions/core'
import { ClusterConfig } from './config.js'
import { KUBERNETES, REGISTRY } from './constants.js'
import { parseDockerTag } from './docker-tag.js'
import { finalBaseImage, parseDockerfileStages } from './dockerfile.js'
import { deepMerge, isDocumentMap, toDocument } from './document.js'
import {
  InvalidBuildDeclarationError,
  InvalidImageReferenceError
} from './errors.js'
import { Reconciler } from './reconciler.js'
import {
  BuildDeclaration,
  Document,
  DocumentMap,
  DockerTagRef,
  ImageSourceRef,
  KubernetesObject,
  ReconcileResult,
  ReconcileState,
  SynthesizedObjects
} from './types.js'

export type SynthesizerConfig = Pick<ClusterConfig, 'localRegistries'>

/**
 * Turns a high-level "mirror this image" or "build this Dockerfile"
 * declaration into an ImageStream and, when something gets built, the
 * BuildConfig that builds it.
 *
 * - `from` without `dockerfile`/`git`: the ImageStream imports that image on
 *   a schedule, through the local registry.
 * - `dockerfile` or `git`: the ImageStream receives the build output. The
 *   BuildConfig builds on `from`, or, when `from` is not given and the
 *   Dockerfile's final stage starts from an image of the in-cluster
 *   registry, on the matching ImageStreamTag. Building on an ImageStreamTag
 *   adds an ImageChange trigger, so the image is rebuilt whenever its base
 *   changes.
 */
export function synthesize(
  declaration: BuildDeclaration,
  config: SynthesizerConfig
): SynthesizedObjects {
  const { name, namespace } = declaration
  if (!name) {
    throw new InvalidBuildDeclarationError('Missing field `name`', 'name')
  }
  if (!namespace) {
    throw new InvalidBuildDeclarationError('Missing field `namespace`', 'namespace')
  }
  const tag = declaration.tag || REGISTRY.DEFAULT_TAG

  const explicitFrom = normalizeFrom(declaration.from, namespace)
  const source = sourceStanza(declaration)

  if (!source) {
    if (declaration.spec !== undefined) {
      throw new InvalidBuildDeclarationError(
        '`spec` overrides the BuildConfig, but there is nothing to build: set `dockerfile` or `git`',
        'spec'
      )
    }
    const imageStreamSpec = explicitFrom ? mirrorSpec(explicitFrom, tag) : null
    return {
      imageStream: makeObject('ImageStream', declaration, imageStreamSpec),
      buildConfig: null
    }
  }

  // Each stanza below is derived from its own input; an absent `from`
  // contributes nothing, anywhere.
  const from =
    explicitFrom ??
    (typeof declaration.dockerfile === 'string' && !overridesBaseImage(declaration.spec)
      ? implicitLocalFrom(declaration.dockerfile, config)
      : null)

  const dockerStrategy: DocumentMap = { forcePull: true }
  if (from) {
    dockerStrategy.from = refToDocument(from)
  }

  const triggers: Document[] = (declaration.triggers ?? []).map((trigger) =>
    toDocument(trigger)
  )
  if (from && from.kind === 'ImageStreamTag' && !hasImageChangeTrigger(triggers)) {
    triggers.push({ type: 'ImageChange' })
  }

  const synthesized: DocumentMap = {
    source,
    output: { to: { kind: 'ImageStreamTag', name: `${name}:${tag}` } },
    strategy: { type: 'Docker', dockerStrategy },
    triggers
  }
  const buildConfigSpec = declaration.spec
    ? deepMerge(synthesized, declaration.spec)
    : synthesized

  return {
    imageStream: makeObject('ImageStream', declaration, null),
    buildConfig: makeObject('BuildConfig', declaration, buildConfigSpec)
  }
}

/**
 * Reconciles the ImageStream, then the BuildConfig if there is one.
 *
 * A failure on the BuildConfig leaves an ImageStream that was just created
 * in place; nothing is rolled back.
 */
export async function reconcileImageStream(
  reconciler: Reconciler,
  declaration: BuildDeclaration,
  config: SynthesizerConfig
): Promise<ReconcileResult[]> {
  const { imageStream, buildConfig } = synthesize(declaration, config)
  const state: ReconcileState = declaration.state ?? 'latest'

  // Deleting goes the other way round, so that no build fires in between
  const objects =
    state === 'absent'
      ? [buildConfig, imageStream]
      : [imageStream, buildConfig]

  const results: ReconcileResult[] = []
  for (const object of objects) {
    if (!object) continue
    results.push(
      await reconciler.reconcile({
        state,
        ref: {
          apiVersion: object.apiVersion,
          kind: object.kind,
          name: declaration.name,
          namespace: declaration.namespace
        },
        desired: object
      })
    )
  }
  return results
}

/**
 * Reads the `from` input: a structured reference is taken as is, a string
 * with a `/` is an external image, and a bare `stream[:tag]` names an
 * ImageStream of the same namespace.
 */
export function normalizeFrom(
  from: BuildDeclaration['from'],
  namespace: string
): ImageSourceRef | null {
  if (from === undefined || from === null || from === '') {
    return null
  }

  if (typeof from !== 'string') {
    if (!from.kind || !from.name) {
      throw new InvalidBuildDeclarationError(
        'A structured `from` needs both `kind` and `name`',
        'from'
      )
    }
    return from
  }

  if (from.includes('/')) {
    return { kind: 'DockerImage', name: from }
  }

  const [stream, streamTag = REGISTRY.DEFAULT_TAG, ...extra] = from.split(':')
  if (!stream || !streamTag || extra.length > 0) {
    throw new InvalidBuildDeclarationError(
      `Cannot read \`from: ${from}\` as an ImageStream name and tag`,
      'from'
    )
  }
  return { kind: 'ImageStreamTag', name: `${stream}:${streamTag}`, namespace }
}

/**
 * Finds the ImageStreamTag behind the final stage of a Dockerfile, when
 * that stage pulls from an in-cluster registry.
 */
export function implicitLocalFrom(
  dockerfile: string,
  config: SynthesizerConfig
): ImageSourceRef | null {
  const image = finalBaseImage(parseDockerfileStages(dockerfile))
  if (!image) return null

  let ref: DockerTagRef
  try {
    ref = parseDockerTag(image)
  } catch (error) {
    if (error instanceof InvalidImageReferenceError) {
      throw new InvalidBuildDeclarationError(
        `The Dockerfile's final FROM line has an invalid image: ${error.message}`,
        'dockerfile'
      )
    }
    throw error
  }

  if (!ref.registry || !config.localRegistries.includes(ref.registry)) {
    return null
  }
  if (!ref.namespace || ref.digest) {
    core.warning(
      `Not wiring ${image} into the BuildConfig: only namespace/stream:tag references map to an ImageStreamTag`
    )
    return null
  }
  return {
    kind: 'ImageStreamTag',
    name: `${ref.repository}:${ref.tag}`,
    namespace: ref.namespace
  }
}

function sourceStanza(declaration: BuildDeclaration): DocumentMap | null {
  const { dockerfile, git } = declaration
  const hasDockerfile = dockerfile !== undefined && dockerfile !== null
  const hasGit = git !== undefined && git !== null

  if (hasDockerfile && hasGit) {
    throw new InvalidBuildDeclarationError(
      'Set either `dockerfile` or `git`, not both',
      'dockerfile'
    )
  }

  if (hasDockerfile) {
    if (!dockerfile.trim()) {
      throw new InvalidBuildDeclarationError(
        '`dockerfile` must be the non-empty text of a Dockerfile',
        'dockerfile'
      )
    }
    // Fails early on a Dockerfile whose FROM lines cannot be read
    parseDockerfileStages(dockerfile)
    return { type: 'Dockerfile', dockerfile }
  }

  if (hasGit) {
    if (!git.repository) {
      throw new InvalidBuildDeclarationError(
        'Missing field `repository` under `git`',
        'git'
      )
    }
    const gitStanza: DocumentMap = { uri: git.repository }
    if (git.ref) {
      gitStanza.ref = git.ref
    }
    const stanza: DocumentMap = { type: 'Git', git: gitStanza }
    if (git.path) {
      stanza.contextDir = git.path
    }
    return stanza
  }

  return null
}

function mirrorSpec(from: ImageSourceRef, tag: string): DocumentMap {
  const tagSpec: DocumentMap = {
    name: tag,
    from: refToDocument(from),
    // `Source` keeps scheduled imports from ever updating the tag
    referencePolicy: { type: 'Local' }
  }
  if (from.kind === 'DockerImage') {
    tagSpec.importPolicy = { scheduled: true }
  }
  return { tags: [tagSpec] }
}

function makeObject(
  kind: 'ImageStream' | 'BuildConfig',
  declaration: BuildDeclaration,
  spec: DocumentMap | null
): KubernetesObject {
  const object: KubernetesObject = {
    apiVersion:
      KUBERNETES.API_VERSIONS[kind.toLowerCase()] ?? KUBERNETES.DEFAULT_API_VERSION,
    kind,
    metadata: {
      ...(declaration.metadata ?? {}),
      name: declaration.name,
      namespace: declaration.namespace
    }
  }
  if (spec) {
    object.spec = spec
  }
  return object
}

function refToDocument(ref: ImageSourceRef): DocumentMap {
  const document: DocumentMap = { kind: ref.kind, name: ref.name }
  if (ref.namespace) {
    document.namespace = ref.namespace
  }
  return document
}

/**
 * True when the `spec` overrides already name the base image of the build.
 */
function overridesBaseImage(spec: DocumentMap | undefined): boolean {
  const strategy = spec?.strategy
  if (!isDocumentMap(strategy)) return false
  const dockerStrategy = strategy.dockerStrategy
  return isDocumentMap(dockerStrategy) && isDocumentMap(dockerStrategy.from)
}

function hasImageChangeTrigger(triggers: Document[]): boolean {
  return triggers.some(
    (trigger) =>
      isDocumentMap(trigger) &&
      trigger.type === 'ImageChange' &&
      !(isDocumentMap(trigger.imageChange) && trigger.imageChange.from)
  )
}
