import * as core from '@actions/core'
import { KUBERNETES } from './constants.js'
import { isDocumentMap, parseDocuments } from './document.js'
import {
  InvalidBuildDeclarationError,
  InvalidObjectDeclarationError
} from './errors.js'
import {
  BuildDeclaration,
  CanonicalDeclaration,
  Document,
  DocumentMap,
  DocumentSource,
  GitSource,
  ImageSourceRef,
  ObjectDeclaration,
  ObjectRef,
  RECONCILE_STATES,
  ReconcileState
} from './types.js'

/**
 * Resolves what the caller handed over (literal text or an already parsed
 * document, plus optional identity fields) into the one canonical form the
 * reconciler works on.
 *
 * Identity found in the document wins over the separate `kind`, `name` and
 * `namespace` fields; whatever the document lacks is filled in from them.
 */
export function resolveDeclaration(
  declaration: ObjectDeclaration
): CanonicalDeclaration {
  const body = loadSource(declaration.source)

  if (body.metadata !== undefined && !isDocumentMap(body.metadata)) {
    throw new InvalidObjectDeclarationError('`metadata` must be a mapping')
  }
  const metadata: DocumentMap = isDocumentMap(body.metadata) ? body.metadata : {}

  const kind = pick('kind', stringField(body.kind), declaration.kind)
  const name = pick('name', stringField(metadata.name), declaration.name)
  const namespace = pick(
    'namespace',
    stringField(metadata.namespace),
    declaration.namespace
  )

  if (!kind) {
    throw new InvalidObjectDeclarationError(
      'Object kind is missing: set `kind` in the document or as an input'
    )
  }
  if (!name) {
    throw new InvalidObjectDeclarationError(
      'Object name is missing: set `metadata.name` in the document or `name` as an input'
    )
  }

  const apiVersion =
    stringField(body.apiVersion) ?? KUBERNETES.API_VERSIONS[kind.toLowerCase()]

  const desired: DocumentMap = {
    ...body,
    kind,
    metadata: { ...metadata, name, ...(namespace ? { namespace } : {}) }
  }
  if (apiVersion) {
    desired.apiVersion = apiVersion
  }

  const ref: ObjectRef = { kind, name }
  if (apiVersion) ref.apiVersion = apiVersion
  if (namespace) ref.namespace = namespace

  return { state: declaration.state ?? 'latest', ref, desired }
}

/**
 * Reads an ImageStream declaration written in YAML, checking the type of
 * every field it knows about. `name` and `namespace` fall back to
 * `defaults` when the YAML leaves them out.
 */
export function parseBuildDeclaration(
  text: string,
  defaults: { name?: string; namespace?: string; state?: ReconcileState } = {}
): BuildDeclaration {
  let documents: Document[]
  try {
    documents = parseDocuments(text)
  } catch (error) {
    throw new InvalidBuildDeclarationError(`${error}`)
  }
  const [body] = documents
  if (documents.length !== 1 || !isDocumentMap(body)) {
    throw new InvalidBuildDeclarationError('The declaration must be one YAML mapping')
  }

  const declaration: BuildDeclaration = {
    name: optionalString(body, 'name') ?? defaults.name ?? '',
    namespace: optionalString(body, 'namespace') ?? defaults.namespace ?? ''
  }

  const state = optionalString(body, 'state') ?? defaults.state
  if (state !== undefined) {
    const known = RECONCILE_STATES.find((candidate) => candidate === state)
    if (!known) {
      throw new InvalidBuildDeclarationError(`Unknown state "${state}"`, 'state')
    }
    declaration.state = known
  }

  const tag = body.tag
  if (typeof tag === 'number') {
    declaration.tag = String(tag)
  } else if (tag !== undefined && tag !== null) {
    declaration.tag = optionalString(body, 'tag')
  }

  const metadata = optionalMap(body, 'metadata')
  if (metadata) declaration.metadata = metadata
  const spec = optionalMap(body, 'spec')
  if (spec) declaration.spec = spec

  const dockerfile = optionalString(body, 'dockerfile')
  if (dockerfile !== undefined) declaration.dockerfile = dockerfile

  const from = readFrom(body.from)
  if (from !== undefined) declaration.from = from

  const git = optionalMap(body, 'git')
  if (git) declaration.git = readGit(git)

  const triggers = body.triggers
  if (triggers !== undefined && triggers !== null) {
    if (!Array.isArray(triggers) || !triggers.every(isDocumentMap)) {
      throw new InvalidBuildDeclarationError(
        '`triggers` must be a list of mappings',
        'triggers'
      )
    }
    declaration.triggers = triggers.filter(isDocumentMap)
  }

  return declaration
}

function readFrom(value: Document | undefined): string | ImageSourceRef | null | undefined {
  if (value === undefined || value === null || typeof value === 'string') {
    return value
  }
  if (!isDocumentMap(value)) {
    throw new InvalidBuildDeclarationError(
      '`from` must be an image reference or a mapping',
      'from'
    )
  }
  const ref: ImageSourceRef = {
    kind: optionalString(value, 'kind', 'from') ?? '',
    name: optionalString(value, 'name', 'from') ?? ''
  }
  const namespace = optionalString(value, 'namespace', 'from')
  if (namespace) ref.namespace = namespace
  return ref
}

function readGit(git: DocumentMap): GitSource {
  const source: GitSource = {
    repository: optionalString(git, 'repository', 'git') ?? ''
  }
  const ref = optionalString(git, 'ref', 'git')
  if (ref) source.ref = ref
  const path = optionalString(git, 'path', 'git')
  if (path) source.path = path
  return source
}

function optionalString(
  map: DocumentMap,
  key: string,
  parent?: string
): string | undefined {
  const value = map[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    const field = parent ? `${parent}.${key}` : key
    throw new InvalidBuildDeclarationError(`\`${field}\` must be a string`, field)
  }
  return value
}

function optionalMap(map: DocumentMap, key: string): DocumentMap | undefined {
  const value = map[key]
  if (value === undefined || value === null) return undefined
  if (!isDocumentMap(value)) {
    throw new InvalidBuildDeclarationError(`\`${key}\` must be a mapping`, key)
  }
  return value
}

function loadSource(source: DocumentSource): DocumentMap {
  if (source.type === 'structured') {
    return source.document
  }

  let documents: Document[]
  try {
    documents = parseDocuments(source.text)
  } catch (error) {
    throw new InvalidObjectDeclarationError(`${error}`)
  }

  const [body] = documents
  if (documents.length !== 1) {
    throw new InvalidObjectDeclarationError(
      `Expected exactly one object in the content, found ${documents.length}`
    )
  }
  if (!isDocumentMap(body)) {
    throw new InvalidObjectDeclarationError('The content must be a YAML mapping')
  }
  return body
}

function stringField(value: Document | undefined): string | undefined {
  return typeof value === 'string' && value ? value : undefined
}

/**
 * Prefers the value found in the document, warning when the separate input
 * says something else.
 */
function pick(
  field: string,
  fromDocument: string | undefined,
  fromInput: string | undefined
): string | undefined {
  if (fromDocument && fromInput && fromDocument !== fromInput) {
    core.warning(
      `Ignoring ${field} "${fromInput}": the document says "${fromDocument}"`
    )
  }
  return fromDocument ?? (fromInput ? fromInput : undefined)
}
