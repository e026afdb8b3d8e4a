/**
 * A scalar value as found in a parsed YAML or JSON document
 */
export type Scalar = string | number | boolean | null

/**
 * Any value of a parsed YAML or JSON document
 */
export type Document = Scalar | Document[] | DocumentMap

/**
 * A mapping node; Kubernetes objects are always one of these at the top
 */
export interface DocumentMap {
  [key: string]: Document
}

/**
 * Identifies a unique cluster object
 */
export interface ObjectRef {
  /** The API version of the object, when known */
  apiVersion?: string
  /** The kind/type of the object */
  kind: string
  /** The name of the object */
  name: string
  /** The namespace of the object; absent for cluster-scoped kinds */
  namespace?: string
}

/** `present` ensures existence, `latest` ensures content, `absent` deletes */
export type ReconcileState = 'present' | 'latest' | 'absent'

export const RECONCILE_STATES: readonly ReconcileState[] = [
  'present',
  'latest',
  'absent'
]

/**
 * A point where the desired document is not satisfied by the observed one
 */
export interface DiffPoint {
  /** Keys and list indices leading from the document root to the discrepancy */
  path: (string | number)[]
  /** The value found on the cluster, `null` when missing */
  observed: Document
  /** The value that was asked for */
  desired: Document
}

export type ComparisonResult =
  | { status: 'subset' }
  | { status: 'conflict'; diffs: DiffPoint[] }
  | { status: 'absent' }

/**
 * Desired object text, either as the caller wrote it or already parsed
 */
export type DocumentSource =
  | { type: 'raw'; text: string }
  | { type: 'structured'; document: DocumentMap }

/**
 * One object to reconcile, as handed over by the caller
 */
export interface ObjectDeclaration {
  state?: ReconcileState
  kind?: string
  name?: string
  namespace?: string
  source: DocumentSource
}

/**
 * An `ObjectDeclaration` after validation: identity and body agree
 */
export interface CanonicalDeclaration {
  state: ReconcileState
  ref: ObjectRef
  desired: DocumentMap
}

export type ReconcileOperation = 'none' | 'create' | 'apply' | 'delete'

export type ReconcilePhase =
  | 'start'
  | 'fetched'
  | 'compared'
  | 'mutated'
  | 'done'
  | 'failed'

/**
 * Human-readable change record, one per relevant diff point
 */
export interface ChangeRecord {
  /** Dotted path of the change, or `(non-existent)` for a creation */
  path: string
  before: string
  after: string
}

export interface ReconcileResult {
  ref: ObjectRef
  /** Whether a mutation happened (or, in check mode, would have) */
  changed: boolean
  operation: ReconcileOperation
  /** The object as observed after reconciliation, `null` when absent */
  object: DocumentMap | null
  diff: ChangeRecord[]
  /** Every state the reconciliation went through, in order */
  transitions: ReconcilePhase[]
  checkMode: boolean
}

/**
 * The `from:` stanza of an ImageStream tag or a Docker build strategy
 */
export interface ImageSourceRef {
  kind: string
  name: string
  namespace?: string
}

export interface GitSource {
  repository: string
  ref?: string
  /** Sub-directory used as build context */
  path?: string
}

/**
 * High-level description of an ImageStream and, when it is built, its BuildConfig
 */
export interface BuildDeclaration {
  name: string
  namespace: string
  state?: ReconcileState
  /** Extra metadata (labels, annotations) for both objects */
  metadata?: DocumentMap
  tag?: string
  /** Image to mirror, or base image of the build */
  from?: string | ImageSourceRef | null
  dockerfile?: string
  git?: GitSource
  triggers?: DocumentMap[]
  /** Merged on top of the synthesized BuildConfig spec */
  spec?: DocumentMap
}

export interface KubernetesObject extends DocumentMap {
  apiVersion: string
  kind: string
  metadata: DocumentMap
}

export interface SynthesizedObjects {
  imageStream: KubernetesObject
  buildConfig: KubernetesObject | null
}

/**
 * Structured form of an image reference such as `registry:5000/ns/repo:tag`
 */
export interface DockerTagRef {
  registry?: string
  namespace?: string
  repository: string
  tag: string
  /** `sha256:…` when the reference is pinned by digest */
  digest?: string
}

/**
 * Image reference with public-registry defaults filled in
 */
export interface ExternalDockerTag {
  shortname: string
  uri: string
  tag: string
  qualified: string
  mirrored?: string
}
