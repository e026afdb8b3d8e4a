/**
 * Application-wide constants used across different modules.
 */

/**
 * API versions of the kinds this action synthesizes itself.
 * Any other kind falls back to `v1` unless the document says otherwise.
 */
const API_VERSIONS: Readonly<Record<string, string>> = {
  imagestream: 'image.openshift.io/v1',
  buildconfig: 'build.openshift.io/v1'
}

/**
 * Sequences found at these keys are sets as far as the API server is
 * concerned; their order is not significant.
 */
const UNORDERED_LIST_KEYS: readonly string[] = ['triggers']

/**
 * In-cluster registries. Pulling from these anonymously fails, so builds
 * have to reference their images through an ImageStreamTag instead.
 */
const DEFAULT_LOCAL_REGISTRIES: readonly string[] = [
  'docker-registry.default.svc:5000',
  'image-registry.openshift-image-registry.svc:5000'
]

/**
 * OpenShift / Kubernetes API constants
 */
export const KUBERNETES = {
  API_VERSIONS,

  DEFAULT_API_VERSION: 'v1',

  /**
   * stderr signature of `oc get` for an object that does not exist, e.g.
   * `Error from server (NotFound): imagestreams.image.openshift.io "foo" not found`
   */
  NOT_FOUND_PATTERN: /\(NotFound\)|\bnot found\b/,

  UNORDERED_LIST_KEYS,

  /** Metadata the API server maintains itself; a dry-run echoes it back */
  SERVER_MANAGED_METADATA: [
    'uid',
    'resourceVersion',
    'generation',
    'creationTimestamp',
    'managedFields',
    'selfLink'
  ],

  LAST_APPLIED_ANNOTATION: 'kubectl.kubernetes.io/last-applied-configuration',

  /** Marks an image reference that was pinned by an ImageStream trigger */
  DIGEST_MARKER: '@sha256:'
} as const

/**
 * Image registry constants
 */
export const REGISTRY = {
  DEFAULT_LOCAL_REGISTRIES,

  DEFAULT_TAG: 'latest',

  /** Used by the external-tag helper when a reference names no registry */
  DEFAULT_REGISTRY: 'docker.io',
  DEFAULT_NAMESPACE: 'library'
} as const

/**
 * Comment formatting constants
 */
export const COMMENTS = {
  DEFAULT_TITLE: 'OpenShift Reconciliation',

  /**
   * Text shown when a comment is continued in the next comment
   */
  CONTINUATION_TEXT: '\n\n---\n*Continued in next comment...*',

  /**
   * Header for continuation comments
   */
  CONTINUATION_HEADER: '## 🔧 {title} (continued)\n\n',

  /**
   * Header template for the comment section, with placeholders for dynamic values
   */
  HEADER_TEMPLATE: `## 🔧 {title}
{subtitle}
Reconciled **{totalCount}** objects: {createdCount} created, {updatedCount} updated, {deletedCount} deleted, {unchangedCount} unchanged{checkMode}

`,

  /**
   * Footer template for the comment section, with placeholders for dynamic values
   */
  FOOTER_TEMPLATE: `
<hr>

**Summary:** {createdCount} created, {updatedCount} updated, {deletedCount} deleted, {unchangedCount} unchanged

<details>
<summary>ℹ️ How to read this report</summary>

- ➕ **Created**: the object did not exist and was created
- 🔄 **Updated**: the live object did not match and was applied
- ➖ **Deleted**: the object was removed
- ✅ **Unchanged**: the live object already matched

Objects are identified by: \`{kind}/{namespace}/{name}\`
</details>
`
} as const

/**
 * GitHub API constants
 */
export const GITHUB = {
  /**
   * Maximum length for a GitHub comment before it needs to be split.
   * GitHub's actual limit is ~65536 chars, but we use a lower value for safety.
   */
  MAX_COMMENT_LENGTH: 60000,

  /**
   * Buffer space to reserve when calculating comment length limits.
   */
  COMMENT_LENGTH_BUFFER: 100
} as const
