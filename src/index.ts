export { ClusterAccessor, execaRunner } from './cluster-accessor.js'
export type { CommandResult, CommandRunner } from './cluster-accessor.js'
export { DEFAULT_CLUSTER_CONFIG, DEFAULT_REPORT_CONFIG, readConfig } from './config.js'
export type { ActionConfig, ClusterConfig, Operation, ReportConfig } from './config.js'
export { parseBuildDeclaration, resolveDeclaration } from './declaration.js'
export {
  describeExternalDockerTag,
  formatDockerTag,
  parseDockerTag
} from './docker-tag.js'
export { finalBaseImage, parseDockerfileStages } from './dockerfile.js'
export type { DockerfileStage } from './dockerfile.js'
export { deepMerge, parseDocuments, serializeDocument, toDocument } from './document.js'
export * from './errors.js'
export {
  implicitLocalFrom,
  normalizeFrom,
  reconcileImageStream,
  synthesize
} from './imagestream-synthesizer.js'
export { ManifestComparator } from './manifest-comparator.js'
export { Reconciler, withResourceVersion } from './reconciler.js'
export { run } from './main.js'
export * from './types.js'
