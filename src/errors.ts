import { DiffPoint, ObjectRef } from './types.js'

/**
 * Base class of every error this action raises on purpose.
 * Anything else reaching `run()` is a bug.
 */
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'ReconcileError'
  }
}

/**
 * The CLI could not be run at all (missing binary, killed, timed out).
 */
export class ClusterCommandError extends ReconcileError {
  constructor(
    message: string,
    public readonly command: string
  ) {
    super(message, 'CLUSTER_COMMAND_ERROR', { command })
    this.name = 'ClusterCommandError'
  }
}

/**
 * `get` exited non-zero for a reason other than the object not existing.
 */
export class ClusterReadError extends ReconcileError {
  constructor(
    public readonly ref: ObjectRef,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(
      `Unable to read ${describeRef(ref)} (exit code ${exitCode}): ${stderr.trim()}`,
      'CLUSTER_READ_ERROR',
      { command, exitCode, stderr }
    )
    this.name = 'ClusterReadError'
  }
}

/**
 * `apply`, `create` or `delete` exited non-zero.
 */
export class ClusterWriteError extends ReconcileError {
  constructor(
    public readonly ref: ObjectRef,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(
      `Unable to write ${describeRef(ref)} (exit code ${exitCode}): ${stderr.trim()}`,
      'CLUSTER_WRITE_ERROR',
      { command, exitCode, stderr }
    )
    this.name = 'ClusterWriteError'
  }
}

/**
 * The cluster accepted a mutation but the object read back still does not
 * match, typically because of a defaulting or mutating webhook.
 */
export class NonConvergentMutationError extends ReconcileError {
  constructor(
    public readonly ref: ObjectRef,
    public readonly diffs: DiffPoint[],
    public readonly patch: string
  ) {
    super(
      `${describeRef(ref)} still differs from the desired state after the mutation was accepted:\n${patch}`,
      'NON_CONVERGENT_MUTATION',
      { diffs }
    )
    this.name = 'NonConvergentMutationError'
  }
}

export class InvalidObjectDeclarationError extends ReconcileError {
  constructor(message: string) {
    super(message, 'INVALID_OBJECT_DECLARATION')
    this.name = 'InvalidObjectDeclarationError'
  }
}

export class InvalidBuildDeclarationError extends ReconcileError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 'INVALID_BUILD_DECLARATION', { field })
    this.name = 'InvalidBuildDeclarationError'
  }
}

export class InvalidImageReferenceError extends ReconcileError {
  constructor(
    public readonly reference: string,
    reason: string
  ) {
    super(
      `Invalid image reference "${reference}": ${reason}`,
      'INVALID_IMAGE_REFERENCE',
      { reference }
    )
    this.name = 'InvalidImageReferenceError'
  }
}

/**
 * Formats an object reference as `kind/namespace/name`.
 */
export function describeRef(ref: ObjectRef): string {
  return ref.namespace
    ? `${ref.kind}/${ref.namespace}/${ref.name}`
    : `${ref.kind}/${ref.name}`
}
