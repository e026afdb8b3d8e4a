import * as core from '@actions/core'
import { ClusterAccessor } from './cluster-accessor.js'
import { ClusterConfig } from './config.js'
import { KUBERNETES } from './constants.js'
import { isDocumentMap, serializeDocument } from './document.js'
import {
  ClusterWriteError,
  describeRef,
  NonConvergentMutationError
} from './errors.js'
import { ManifestComparator } from './manifest-comparator.js'
import {
  CanonicalDeclaration,
  ChangeRecord,
  ComparisonResult,
  DocumentMap,
  ReconcileOperation,
  ReconcilePhase,
  ReconcileResult
} from './types.js'

export type ReconcilerConfig = Pick<ClusterConfig, 'force' | 'checkMode'>

/**
 * Brings one cluster object in line with its declaration:
 * fetch, compare, then create or apply only when needed, and read the
 * object back once to make sure the mutation took.
 *
 * A declaration that does not already match is first normalized by the API
 * server (a dry-run), and that form is what gets compared and verified, so
 * values the server defaults or drops do not count as differences.
 *
 * `present` only cares that the object exists, `latest` that every declared
 * field matches, `absent` that it is gone.
 */
export class Reconciler {
  constructor(
    private readonly accessor: ClusterAccessor,
    private readonly config: ReconcilerConfig,
    private readonly comparator: ManifestComparator = new ManifestComparator()
  ) {}

  async reconcile(declaration: CanonicalDeclaration): Promise<ReconcileResult> {
    const { state, ref, desired } = declaration
    const label = describeRef(ref)
    const transitions: ReconcilePhase[] = []
    const enter = (phase: ReconcilePhase): void => {
      transitions.push(phase)
      core.debug(`${label}: ${phase}`)
    }
    const finish = (
      changed: boolean,
      operation: ReconcileOperation,
      object: DocumentMap | null,
      diff: ChangeRecord[] = []
    ): ReconcileResult => {
      enter('done')
      return {
        ref,
        changed,
        operation,
        object,
        diff,
        transitions,
        checkMode: this.config.checkMode
      }
    }

    enter('start')
    try {
      const observed = await this.accessor.get(ref)
      enter('fetched')

      if (state === 'absent') {
        return await this.remove(declaration, observed, enter, finish)
      }

      let expected = desired
      let comparison = this.comparator.compare(desired, observed)
      if (state === 'latest' && comparison.status !== 'subset') {
        expected = await this.accessor.normalize(ref, desired)
        comparison = this.comparator.compare(expected, observed)
      }
      enter('compared')

      if (observed === null || comparison.status === 'absent') {
        return await this.mutate('create', declaration, expected, null, comparison, enter, finish)
      }
      if (state === 'present' || comparison.status === 'subset') {
        core.info(`${label} is up to date`)
        return finish(false, 'none', observed)
      }
      return await this.mutate('apply', declaration, expected, observed, comparison, enter, finish)
    } catch (error) {
      enter('failed')
      throw error
    }
  }

  private async mutate(
    operation: 'create' | 'apply',
    { state, ref, desired }: CanonicalDeclaration,
    expected: DocumentMap,
    observed: DocumentMap | null,
    comparison: ComparisonResult,
    enter: (phase: ReconcilePhase) => void,
    finish: FinishFn
  ): Promise<ReconcileResult> {
    const label = describeRef(ref)
    const diff: ChangeRecord[] =
      comparison.status === 'conflict'
        ? this.comparator.describeChanges(comparison.diffs)
        : [{ path: '(non-existent)', before: '', after: serializeDocument(desired) }]

    if (this.config.checkMode) {
      core.info(`${label} would be ${operation === 'create' ? 'created' : 'updated'}`)
      return finish(true, operation, observed, diff)
    }

    if (operation === 'create') {
      await this.accessor.create(ref, desired)
    } else {
      await this.accessor.apply(ref, withResourceVersion(desired, observed))
    }
    enter('mutated')

    const converged = await this.accessor.get(ref)
    const verification: ComparisonResult =
      state === 'present' && converged !== null
        ? { status: 'subset' }
        : this.comparator.compare(expected, converged)
    if (verification.status !== 'subset') {
      const diffs =
        verification.status === 'conflict'
          ? verification.diffs
          : [{ path: [], observed: null, desired: expected }]
      throw new NonConvergentMutationError(
        ref,
        diffs,
        this.comparator.renderDiff(expected, converged, label)
      )
    }

    core.info(`${operation === 'create' ? 'Created' : 'Updated'} ${label}`)
    return finish(true, operation, converged, diff)
  }

  private async remove(
    { ref }: CanonicalDeclaration,
    observed: DocumentMap | null,
    enter: (phase: ReconcilePhase) => void,
    finish: FinishFn
  ): Promise<ReconcileResult> {
    const label = describeRef(ref)
    enter('compared')

    if (observed === null && !this.config.force) {
      core.info(`${label} is already absent`)
      return finish(false, 'none', null)
    }

    const diff: ChangeRecord[] = [
      {
        path: '(deleted)',
        before: observed === null ? '' : serializeDocument(observed),
        after: ''
      }
    ]
    if (this.config.checkMode) {
      core.info(`${label} would be deleted`)
      return finish(true, 'delete', observed, diff)
    }

    try {
      await this.accessor.delete(ref)
    } catch (error) {
      // A forced delete of an object that was never there is not a failure
      if (
        error instanceof ClusterWriteError &&
        observed === null &&
        KUBERNETES.NOT_FOUND_PATTERN.test(error.stderr)
      ) {
        return finish(false, 'none', null)
      }
      throw error
    }
    enter('mutated')

    core.info(`Deleted ${label}`)
    return finish(true, 'delete', null, diff)
  }
}

type FinishFn = (
  changed: boolean,
  operation: ReconcileOperation,
  object: DocumentMap | null,
  diff?: ChangeRecord[]
) => ReconcileResult

/**
 * Carries the live `metadata.resourceVersion` over into an update, so that
 * the API server rejects it if someone else changed the object since it was
 * read.
 */
export function withResourceVersion(
  desired: DocumentMap,
  observed: DocumentMap | null
): DocumentMap {
  const desiredMetadata = isDocumentMap(desired.metadata) ? desired.metadata : {}
  const observedMetadata = observed?.metadata
  if (!isDocumentMap(observedMetadata) || 'resourceVersion' in desiredMetadata) {
    return desired
  }

  const resourceVersion = observedMetadata.resourceVersion
  if (typeof resourceVersion !== 'string' && typeof resourceVersion !== 'number') {
    return desired
  }
  return {
    ...desired,
    metadata: { ...desiredMetadata, resourceVersion: String(resourceVersion) }
  }
}
