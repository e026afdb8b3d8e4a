import * as yaml from 'js-yaml'
import { createTwoFilesPatch } from 'diff'
import { isScalar } from 'yaml'
import { KUBERNETES } from './constants.js'
import { isDocumentMap, toDocument } from './document.js'
import {
  ChangeRecord,
  ComparisonResult,
  DiffPoint,
  Document,
  DocumentMap,
  Scalar
} from './types.js'

export interface ComparatorOptions {
  /** Keys whose sequences are compared as multisets rather than by position */
  unorderedListKeys?: readonly string[]
}

/**
 * Decides whether a desired (partial) document is already satisfied by an
 * observed (complete) one.
 *
 * Mappings are compared key by key on the desired side only, so fields the
 * cluster adds (`status`, `metadata.resourceVersion`, defaults) never count
 * as differences. Sequences must match in length and position, except under
 * the keys listed in `unorderedListKeys` where every desired element only
 * has to be found somewhere in the observed sequence. An explicitly empty
 * mapping or sequence on the desired side requires the observed value to be
 * empty or missing as well.
 */
export class ManifestComparator {
  private readonly unorderedListKeys: readonly string[]

  constructor(options: ComparatorOptions = {}) {
    this.unorderedListKeys =
      options.unorderedListKeys ?? KUBERNETES.UNORDERED_LIST_KEYS
  }

  /**
   * Compares a desired object with the live one (`null` when it does not exist).
   */
  compare(desired: DocumentMap, observed: DocumentMap | null): ComparisonResult {
    if (observed === null) {
      return { status: 'absent' }
    }

    const diffs = this.findDiffPoints(desired, observed).filter(
      (diff) => !this.isDiffIrrelevant(diff)
    )
    return diffs.length === 0 ? { status: 'subset' } : { status: 'conflict', diffs }
  }

  isSubset(desired: DocumentMap, observed: DocumentMap | null): boolean {
    return this.compare(desired, observed).status === 'subset'
  }

  /**
   * Enumerates every point where `observed` fails to satisfy `desired`.
   */
  findDiffPoints(
    desired: Document | undefined,
    observed: Document | undefined,
    path: (string | number)[] = []
  ): DiffPoint[] {
    const wanted = normalize(desired)
    const actual = normalize(observed)
    const mismatch: DiffPoint[] = [{ path, observed: actual, desired: wanted }]

    // Below the root, an empty mapping or sequence asks for an empty one
    if (path.length > 0 && isEmptyStructure(wanted)) {
      return isEmptyOrMissing(actual) ? [] : mismatch
    }

    if (Array.isArray(wanted) && Array.isArray(actual)) {
      if (this.isUnordered(path)) {
        return this.findUnmatchedElements(wanted, actual, path)
      }
      if (wanted.length !== actual.length) {
        return mismatch
      }
      return wanted.flatMap((element, i) =>
        this.findDiffPoints(element, actual[i], [...path, i])
      )
    }

    if (isDocumentMap(wanted) && isDocumentMap(actual)) {
      // Keys that only exist on the live side were put there by the cluster
      return Object.keys(wanted).flatMap((key) =>
        this.findDiffPoints(wanted[key], actual[key], [...path, key])
      )
    }

    if (isScalarValue(wanted) && isScalarValue(actual)) {
      return scalarsEqual(wanted, actual) ? [] : mismatch
    }

    return mismatch
  }

  /**
   * True for differences the cluster itself introduces on purpose: a
   * container image that an ImageStream trigger pinned to a digest.
   */
  isDiffIrrelevant(diff: DiffPoint): boolean {
    const { path, observed, desired } = diff
    if (path.length <= 3) return false

    const listKey = path[path.length - 3]
    if (listKey !== 'containers' && listKey !== 'initContainers') return false
    if (path[path.length - 1] !== 'image') return false

    return (
      typeof observed === 'string' &&
      observed.includes(KUBERNETES.DIGEST_MARKER) &&
      !(typeof desired === 'string' && desired.includes(KUBERNETES.DIGEST_MARKER))
    )
  }

  /**
   * Renders a unified diff of the desired document against the parts of the
   * observed document it talks about.
   */
  renderDiff(desired: DocumentMap, observed: DocumentMap | null, label: string): string {
    const desiredYaml = yaml.dump(desired, { sortKeys: true })
    const observedYaml =
      observed === null ? '' : yaml.dump(project(desired, observed), { sortKeys: true })

    return createTwoFilesPatch(
      `desired/${label}`,
      `observed/${label}`,
      desiredYaml,
      observedYaml,
      '',
      ''
    )
  }

  /**
   * Turns diff points into before/after records suitable for output.
   */
  describeChanges(diffs: DiffPoint[]): ChangeRecord[] {
    return diffs.map((diff) => ({
      path: diff.path.join('.'),
      before: stringify(diff.observed),
      after: stringify(diff.desired)
    }))
  }

  private isUnordered(path: (string | number)[]): boolean {
    const last = path[path.length - 1]
    return typeof last === 'string' && this.unorderedListKeys.includes(last)
  }

  /**
   * Matches desired elements to distinct observed elements (augmenting-path
   * bipartite matching) and reports the desired elements left over.
   */
  private findUnmatchedElements(
    wanted: Document[],
    actual: Document[],
    path: (string | number)[]
  ): DiffPoint[] {
    const candidates = wanted.map((element, i) =>
      actual
        .map((_, j) => j)
        .filter((j) => this.findDiffPoints(element, actual[j], [...path, i]).length === 0)
    )
    const owner: (number | undefined)[] = new Array(actual.length).fill(undefined)

    const assign = (i: number, visited: Set<number>): boolean => {
      for (const j of candidates[i]) {
        if (visited.has(j)) continue
        visited.add(j)
        const current = owner[j]
        if (current === undefined || assign(current, visited)) {
          owner[j] = i
          return true
        }
      }
      return false
    }

    const unmatched: DiffPoint[] = []
    wanted.forEach((element, i) => {
      if (!assign(i, new Set())) {
        unmatched.push({ path: [...path, i], observed: null, desired: element })
      }
    })
    return unmatched
  }
}

function isScalarValue(value: Document): value is Scalar {
  return value === null || typeof value !== 'object'
}

function isEmptyStructure(value: Document): boolean {
  if (Array.isArray(value)) return value.length === 0
  return isDocumentMap(value) && Object.keys(value).length === 0
}

function isEmptyOrMissing(value: Document): boolean {
  return value === null || isEmptyStructure(value)
}

/**
 * Strips representation wrappers so that values compare by what they hold:
 * YAML scalar nodes and boxed primitives become plain values, a missing
 * value becomes `null`.
 */
function normalize(value: Document | undefined): Document {
  if (value === undefined) return null
  if (
    isScalar(value) ||
    value instanceof String ||
    value instanceof Number ||
    value instanceof Boolean
  ) {
    return toDocument(value)
  }
  return value
}

/**
 * The API server echoes some numbers back as strings (`cpu: 1` reads back
 * as `cpu: "1"`), so a number and its decimal rendering are equal.
 */
function scalarsEqual(wanted: Scalar, actual: Scalar): boolean {
  if (wanted === actual) return true
  if (typeof wanted === 'number' && typeof actual === 'string') {
    return String(wanted) === actual
  }
  if (typeof wanted === 'string' && typeof actual === 'number') {
    return wanted === String(actual)
  }
  return false
}

/**
 * Keeps only the parts of `observed` that `desired` mentions, so that a
 * rendered diff is not drowned in fields the cluster manages.
 */
function project(desired: Document, observed: Document): Document {
  if (isDocumentMap(desired) && isDocumentMap(observed)) {
    const projected: DocumentMap = {}
    for (const key of Object.keys(desired)) {
      if (key in observed) {
        projected[key] = project(desired[key], observed[key])
      }
    }
    return projected
  }

  if (Array.isArray(desired) && Array.isArray(observed)) {
    return observed.map((element, i) =>
      i < desired.length ? project(desired[i], element) : element
    )
  }

  return observed
}

function stringify(value: Document): string {
  if (value === null) return ''
  if (typeof value === 'object') return JSON.stringify(value)
  return String(value)
}
