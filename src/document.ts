import * as yaml from 'js-yaml'
import { isScalar, parseAllDocuments } from 'yaml'
import { Document, DocumentMap } from './types.js'

/**
 * Parses YAML (or JSON) text into plain documents, one per `---` section.
 *
 * Throws on the first syntax error, with the parser's message.
 */
export function parseDocuments(text: string): Document[] {
  const documents: Document[] = []
  for (const parsed of parseAllDocuments(text)) {
    const [error] = parsed.errors
    if (error) {
      throw new SyntaxError(`Failed to parse YAML document: ${error.message}`)
    }
    documents.push(toDocument(parsed.toJS()))
  }
  return documents
}

/**
 * Serializes a document for `oc apply -f -` / `oc create -f -`.
 * YAML rather than JSON, so that `null` values survive.
 */
export function serializeDocument(document: Document): string {
  return yaml.dump(document, { noRefs: true, lineWidth: -1 })
}

/**
 * Converts an arbitrary value into a plain document, unwrapping YAML nodes
 * and boxed primitives.
 */
export function toDocument(value: unknown): Document {
  if (value === null || value === undefined) return null
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value
  }
  if (isScalar(value)) return toDocument(value.value)
  if (
    value instanceof String ||
    value instanceof Number ||
    value instanceof Boolean
  ) {
    return value.valueOf()
  }
  if (value instanceof Date) return value.toISOString()
  if (Array.isArray(value)) return value.map((element) => toDocument(element))
  if (typeof value === 'object') {
    const map: DocumentMap = {}
    for (const [key, entry] of Object.entries(value)) {
      map[key] = toDocument(entry)
    }
    return map
  }
  throw new TypeError(`Unsupported ${typeof value} value in document`)
}

export function isDocumentMap(value: Document | undefined): value is DocumentMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Returns `base` with `override` merged on top: mappings merge key by key,
 * anything else in `override` replaces what `base` had. Neither input is
 * modified.
 */
export function deepMerge(base: DocumentMap, override: DocumentMap): DocumentMap {
  const merged: DocumentMap = structuredClone(base)
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key]
    merged[key] =
      isDocumentMap(value) && isDocumentMap(current)
        ? deepMerge(current, value)
        : structuredClone(value)
  }
  return merged
}
