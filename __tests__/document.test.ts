import {
  deepMerge,
  parseDocuments,
  serializeDocument,
  toDocument
} from '../src/document.js'
import { DocumentMap } from '../src/types.js'

describe('parseDocuments', () => {
  it('should return one document per section', () => {
    expect(parseDocuments('a: 1\n---\nb: [x, "2"]\n')).toEqual([{ a: 1 }, { b: ['x', '2'] }])
  })

  it('should read JSON', () => {
    expect(parseDocuments('{"kind": "ConfigMap", "data": {"a": "1"}}')).toEqual([
      { kind: 'ConfigMap', data: { a: '1' } }
    ])
  })

  it('should fail on a syntax error', () => {
    expect(() => parseDocuments('data: [unclosed, array')).toThrow(
      /^Failed to parse YAML document: /
    )
  })
})

describe('serializeDocument', () => {
  it('should keep nulls and quote strings that look like numbers', () => {
    expect(serializeDocument({ a: null, b: '1', c: 1 })).toBe("a: null\nb: '1'\nc: 1\n")
  })
})

describe('toDocument', () => {
  it('should unwrap boxed primitives', () => {
    expect(toDocument(new String('x'))).toBe('x')
    expect(toDocument(new Number(3))).toBe(3)
    expect(toDocument(new Boolean(false))).toBe(false)
  })

  it('should convert nested values', () => {
    expect(
      toDocument({
        when: new Date('2024-05-01T00:00:00Z'),
        list: [new String('a'), undefined]
      })
    ).toEqual({ when: '2024-05-01T00:00:00.000Z', list: ['a', null] })
  })

  it('should reject values no document can hold', () => {
    expect(() => toDocument(() => 1)).toThrow('Unsupported function value in document')
  })
})

describe('deepMerge', () => {
  it('should merge mappings and replace everything else', () => {
    const base: DocumentMap = { a: { b: 1, c: [1, 2] }, d: 1 }

    expect(deepMerge(base, { a: { c: [3] }, e: 2 })).toEqual({
      a: { b: 1, c: [3] },
      d: 1,
      e: 2
    })
  })

  it('should leave its inputs alone', () => {
    const base: DocumentMap = { a: { b: 1 } }
    const override: DocumentMap = { a: { c: 2 } }

    const merged = deepMerge(base, override)
    merged.a = null

    expect(base).toEqual({ a: { b: 1 } })
    expect(override).toEqual({ a: { c: 2 } })
  })
})
