/**
 * Tests for mapping and relation helpers
 */

import { describe, expect, it } from 'vitest'

import {
  compose,
  composeChain,
  composeRelationDicts,
  identityMapping,
  invertMapping,
  isMonic,
  keysByValue,
  lookup,
  mappingToRelation,
  normalizeRelation,
  preimageIndex,
  relationFromPairs,
  relationToPairs,
  reverseRelation,
} from '../../src/utils/mapping'

describe('mappings', () => {
  it('looks up own keys only', () => {
    expect(lookup({ a: 'b' }, 'a')).toBe('b')
    expect(lookup({ a: 'b' }, 'toString')).toBeUndefined()
  })

  it('composes and drops keys without an image', () => {
    expect(compose({ a: 'x', b: 'y' }, { x: '1' })).toEqual({ a: '1' })
    expect(composeChain([{ a: 'x' }, { x: 'y' }, { y: 'z' }])).toEqual({ a: 'z' })
    expect(composeChain([])).toEqual({})
  })

  it('builds identities', () => {
    expect(identityMapping(['a', 'b'])).toEqual({ a: 'a', b: 'b' })
  })

  it('indexes preimages', () => {
    const mapping = { a: 'x', b: 'x', c: 'y' }
    expect(keysByValue(mapping, 'x')).toEqual(['a', 'b'])
    expect(preimageIndex(mapping).get('x')).toEqual(['a', 'b'])
    expect(preimageIndex(mapping).get('z')).toBeUndefined()
  })

  it('inverts monic mappings only', () => {
    expect(isMonic({ a: 'x', b: 'y' })).toBe(true)
    expect(isMonic({ a: 'x', b: 'x' })).toBe(false)
    expect(invertMapping({ a: 'x', b: 'y' })).toEqual({ x: 'a', y: 'b' })
    expect(invertMapping({ a: 'x', b: 'x' })).toBeUndefined()
  })
})

describe('relations', () => {
  it('converts between pairs and sets', () => {
    const relation = relationFromPairs([
      ['a', 'x'],
      ['a', 'y'],
      ['b', 'x'],
    ])
    expect(relation).toEqual({ a: new Set(['x', 'y']), b: new Set(['x']) })
    expect(relationToPairs(relation)).toEqual([
      ['a', 'x'],
      ['a', 'y'],
      ['b', 'x'],
    ])
    expect(reverseRelation(relation)).toEqual({
      x: new Set(['a', 'b']),
      y: new Set(['a']),
    })
  })

  it('accepts single ids or collections', () => {
    expect(normalizeRelation({ a: 'x', b: ['x', 'y'] })).toEqual({
      a: new Set(['x']),
      b: new Set(['x', 'y']),
    })
    expect(mappingToRelation({ a: 'x' })).toEqual({ a: new Set(['x']) })
  })

  it('composes relations', () => {
    const left = normalizeRelation({ a: ['x', 'y'], b: 'z' })
    const right = normalizeRelation({ x: '1', y: ['1', '2'] })
    expect(composeRelationDicts(left, right)).toEqual({ a: new Set(['1', '2']) })
  })

  it('treats object member names as ordinary ids', () => {
    expect(
      relationFromPairs([
        ['toString', 'a'],
        ['toString', 'b'],
      ]),
    ).toEqual({ toString: new Set(['a', 'b']) })
    expect(composeRelationDicts(normalizeRelation({ a: 'constructor' }), {})).toEqual({})
    expect(lookup({}, 'toString')).toBeUndefined()
    expect(compose({ a: 'constructor' }, {})).toEqual({})
  })
})
