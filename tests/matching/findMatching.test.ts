/**
 * Tests for pattern matching
 */

import { describe, expect, it } from 'vitest'

import { RewritingTypingError } from '../../src/core/errors'
import { buildTypedGraph } from '../../src/graphs/typedGraph'
import { findMatching } from '../../src/matching/findMatching'

const graph = buildTypedGraph(
  [['u', { t: 'agent' }], ['v', { t: 'agent' }], ['w', { t: 'region' }]],
  [
    ['u', 'w'],
    ['v', 'w'],
  ],
)

describe('findMatching', () => {
  it('finds every placement of an edge', () => {
    const pattern = buildTypedGraph(['a', 'r'], [['a', 'r']])
    expect(findMatching(graph, pattern)).toEqual([
      { r: 'w', a: 'u' },
      { r: 'w', a: 'v' },
    ])
  })

  it('requires pattern attributes on the host', () => {
    const pattern = buildTypedGraph([['a', { t: 'region' }]])
    expect(findMatching(graph, pattern)).toEqual([{ a: 'w' }])
  })

  it('requires edge attributes on the host', () => {
    const pattern = buildTypedGraph(['a', 'r'], [['a', 'r', { w: 1 }]])
    expect(findMatching(graph, pattern)).toEqual([])
  })

  it('only returns injective matches', () => {
    const pattern = buildTypedGraph(['a', 'b'])
    const host = buildTypedGraph(['u', 'v'])
    expect(findMatching(host, pattern)).toEqual([
      { a: 'u', b: 'v' },
      { a: 'v', b: 'u' },
    ])
    expect(findMatching(buildTypedGraph(['u']), pattern)).toEqual([])
  })

  it('matches self-loops onto self-loops only', () => {
    const pattern = buildTypedGraph(['a'], [['a', 'a']])
    const host = buildTypedGraph(['u', 'v'], [['v', 'v']])
    expect(findMatching(host, pattern)).toEqual([{ a: 'v' }])
  })

  it('returns one empty match for an empty pattern', () => {
    expect(findMatching(graph, buildTypedGraph([]))).toEqual([{}])
  })
})

describe('typed matching', () => {
  const graphTyping = { T: { u: 'agent_t', v: 'other_t', w: 'region_t' } }
  const pattern = buildTypedGraph(['a', 'r'], [['a', 'r']])

  it('keeps matches agreeing with the pattern typing', () => {
    expect(
      findMatching(graph, pattern, {
        patternTyping: { T: { a: 'agent_t' } },
        graphTyping,
      }),
    ).toEqual([{ r: 'w', a: 'u' }])
  })

  it('rejects typing by a graph the host is not typed by', () => {
    expect(() =>
      findMatching(graph, pattern, { patternTyping: { T: { a: 'agent_t' } } }),
    ).toThrow(RewritingTypingError)
  })

  it('rejects a total typing that leaves nodes untyped', () => {
    expect(() =>
      findMatching(graph, pattern, {
        patternTyping: { T: [{ a: 'agent_t' }, true] },
        graphTyping,
      }),
    ).toThrow(RewritingTypingError)
  })

  it('rejects typing of unknown pattern nodes', () => {
    expect(() =>
      findMatching(graph, pattern, {
        patternTyping: { T: { z: 'agent_t' } },
        graphTyping,
      }),
    ).toThrow('Pattern typing by "T" refers to "z" which is not a pattern node')
  })
})
