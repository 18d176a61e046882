/**
 * Tests for hierarchy construction
 *
 * Covers:
 * - graphs, rules, typings and relations
 * - commutation of typing paths and cycle rejection
 * - removal with reconnection, renaming, copies and JSON
 */

import { beforeEach, describe, expect, it } from 'vitest'

import {
  GraphStructureError,
  HierarchyConsistencyError,
  InvalidHomomorphismError,
  ParsingError,
} from '../../src/core/errors'
import { buildTypedGraph } from '../../src/graphs/typedGraph'
import { createHierarchy, type Hierarchy } from '../../src/hierarchy/hierarchy'
import { hierarchyFromJson, hierarchyToJson } from '../../src/hierarchy/json'
import { ruleFromTransform } from '../../src/rules/rule'

/** A -> B -> C with B typed partially by C, plus X related to B. */
const chain = (): Hierarchy => {
  const hierarchy = createHierarchy()
  hierarchy.addGraph('C', buildTypedGraph(['c1', 'c2']))
  hierarchy.addGraph('B', buildTypedGraph(['b1', 'b2']))
  hierarchy.addGraph('A', buildTypedGraph(['a']), { label: 'top' })
  hierarchy.addGraph('X', buildTypedGraph(['x1', 'x2']))
  hierarchy.addTyping('B', 'C', { b1: 'c1' })
  hierarchy.addTyping('A', 'B', { a: 'b1' })
  hierarchy.addRelation('B', 'X', { b1: ['x1', 'x2'] })
  return hierarchy
}

describe('graphs and typings', () => {
  let hierarchy: Hierarchy

  beforeEach(() => {
    hierarchy = chain()
  })

  it('lists what was added', () => {
    expect(hierarchy.graphs()).toEqual(['C', 'B', 'A', 'X'])
    expect(hierarchy.typings()).toEqual([
      ['B', 'C'],
      ['A', 'B'],
    ])
    expect(hierarchy.successors('A')).toEqual(['B'])
    expect(hierarchy.predecessors('C')).toEqual(['B'])
    expect(hierarchy.getAttrs('A')).toEqual({ label: new Set(['top']) })
  })

  it('stores copies of the graphs it is given', () => {
    const graph = buildTypedGraph(['n'])
    hierarchy.addGraph('N', graph)
    graph.addNode('m')
    expect(hierarchy.getGraph('N').nodes()).toEqual(['n'])
  })

  it('hands out copies of its graphs and rules', () => {
    hierarchy.getGraph('A').addNode('extra')
    expect(hierarchy.getGraph('A').nodes()).toEqual(['a'])

    hierarchy.addRule('r', ruleFromTransform(buildTypedGraph(['p'])))
    hierarchy.getRule('r').injectAddNode('q')
    expect(hierarchy.getRule('r').rhs.nodes()).toEqual(['p'])
  })

  it('composes typings along paths', () => {
    expect(hierarchy.getTyping('A', 'C')).toEqual({ a: 'c1' })
    expect(hierarchy.getTyping('B', 'B')).toEqual({ b1: 'b1', b2: 'b2' })
    expect(() => hierarchy.getTyping('C', 'A')).toThrow(GraphStructureError)
    expect(hierarchy.composePathTyping(['A', 'B', 'C'])).toEqual({
      kind: 'graph',
      mapping: { a: 'c1' },
    })
  })

  it('reports ancestors and descendants with their typings', () => {
    expect(hierarchy.getAncestors('C')).toEqual({ B: { b1: 'c1' }, A: { a: 'c1' } })
    expect(hierarchy.getDescendants('A')).toEqual({ B: { a: 'b1' }, C: { a: 'c1' } })
    expect(hierarchy.ancestorOrder('C')).toEqual(['B', 'A'])
    expect(hierarchy.descendantOrder('A')).toEqual(['B', 'C'])
  })

  it('rejects duplicates and graphs of the wrong kind', () => {
    expect(() => hierarchy.addGraph('A', buildTypedGraph([]))).toThrow(GraphStructureError)
    expect(() =>
      hierarchy.addGraph('U', buildTypedGraph([], [], { directed: false })),
    ).toThrow(HierarchyConsistencyError)
    expect(() => hierarchy.addTyping('B', 'C', { b1: 'c1' })).toThrow(GraphStructureError)
  })

  it('rejects typings that are not homomorphisms', () => {
    const other = createHierarchy()
    other.addGraph('G', buildTypedGraph(['u', 'v'], [['u', 'v']]))
    other.addGraph('T', buildTypedGraph(['t']))
    expect(() => other.addTyping('G', 'T', { u: 't', v: 't' })).toThrow(
      InvalidHomomorphismError,
    )
    expect(() => other.addTyping('G', 'T', { u: 't' }, { total: true })).toThrow(
      InvalidHomomorphismError,
    )
    expect(other.typings()).toEqual([])
  })

  it('rejects cycles', () => {
    expect(() => hierarchy.addTyping('C', 'A', {})).toThrow(HierarchyConsistencyError)
    expect(() => hierarchy.addTyping('A', 'A', {})).toThrow(HierarchyConsistencyError)
  })

  it('rejects shortcuts that disagree with an existing path', () => {
    expect(() => hierarchy.addTyping('A', 'C', { a: 'c2' })).toThrow(
      'Typing "A" -> "C" does not commute with an existing path from "A" to "C"',
    )
    hierarchy.addTyping('A', 'C', { a: 'c1' })
    expect(hierarchy.successors('A')).toEqual(['B', 'C'])
  })

  it('checks every path closed by a new typing', () => {
    hierarchy.addGraph('D', buildTypedGraph(['d']))
    hierarchy.addTyping('A', 'D', { a: 'd' })
    hierarchy.addGraph('E', buildTypedGraph(['e1', 'e2']))
    hierarchy.addTyping('D', 'E', { d: 'e1' })

    expect(() => hierarchy.addTyping('C', 'E', { c1: 'e2' })).toThrow(
      HierarchyConsistencyError,
    )
    hierarchy.addTyping('C', 'E', { c1: 'e1' })
    expect(hierarchy.getTyping('B', 'E')).toEqual({ b1: 'e1' })
  })

  it('combines partial typings of every path', () => {
    const diamond = createHierarchy()
    diamond.addGraph('D', buildTypedGraph(['d1', 'd2']))
    diamond.addGraph('B', buildTypedGraph(['b']))
    diamond.addGraph('C', buildTypedGraph(['c']))
    diamond.addGraph('A', buildTypedGraph(['a']))
    diamond.addTyping('B', 'D', { b: 'd1' })
    diamond.addTyping('C', 'D', { c: 'd1' })
    diamond.addTyping('A', 'B', {})
    diamond.addTyping('A', 'C', { a: 'c' })

    expect(diamond.getTyping('A', 'D')).toEqual({ a: 'd1' })
    expect(() => diamond.addTyping('A', 'D', { a: 'd2' })).toThrow(
      'Typing "A" -> "D" does not commute with an existing path from "A" to "D"',
    )
    diamond.addTyping('A', 'D', { a: 'd1' })
    expect(diamond.getAncestors('D')).toEqual({
      B: { b: 'd1' },
      C: { c: 'd1' },
      A: { a: 'd1' },
    })
  })

  it('types nodes one at a time', () => {
    hierarchy.addNodeType('B', 'b2', { C: 'c2' })
    expect(hierarchy.getTyping('B', 'C')).toEqual({ b1: 'c1', b2: 'c2' })
    expect(hierarchy.nodeType('B', 'b2')).toEqual({ C: 'c2' })
    expect(() => hierarchy.addNodeType('B', 'b1', { C: 'c2' })).toThrow(
      HierarchyConsistencyError,
    )
  })
})

describe('relations', () => {
  it('are symmetric', () => {
    const hierarchy = chain()
    expect(hierarchy.relations()).toEqual([['B', 'X']])
    expect(hierarchy.getRelation('X', 'B')).toEqual({
      x1: new Set(['b1']),
      x2: new Set(['b1']),
    })
    expect(hierarchy.adjacentRelations('X')).toEqual(['B'])
  })

  it('reject self relations, duplicates and unknown nodes', () => {
    const hierarchy = chain()
    expect(() => hierarchy.addRelation('B', 'B', {})).toThrow(HierarchyConsistencyError)
    expect(() => hierarchy.addRelation('X', 'B', {})).toThrow(GraphStructureError)
    expect(() => hierarchy.addRelation('A', 'C', { z: 'c1' })).toThrow(GraphStructureError)
  })

  it('can be removed', () => {
    const hierarchy = chain()
    hierarchy.removeRelation('X', 'B')
    expect(hierarchy.relations()).toEqual([])
  })
})

describe('rules', () => {
  const cloneRule = () => {
    const rule = ruleFromTransform(buildTypedGraph(['a']))
    rule.injectCloneNode('a')
    return rule
  }

  it('infer rhs types from the lhs', () => {
    const hierarchy = chain()
    hierarchy.addRule('r', cloneRule())
    hierarchy.addRuleTyping('r', 'C', { a: 'c1' })

    expect(hierarchy.rules()).toEqual(['r'])
    expect(hierarchy.ruleTypings()).toEqual([['r', 'C']])
    expect(hierarchy.getRuleTyping('r', 'C')).toEqual({
      lhs: { a: 'c1' },
      p: { a: 'c1', a1: 'c1' },
      rhs: { a: 'c1', a1: 'c1' },
    })
  })

  it('reject rhs types contradicting the lhs', () => {
    const hierarchy = chain()
    hierarchy.addRule('r', cloneRule())
    expect(() => hierarchy.addRuleTyping('r', 'C', { a: 'c1' }, { a1: 'c2' })).toThrow(
      HierarchyConsistencyError,
    )
  })

  it('are never typed by graph typings nor typing targets', () => {
    const hierarchy = chain()
    hierarchy.addRule('r', cloneRule())
    expect(() => hierarchy.addTyping('r', 'C', {})).toThrow(HierarchyConsistencyError)
    expect(() => hierarchy.addTyping('A', 'r', {})).toThrow(GraphStructureError)
  })
})

describe('removal and renaming', () => {
  it('removes a graph with its typings and relations', () => {
    const hierarchy = chain()
    hierarchy.removeGraph('B')
    expect(hierarchy.typings()).toEqual([])
    expect(hierarchy.relations()).toEqual([])
    expect(hierarchy.has('B')).toBe(false)
  })

  it('reconnects around a removed graph', () => {
    const hierarchy = chain()
    hierarchy.removeGraph('B', true)
    expect(hierarchy.typings()).toEqual([['A', 'C']])
    expect(hierarchy.getTyping('A', 'C')).toEqual({ a: 'c1' })
  })

  it('removes single typings', () => {
    const hierarchy = chain()
    hierarchy.removeTyping('A', 'B')
    expect(hierarchy.typings()).toEqual([['B', 'C']])
    expect(() => hierarchy.removeTyping('A', 'B')).toThrow(GraphStructureError)
  })

  it('renames graphs', () => {
    const hierarchy = chain()
    hierarchy.renameGraph('B', 'B2')
    expect(hierarchy.getTyping('A', 'B2')).toEqual({ a: 'b1' })
    expect(hierarchy.getTyping('B2', 'C')).toEqual({ b1: 'c1' })
    expect(hierarchy.relations()).toEqual([['B2', 'X']])
    expect(() => hierarchy.renameGraph('A', 'C')).toThrow(GraphStructureError)
  })

  it('renames nodes in typings and relations', () => {
    const hierarchy = chain()
    hierarchy.renameNode('B', 'b1', 'bx')
    expect(hierarchy.getGraph('B').nodes().sort()).toEqual(['b2', 'bx'])
    expect(hierarchy.getTyping('A', 'B')).toEqual({ a: 'bx' })
    expect(hierarchy.getTyping('B', 'C')).toEqual({ bx: 'c1' })
    expect(hierarchy.getRelation('B', 'X')).toEqual({ bx: new Set(['x1', 'x2']) })
  })
})

describe('copies, equality and JSON', () => {
  it('copies independently', () => {
    const hierarchy = chain()
    const copy = hierarchy.copy()
    expect(copy.equals(hierarchy)).toBe(true)
    copy.removeTyping('A', 'B')
    expect(copy.equals(hierarchy)).toBe(false)
    expect(hierarchy.typings()).toHaveLength(2)
  })

  it('restores what it wrote', () => {
    const hierarchy = chain()
    const rule = ruleFromTransform(buildTypedGraph(['a']))
    rule.injectRemoveNode('a')
    hierarchy.addRule('r', rule)
    hierarchy.addRuleTyping('r', 'C', { a: 'c2' })

    const json = hierarchyToJson(hierarchy)
    expect(json.relations).toEqual([
      { from: 'B', to: 'X', rel: { b1: ['x1', 'x2'] }, attrs: {} },
    ])
    expect(hierarchyFromJson(json).equals(hierarchy)).toBe(true)
  })

  it('rejects malformed input', () => {
    expect(() => hierarchyFromJson({ graphs: 'A' })).toThrow(ParsingError)
  })
})
