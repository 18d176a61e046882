/**
 * Tests for rules
 *
 * Covers construction, the inject* edit API and its rollback, derived
 * queries, rewriting a graph, inversion and refinement.
 */

import { describe, expect, it } from 'vitest'

import {
  InvalidHomomorphismError,
  RuleConstructionError,
} from '../../src/core/errors'
import { buildTypedGraph } from '../../src/graphs/typedGraph'
import { createRule, identityRule, ruleFromTransform } from '../../src/rules/rule'

const pattern = () => buildTypedGraph(['a', 'b'], [['a', 'b']])

describe('createRule', () => {
  it('defaults both legs to identities', () => {
    const rule = createRule({ lhs: pattern(), p: pattern(), rhs: pattern() })
    expect(rule.pLhs).toEqual({ a: 'a', b: 'b' })
    expect(rule.pRhs).toEqual({ a: 'a', b: 'b' })
    expect(rule.isIdentity()).toBe(true)
  })

  it('rejects mixed directedness', () => {
    expect(() =>
      createRule({
        lhs: pattern(),
        p: buildTypedGraph(['a'], [], { directed: false }),
        rhs: pattern(),
      }),
    ).toThrow(RuleConstructionError)
  })

  it('rejects legs that are not homomorphisms', () => {
    expect(() =>
      createRule({
        lhs: buildTypedGraph(['a', 'b']),
        p: pattern(),
        rhs: pattern(),
      }),
    ).toThrow(InvalidHomomorphismError)
  })

  it('copies its graphs', () => {
    const lhs = pattern()
    const rule = createRule({ lhs, p: lhs, rhs: lhs })
    lhs.addNode('c')
    expect(rule.lhs.hasNode('c')).toBe(false)
  })

  it('builds empty identity rules', () => {
    const rule = identityRule()
    expect(rule.lhs.nodeCount()).toBe(0)
    expect(rule.isIdentity()).toBe(true)
  })
})

describe('restrictive edits', () => {
  it('clones a node with its edges', () => {
    const rule = ruleFromTransform(pattern())
    expect(rule.injectCloneNode('a')).toEqual(['a1', 'a1'])

    expect(rule.pLhs).toEqual({ a: 'a', b: 'b', a1: 'a' })
    expect(rule.rhs.hasEdge('a1', 'b')).toBe(true)
    expect(rule.clonedNodes()).toEqual({ a: new Set(['a', 'a1']) })
    expect(rule.isRestrictive()).toBe(true)
    expect(rule.isRelaxing()).toBe(false)
  })

  it('removes nodes from p and rhs', () => {
    const rule = ruleFromTransform(pattern())
    rule.injectRemoveNode('b')
    expect(rule.p.nodes()).toEqual(['a'])
    expect(rule.rhs.nodes()).toEqual(['a'])
    expect(rule.removedNodes()).toEqual(new Set(['b']))
    expect(rule.removedEdges()).toEqual([])
  })

  it('removes edges', () => {
    const rule = ruleFromTransform(pattern())
    rule.injectRemoveEdge('a', 'b')
    expect(rule.removedEdges()).toEqual([['a', 'b']])
    expect(rule.rhs.edges()).toEqual([])
  })

  it('removes and replaces node attributes', () => {
    const rule = ruleFromTransform(buildTypedGraph([['a', { x: [1, 2] }]]))
    rule.injectRemoveNodeAttrs('a', { x: 1 })
    expect(rule.p.getNodeAttrs('a')).toEqual({ x: new Set([2]) })
    expect(rule.rhs.getNodeAttrs('a')).toEqual({ x: new Set([2]) })
    expect(rule.removedNodeAttrs()).toEqual({ a: { x: new Set([1]) } })

    rule.injectUpdateNodeAttrs('a', { k: 'v' })
    expect(rule.removedNodeAttrs()).toEqual({ a: { x: new Set([1, 2]) } })
    expect(rule.addedNodeAttrs()).toEqual({ a: { k: new Set(['v']) } })
  })

  it('removes edge attributes', () => {
    const rule = ruleFromTransform(buildTypedGraph(['a', 'b'], [['a', 'b', { w: [1, 2] }]]))
    rule.injectRemoveEdgeAttrs('a', 'b', { w: 1 })
    expect(rule.removedEdgeAttrs()).toEqual([
      { edge: ['a', 'b'], attrs: { w: new Set([1]) } },
    ])
    rule.injectAddEdgeAttrs('a', 'b', { w: 3 })
    expect(rule.addedEdgeAttrs()).toEqual([
      { edge: ['a', 'b'], attrs: { w: new Set([3]) } },
    ])
  })
})

describe('relaxing edits', () => {
  it('adds nodes, edges and attributes', () => {
    const rule = ruleFromTransform(pattern())
    rule.injectAddNode('c', { x: 1 })
    rule.injectAddEdge('a', 'c')
    rule.injectAddNodeAttrs('a', { y: 'z' })

    expect(rule.addedNodes()).toEqual(new Set(['c']))
    expect(rule.addedEdges()).toEqual([['a', 'c']])
    expect(rule.addedNodeAttrs()).toEqual({
      a: { y: new Set(['z']) },
      c: { x: new Set([1]) },
    })
    expect(rule.isRelaxing()).toBe(true)
    expect(rule.isRestrictive()).toBe(false)
  })

  it('merges nodes and redirects the right leg', () => {
    const rule = ruleFromTransform(pattern())
    expect(rule.injectMergeNodes(['a', 'b'])).toBe('a_b')
    expect(rule.pRhs).toEqual({ a: 'a_b', b: 'a_b' })
    expect(rule.rhs.edges()).toEqual([['a_b', 'a_b']])
    expect(rule.mergedNodes()).toEqual({ a_b: new Set(['a', 'b']) })
  })
})

describe('failed edits', () => {
  it('leave the rule unchanged', () => {
    const rule = ruleFromTransform(pattern())
    const before = rule.copy()

    expect(() => rule.injectAddEdge('a', 'missing')).toThrow(RuleConstructionError)
    expect(() => rule.injectRemoveNode('missing')).toThrow(RuleConstructionError)
    expect(() => rule.injectCloneNode('a', 'b')).toThrow(RuleConstructionError)
    expect(rule.equals(before)).toBe(true)
  })

  it('reject references to removed nodes', () => {
    const rule = ruleFromTransform(pattern())
    rule.injectRemoveNode('a')
    expect(() => rule.injectCloneNode('a')).toThrow('Node "a" is already removed by the rule')
  })
})

describe('applyTo', () => {
  it('clones the matched node in a copy of the graph', () => {
    const graph = buildTypedGraph(['u', 'v', 'w'], [['u', 'v'], ['w', 'v']])
    const rule = ruleFromTransform(pattern())
    rule.injectCloneNode('a')

    const square = rule.applyTo(graph, { a: 'u', b: 'v' })

    expect(square.graph.nodes()).toEqual(['u', 'v', 'w', 'u1'])
    expect(square.graph.hasEdge('u1', 'v')).toBe(true)
    expect(square.rhsInstance).toEqual({ a: 'u', b: 'v', a1: 'u1' })
    expect(square.gmG).toEqual({ u: 'u', v: 'v', w: 'w', u1: 'u' })
    expect(graph.nodeCount()).toBe(3)
  })

  it('merges matched nodes', () => {
    const graph = buildTypedGraph(['u', 'v', 'w'], [['u', 'w'], ['v', 'w']])
    const rule = ruleFromTransform(buildTypedGraph(['a', 'b']))
    rule.injectMergeNodes(['a', 'b'])

    const square = rule.applyTo(graph, { a: 'u', b: 'v' })

    expect(square.graph.nodes()).toEqual(['w', 'u_v'])
    expect(square.graph.edges()).toEqual([['u_v', 'w']])
    expect(square.rhsInstance).toEqual({ a_b: 'u_v' })
  })

  it('leaves the graph as it was with an identity rule', () => {
    const graph = buildTypedGraph([['u', { x: 1 }], 'v'], [['u', 'v']])
    const square = ruleFromTransform(pattern()).applyTo(graph, { a: 'u', b: 'v' })
    expect(square.graph.equals(graph)).toBe(true)
  })
})

describe('getInvertedRule', () => {
  it('turns clones into merges', () => {
    const rule = ruleFromTransform(pattern())
    rule.injectCloneNode('a')
    const inverted = rule.getInvertedRule()
    expect(inverted.mergedNodes()).toEqual({ a: new Set(['a', 'a1']) })
    expect(inverted.isRestrictive()).toBe(false)
  })
})

describe('refine', () => {
  it('pulls the neighbourhood of removed nodes into the rule', () => {
    const graph = buildTypedGraph([['u', { x: 1 }], 'v'], [['v', 'u']])
    const rule = ruleFromTransform(buildTypedGraph(['a']))
    rule.injectRemoveNode('a')

    const instance = rule.refine(graph, { a: 'u' })

    expect(instance).toEqual({ a: 'u', v: 'v' })
    expect(rule.lhs.edges()).toEqual([['v', 'a']])
    expect(rule.lhs.getNodeAttrs('a')).toEqual({ x: new Set([1]) })
    expect(rule.p.nodes()).toEqual(['v'])
    expect(rule.rhs.nodes()).toEqual(['v'])
    expect(rule.removedNodes()).toEqual(new Set(['a']))
  })
})
