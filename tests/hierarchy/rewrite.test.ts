/**
 * Tests for rewriting in a hierarchy
 *
 * The fixture is a small three-level hierarchy:
 *
 *   H (h1 -> h2)  --typed by-->  G (alice, bob -> home)  --typed by-->  T (agent -> region)
 *
 * Clones propagate up to H, additions and merges propagate down to T.
 */

import { afterEach, describe, expect, it, vi } from 'vitest'

import {
  CategoryOperatorPreconditionError,
  HierarchyConsistencyError,
  RewritingTypingError,
} from '../../src/core/errors'
import type { HierarchyConfig } from '../../src/core/types'
import { buildTypedGraph } from '../../src/graphs/typedGraph'
import { createHierarchy, type Hierarchy } from '../../src/hierarchy/hierarchy'
import { ruleFromTransform, type Rule } from '../../src/rules/rule'

const setup = (config: HierarchyConfig = {}): Hierarchy => {
  const hierarchy = createHierarchy(config)
  hierarchy.addGraph('T', buildTypedGraph(['agent', 'region'], [['agent', 'region']]))
  hierarchy.addGraph(
    'G',
    buildTypedGraph(
      ['alice', 'bob', 'home'],
      [
        ['alice', 'home'],
        ['bob', 'home'],
      ],
    ),
  )
  hierarchy.addTyping(
    'G',
    'T',
    { alice: 'agent', bob: 'agent', home: 'region' },
    { total: true },
  )
  hierarchy.addGraph('H', buildTypedGraph(['h1', 'h2'], [['h1', 'h2']]))
  hierarchy.addTyping('H', 'G', { h1: 'alice', h2: 'home' })
  return hierarchy
}

const cloneRule = (): Rule => {
  const rule = ruleFromTransform(buildTypedGraph(['x']))
  rule.injectCloneNode('x')
  return rule
}

const mergeRule = (): Rule => {
  const rule = ruleFromTransform(buildTypedGraph(['x', 'y']))
  rule.injectMergeNodes(['x', 'y'])
  return rule
}

describe('rewrite', () => {
  it('leaves the hierarchy as it was with an identity rule', () => {
    const hierarchy = setup()
    const before = hierarchy.copy()
    hierarchy.rewrite('G', ruleFromTransform(buildTypedGraph(['x'])), {
      instance: { x: 'alice' },
    })
    expect(hierarchy.equals(before)).toBe(true)
  })

  it('clones the matched node and every ancestor node typed by it', () => {
    const hierarchy = setup()
    const { rhsInstance } = hierarchy.rewrite('G', cloneRule(), {
      instance: { x: 'alice' },
    })

    expect(rhsInstance).toEqual({ x: 'alice', x1: 'alice1' })
    expect(hierarchy.getGraph('G').nodes()).toEqual(['alice', 'bob', 'home', 'alice1'])
    expect(hierarchy.getTyping('G', 'T')).toEqual({
      alice: 'agent',
      bob: 'agent',
      home: 'region',
      alice1: 'agent',
    })
    expect(hierarchy.getEdge('G', 'T')).toMatchObject({ total: true })

    expect(hierarchy.getGraph('H').nodes()).toEqual(['h1', 'h2', 'h11'])
    expect(hierarchy.getGraph('H').hasEdge('h11', 'h2')).toBe(true)
    expect(hierarchy.getTyping('H', 'G')).toEqual({
      h1: 'alice',
      h2: 'home',
      h11: 'alice1',
    })
    expect(hierarchy.getGraph('T').nodes()).toEqual(['agent', 'region'])
  })

  it('keeps only the clones an ancestor node is given', () => {
    const hierarchy = setup()
    hierarchy.rewrite('G', cloneRule(), {
      instance: { x: 'alice' },
      pTyping: { H: { h1: 'x1' } },
    })
    expect(hierarchy.getGraph('H').nodes()).toEqual(['h1', 'h2'])
    expect(hierarchy.getTyping('H', 'G')).toEqual({ h1: 'alice1', h2: 'home' })
  })

  it('rejects controlled clones of another node', () => {
    const hierarchy = setup()
    expect(() =>
      hierarchy.rewrite('G', cloneRule(), {
        instance: { x: 'bob' },
        pTyping: { H: { h1: 'x1' } },
      }),
    ).toThrow(RewritingTypingError)
  })

  it('lifts rules typed by the rewritten graph', () => {
    const hierarchy = setup()
    hierarchy.addRule('r', ruleFromTransform(buildTypedGraph(['p1'])))
    hierarchy.addRuleTyping('r', 'G', { p1: 'alice' })

    hierarchy.rewrite('G', cloneRule(), { instance: { x: 'alice' } })

    const lifted = hierarchy.getRule('r')
    expect(lifted.lhs.nodes()).toEqual(['p1', 'p11'])
    expect(lifted.pLhs).toEqual({ p1: 'p1', p11: 'p11' })
    expect(hierarchy.getRuleTyping('r', 'G').lhs).toEqual({
      p1: 'alice',
      p11: 'alice1',
    })
  })

  it('merges matched nodes and retypes their ancestors', () => {
    const hierarchy = setup()
    const { rhsInstance } = hierarchy.rewrite('G', mergeRule(), {
      instance: { x: 'alice', y: 'bob' },
    })

    expect(rhsInstance).toEqual({ x_y: 'alice_bob' })
    expect(hierarchy.getGraph('G').nodes()).toEqual(['home', 'alice_bob'])
    expect(hierarchy.getGraph('G').edges()).toEqual([['alice_bob', 'home']])
    expect(hierarchy.getTyping('G', 'T')).toEqual({ home: 'region', alice_bob: 'agent' })
    expect(hierarchy.getTyping('H', 'G')).toEqual({ h1: 'alice_bob', h2: 'home' })
    expect(hierarchy.getGraph('T').nodes()).toEqual(['agent', 'region'])
  })

  it('merges types below when merged nodes had different types', () => {
    const hierarchy = setup()
    hierarchy.rewrite('G', mergeRule(), { instance: { x: 'alice', y: 'home' } })

    expect(hierarchy.getGraph('T').nodes()).toEqual(['agent_region'])
    expect(hierarchy.getGraph('T').edges()).toEqual([['agent_region', 'agent_region']])
    expect(hierarchy.getTyping('G', 'T')).toEqual({
      bob: 'agent_region',
      alice_home: 'agent_region',
    })
  })

  it('rejects ambiguous types in strict mode', () => {
    const hierarchy = setup()
    expect(() =>
      hierarchy.rewrite('G', mergeRule(), {
        instance: { x: 'alice', y: 'home' },
        strict: true,
      }),
    ).toThrow(RewritingTypingError)
    expect(hierarchy.getGraph('T').nodes()).toEqual(['agent', 'region'])
  })

  it('requires added nodes to be typed in strict mode', () => {
    const hierarchy = setup()
    const rule = ruleFromTransform(buildTypedGraph([]))
    rule.injectAddNode('n')

    expect(() => hierarchy.rewrite('G', rule, { strict: true })).toThrow(
      HierarchyConsistencyError,
    )
    expect(hierarchy.getGraph('G').nodeCount()).toBe(3)

    hierarchy.rewrite('G', rule, { strict: true, rhsTyping: { T: { n: 'agent' } } })
    expect(hierarchy.getTyping('G', 'T')).toEqual({
      alice: 'agent',
      bob: 'agent',
      home: 'region',
      n: 'agent',
    })
    expect(hierarchy.getGraph('T').nodes()).toEqual(['agent', 'region'])
  })

  it('rejects instances contradicting the lhs typing', () => {
    const hierarchy = setup()
    expect(() =>
      hierarchy.rewrite('G', cloneRule(), {
        instance: { x: 'alice' },
        lhsTyping: { T: { x: 'region' } },
      }),
    ).toThrow(RewritingTypingError)
  })

  it('rejects instances that are not injective', () => {
    const hierarchy = setup()
    expect(() =>
      hierarchy.rewrite('G', ruleFromTransform(buildTypedGraph(['x', 'y'])), {
        instance: { x: 'alice', y: 'alice' },
      }),
    ).toThrow(CategoryOperatorPreconditionError)
  })

  it('only rewrites graphs', () => {
    const hierarchy = setup()
    hierarchy.addRule('r', cloneRule())
    expect(() => hierarchy.rewrite('r', cloneRule())).toThrow(HierarchyConsistencyError)
  })

  it('returns a rewritten copy when not in place', () => {
    const hierarchy = setup()
    const result = hierarchy.rewrite('G', cloneRule(), {
      instance: { x: 'alice' },
      inplace: false,
    })
    expect(result.hierarchy).not.toBe(hierarchy)
    expect(result.hierarchy.getGraph('G').nodeCount()).toBe(4)
    expect(hierarchy.getGraph('G').nodeCount()).toBe(3)
    expect(hierarchy.getGraph('H').nodeCount()).toBe(2)
  })
})

describe('upward propagation', () => {
  it('removes ancestor nodes typed by a removed node', () => {
    const hierarchy = setup()
    const rule = ruleFromTransform(buildTypedGraph(['x']))
    rule.injectRemoveNode('x')

    hierarchy.rewrite('G', rule, { instance: { x: 'alice' } })

    expect(hierarchy.getGraph('G').nodes()).toEqual(['bob', 'home'])
    expect(hierarchy.getTyping('G', 'T')).toEqual({ bob: 'agent', home: 'region' })
    expect(hierarchy.getEdge('G', 'T')).toMatchObject({ total: true })
    expect(hierarchy.getGraph('H').nodes()).toEqual(['h2'])
    expect(hierarchy.getTyping('H', 'G')).toEqual({ h2: 'home' })
    expect(hierarchy.getGraph('T').nodes()).toEqual(['agent', 'region'])
  })

  it('removes attributes the new type no longer has', () => {
    const hierarchy = createHierarchy()
    hierarchy.addGraph(
      'G',
      buildTypedGraph(
        [['alice', { role: ['admin', 'user'] }], 'home'],
        [['alice', 'home', { since: [2020, 2021] }]],
      ),
    )
    hierarchy.addGraph(
      'H',
      buildTypedGraph([['h1', { role: 'admin' }], 'h2'], [['h1', 'h2', { since: 2020 }]]),
    )
    hierarchy.addTyping('H', 'G', { h1: 'alice', h2: 'home' })
    const rule = ruleFromTransform(
      buildTypedGraph([['x', { role: 'admin' }], 'y'], [['x', 'y', { since: 2020 }]]),
    )
    rule.injectRemoveNodeAttrs('x', { role: 'admin' })
    rule.injectRemoveEdgeAttrs('x', 'y', { since: 2020 })

    hierarchy.rewrite('G', rule, { instance: { x: 'alice', y: 'home' } })

    const graph = hierarchy.getGraph('G')
    expect(graph.getNodeAttrs('alice')).toEqual({ role: new Set(['user']) })
    expect(graph.getEdgeAttrs('alice', 'home')).toEqual({ since: new Set([2021]) })
    const ancestor = hierarchy.getGraph('H')
    expect(ancestor.getNodeAttrs('h1')).toEqual({})
    expect(ancestor.getEdgeAttrs('h1', 'h2')).toEqual({})
    expect(hierarchy.getTyping('H', 'G')).toEqual({ h1: 'alice', h2: 'home' })
  })

  it('uses every typing path of an ancestor', () => {
    // A -> B is empty, only A -> C -> G types "a"
    const hierarchy = createHierarchy()
    hierarchy.addGraph('G', buildTypedGraph(['g']))
    hierarchy.addGraph('B', buildTypedGraph(['b']))
    hierarchy.addGraph('C', buildTypedGraph(['c']))
    hierarchy.addGraph('A', buildTypedGraph(['a']))
    hierarchy.addTyping('B', 'G', { b: 'g' }, { total: true })
    hierarchy.addTyping('C', 'G', { c: 'g' }, { total: true })
    hierarchy.addTyping('A', 'B', {})
    hierarchy.addTyping('A', 'C', { a: 'c' }, { total: true })
    expect(hierarchy.getTyping('A', 'G')).toEqual({ a: 'g' })

    const rule = ruleFromTransform(buildTypedGraph(['x']))
    rule.injectRemoveNode('x')
    hierarchy.rewrite('G', rule, { instance: { x: 'g' } })

    expect(hierarchy.getGraph('G').nodes()).toEqual([])
    expect(hierarchy.getGraph('B').nodes()).toEqual([])
    expect(hierarchy.getGraph('C').nodes()).toEqual([])
    expect(hierarchy.getGraph('A').nodes()).toEqual([])
    expect(hierarchy.getTyping('A', 'C')).toEqual({})
  })
})

describe('relations', () => {
  const related = () => {
    const hierarchy = setup()
    hierarchy.addGraph('X', buildTypedGraph(['x1']))
    hierarchy.addRelation('G', 'X', { alice: 'x1' })
    return hierarchy
  }

  it('relate every clone of a related node', () => {
    const hierarchy = related()
    hierarchy.rewrite('G', cloneRule(), { instance: { x: 'alice' } })
    expect(hierarchy.getRelation('G', 'X')).toEqual({
      alice: new Set(['x1']),
      alice1: new Set(['x1']),
    })
  })

  it('drop pairs of removed nodes', () => {
    const hierarchy = related()
    const rule = ruleFromTransform(buildTypedGraph(['x']))
    rule.injectRemoveNode('x')
    hierarchy.rewrite('G', rule, { instance: { x: 'alice' } })
    expect(hierarchy.getRelation('G', 'X')).toEqual({})
    expect(hierarchy.relations()).toEqual([['G', 'X']])
  })
})

describe('node ids named like object members', () => {
  it('are matched by attribute', () => {
    const hierarchy = createHierarchy()
    hierarchy.addGraph('G', buildTypedGraph([['u', { toString: 'v' }], 'w']))
    expect(
      hierarchy.findMatching('G', buildTypedGraph([['x', { toString: 'v' }]])),
    ).toEqual([{ x: 'u' }])
  })

  it('are cloned in ancestors', () => {
    const hierarchy = setup()
    hierarchy.addGraph('K', buildTypedGraph(['toString']))
    hierarchy.addTyping('K', 'G', { toString: 'alice' })

    hierarchy.rewrite('G', cloneRule(), { instance: { x: 'alice' } })

    expect(hierarchy.getGraph('K').nodes()).toEqual(['toString', 'toString1'])
    expect(hierarchy.getTyping('K', 'G')).toEqual({
      toString: 'alice',
      toString1: 'alice1',
    })
  })

  it('are typed through the rhs typing', () => {
    const hierarchy = setup()
    const rule = ruleFromTransform(buildTypedGraph(['constructor']))
    rule.injectCloneNode('constructor')

    const { rhsInstance } = hierarchy.rewrite('G', rule, {
      instance: { constructor: 'alice' },
      rhsTyping: { T: { constructor1: 'agent' } },
    })

    expect(rhsInstance).toEqual({ constructor: 'alice', constructor1: 'alice1' })
    expect(hierarchy.getTyping('G', 'T')).toEqual({
      alice: 'agent',
      bob: 'agent',
      home: 'region',
      alice1: 'agent',
    })
  })
})

describe('stored rules', () => {
  const withRule = () => {
    const hierarchy = setup()
    hierarchy.addRule('clone', cloneRule())
    hierarchy.addRuleTyping('clone', 'T', { x: 'agent' })
    return hierarchy
  }

  it('are matched with their typing', () => {
    expect(withRule().findRuleMatching('G', 'clone')).toEqual([
      { x: 'alice' },
      { x: 'bob' },
    ])
  })

  it('are applied with their typing', () => {
    const hierarchy = withRule()
    const { rhsInstance } = hierarchy.applyRule('G', 'clone', { x: 'bob' })
    expect(rhsInstance).toEqual({ x: 'bob', x1: 'bob1' })
    expect(hierarchy.getTyping('G', 'T')).toMatchObject({ bob1: 'agent' })
    expect(hierarchy.getRule('clone').lhs.nodes()).toEqual(['x'])
  })
})

describe('findMatching', () => {
  it('filters by types from any graph below', () => {
    const hierarchy = setup()
    expect(
      hierarchy.findMatching('G', buildTypedGraph(['x']), { T: { x: 'region' } }),
    ).toEqual([{ x: 'home' }])
  })

  it('rejects typing by graphs above', () => {
    const hierarchy = setup()
    expect(() =>
      hierarchy.findMatching('G', buildTypedGraph(['x']), { H: { x: 'h1' } }),
    ).toThrow(RewritingTypingError)
  })
})

describe('logging', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('reports rewrites when enabled', () => {
    const titles: string[] = []
    vi.spyOn(console, 'groupCollapsed').mockImplementation((title: string) => {
      titles.push(title)
    })
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'groupEnd').mockImplementation(() => undefined)

    const hierarchy = setup({ debug: { log: true } })
    hierarchy.rewrite('G', cloneRule(), { instance: { x: 'alice' } })

    expect(titles).toEqual([
      'sqpo-hierarchy:typing | G -> T',
      'sqpo-hierarchy:typing | H -> G',
      'sqpo-hierarchy:rewrite | G',
    ])
  })

  it('reports slow rewrites per phase when timing is enabled', () => {
    let now = 0
    vi.spyOn(performance, 'now').mockImplementation(() => {
      now += 1
      return now
    })
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)

    const hierarchy = setup({ debug: { timing: true, timingThreshold: 2 } })
    hierarchy.rewrite('G', cloneRule(), { instance: { x: 'alice' } })

    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith(
      '[sqpo-hierarchy] Slow operation on "G": 4.00ms (pullbackComplement 1.00ms, pushout 1.00ms, propagateUp 1.00ms, propagateDown 1.00ms)',
    )
  })
})
