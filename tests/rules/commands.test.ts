/**
 * Tests for rule commands, command scripts and the JSON form of rules
 */

import { describe, expect, it } from 'vitest'

import { InvalidHomomorphismError, ParsingError } from '../../src/core/errors'
import { buildTypedGraph } from '../../src/graphs/typedGraph'
import { parseRuleCommands } from '../../src/rules/commands'
import { ruleFromJson, ruleToJson } from '../../src/rules/json'
import { ruleFromTransform } from '../../src/rules/rule'
import { ruleToCommands } from '../../src/rules/script'

describe('parseRuleCommands', () => {
  it('accepts well-formed commands', () => {
    const commands = parseRuleCommands([
      { type: 'CLONE', node: 'a' },
      { type: 'ADD_EDGE', source: 'a', target: 'b', attrs: { w: 1 } },
    ])
    expect(commands).toEqual([
      { type: 'CLONE', node: 'a' },
      { type: 'ADD_EDGE', source: 'a', target: 'b', attrs: { w: 1 } },
    ])
  })

  it('rejects unknown types and missing fields', () => {
    expect(() => parseRuleCommands([{ type: 'RENAME', node: 'a' }])).toThrow(ParsingError)
    expect(() => parseRuleCommands([{ type: 'CLONE' }])).toThrow(ParsingError)
    expect(() => parseRuleCommands({ type: 'CLONE', node: 'a' })).toThrow(ParsingError)
  })
})

describe('ruleFromTransform', () => {
  it('replays commands in order', () => {
    const rule = ruleFromTransform(buildTypedGraph(['a', 'b'], [['a', 'b']]), [
      { type: 'CLONE', node: 'a', newNode: 'c' },
      { type: 'DELETE_EDGE', source: 'c', target: 'b' },
      { type: 'ADD_NODE', node: 'n', attrs: { k: 'v' } },
    ])
    expect(rule.clonedNodes()).toEqual({ a: new Set(['a', 'c']) })
    expect(rule.removedEdges()).toEqual([['c', 'b']])
    expect(rule.addedNodes()).toEqual(new Set(['n']))
  })
})

describe('ruleToCommands', () => {
  it('lists clones before removals', () => {
    const pattern = buildTypedGraph(['a', 'b', 'c'], [['a', 'b']])
    const rule = ruleFromTransform(pattern)
    rule.injectCloneNode('a')
    rule.injectRemoveNode('c')

    const commands = ruleToCommands(rule)

    expect(commands).toEqual([
      { type: 'CLONE', node: 'a', newNode: 'a1' },
      { type: 'DELETE_NODE', node: 'c' },
    ])
    expect(ruleFromTransform(rule.lhs, commands).equals(rule)).toBe(true)
  })

  it('lists merges before additions', () => {
    const rule = ruleFromTransform(buildTypedGraph(['a', 'b']))
    rule.injectMergeNodes(['a', 'b'])
    rule.injectAddNode('n', { k: 1 })
    rule.injectAddEdge('a_b', 'n')

    const commands = ruleToCommands(rule)

    expect(commands).toEqual([
      { type: 'MERGE', nodes: ['a', 'b'], newNode: 'a_b' },
      { type: 'ADD_NODE', node: 'n', attrs: { k: [1] } },
      { type: 'ADD_EDGE', source: 'a_b', target: 'n', attrs: {} },
    ])
    expect(ruleFromTransform(rule.lhs, commands).equals(rule)).toBe(true)
  })

  it('is empty for identity rules', () => {
    expect(ruleToCommands(ruleFromTransform(buildTypedGraph(['a'])))).toEqual([])
  })
})

describe('rule JSON', () => {
  it('restores what it wrote', () => {
    const rule = ruleFromTransform(buildTypedGraph([['a', { x: 1 }], 'b'], [['a', 'b']]))
    rule.injectCloneNode('a')
    rule.injectRemoveNodeAttrs('a1', { x: 1 })

    const json = ruleToJson(rule)
    expect(json.p_lhs).toEqual({ a: 'a', b: 'b', a1: 'a' })
    expect(ruleFromJson(json).equals(rule)).toBe(true)
  })

  it('rejects malformed input', () => {
    expect(() => ruleFromJson({ lhs: { nodes: [] } })).toThrow(ParsingError)
  })

  it('rejects legs that are not homomorphisms', () => {
    expect(() =>
      ruleFromJson({
        lhs: { nodes: [{ id: 'a' }], edges: [] },
        p: { nodes: [{ id: 'x' }], edges: [] },
        rhs: { nodes: [{ id: 'a' }], edges: [] },
        p_lhs: { x: 'a' },
      }),
    ).toThrow(InvalidHomomorphismError)
  })
})
