/**
 * Rule to command list
 *
 * Emits the commands that rebuild a rule from its `lhs`. Commands are
 * replayed on a scratch rule while they are emitted, so every reference
 * uses the ids the replay will actually produce.
 */

import type { Mapping } from '../core/types'
import { attrsToJson } from '../utils/attrs'
import { preimageIndex } from '../utils/mapping'
import { applyRuleCommand, type RuleCommand } from './commands'
import { ruleFromTransform, type Rule } from './rule'

const newNodes = (before: string[], after: string[]): string[] => {
  const known = new Set(before)
  return after.filter((node) => !known.has(node))
}

/**
 * Commands such that `ruleFromTransform(rule.lhs, commands)` rebuilds
 * `rule` up to the naming of `p` and `rhs` nodes. Order: clones, node
 * removals, edge removals, attribute removals, merges, additions.
 */
export const ruleToCommands = (rule: Rule): RuleCommand[] => {
  const scratch = ruleFromTransform(rule.lhs)
  const commands: RuleCommand[] = []
  const run = (command: RuleCommand) => {
    applyRuleCommand(scratch, command)
    commands.push(command)
  }

  // Ids of the scratch rule for the p and rhs nodes of `rule`
  const pName: Mapping = {}
  const rhsName: Mapping = {}
  const pByLhs = preimageIndex(rule.pLhs)

  for (const node of rule.lhs.nodes()) {
    const preimages = pByLhs.get(node) ?? []
    if (preimages.length === 0) continue
    const kept = preimages.includes(node) ? node : preimages[0]
    pName[kept] = node
    for (const other of preimages) {
      if (other === kept) continue
      const before = scratch.p.nodes()
      run({
        type: 'CLONE',
        node,
        ...(scratch.p.hasNode(other) ? {} : { newNode: other }),
      })
      const [created] = newNodes(before, scratch.p.nodes())
      pName[other] = created
    }
  }

  for (const node of rule.removedNodes()) run({ type: 'DELETE_NODE', node })

  for (const [u, v] of rule.removedEdges()) {
    if (!scratch.p.hasEdge(pName[u], pName[v])) continue
    run({ type: 'DELETE_EDGE', source: pName[u], target: pName[v] })
  }

  for (const [node, attrs] of Object.entries(rule.removedNodeAttrs())) {
    run({ type: 'DELETE_NODE_ATTRS', node: pName[node], attrs: attrsToJson(attrs) })
  }

  for (const { edge, attrs } of rule.removedEdgeAttrs()) {
    const [u, v] = edge
    run({
      type: 'DELETE_EDGE_ATTRS',
      source: pName[u],
      target: pName[v],
      attrs: attrsToJson(attrs),
    })
  }

  for (const [rhsNode, group] of Object.entries(rule.mergedNodes())) {
    const members = [...group].map((pNode) => pName[pNode])
    const images = new Set(members.map((pNode) => scratch.pRhs[pNode]))
    const free = !scratch.rhs.hasNode(rhsNode) || images.has(rhsNode)
    run({
      type: 'MERGE',
      nodes: members,
      ...(free ? { newNode: rhsNode } : {}),
    })
    rhsName[rhsNode] = scratch.pRhs[members[0]]
  }
  for (const [pNode, rhsNode] of Object.entries(rule.pRhs)) {
    if (!Object.hasOwn(rhsName, rhsNode)) {
      rhsName[rhsNode] = scratch.pRhs[pName[pNode]]
    }
  }

  const added = rule.addedNodes()
  for (const node of added) {
    const id = scratch.rhs.uniqueNodeId(node)
    run({
      type: 'ADD_NODE',
      node: id,
      attrs: attrsToJson(rule.rhs.getNodeAttrs(node)),
    })
    rhsName[node] = id
  }

  for (const [u, v] of rule.addedEdges()) {
    run({
      type: 'ADD_EDGE',
      source: rhsName[u],
      target: rhsName[v],
      attrs: attrsToJson(rule.rhs.getEdgeAttrs(u, v)),
    })
  }

  for (const [node, attrs] of Object.entries(rule.addedNodeAttrs())) {
    if (added.has(node)) continue
    run({
      type: 'ADD_NODE_ATTRS',
      node: rhsName[node],
      attrs: attrsToJson(attrs),
    })
  }

  const addedEdges = rule.addedEdges()
  for (const { edge, attrs } of rule.addedEdgeAttrs()) {
    const [u, v] = edge
    if (addedEdges.some(([s, t]) => s === u && t === v)) continue
    run({
      type: 'ADD_EDGE_ATTRS',
      source: rhsName[u],
      target: rhsName[v],
      attrs: attrsToJson(attrs),
    })
  }

  return commands
}
