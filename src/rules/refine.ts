/**
 * Instance refinement
 *
 * Pulls the graph context of every removed, cloned or merged node into the
 * rule, so that the rule describes its effect on those nodes completely.
 * The refined rule rewrites the graph exactly like the original one.
 */

import type { Mapping } from '../core/types'
import type { TypedGraph } from '../graphs/typedGraph'
import { assertArrow } from '../homomorphisms/check'
import { isEmptyAttrs, subtractAttrs } from '../utils/attrs'
import { copyMapping, preimageIndex } from '../utils/mapping'
import {
  clonedNodes,
  mergedNodes,
  removedNodes,
  type RuleParts,
} from './queries'

export interface RefinedRule extends RuleParts {
  /** Total instance of the refined `lhs` in the graph */
  readonly instance: Mapping
}

/**
 * Extend `rule` and `instance` with the neighbours, edges and attributes
 * of `graph` around the nodes the rule removes, clones or merges.
 * Returns fresh copies; `rule` is not touched.
 */
export const refineRule = (
  rule: RuleParts,
  graph: TypedGraph,
  instance: Mapping,
): RefinedRule => {
  assertArrow('L -> G', rule.lhs, graph, instance, { monic: true })

  const lhs = rule.lhs.copy()
  const p = rule.p.copy()
  const rhs = rule.rhs.copy()
  const pLhs = copyMapping(rule.pLhs)
  const pRhs = copyMapping(rule.pRhs)
  const refined = copyMapping(instance)
  const matched = new Set(Object.values(refined))

  const focus = new Set<string>(removedNodes(rule))
  for (const node of Object.keys(clonedNodes(rule))) focus.add(node)
  for (const group of Object.values(mergedNodes(rule))) {
    for (const pNode of group) focus.add(rule.pLhs[pNode])
  }

  const freshId = (prefix: string): string => {
    const taken = (id: string) => lhs.hasNode(id) || p.hasNode(id) || rhs.hasNode(id)
    if (!taken(prefix)) return prefix
    let i = 1
    while (taken(`${prefix}_${String(i)}`)) i++
    return `${prefix}_${String(i)}`
  }

  for (const node of focus) {
    const image = refined[node]
    const neighbours = new Set([
      ...graph.successors(image),
      ...graph.predecessors(image),
    ])
    for (const neighbour of neighbours) {
      if (matched.has(neighbour)) continue
      const id = freshId(neighbour)
      const attrs = graph.getNodeAttrs(neighbour)
      lhs.addNode(id, attrs)
      p.addNode(id, attrs)
      rhs.addNode(id, attrs)
      pLhs[id] = id
      pRhs[id] = id
      refined[id] = neighbour
      matched.add(neighbour)
    }
  }

  const pByLhs = preimageIndex(pLhs)
  const preimagesOf = (node: string) => pByLhs.get(node) ?? []

  // Edges between matched nodes
  for (const u of lhs.nodes()) {
    for (const v of lhs.nodes()) {
      if (!graph.hasEdge(refined[u], refined[v])) continue
      const attrs = graph.getEdgeAttrs(refined[u], refined[v])
      if (!lhs.hasEdge(u, v)) {
        lhs.addEdge(u, v, attrs)
        for (const pu of preimagesOf(u)) {
          for (const pv of preimagesOf(v)) {
            if (!p.hasEdge(pu, pv)) p.addEdge(pu, pv, attrs)
            const [ru, rv] = [pRhs[pu], pRhs[pv]]
            if (rhs.hasEdge(ru, rv)) rhs.addEdgeAttrs(ru, rv, attrs)
            else rhs.addEdge(ru, rv, attrs)
          }
        }
        continue
      }
      const extra = subtractAttrs(attrs, lhs.getEdgeAttrs(u, v))
      if (isEmptyAttrs(extra)) continue
      lhs.addEdgeAttrs(u, v, extra)
      for (const pu of preimagesOf(u)) {
        for (const pv of preimagesOf(v)) {
          if (!p.hasEdge(pu, pv)) continue
          p.addEdgeAttrs(pu, pv, extra)
          rhs.addEdgeAttrs(pRhs[pu], pRhs[pv], extra)
        }
      }
    }
  }

  // Node attributes the pattern did not mention
  for (const node of lhs.nodes()) {
    const extra = subtractAttrs(
      graph.getNodeAttrs(refined[node]),
      lhs.getNodeAttrs(node),
    )
    if (isEmptyAttrs(extra)) continue
    lhs.addNodeAttrs(node, extra)
    for (const pNode of preimagesOf(node)) {
      p.addNodeAttrs(pNode, extra)
      rhs.addNodeAttrs(pRhs[pNode], extra)
    }
  }

  return { lhs, p, rhs, pLhs, pRhs, instance: refined }
}
