/**
 * Pushout of the span induced by a relation between two graphs.
 */

import { CategoryOperatorPreconditionError } from '../core/errors'
import type { Mapping, Relation } from '../core/types'
import type { TypedGraph } from '../graphs/typedGraph'
import { identityMapping, relationToPairs } from '../utils/mapping'
import { gluingClasses } from './gluing'

export interface PushoutFromRelationResult {
  graph: TypedGraph
  /** G1 -> G12 */
  g1G12: Mapping
  /** G2 -> G12 */
  g2G12: Mapping
}

/**
 * Glue `g2` onto a copy of `g1` along `relation` (g1 node -> related g2
 * nodes). Nodes of `g1` related to a common node of `g2` are merged, nodes
 * of `g2` outside the relation are added, and glued elements receive the
 * union of their attributes.
 */
export const pushoutFromRelation = (
  g1: TypedGraph,
  g2: TypedGraph,
  relation: Relation,
): PushoutFromRelationResult => {
  if (g1.directed !== g2.directed) {
    throw new CategoryOperatorPreconditionError(
      'Cannot glue graphs with different directedness',
    )
  }
  const pairs = relationToPairs(relation)
  const related = new Map<string, string[]>()
  for (const [left, right] of pairs) {
    if (!g1.hasNode(left) || !g2.hasNode(right)) {
      throw new CategoryOperatorPreconditionError(
        `Relation pair ("${left}", "${right}") refers to a missing node`,
        { left, right },
      )
    }
    related.set(right, [...(related.get(right) ?? []), left])
  }

  const g12 = g1.copy()
  const g1G12 = identityMapping(g1.nodes())
  const links: [string, string][] = []
  for (const lefts of related.values()) {
    for (const other of lefts.slice(1)) links.push([lefts[0], other])
  }
  for (const group of gluingClasses(g1.nodes(), links)) {
    const merged = g12.mergeNodes(group, g12.uniqueNodeId(group.join('_')))
    for (const node of group) g1G12[node] = merged
  }

  const g2G12: Mapping = {}
  for (const node of g2.nodes()) {
    const lefts = related.get(node)
    if (lefts === undefined) {
      const id = g12.uniqueNodeId(node)
      g12.addNode(id, g2.getNodeAttrs(node))
      g2G12[node] = id
    } else {
      g2G12[node] = g1G12[lefts[0]]
      g12.addNodeAttrs(g2G12[node], g2.getNodeAttrs(node))
    }
  }

  for (const [u, v] of g2.edges()) {
    const su = g2G12[u]
    const sv = g2G12[v]
    if (g12.hasEdge(su, sv)) g12.addEdgeAttrs(su, sv, g2.getEdgeAttrs(u, v))
    else g12.addEdge(su, sv, g2.getEdgeAttrs(u, v))
  }

  return { graph: g12, g1G12, g2G12 }
}
