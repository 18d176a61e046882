/**
 * Pushout of two arrows with a common domain.
 */

import { CategoryOperatorPreconditionError } from '../core/errors'
import type { Mapping } from '../core/types'
import { assertArrow } from '../homomorphisms/check'
import type { TypedGraph } from '../graphs/typedGraph'
import { identityMapping, preimageIndex } from '../utils/mapping'
import { gluingClasses } from './gluing'

export interface PushoutResult {
  graph: TypedGraph
  /** Injection B -> D */
  bD: Mapping
  /** Injection C -> D */
  cD: Mapping
}

/**
 * Pushout of `aB: A -> B` and `aC: A -> C`.
 *
 * D starts as a copy of B. Nodes of B whose preimages meet in C are merged,
 * nodes of C outside the image of A are added (renamed on collision), and
 * glued nodes and edges receive the union of the attributes.
 */
export const pushout = (
  a: TypedGraph,
  b: TypedGraph,
  c: TypedGraph,
  aB: Mapping,
  aC: Mapping,
): PushoutResult => {
  if (a.directed !== b.directed || b.directed !== c.directed) {
    throw new CategoryOperatorPreconditionError(
      'Cannot compute pushout of graphs with different directedness',
    )
  }
  assertArrow('A -> B', a, b, aB)
  assertArrow('A -> C', a, c, aC)

  const d = b.copy()
  const bD = identityMapping(b.nodes())
  const cD: Mapping = {}
  const aByC = preimageIndex(aC)

  const links: [string, string][] = []
  for (const preimages of aByC.values()) {
    for (const other of preimages.slice(1)) {
      links.push([aB[preimages[0]], aB[other]])
    }
  }
  for (const group of gluingClasses(b.nodes(), links)) {
    const merged = d.mergeNodes(group, d.uniqueNodeId(group.join('_')))
    for (const node of group) bD[node] = merged
  }

  for (const node of c.nodes()) {
    const preimages = aByC.get(node)
    if (preimages === undefined) {
      const id = d.uniqueNodeId(node)
      d.addNode(id, c.getNodeAttrs(node))
      cD[node] = id
    } else {
      cD[node] = bD[aB[preimages[0]]]
      d.addNodeAttrs(cD[node], c.getNodeAttrs(node))
    }
  }

  for (const [u, v] of c.edges()) {
    const du = cD[u]
    const dv = cD[v]
    if (d.hasEdge(du, dv)) d.addEdgeAttrs(du, dv, c.getEdgeAttrs(u, v))
    else d.addEdge(du, dv, c.getEdgeAttrs(u, v))
  }

  return { graph: d, bD, cD }
}
