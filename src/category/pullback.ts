/**
 * Pullback of two arrows with a common codomain.
 */

import { CategoryOperatorPreconditionError } from '../core/errors'
import type { Mapping } from '../core/types'
import { assertArrow } from '../homomorphisms/check'
import { createTypedGraph, type TypedGraph } from '../graphs/typedGraph'
import { intersectAttrs } from '../utils/attrs'
import { preimageIndex } from '../utils/mapping'

export interface PullbackResult {
  graph: TypedGraph
  /** Projection A -> B */
  aB: Mapping
  /** Projection A -> C */
  aC: Mapping
}

/**
 * Pullback of `bD: B -> D` and `cD: C -> D`.
 *
 * Nodes of A are the pairs (b, c) with equal images in D, carrying the
 * intersection of their attributes. An edge joins two pairs when both
 * components are joined in B and in C.
 */
export const pullback = (
  b: TypedGraph,
  c: TypedGraph,
  d: TypedGraph,
  bD: Mapping,
  cD: Mapping,
): PullbackResult => {
  if (b.directed !== c.directed || c.directed !== d.directed) {
    throw new CategoryOperatorPreconditionError(
      'Cannot compute pullback of graphs with different directedness',
    )
  }
  assertArrow('B -> D', b, d, bD)
  assertArrow('C -> D', c, d, cD)

  const a = createTypedGraph({ directed: d.directed })
  const aB: Mapping = {}
  const aC: Mapping = {}
  const pairsOfB = new Map<string, string[]>()
  const cByImage = preimageIndex(cD)

  for (const bNode of b.nodes()) {
    const partners = cByImage.get(bD[bNode]) ?? []
    const ids: string[] = []
    for (const cNode of partners) {
      const id =
        ids.length === 0
          ? a.uniqueNodeId(bNode)
          : a.uniqueNodeId(`${bNode}_${cNode}`)
      a.addNode(id, intersectAttrs(b.getNodeAttrs(bNode), c.getNodeAttrs(cNode)))
      aB[id] = bNode
      aC[id] = cNode
      ids.push(id)
    }
    pairsOfB.set(bNode, ids)
  }

  for (const [bu, bv] of b.edges()) {
    for (const u of pairsOfB.get(bu) ?? []) {
      for (const v of pairsOfB.get(bv) ?? []) {
        if (a.hasEdge(u, v) || !c.hasEdge(aC[u], aC[v])) continue
        a.addEdge(
          u,
          v,
          intersectAttrs(b.getEdgeAttrs(bu, bv), c.getEdgeAttrs(aC[u], aC[v])),
        )
      }
    }
  }

  return { graph: a, aB, aC }
}
