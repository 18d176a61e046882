/**
 * Final pullback complement, the deleting half of a sesqui-pushout step.
 */

import { CategoryOperatorPreconditionError } from '../core/errors'
import type { Mapping } from '../core/types'
import { assertArrow } from '../homomorphisms/check'
import type { TypedGraph } from '../graphs/typedGraph'
import { subtractAttrs } from '../utils/attrs'
import { identityMapping, preimageIndex } from '../utils/mapping'

export interface PullbackComplementResult {
  graph: TypedGraph
  /** A -> C */
  aC: Mapping
  /** C -> D */
  cD: Mapping
}

/**
 * Complete `aB: A -> B`, `bD: B -> D` into a pullback square through C.
 *
 * C starts as a copy of D. Images of nodes of B without preimage in A are
 * removed, images of nodes with several preimages are cloned once per
 * extra preimage, and edges and attributes that A drops are removed from
 * every copy. Surviving nodes keep their ids from D.
 */
export const pullbackComplement = (
  a: TypedGraph,
  b: TypedGraph,
  d: TypedGraph,
  aB: Mapping,
  bD: Mapping,
): PullbackComplementResult => {
  if (a.directed !== b.directed || b.directed !== d.directed) {
    throw new CategoryOperatorPreconditionError(
      'Cannot compute pullback complement of graphs with different directedness',
    )
  }
  assertArrow('A -> B', a, b, aB)
  assertArrow('B -> D', b, d, bD, { monic: true })

  const c = d.copy()
  const cD = identityMapping(d.nodes())
  const aC: Mapping = {}
  const aByB = preimageIndex(aB)

  for (const node of b.nodes()) {
    const image = bD[node]
    const [first, ...rest] = aByB.get(node) ?? []
    if (first === undefined) {
      c.removeNode(image)
      delete cD[image]
      continue
    }
    aC[first] = image
    for (const other of rest) {
      const clone = c.cloneNode(image)
      aC[other] = clone
      cD[clone] = image
    }
  }

  for (const [bu, bv] of b.edges()) {
    for (const u of aByB.get(bu) ?? []) {
      for (const v of aByB.get(bv) ?? []) {
        if (a.hasEdge(u, v)) continue
        if (c.hasEdge(aC[u], aC[v])) c.removeEdge(aC[u], aC[v])
      }
    }
  }

  for (const node of a.nodes()) {
    const removed = subtractAttrs(b.getNodeAttrs(aB[node]), a.getNodeAttrs(node))
    c.removeNodeAttrs(aC[node], removed)
  }
  for (const [u, v] of a.edges()) {
    const removed = subtractAttrs(
      b.getEdgeAttrs(aB[u], aB[v]),
      a.getEdgeAttrs(u, v),
    )
    c.removeEdgeAttrs(aC[u], aC[v], removed)
  }

  return { graph: c, aC, cD }
}
