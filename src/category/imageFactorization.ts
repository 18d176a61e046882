/**
 * Epi-mono factorization of a homomorphism.
 */

import type { Mapping } from '../core/types'
import { assertArrow } from '../homomorphisms/check'
import type { TypedGraph } from '../graphs/typedGraph'
import { identityMapping, preimageIndex } from '../utils/mapping'
import { gluingClasses } from './gluing'

export interface ImageFactorizationResult {
  graph: TypedGraph
  /** Surjective A -> C */
  aC: Mapping
  /** Injective C -> B */
  cB: Mapping
}

/**
 * Factor `aB: A -> B` through its image: nodes of A sharing an image are
 * merged into one node of C.
 */
export const imageFactorization = (
  a: TypedGraph,
  b: TypedGraph,
  aB: Mapping,
): ImageFactorizationResult => {
  assertArrow('A -> B', a, b, aB)

  const c = a.copy()
  const aC = identityMapping(a.nodes())
  const links: [string, string][] = []
  for (const preimages of preimageIndex(aB).values()) {
    for (const other of preimages.slice(1)) links.push([preimages[0], other])
  }
  for (const group of gluingClasses(a.nodes(), links)) {
    const merged = c.mergeNodes(group, c.uniqueNodeId(group.join('_')))
    for (const node of group) aC[node] = merged
  }

  const cB: Mapping = {}
  for (const [node, merged] of Object.entries(aC)) cB[merged] = aB[node]
  return { graph: c, aC, cB }
}
