/**
 * Span representation of a relation between two graphs.
 */

import { CategoryOperatorPreconditionError } from '../core/errors'
import type { Mapping, Relation } from '../core/types'
import { createTypedGraph, type TypedGraph } from '../graphs/typedGraph'
import { intersectAttrs } from '../utils/attrs'
import { relationToPairs } from '../utils/mapping'

export interface SpanResult {
  graph: TypedGraph
  spanLeft: Mapping
  spanRight: Mapping
}

export interface SpanOptions {
  /** Connect pairs whose components are connected on both sides */
  edges?: boolean
  /** Carry the intersection of attributes of both sides */
  attrs?: boolean
}

/**
 * Span `left <- R -> right` whose nodes are the related pairs.
 */
export const relationToSpan = (
  left: TypedGraph,
  right: TypedGraph,
  relation: Relation,
  options: SpanOptions = {},
): SpanResult => {
  const span = createTypedGraph({ directed: left.directed })
  const spanLeft: Mapping = {}
  const spanRight: Mapping = {}

  for (const [l, r] of relationToPairs(relation)) {
    if (!left.hasNode(l) || !right.hasNode(r)) {
      throw new CategoryOperatorPreconditionError(
        `Relation pair ("${l}", "${r}") refers to a missing node`,
        { left: l, right: r },
      )
    }
    const id = span.uniqueNodeId(l === r ? l : `${l}_${r}`)
    span.addNode(
      id,
      options.attrs
        ? intersectAttrs(left.getNodeAttrs(l), right.getNodeAttrs(r))
        : {},
    )
    spanLeft[id] = l
    spanRight[id] = r
  }

  if (options.edges) {
    const nodes = span.nodes()
    for (const u of nodes) {
      for (const v of nodes) {
        const [lu, lv, ru, rv] = [spanLeft[u], spanLeft[v], spanRight[u], spanRight[v]]
        if (!left.hasEdge(lu, lv) || !right.hasEdge(ru, rv)) continue
        if (span.hasEdge(u, v)) continue
        span.addEdge(
          u,
          v,
          options.attrs
            ? intersectAttrs(left.getEdgeAttrs(lu, lv), right.getEdgeAttrs(ru, rv))
            : {},
        )
      }
    }
  }

  return { graph: span, spanLeft, spanRight }
}
