/**
 * Homomorphism validity
 *
 * A mapping is a homomorphism when every mapped node lands on a node of the
 * target, every edge between mapped nodes lands on an edge, and attribute
 * sets only grow along the mapping.
 */

import {
  CategoryOperatorPreconditionError,
  InvalidHomomorphismError,
} from '../core/errors'
import type { Mapping } from '../core/types'
import type { TypedGraph } from '../graphs/typedGraph'
import { isSubAttrs } from '../utils/attrs'
import { isMonic, lookup } from '../utils/mapping'

/**
 * Validate `mapping` as a homomorphism from `source` to `target`.
 * @throws InvalidHomomorphismError on the first violation found
 */
export const checkHomomorphism = (
  source: TypedGraph,
  target: TypedGraph,
  mapping: Mapping,
  total = true,
): void => {
  for (const [node, image] of Object.entries(mapping)) {
    if (!source.hasNode(node)) {
      throw new InvalidHomomorphismError(
        `Mapping is defined on "${node}" which is not a node of the source`,
        { node },
      )
    }
    if (!target.hasNode(image)) {
      throw new InvalidHomomorphismError(
        `Node "${node}" is mapped to "${image}" which is not a node of the target`,
        { node, image },
      )
    }
  }

  for (const node of source.nodes()) {
    const image = lookup(mapping, node)
    if (image === undefined) {
      if (total) {
        throw new InvalidHomomorphismError(
          `Mapping is not total: node "${node}" is not mapped`,
          { node },
        )
      }
      continue
    }
    if (!isSubAttrs(source.getNodeAttrs(node), target.getNodeAttrs(image))) {
      throw new InvalidHomomorphismError(
        `Attributes of node "${node}" are not preserved by its image "${image}"`,
        { node, image },
      )
    }
  }

  for (const [u, v] of source.edges()) {
    const su = lookup(mapping, u)
    const sv = lookup(mapping, v)
    if (su === undefined || sv === undefined) continue
    if (!target.hasEdge(su, sv)) {
      throw new InvalidHomomorphismError(
        `Edge "${u}" -> "${v}" is mapped to "${su}" -> "${sv}" which is not an edge of the target`,
        { edge: [u, v], image: [su, sv] },
      )
    }
    if (!isSubAttrs(source.getEdgeAttrs(u, v), target.getEdgeAttrs(su, sv))) {
      throw new InvalidHomomorphismError(
        `Attributes of edge "${u}" -> "${v}" are not preserved by its image`,
        { edge: [u, v], image: [su, sv] },
      )
    }
  }
}

export const isHomomorphism = (
  source: TypedGraph,
  target: TypedGraph,
  mapping: Mapping,
  total = true,
): boolean => {
  try {
    checkHomomorphism(source, target, mapping, total)
    return true
  } catch (error) {
    if (error instanceof InvalidHomomorphismError) return false
    throw error
  }
}

export const isTotalOn = (graph: TypedGraph, mapping: Mapping): boolean =>
  graph.nodes().every((node) => lookup(mapping, node) !== undefined)

/**
 * Identity mapping from `a` into `b`.
 * @throws InvalidHomomorphismError if some node of `a` is missing in `b`
 */
export const identity = (a: TypedGraph, b: TypedGraph): Mapping => {
  const out: Mapping = {}
  for (const node of a.nodes()) {
    if (!b.hasNode(node)) {
      throw new InvalidHomomorphismError(
        `Cannot build identity: node "${node}" is missing in the target`,
        { node },
      )
    }
    out[node] = node
  }
  return out
}

// ---------------------------------------------------------------------------
// Preconditions of categorical constructions
// ---------------------------------------------------------------------------

/**
 * Assert that `mapping` is a total arrow `source -> target`.
 * Domain or codomain mismatches raise CategoryOperatorPreconditionError,
 * structural violations raise InvalidHomomorphismError.
 */
export const assertArrow = (
  name: string,
  source: TypedGraph,
  target: TypedGraph,
  mapping: Mapping,
  options: { monic?: boolean } = {},
): void => {
  for (const node of source.nodes()) {
    if (lookup(mapping, node) === undefined) {
      throw new CategoryOperatorPreconditionError(
        `Arrow ${name} is not defined on node "${node}" of its domain`,
        { arrow: name, node },
      )
    }
  }
  for (const [node, image] of Object.entries(mapping)) {
    if (!source.hasNode(node) || !target.hasNode(image)) {
      throw new CategoryOperatorPreconditionError(
        `Arrow ${name} maps "${node}" -> "${image}" outside of its domain or codomain`,
        { arrow: name, node, image },
      )
    }
  }
  if (options.monic && !isMonic(mapping)) {
    throw new CategoryOperatorPreconditionError(
      `Arrow ${name} is required to be monic`,
      { arrow: name },
    )
  }
  checkHomomorphism(source, target, mapping, true)
}
