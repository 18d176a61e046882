/**
 * Pattern matching
 *
 * Enumerates every injective homomorphism from a small pattern into a
 * graph. Candidate hosts are pruned per pattern node by attributes, typing
 * and degree; the search then extends partial matches one connected
 * pattern node at a time, checking edges against nodes already placed.
 *
 * Worst-case exponential in the size of the pattern.
 */

import { filter, pipe } from 'remeda'

import { RewritingTypingError } from '../core/errors'
import type { Mapping } from '../core/types'
import type { TypedGraph } from '../graphs/typedGraph'
import { isSubAttrs } from '../utils/attrs'
import { lookup, own } from '../utils/mapping'

/**
 * Typing of pattern nodes, keyed by typing graph id. A pair carries the
 * mapping and whether it must be total on the pattern.
 */
export type PatternTyping = Record<string, Mapping | [Mapping, boolean]>

export interface MatchingOptions {
  patternTyping?: PatternTyping
  /**
   * Typing of the host graph nodes, keyed by typing graph id. Constraints
   * by a typing graph missing here cannot be checked and are rejected.
   */
  graphTyping?: Record<string, Mapping>
}

/** Normalize pattern typing to plain mappings. */
export const resolvePatternTyping = (
  pattern: TypedGraph,
  typing: PatternTyping = {},
): Record<string, Mapping> => {
  const out: Record<string, Mapping> = {}
  for (const [typeGraph, entry] of Object.entries(typing)) {
    const [mapping, total]: [Mapping, boolean] = Array.isArray(entry)
      ? entry
      : [entry, false]
    for (const node of Object.keys(mapping)) {
      if (!pattern.hasNode(node)) {
        throw new RewritingTypingError(
          `Pattern typing by "${typeGraph}" refers to "${node}" which is not a pattern node`,
          { typeGraph, node },
        )
      }
    }
    if (total) {
      const untyped = pattern.nodes().filter((node) => !Object.hasOwn(mapping, node))
      if (untyped.length > 0) {
        throw new RewritingTypingError(
          `Pattern typing by "${typeGraph}" is declared total but leaves ${untyped.map((node) => `"${node}"`).join(', ')} untyped`,
          { typeGraph, nodes: untyped },
        )
      }
    }
    out[typeGraph] = mapping
  }
  return out
}

/**
 * Order pattern nodes so that every node after the first of its component
 * is adjacent to an earlier one; within that, fewest candidates first.
 */
const searchOrder = (
  pattern: TypedGraph,
  candidates: Map<string, string[]>,
): string[] => {
  const count = (node: string) => candidates.get(node)?.length ?? 0
  const remaining = new Set(pattern.nodes())
  const order: string[] = []
  while (remaining.size > 0) {
    const placed = new Set(order)
    const frontier = [...remaining].filter((node) =>
      [...pattern.successors(node), ...pattern.predecessors(node)].some((n) =>
        placed.has(n),
      ),
    )
    const pool = frontier.length > 0 ? frontier : [...remaining]
    const next = pool.reduce((best, node) =>
      count(node) < count(best) ? node : best,
    )
    order.push(next)
    remaining.delete(next)
  }
  return order
}

/**
 * All injective node mappings `pattern -> graph` preserving edges and
 * attribute inclusion, and agreeing with `patternTyping` wherever both the
 * pattern and the host node are typed.
 *
 * @example
 * findMatching(graph, pattern, {
 *   patternTyping: { T: { x: 'agent' } },
 *   graphTyping: { T: typingOfGraphIntoT },
 * })
 */
export const findMatching = (
  graph: TypedGraph,
  pattern: TypedGraph,
  options: MatchingOptions = {},
): Mapping[] => {
  if (pattern.nodeCount() === 0) return [{}]
  if (pattern.nodeCount() > graph.nodeCount()) return []

  const patternTyping = resolvePatternTyping(pattern, options.patternTyping)
  const graphTyping = options.graphTyping ?? {}
  for (const typeGraph of Object.keys(patternTyping)) {
    if (own(graphTyping, typeGraph) === undefined) {
      throw new RewritingTypingError(
        `Graph is not typed by "${typeGraph}", pattern typing cannot be checked`,
        { typeGraph },
      )
    }
  }

  const hostNodes = graph.nodes()
  const typeAgrees = (patternNode: string, hostNode: string) =>
    Object.entries(patternTyping).every(([typeGraph, mapping]) => {
      const expected = lookup(mapping, patternNode)
      const actual = lookup(own(graphTyping, typeGraph) ?? {}, hostNode)
      return expected === undefined || actual === undefined || expected === actual
    })

  const candidates = new Map<string, string[]>()
  for (const node of pattern.nodes()) {
    const attrs = pattern.getNodeAttrs(node)
    const outDegree = pattern.successors(node).length
    const inDegree = pattern.predecessors(node).length
    const loop = pattern.hasEdge(node, node)
    candidates.set(
      node,
      pipe(
        hostNodes,
        filter((host: string) => isSubAttrs(attrs, graph.getNodeAttrs(host))),
        filter((host: string) => typeAgrees(node, host)),
        filter((host: string) => !loop || graph.hasEdge(host, host)),
        filter(
          (host: string) =>
            graph.successors(host).length >= outDegree &&
            graph.predecessors(host).length >= inDegree,
        ),
      ),
    )
    if (candidates.get(node)?.length === 0) return []
  }

  const order = searchOrder(pattern, candidates)
  const results: Mapping[] = []
  const current: Mapping = {}
  const used = new Set<string>()

  const edgeFits = (u: string, v: string): boolean => {
    if (!pattern.hasEdge(u, v)) return true
    const [hu, hv] = [current[u], current[v]]
    return (
      graph.hasEdge(hu, hv) &&
      isSubAttrs(pattern.getEdgeAttrs(u, v), graph.getEdgeAttrs(hu, hv))
    )
  }

  const extend = (depth: number): void => {
    if (depth === order.length) {
      results.push({ ...current })
      return
    }
    const node = order[depth]
    for (const host of candidates.get(node) ?? []) {
      if (used.has(host)) continue
      current[node] = host
      const fits = order
        .slice(0, depth + 1)
        .every((other) => edgeFits(node, other) && edgeFits(other, node))
      if (fits) {
        used.add(host)
        extend(depth + 1)
        used.delete(host)
      }
      delete current[node]
    }
  }

  extend(0)
  return results
}
