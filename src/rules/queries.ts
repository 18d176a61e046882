/**
 * Derived queries over the two legs of a rule.
 *
 * Pure functions: they read `p -> lhs` and `p -> rhs` and report what the
 * rule removes, clones, adds and merges.
 */

import type { AttrDict, Edge, Mapping } from '../core/types'
import type { TypedGraph } from '../graphs/typedGraph'
import { isEmptyAttrs, subtractAttrs, unionAttrs } from '../utils/attrs'
import { preimageIndex } from '../utils/mapping'

/** The span `lhs <- p -> rhs` a rule is made of. */
export interface RuleParts {
  readonly lhs: TypedGraph
  readonly p: TypedGraph
  readonly rhs: TypedGraph
  readonly pLhs: Mapping
  readonly pRhs: Mapping
}

export interface EdgeAttrsEntry {
  edge: Edge
  attrs: AttrDict
}

const preimages = (index: Map<string, string[]>, node: string): string[] =>
  index.get(node) ?? []

// ---------------------------------------------------------------------------
// Restrictive side (lhs vs p)
// ---------------------------------------------------------------------------

/** Nodes of `lhs` without preimage in `p`. */
export const removedNodes = (rule: RuleParts): Set<string> => {
  const index = preimageIndex(rule.pLhs)
  return new Set(
    rule.lhs.nodes().filter((node) => preimages(index, node).length === 0),
  )
}

/** Nodes of `lhs` with several preimages, and those preimages. */
export const clonedNodes = (rule: RuleParts): Record<string, Set<string>> => {
  const index = preimageIndex(rule.pLhs)
  const out: Record<string, Set<string>> = {}
  for (const node of rule.lhs.nodes()) {
    const ps = preimages(index, node)
    if (ps.length > 1) out[node] = new Set(ps)
  }
  return out
}

/** Pairs of `p` nodes whose images are joined in `lhs` but not in `p`. */
export const removedEdges = (rule: RuleParts): Edge[] => {
  const index = preimageIndex(rule.pLhs)
  const out: Edge[] = []
  const seen = new Set<string>()
  for (const [s, t] of rule.lhs.edges()) {
    for (const ps of preimages(index, s)) {
      for (const pt of preimages(index, t)) {
        if (rule.p.hasEdge(ps, pt)) continue
        const key = JSON.stringify(
          rule.p.directed || ps <= pt ? [ps, pt] : [pt, ps],
        )
        if (seen.has(key)) continue
        seen.add(key)
        out.push([ps, pt])
      }
    }
  }
  return out
}

/** Attributes each `p` node loses with respect to its `lhs` image. */
export const removedNodeAttrs = (rule: RuleParts): Record<string, AttrDict> => {
  const out: Record<string, AttrDict> = {}
  for (const node of rule.p.nodes()) {
    const removed = subtractAttrs(
      rule.lhs.getNodeAttrs(rule.pLhs[node]),
      rule.p.getNodeAttrs(node),
    )
    if (!isEmptyAttrs(removed)) out[node] = removed
  }
  return out
}

/** Attributes each `p` edge loses with respect to its `lhs` image. */
export const removedEdgeAttrs = (rule: RuleParts): EdgeAttrsEntry[] => {
  const out: EdgeAttrsEntry[] = []
  for (const [s, t] of rule.p.edges()) {
    const removed = subtractAttrs(
      rule.lhs.getEdgeAttrs(rule.pLhs[s], rule.pLhs[t]),
      rule.p.getEdgeAttrs(s, t),
    )
    if (!isEmptyAttrs(removed)) out.push({ edge: [s, t], attrs: removed })
  }
  return out
}

// ---------------------------------------------------------------------------
// Relaxing side (p vs rhs)
// ---------------------------------------------------------------------------

/** Nodes of `rhs` without preimage in `p`. */
export const addedNodes = (rule: RuleParts): Set<string> => {
  const index = preimageIndex(rule.pRhs)
  return new Set(
    rule.rhs.nodes().filter((node) => preimages(index, node).length === 0),
  )
}

/** Nodes of `rhs` with several preimages, and those preimages. */
export const mergedNodes = (rule: RuleParts): Record<string, Set<string>> => {
  const index = preimageIndex(rule.pRhs)
  const out: Record<string, Set<string>> = {}
  for (const node of rule.rhs.nodes()) {
    const ps = preimages(index, node)
    if (ps.length > 1) out[node] = new Set(ps)
  }
  return out
}

/** Edges of `rhs` that no edge of `p` is sent to. */
export const addedEdges = (rule: RuleParts): Edge[] => {
  const index = preimageIndex(rule.pRhs)
  return rule.rhs.edges().filter(([s, t]) => {
    for (const ps of preimages(index, s)) {
      for (const pt of preimages(index, t)) {
        if (rule.p.hasEdge(ps, pt)) return false
      }
    }
    return true
  })
}

/** Attributes `rhs` nodes gain with respect to their preimages. */
export const addedNodeAttrs = (rule: RuleParts): Record<string, AttrDict> => {
  const index = preimageIndex(rule.pRhs)
  const out: Record<string, AttrDict> = {}
  for (const node of rule.rhs.nodes()) {
    const ps = preimages(index, node)
    const attrs = rule.rhs.getNodeAttrs(node)
    const added =
      ps.length === 0
        ? attrs
        : unionAttrs(
            ...ps.map((p) => subtractAttrs(attrs, rule.p.getNodeAttrs(p))),
          )
    if (!isEmptyAttrs(added)) out[node] = added
  }
  return out
}

/** Attributes `rhs` edges gain with respect to their preimages. */
export const addedEdgeAttrs = (rule: RuleParts): EdgeAttrsEntry[] => {
  const index = preimageIndex(rule.pRhs)
  const out: EdgeAttrsEntry[] = []
  for (const [s, t] of rule.rhs.edges()) {
    const attrs = rule.rhs.getEdgeAttrs(s, t)
    const diffs: AttrDict[] = []
    for (const ps of preimages(index, s)) {
      for (const pt of preimages(index, t)) {
        if (rule.p.hasEdge(ps, pt)) {
          diffs.push(subtractAttrs(attrs, rule.p.getEdgeAttrs(ps, pt)))
        }
      }
    }
    const added = diffs.length === 0 ? attrs : unionAttrs(...diffs)
    if (!isEmptyAttrs(added)) out.push({ edge: [s, t], attrs: added })
  }
  return out
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/** Removes or clones something; rewriting must be propagated upwards. */
export const isRestrictive = (rule: RuleParts): boolean =>
  removedNodes(rule).size > 0 ||
  Object.keys(clonedNodes(rule)).length > 0 ||
  Object.keys(removedNodeAttrs(rule)).length > 0 ||
  removedEdges(rule).length > 0 ||
  removedEdgeAttrs(rule).length > 0

/** Adds or merges something; rewriting must be propagated downwards. */
export const isRelaxing = (rule: RuleParts): boolean =>
  addedNodes(rule).size > 0 ||
  Object.keys(mergedNodes(rule)).length > 0 ||
  Object.keys(addedNodeAttrs(rule)).length > 0 ||
  addedEdges(rule).length > 0 ||
  addedEdgeAttrs(rule).length > 0
