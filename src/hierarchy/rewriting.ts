/**
 * Rewriting with propagation
 *
 * Computes everything a rewrite changes without touching the hierarchy:
 *
 * 1. the rewritten graph itself (`rewriteSquare`)
 * 2. ancestors restricted to what survives: nodes typed by removed nodes
 *    go, nodes typed by cloned nodes are cloned, edges and attributes the
 *    rule drops are dropped (`propagateUp`)
 * 3. descendants glued with the rhs along its typing, which adds and
 *    merges nodes there (`propagateDown`)
 * 4. the typing of every edge and the content of every relation touching
 *    a changed graph (`collectUpdates`)
 *
 * The hierarchy applies the resulting plan in one step.
 */

import { getUniqueMapFromPushout } from '../category/universal'
import { pushoutFromRelation } from '../category/pushoutFromRelation'
import type { Mapping, Relation, TypingRelationDict } from '../core/types'
import type { TypedGraph } from '../graphs/typedGraph'
import { isTotalOn } from '../homomorphisms/check'
import { isRelaxing, isRestrictive } from '../rules/queries'
import { createRule, type RewriteSquare, type Rule } from '../rules/rule'
import { isEmptyAttrs, subtractAttrs } from '../utils/attrs'
import {
  compose,
  composeChain,
  identityMapping,
  invertMapping,
  lookup,
  own,
  preimageIndex,
  relationFromPairs,
  relationToPairs,
  reverseRelation,
} from '../utils/mapping'
import type { Hierarchy } from './hierarchy'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A graph restricted by a rewrite of one of its descendants. */
export interface Lift {
  graph: TypedGraph
  /** New node -> node it comes from */
  back: Mapping
  /** New node -> node of the matched-and-cut graph (where typed) */
  origin: Mapping
}

/** A graph glued with the rhs of a rule. */
export interface Expansion {
  graph: TypedGraph
  /** Old node -> new node */
  fwd: Mapping
  /** rhs node -> new node */
  rhs: Mapping
}

/** How a hierarchy node takes part in a rewrite. */
export type NodeState =
  | { kind: 'lifted'; lift: Lift; changed: boolean }
  | { kind: 'liftedRule'; lhs: Lift; rhs: Lift; rule: Rule; changed: boolean }
  | { kind: 'origin'; square: RewriteSquare }
  | { kind: 'expanded'; expansion: Expansion; changed: boolean }

export interface TypingUpdate {
  source: string
  target: string
  mapping: Mapping
  total: boolean
}

export interface RuleTypingUpdate {
  source: string
  target: string
  lhsMapping: Mapping
  rhsMapping: Mapping
  lhsTotal: boolean
  rhsTotal: boolean
}

export interface RelationUpdate {
  left: string
  right: string
  relation: Relation
}

export interface RewritePlan {
  graphs: Map<string, TypedGraph>
  rules: Map<string, Rule>
  typings: TypingUpdate[]
  ruleTypings: RuleTypingUpdate[]
  relations: RelationUpdate[]
  /** rhs node -> node of the rewritten graph */
  rhsInstance: Mapping
  /** Ancestors whose graph or rule changed */
  ancestors: string[]
  /** Descendants whose graph changed */
  descendants: string[]
}

// ---------------------------------------------------------------------------
// Lifting
// ---------------------------------------------------------------------------

/**
 * Drop edges and attributes of lifted nodes that have no counterpart in
 * the matched-and-cut graph, so that `origin` is a homomorphism.
 */
const restrictTo = (graph: TypedGraph, origin: Mapping, gm: TypedGraph): void => {
  for (const [u, v] of graph.edges()) {
    const gu = lookup(origin, u)
    const gv = lookup(origin, v)
    if (gu === undefined || gv === undefined) continue
    if (!gm.hasEdge(gu, gv)) {
      graph.removeEdge(u, v)
      continue
    }
    const extra = subtractAttrs(graph.getEdgeAttrs(u, v), gm.getEdgeAttrs(gu, gv))
    if (!isEmptyAttrs(extra)) graph.removeEdgeAttrs(u, v, extra)
  }
  for (const node of graph.nodes()) {
    const image = lookup(origin, node)
    if (image === undefined) continue
    const extra = subtractAttrs(graph.getNodeAttrs(node), gm.getNodeAttrs(image))
    if (!isEmptyAttrs(extra)) graph.removeNodeAttrs(node, extra)
  }
}

/**
 * Restrict `graph`, typed by the rewritten graph through `typing`, to the
 * part that survives the rewrite. A node typed by a cloned node is cloned
 * once per clone it keeps: all of them, or those `controlled` lists.
 */
export const liftGraph = (
  graph: TypedGraph,
  typing: Mapping,
  rule: Rule,
  instance: Mapping,
  square: RewriteSquare,
  controlled: Relation = {},
): Lift => {
  const lifted = graph.copy()
  const back = identityMapping(graph.nodes())
  const origin: Mapping = {}
  const lhsByHost = invertMapping(instance) ?? {}
  const clonesOf = preimageIndex(rule.pLhs)
  const gmByHost = preimageIndex(square.gmG)

  for (const node of graph.nodes()) {
    const host = lookup(typing, node)
    if (host === undefined) continue
    const lhsNode = lookup(lhsByHost, host)
    if (lhsNode === undefined) {
      const [kept] = gmByHost.get(host) ?? []
      if (kept !== undefined) origin[node] = kept
      continue
    }
    const kept = own(controlled, node)
    const pNodes = kept ? [...kept] : (clonesOf.get(lhsNode) ?? [])
    if (pNodes.length === 0) {
      lifted.removeNode(node)
      delete back[node]
      continue
    }
    origin[node] = square.pGm[pNodes[0]]
    for (const pNode of pNodes.slice(1)) {
      const clone = lifted.cloneNode(node)
      back[clone] = node
      origin[clone] = square.pGm[pNode]
    }
  }

  restrictTo(lifted, origin, square.gm)
  return { graph: lifted, back, origin }
}

/**
 * Arrow into a lift: each node goes to the lifted node with the same old
 * node and the same origin, or to the untyped copy of its old node.
 */
const liftArrow = (
  nodes: string[],
  toOld: Mapping,
  origin: Mapping,
  target: Lift,
): Mapping => {
  const key = (old: string, image: string | undefined) =>
    JSON.stringify([old, image ?? null])
  const index = new Map<string, string>()
  for (const node of target.graph.nodes()) {
    index.set(key(target.back[node], lookup(target.origin, node)), node)
  }
  const out: Mapping = {}
  for (const node of nodes) {
    const old = lookup(toOld, node)
    if (old === undefined) continue
    const image =
      index.get(key(old, lookup(origin, node))) ?? index.get(key(old, undefined))
    if (image !== undefined) out[node] = image
  }
  return out
}

/** Lift all three graphs of a rule and rebuild its legs. */
const liftRule = (
  rule: Rule,
  lhsTyping: Mapping,
  rhsTyping: Mapping,
  rewriting: Rule,
  instance: Mapping,
  square: RewriteSquare,
) => {
  const lhs = liftGraph(rule.lhs, lhsTyping, rewriting, instance, square)
  const p = liftGraph(rule.p, compose(rule.pLhs, lhsTyping), rewriting, instance, square)
  const rhs = liftGraph(rule.rhs, rhsTyping, rewriting, instance, square)
  const nodes = p.graph.nodes()
  const lifted = createRule({
    lhs: lhs.graph,
    p: p.graph,
    rhs: rhs.graph,
    pLhs: liftArrow(nodes, compose(p.back, rule.pLhs), p.origin, lhs),
    pRhs: liftArrow(nodes, compose(p.back, rule.pRhs), p.origin, rhs),
  })
  return { lhs, rhs, rule: lifted }
}

// ---------------------------------------------------------------------------
// Propagation
// ---------------------------------------------------------------------------

/**
 * Restrict every ancestor, graph or rule, of the rewritten graph. When the
 * rule neither removes nor clones anything, ancestors stay as they are and
 * only their typing is moved onto the rewritten graph.
 */
export const propagateUp = (
  hierarchy: Hierarchy,
  graphId: string,
  rule: Rule,
  instance: Mapping,
  square: RewriteSquare,
  pTyping: TypingRelationDict,
): Map<string, NodeState> => {
  const changed = isRestrictive(rule)
  const states = new Map<string, NodeState>()

  for (const ancestor of hierarchy.ancestorOrder(graphId)) {
    if (hierarchy.isGraph(ancestor)) {
      const lift = liftGraph(
        hierarchy.getGraph(ancestor),
        hierarchy.getTyping(ancestor, graphId),
        rule,
        instance,
        square,
        own(pTyping, ancestor),
      )
      states.set(ancestor, { kind: 'lifted', lift, changed })
    } else {
      const typing = hierarchy.getRuleTyping(ancestor, graphId)
      const lifted = liftRule(
        hierarchy.getRule(ancestor),
        typing.lhs,
        typing.rhs,
        rule,
        instance,
        square,
      )
      states.set(ancestor, { kind: 'liftedRule', ...lifted, changed })
    }
  }
  return states
}

/** Single-valued part of a typing relation. */
const singleValued = (relation: Relation): Mapping => {
  const out: Mapping = {}
  for (const [node, types] of Object.entries(relation)) {
    const [only] = types
    if (types.size === 1 && only !== undefined) out[node] = only
  }
  return out
}

/**
 * Glue the rhs into every descendant along `rhsTyping`. Rhs nodes related
 * to several nodes of a descendant merge them there, untyped rhs nodes are
 * added. Descendants are left alone when the rule adds and merges nothing
 * and every rhs node has at most one type.
 */
export const propagateDown = (
  hierarchy: Hierarchy,
  graphId: string,
  rule: Rule,
  rhsTyping: TypingRelationDict,
): Map<string, NodeState> => {
  const ambiguous = Object.values(rhsTyping).some((relation) =>
    Object.values(relation).some((types) => types.size > 1),
  )
  const changed = isRelaxing(rule) || ambiguous
  const states = new Map<string, NodeState>()

  for (const descendant of hierarchy.descendantOrder(graphId)) {
    const graph = hierarchy.getGraph(descendant)
    const relation = own(rhsTyping, descendant) ?? {}
    if (changed) {
      const glued = pushoutFromRelation(graph, rule.rhs, reverseRelation(relation))
      states.set(descendant, {
        kind: 'expanded',
        expansion: { graph: glued.graph, fwd: glued.g1G12, rhs: glued.g2G12 },
        changed,
      })
    } else {
      states.set(descendant, {
        kind: 'expanded',
        expansion: {
          graph,
          fwd: identityMapping(graph.nodes()),
          rhs: singleValued(relation),
        },
        changed,
      })
    }
  }
  return states
}

// ---------------------------------------------------------------------------
// Typing updates
// ---------------------------------------------------------------------------

/** One side of a typing edge: a graph, or a side of a rule. */
type Side =
  | { kind: 'unchanged'; graph: TypedGraph }
  | { kind: 'lifted'; lift: Lift }
  | { kind: 'origin'; square: RewriteSquare }
  | { kind: 'expanded'; expansion: Expansion }

const sideGraph = (side: Side): TypedGraph => {
  switch (side.kind) {
    case 'unchanged':
      return side.graph
    case 'lifted':
      return side.lift.graph
    case 'origin':
      return side.square.graph
    case 'expanded':
      return side.expansion.graph
  }
}

/** Typing of the new source by the new target, from the old typing. */
const retype = (source: Side, target: Side, old: Mapping): Mapping => {
  if (source.kind === 'origin' || source.kind === 'expanded') {
    // Targets of these are always descendants
    if (target.kind !== 'expanded') return old
    const { fwd, rhs } = target.expansion
    return source.kind === 'origin'
      ? getUniqueMapFromPushout(
          source.square.graph.nodes(),
          source.square.gmG1,
          source.square.rhsInstance,
          composeChain([source.square.gmG, old, fwd]),
          rhs,
        )
      : getUniqueMapFromPushout(
          source.expansion.graph.nodes(),
          source.expansion.fwd,
          source.expansion.rhs,
          compose(old, fwd),
          rhs,
        )
  }

  const toOld =
    source.kind === 'lifted'
      ? source.lift.back
      : identityMapping(source.graph.nodes())
  const origin = source.kind === 'lifted' ? source.lift.origin : {}
  switch (target.kind) {
    case 'unchanged':
      return compose(toOld, old)
    case 'lifted':
      return liftArrow(
        sideGraph(source).nodes(),
        compose(toOld, old),
        origin,
        target.lift,
      )
    case 'origin':
      return compose(origin, target.square.gmG1)
    case 'expanded':
      return composeChain([toOld, old, target.expansion.fwd])
  }
}

const graphSide = (
  hierarchy: Hierarchy,
  id: string,
  states: Map<string, NodeState>,
): Side => {
  const state = states.get(id)
  if (state === undefined || state.kind === 'liftedRule') {
    return { kind: 'unchanged', graph: hierarchy.getGraph(id) }
  }
  switch (state.kind) {
    case 'lifted':
      return { kind: 'lifted', lift: state.lift }
    case 'origin':
      return { kind: 'origin', square: state.square }
    case 'expanded':
      return { kind: 'expanded', expansion: state.expansion }
  }
}

// ---------------------------------------------------------------------------
// Relation updates
// ---------------------------------------------------------------------------

/** New nodes standing for each old node of a graph. */
const correspondence = (state: NodeState | undefined) => {
  if (state === undefined) return (node: string) => [node]
  switch (state.kind) {
    case 'lifted': {
      const index = preimageIndex(state.lift.back)
      return (node: string) => index.get(node) ?? []
    }
    case 'origin': {
      const index = preimageIndex(state.square.gmG)
      const { gmG1 } = state.square
      return (node: string) => [
        ...new Set((index.get(node) ?? []).map((gm) => gmG1[gm])),
      ]
    }
    case 'expanded': {
      const { fwd } = state.expansion
      return (node: string) => {
        const image = lookup(fwd, node)
        return image === undefined ? [] : [image]
      }
    }
    case 'liftedRule':
      return (node: string) => [node]
  }
}

const isChanged = (state: NodeState | undefined): boolean =>
  state !== undefined && (state.kind === 'origin' || state.changed)

// ---------------------------------------------------------------------------
// Plan
// ---------------------------------------------------------------------------

/**
 * Gather new graphs, rules, typings and relations for every hierarchy
 * element the rewrite touches.
 */
export const collectUpdates = (
  hierarchy: Hierarchy,
  graphId: string,
  square: RewriteSquare,
  up: Map<string, NodeState>,
  down: Map<string, NodeState>,
): RewritePlan => {
  const states = new Map<string, NodeState>([
    ...up,
    ...down,
    [graphId, { kind: 'origin', square }],
  ])
  const plan: RewritePlan = {
    graphs: new Map([[graphId, square.graph]]),
    rules: new Map(),
    typings: [],
    ruleTypings: [],
    relations: [],
    rhsInstance: square.rhsInstance,
    ancestors: [],
    descendants: [],
  }

  for (const [id, state] of states) {
    if (state.kind === 'origin' || !state.changed) continue
    if (state.kind === 'liftedRule') {
      plan.rules.set(id, state.rule)
      plan.ancestors.push(id)
    } else if (state.kind === 'lifted') {
      plan.graphs.set(id, state.lift.graph)
      plan.ancestors.push(id)
    } else {
      plan.graphs.set(id, state.expansion.graph)
      plan.descendants.push(id)
    }
  }

  for (const source of states.keys()) {
    const state = states.get(source)
    for (const target of hierarchy.successors(source)) {
      const targetSide = graphSide(hierarchy, target, states)
      if (state?.kind === 'liftedRule') {
        const old = hierarchy.getEdge(source, target)
        if (old.kind !== 'ruleTyping') continue
        const lhsMapping = retype({ kind: 'lifted', lift: state.lhs }, targetSide, old.lhsMapping)
        const rhsMapping = retype({ kind: 'lifted', lift: state.rhs }, targetSide, old.rhsMapping)
        plan.ruleTypings.push({
          source,
          target,
          lhsMapping,
          rhsMapping,
          lhsTotal: old.lhsTotal && isTotalOn(state.rule.lhs, lhsMapping),
          rhsTotal: old.rhsTotal && isTotalOn(state.rule.rhs, rhsMapping),
        })
        continue
      }
      const old = hierarchy.getEdge(source, target)
      if (old.kind !== 'typing') continue
      const sourceSide = graphSide(hierarchy, source, states)
      const mapping = retype(sourceSide, targetSide, old.mapping)
      plan.typings.push({
        source,
        target,
        mapping,
        total: old.total && isTotalOn(sideGraph(sourceSide), mapping),
      })
    }
    // Typings into a changed graph from outside the rewrite
    for (const other of hierarchy.predecessors(source)) {
      if (states.has(other)) continue
      const old = hierarchy.getEdge(other, source)
      const targetSide = graphSide(hierarchy, source, states)
      if (old.kind === 'typing') {
        const graph = hierarchy.getGraph(other)
        const mapping = retype({ kind: 'unchanged', graph }, targetSide, old.mapping)
        plan.typings.push({
          source: other,
          target: source,
          mapping,
          total: old.total && isTotalOn(graph, mapping),
        })
      } else {
        const { lhs, rhs } = hierarchy.getRule(other)
        const lhsMapping = retype({ kind: 'unchanged', graph: lhs }, targetSide, old.lhsMapping)
        const rhsMapping = retype({ kind: 'unchanged', graph: rhs }, targetSide, old.rhsMapping)
        plan.ruleTypings.push({
          source: other,
          target: source,
          lhsMapping,
          rhsMapping,
          lhsTotal: old.lhsTotal && isTotalOn(lhs, lhsMapping),
          rhsTotal: old.rhsTotal && isTotalOn(rhs, rhsMapping),
        })
      }
    }
  }

  for (const [left, right] of hierarchy.relations()) {
    const leftState = states.get(left)
    const rightState = states.get(right)
    if (!isChanged(leftState) && !isChanged(rightState)) continue
    const toLeft = correspondence(leftState)
    const toRight = correspondence(rightState)
    const pairs = relationToPairs(hierarchy.getRelation(left, right)).flatMap(
      ([l, r]) =>
        toLeft(l).flatMap((nl) =>
          toRight(r).map((nr): [string, string] => [nl, nr]),
        ),
    )
    plan.relations.push({ left, right, relation: relationFromPairs(pairs) })
  }

  return plan
}
