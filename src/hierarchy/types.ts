/**
 * Hierarchy entries
 *
 * Nodes of a hierarchy are graphs or rules, edges are typings of a graph
 * or of both sides of a rule. Relations are stored apart, once per pair.
 */

import type { AttrDict, Mapping, Relation } from '../core/types'
import type { TypedGraph } from '../graphs/typedGraph'
import type { Rule } from '../rules/rule'

// ---------------------------------------------------------------------------
// Nodes
// ---------------------------------------------------------------------------

export interface GraphNode {
  kind: 'graph'
  graph: TypedGraph
  attrs: AttrDict
}

export interface RuleNode {
  kind: 'rule'
  rule: Rule
  attrs: AttrDict
}

export type HierarchyNode = GraphNode | RuleNode

// ---------------------------------------------------------------------------
// Edges
// ---------------------------------------------------------------------------

export interface TypingEdge {
  kind: 'typing'
  mapping: Mapping
  /** Every node of the source is typed */
  total: boolean
  attrs: AttrDict
}

export interface RuleTypingEdge {
  kind: 'ruleTyping'
  lhsMapping: Mapping
  rhsMapping: Mapping
  lhsTotal: boolean
  rhsTotal: boolean
  attrs: AttrDict
}

export type HierarchyEdge = TypingEdge | RuleTypingEdge

/** Typing of the three graphs of a rule by one graph. */
export interface RuleTyping {
  lhs: Mapping
  p: Mapping
  rhs: Mapping
}

/** Composed typing along a path: one mapping, or one per rule side. */
export type PathTyping =
  | { kind: 'graph'; mapping: Mapping }
  | { kind: 'rule'; lhs: Mapping; rhs: Mapping }

// ---------------------------------------------------------------------------
// Relations
// ---------------------------------------------------------------------------

export interface RelationEntry {
  left: string
  right: string
  /** left node -> related right nodes */
  relation: Relation
  attrs: AttrDict
}

// ---------------------------------------------------------------------------
// Rewriting input
// ---------------------------------------------------------------------------

/** Relation input: a node id or a collection of node ids per node. */
export type RelationInput = Record<string, string | Iterable<string>>

export interface RewriteOptions {
  /** lhs node -> host node (default: identity on the lhs) */
  instance?: Mapping
  /** Typing of the lhs by descendants of the rewritten graph */
  lhsTyping?: Record<string, Mapping>
  /**
   * Controlled relation of ancestors: which `p` nodes each ancestor node
   * typed by a cloned node keeps. Ancestors left out keep all clones.
   */
  pTyping?: Record<string, RelationInput>
  /** Typing of the rhs by descendants of the rewritten graph */
  rhsTyping?: Record<string, RelationInput>
  /** Reject untyped rhs nodes and ambiguous types (default: false) */
  strict?: boolean
  /** Mutate this hierarchy instead of returning a rewritten copy (default: true) */
  inplace?: boolean
}
