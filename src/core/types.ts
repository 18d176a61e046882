/**
 * Core types shared by graphs, rules and hierarchies.
 */

/** A single attribute value. Attribute maps hold sets of these. */
export type AttrValue = string | number | boolean

/** Attribute map of a node or an edge: name -> set of values. */
export type AttrDict = Record<string, Set<AttrValue>>

/**
 * Attribute input accepted at the API boundary.
 * Scalars become singleton sets, arrays and sets are copied.
 */
export type AttrInput = Record<
  string,
  AttrValue | readonly AttrValue[] | ReadonlySet<AttrValue>
>

/** Directed edge as a (source, target) pair. */
export type Edge = [source: string, target: string]

/** Node mapping between two graphs (source node -> target node). */
export type Mapping = Record<string, string>

/** Many-to-many node correspondence (left node -> set of right nodes). */
export type Relation = Record<string, Set<string>>

/**
 * Typing of a pattern or rule side, keyed by the id of the typing graph.
 * Values are partial mappings into that graph.
 */
export type TypingDict = Record<string, Mapping>

/**
 * Typing relation of a rule side, keyed by the id of the typing graph.
 * A node may be related to several candidate types before validation.
 */
export type TypingRelationDict = Record<string, Relation>

export interface DebugConfig {
  /** Log hierarchy mutations and rewrites to the console */
  log?: boolean
  /** Time each phase of matching and rewriting, per graph */
  timing?: boolean
  /** Threshold in milliseconds for slow rewrite warnings (default: 50ms) */
  timingThreshold?: number
}

export interface HierarchyConfig {
  /** Whether graphs of the hierarchy are directed (default: true) */
  directed?: boolean
  /** Debug configuration for development tooling */
  debug?: DebugConfig
}
