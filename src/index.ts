/**
 * sqpo-hierarchy
 *
 * Sesqui-pushout graph rewriting over hierarchies of typed graphs:
 * - Attributed graphs and homomorphisms between them
 * - Pullbacks, pushouts and pullback complements
 * - Rules as spans, with pattern matching and rewriting
 * - Hierarchies whose rewrites propagate along typings
 */

// =============================================================================
// CORE PUBLIC API
// =============================================================================

// Hierarchy
export {
  createHierarchy,
  hierarchyFromJson,
  hierarchyJsonSchema,
  hierarchyToJson,
  type AddRuleTypingOptions,
  type AddTypingOptions,
  type Hierarchy,
  type HierarchyJson,
  type HierarchyJsonInput,
  type PathTyping,
  type RelationInput,
  type RewriteOptions,
  type RewriteResult,
  type RuleTyping,
} from './hierarchy'

// Graphs
export {
  buildTypedGraph,
  createTypedGraph,
  type EdgeSpec,
  type NodeSpec,
  type TypedGraph,
  type TypedGraphOptions,
} from './graphs/typedGraph'
export {
  graphFromJson,
  graphJsonSchema,
  graphToJson,
  type GraphJson,
  type GraphJsonInput,
} from './graphs/json'

// Rules
export * from './rules'

// Matching
export {
  findMatching,
  type MatchingOptions,
  type PatternTyping,
} from './matching/findMatching'

// =============================================================================
// CATEGORY OPERATIONS
// =============================================================================

export * from './category'
export {
  checkHomomorphism,
  identity,
  isHomomorphism,
  isTotalOn,
} from './homomorphisms/check'

// =============================================================================
// TYPES, ERRORS AND CONFIG
// =============================================================================

export * from './core'
export * from './utils'

// =============================================================================
// DEBUG TOOLING
// =============================================================================

export {
  createLogger,
  type HierarchyLogger,
  type RewriteLogData,
  type RuleLogSummary,
} from './utils/log'
export {
  createTiming,
  formatPhases,
  type OnSlowReport,
  type PhaseReport,
  type RewritePhase,
  type Timing,
  type TimingConfig,
} from './utils/timing'
