export {
  createHierarchy,
  type AddRuleTypingOptions,
  type AddTypingOptions,
  type Hierarchy,
  type RewriteResult,
} from './hierarchy'
export {
  hierarchyFromJson,
  hierarchyJsonSchema,
  hierarchyToJson,
  type HierarchyJson,
  type HierarchyJsonInput,
} from './json'
export {
  autocompleteTyping,
  checkRewriteTyping,
  type CheckedTyping,
  type RewriteTypingInput,
} from './typeChecking'
export type {
  GraphNode,
  HierarchyEdge,
  HierarchyNode,
  PathTyping,
  RelationEntry,
  RelationInput,
  RewriteOptions,
  RuleNode,
  RuleTyping,
  RuleTypingEdge,
  TypingEdge,
} from './types'
