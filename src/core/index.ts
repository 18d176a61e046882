/**
 * Core module exports
 *
 * Types, configuration defaults and errors shared by every module.
 */

export { DEFAULT_HIERARCHY_CONFIG, resolveConfig } from './defaults'
export {
  CategoryOperatorPreconditionError,
  GraphStructureError,
  HierarchyConsistencyError,
  InvalidHomomorphismError,
  ParsingError,
  RewritingTypingError,
  RuleConstructionError,
  SqpoError,
  hasErrorCode,
  isSqpoError,
  type ErrorJSON,
  type SqpoErrorCode,
} from './errors'
export type {
  AttrDict,
  AttrInput,
  AttrValue,
  DebugConfig,
  Edge,
  HierarchyConfig,
  Mapping,
  Relation,
  TypingDict,
  TypingRelationDict,
} from './types'
