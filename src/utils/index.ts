/**
 * Utility functions
 *
 * Attribute sets and node mappings shared across the codebase.
 */

export {
  attrsEqual,
  attrsToJson,
  copyAttrs,
  intersectAttrs,
  isEmptyAttrs,
  isSubAttrs,
  normalizeAttrs,
  subtractAttrs,
  unionAttrs,
} from './attrs'
export {
  compose,
  composeChain,
  composeRelationDicts,
  copyMapping,
  copyRelation,
  identityMapping,
  invertMapping,
  isMonic,
  keysByValue,
  lookup,
  mappingToRelation,
  normalizeRelation,
  preimageIndex,
  relationFromPairs,
  relationToPairs,
  reverseRelation,
} from './mapping'
