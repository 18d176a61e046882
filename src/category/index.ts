export { gluingClasses } from './gluing'
export { imageFactorization, type ImageFactorizationResult } from './imageFactorization'
export { pullback, type PullbackResult } from './pullback'
export {
  pullbackComplement,
  type PullbackComplementResult,
} from './pullbackComplement'
export { pushout, type PushoutResult } from './pushout'
export {
  pushoutFromRelation,
  type PushoutFromRelationResult,
} from './pushoutFromRelation'
export { relationToSpan, type SpanOptions, type SpanResult } from './span'
export { getUniqueMapFromPushout, getUniqueMapToPullback } from './universal'
