/**
 * JSON form of rules: `{ lhs, p, rhs, p_lhs, p_rhs }`.
 */

import { z } from 'zod'

import type { Mapping } from '../core/types'
import {
  graphFromJson,
  graphJsonSchema,
  graphToJson,
  parseWith,
  type GraphJson,
} from '../graphs/json'
import { copyMapping } from '../utils/mapping'
import { createRule, type Rule } from './rule'

export const mappingJsonSchema = z.record(z.string())

export const ruleJsonSchema = z.object({
  lhs: graphJsonSchema,
  p: graphJsonSchema,
  rhs: graphJsonSchema,
  p_lhs: mappingJsonSchema.optional(),
  p_rhs: mappingJsonSchema.optional(),
})

export interface RuleJson {
  lhs: GraphJson
  p: GraphJson
  rhs: GraphJson
  p_lhs: Mapping
  p_rhs: Mapping
}

export const ruleToJson = (rule: Rule): RuleJson => ({
  lhs: graphToJson(rule.lhs),
  p: graphToJson(rule.p),
  rhs: graphToJson(rule.rhs),
  p_lhs: copyMapping(rule.pLhs),
  p_rhs: copyMapping(rule.pRhs),
})

/**
 * @throws ParsingError on schema violations
 * @throws InvalidHomomorphismError if a leg is not a homomorphism
 */
export const ruleFromJson = (
  input: unknown,
  options: { directed?: boolean } = {},
): Rule => {
  const json = parseWith(ruleJsonSchema, input, 'rule')
  return createRule({
    lhs: graphFromJson(json.lhs, options),
    p: graphFromJson(json.p, options),
    rhs: graphFromJson(json.rhs, options),
    pLhs: json.p_lhs,
    pRhs: json.p_rhs,
  })
}
