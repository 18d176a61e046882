export {
  applyRuleCommand,
  applyRuleCommands,
  parseRuleCommands,
  ruleCommandSchema,
  type RuleCommand,
  type RuleCommandType,
} from './commands'
export { mappingJsonSchema, ruleFromJson, ruleJsonSchema, ruleToJson, type RuleJson } from './json'
export * from './queries'
export { refineRule, type RefinedRule } from './refine'
export {
  createRule,
  identityRule,
  ruleFromTransform,
  rewriteSquare,
  type RewriteSquare,
  type SquareStepRunner,
  type Rule,
  type RuleInit,
} from './rule'
export { ruleToCommands } from './script'
