/**
 * Rule commands
 *
 * Typed edit commands replayed through the `inject*` API of a rule.
 * Node references follow the rule's own resolution: removals, clones,
 * merges and updates name `p` or `lhs` nodes, additions name `rhs` nodes.
 */

import { z } from 'zod'

import { attrsJsonSchema, parseWith } from '../graphs/json'
import type { Rule } from './rule'

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const nodeCommand = <T extends string>(type: T) =>
  z.object({ type: z.literal(type), node: z.string() })

const edgeCommand = <T extends string>(type: T) =>
  z.object({ type: z.literal(type), source: z.string(), target: z.string() })

export const ruleCommandSchema = z.discriminatedUnion('type', [
  nodeCommand('CLONE').extend({ newNode: z.string().optional() }),
  z.object({
    type: z.literal('MERGE'),
    nodes: z.array(z.string()).min(1),
    newNode: z.string().optional(),
  }),
  nodeCommand('ADD_NODE').extend({ attrs: attrsJsonSchema.optional() }),
  nodeCommand('DELETE_NODE'),
  edgeCommand('ADD_EDGE').extend({ attrs: attrsJsonSchema.optional() }),
  edgeCommand('DELETE_EDGE'),
  nodeCommand('ADD_NODE_ATTRS').extend({ attrs: attrsJsonSchema }),
  nodeCommand('DELETE_NODE_ATTRS').extend({ attrs: attrsJsonSchema }),
  nodeCommand('UPDATE_NODE_ATTRS').extend({ attrs: attrsJsonSchema }),
  edgeCommand('ADD_EDGE_ATTRS').extend({ attrs: attrsJsonSchema }),
  edgeCommand('DELETE_EDGE_ATTRS').extend({ attrs: attrsJsonSchema }),
  edgeCommand('UPDATE_EDGE_ATTRS').extend({ attrs: attrsJsonSchema }),
])

export type RuleCommand = z.infer<typeof ruleCommandSchema>

export type RuleCommandType = RuleCommand['type']

/** @throws ParsingError on anything that is not a list of commands */
export const parseRuleCommands = (input: unknown): RuleCommand[] =>
  parseWith(z.array(ruleCommandSchema), input, 'rule command')

// ---------------------------------------------------------------------------
// Replay
// ---------------------------------------------------------------------------

/** Apply one command to `rule` in place. */
export const applyRuleCommand = (rule: Rule, command: RuleCommand): void => {
  switch (command.type) {
    case 'CLONE':
      rule.injectCloneNode(command.node, command.newNode)
      return
    case 'MERGE':
      rule.injectMergeNodes(command.nodes, command.newNode)
      return
    case 'ADD_NODE':
      rule.injectAddNode(command.node, command.attrs)
      return
    case 'DELETE_NODE':
      rule.injectRemoveNode(command.node)
      return
    case 'ADD_EDGE':
      rule.injectAddEdge(command.source, command.target, command.attrs)
      return
    case 'DELETE_EDGE':
      rule.injectRemoveEdge(command.source, command.target)
      return
    case 'ADD_NODE_ATTRS':
      rule.injectAddNodeAttrs(command.node, command.attrs)
      return
    case 'DELETE_NODE_ATTRS':
      rule.injectRemoveNodeAttrs(command.node, command.attrs)
      return
    case 'UPDATE_NODE_ATTRS':
      rule.injectUpdateNodeAttrs(command.node, command.attrs)
      return
    case 'ADD_EDGE_ATTRS':
      rule.injectAddEdgeAttrs(command.source, command.target, command.attrs)
      return
    case 'DELETE_EDGE_ATTRS':
      rule.injectRemoveEdgeAttrs(command.source, command.target, command.attrs)
      return
    case 'UPDATE_EDGE_ATTRS':
      rule.injectUpdateEdgeAttrs(command.source, command.target, command.attrs)
      return
  }
}

export const applyRuleCommands = (
  rule: Rule,
  commands: readonly RuleCommand[],
): void => {
  for (const command of commands) applyRuleCommand(rule, command)
}
