/**
 * JSON form of hierarchies
 *
 * Graphs and rules are written in their own JSON forms. Typings keep their
 * totality flags, relations are written once per pair as
 * `{ from, to, rel: { node: [related...] } }`.
 *
 * Loading replays the construction calls, so a document describing an
 * inconsistent hierarchy is rejected with the error the call raises.
 */

import { z } from 'zod'

import type { Mapping } from '../core/types'
import {
  attrsJsonSchema,
  graphFromJson,
  graphJsonSchema,
  graphToJson,
  parseWith,
  type AttrsJson,
  type GraphJson,
} from '../graphs/json'
import { mappingJsonSchema, ruleFromJson, ruleJsonSchema, ruleToJson, type RuleJson } from '../rules/json'
import { attrsToJson } from '../utils/attrs'
import { copyMapping } from '../utils/mapping'
import { createHierarchy, type Hierarchy } from './hierarchy'

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const hierarchyJsonSchema = z.object({
  directed: z.boolean().optional(),
  graphs: z.array(
    z.object({
      id: z.string(),
      graph: graphJsonSchema,
      attrs: attrsJsonSchema.optional(),
    }),
  ),
  rules: z
    .array(
      z.object({
        id: z.string(),
        rule: ruleJsonSchema,
        attrs: attrsJsonSchema.optional(),
      }),
    )
    .default([]),
  typing: z
    .array(
      z.object({
        from: z.string(),
        to: z.string(),
        mapping: mappingJsonSchema,
        total: z.boolean().default(false),
        attrs: attrsJsonSchema.optional(),
      }),
    )
    .default([]),
  rule_typing: z
    .array(
      z.object({
        from: z.string(),
        to: z.string(),
        lhs_mapping: mappingJsonSchema,
        rhs_mapping: mappingJsonSchema.default({}),
        lhs_total: z.boolean().default(false),
        rhs_total: z.boolean().default(false),
        attrs: attrsJsonSchema.optional(),
      }),
    )
    .default([]),
  relations: z
    .array(
      z.object({
        from: z.string(),
        to: z.string(),
        rel: z.record(z.array(z.string())),
        attrs: attrsJsonSchema.optional(),
      }),
    )
    .default([]),
})

export type HierarchyJsonInput = z.input<typeof hierarchyJsonSchema>

export interface HierarchyJson {
  directed: boolean
  graphs: { id: string; graph: GraphJson; attrs: AttrsJson }[]
  rules: { id: string; rule: RuleJson; attrs: AttrsJson }[]
  typing: {
    from: string
    to: string
    mapping: Mapping
    total: boolean
    attrs: AttrsJson
  }[]
  rule_typing: {
    from: string
    to: string
    lhs_mapping: Mapping
    rhs_mapping: Mapping
    lhs_total: boolean
    rhs_total: boolean
    attrs: AttrsJson
  }[]
  relations: {
    from: string
    to: string
    rel: Record<string, string[]>
    attrs: AttrsJson
  }[]
}

// ---------------------------------------------------------------------------
// Conversions
// ---------------------------------------------------------------------------

export const hierarchyToJson = (hierarchy: Hierarchy): HierarchyJson => {
  const json: HierarchyJson = {
    directed: hierarchy.directed,
    graphs: hierarchy.graphs().map((id) => ({
      id,
      graph: graphToJson(hierarchy.getGraph(id)),
      attrs: attrsToJson(hierarchy.getAttrs(id)),
    })),
    rules: hierarchy.rules().map((id) => ({
      id,
      rule: ruleToJson(hierarchy.getRule(id)),
      attrs: attrsToJson(hierarchy.getAttrs(id)),
    })),
    typing: [],
    rule_typing: [],
    relations: [],
  }

  for (const [from, to] of [...hierarchy.typings(), ...hierarchy.ruleTypings()]) {
    const edge = hierarchy.getEdge(from, to)
    if (edge.kind === 'typing') {
      json.typing.push({
        from,
        to,
        mapping: copyMapping(edge.mapping),
        total: edge.total,
        attrs: attrsToJson(edge.attrs),
      })
    } else {
      json.rule_typing.push({
        from,
        to,
        lhs_mapping: copyMapping(edge.lhsMapping),
        rhs_mapping: copyMapping(edge.rhsMapping),
        lhs_total: edge.lhsTotal,
        rhs_total: edge.rhsTotal,
        attrs: attrsToJson(edge.attrs),
      })
    }
  }

  for (const [from, to] of hierarchy.relations()) {
    const rel: Record<string, string[]> = {}
    for (const [node, related] of Object.entries(hierarchy.getRelation(from, to))) {
      rel[node] = [...related]
    }
    json.relations.push({
      from,
      to,
      rel,
      attrs: attrsToJson(hierarchy.getRelationAttrs(from, to)),
    })
  }
  return json
}

/**
 * Build a hierarchy from its JSON form.
 * @throws ParsingError on schema violations
 * @throws HierarchyConsistencyError if typings do not commute or form a cycle
 */
export const hierarchyFromJson = (input: unknown): Hierarchy => {
  const json = parseWith(hierarchyJsonSchema, input, 'hierarchy')
  const directed = json.directed ?? true
  const hierarchy = createHierarchy({ directed })

  for (const { id, graph, attrs } of json.graphs) {
    hierarchy.addGraph(id, graphFromJson(graph, { directed }), attrs)
  }
  for (const { id, rule, attrs } of json.rules) {
    hierarchy.addRule(id, ruleFromJson(rule, { directed }), attrs)
  }
  for (const { from, to, mapping, total, attrs } of json.typing) {
    hierarchy.addTyping(from, to, mapping, { total, attrs })
  }
  for (const entry of json.rule_typing) {
    hierarchy.addRuleTyping(entry.from, entry.to, entry.lhs_mapping, entry.rhs_mapping, {
      lhsTotal: entry.lhs_total,
      rhsTotal: entry.rhs_total,
      attrs: entry.attrs,
    })
  }
  for (const { from, to, rel, attrs } of json.relations) {
    hierarchy.addRelation(from, to, rel, attrs)
  }
  return hierarchy
}
