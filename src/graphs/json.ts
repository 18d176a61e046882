/**
 * JSON form of typed graphs
 *
 * `{ nodes: [{ id, attrs }], edges: [{ from, to, attrs }] }` with attribute
 * sets written as arrays. Input is validated with zod before anything is
 * built; rejected input raises ParsingError with the zod issues attached.
 */

import { z } from 'zod'

import { GraphStructureError, ParsingError } from '../core/errors'
import type { AttrValue } from '../core/types'
import { attrsToJson } from '../utils/attrs'
import { createTypedGraph, type TypedGraph } from './typedGraph'

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const attrValueSchema = z.union([z.string(), z.number(), z.boolean()])

/** Scalars are accepted and read as singleton sets. */
export const attrsJsonSchema = z.record(
  z.union([attrValueSchema, z.array(attrValueSchema)]),
)

export const graphJsonSchema = z.object({
  directed: z.boolean().optional(),
  nodes: z.array(
    z.object({
      id: z.string(),
      attrs: attrsJsonSchema.optional(),
    }),
  ),
  edges: z.array(
    z.object({
      from: z.string(),
      to: z.string(),
      attrs: attrsJsonSchema.optional(),
    }),
  ),
})

export type AttrsJson = Record<string, AttrValue[]>

export interface GraphJson {
  directed?: boolean
  nodes: { id: string; attrs: AttrsJson }[]
  edges: { from: string; to: string; attrs: AttrsJson }[]
}

export type GraphJsonInput = z.input<typeof graphJsonSchema>

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Validate `input` against `schema` or raise ParsingError.
 * @internal
 */
export const parseWith = <T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  what: string,
): z.output<T> => {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new ParsingError(`Invalid ${what} JSON`, {
      issues: result.error.issues,
    })
  }
  return result.data
}

// ---------------------------------------------------------------------------
// Conversions
// ---------------------------------------------------------------------------

export const graphToJson = (graph: TypedGraph): GraphJson => ({
  directed: graph.directed,
  nodes: graph.nodes().map((id) => ({
    id,
    attrs: attrsToJson(graph.getNodeAttrs(id)),
  })),
  edges: graph.edges().map(([from, to]) => ({
    from,
    to,
    attrs: attrsToJson(graph.getEdgeAttrs(from, to)),
  })),
})

/**
 * Build a graph from its JSON form. `directed` in the input wins over
 * `options.directed`.
 * @throws ParsingError on schema violations or dangling edges
 */
export const graphFromJson = (
  input: unknown,
  options: { directed?: boolean } = {},
): TypedGraph => {
  const json = parseWith(graphJsonSchema, input, 'graph')
  const graph = createTypedGraph({
    directed: json.directed ?? options.directed ?? true,
  })
  try {
    for (const node of json.nodes) graph.addNode(node.id, node.attrs)
    for (const edge of json.edges) graph.addEdge(edge.from, edge.to, edge.attrs)
  } catch (error) {
    if (error instanceof GraphStructureError) {
      throw new ParsingError(`Invalid graph JSON: ${error.message}`, {
        ...error.context,
      })
    }
    throw error
  }
  return graph
}
