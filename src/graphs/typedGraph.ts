/**
 * Typed graph backed by graphology.
 *
 * Simple graph (no parallel edges) whose nodes and edges carry attribute
 * sets. Every mutation checks existence first and raises
 * GraphStructureError on duplicate or missing elements.
 */

import Graph from 'graphology'

import { GraphStructureError } from '../core/errors'
import type { AttrDict, AttrInput, Edge } from '../core/types'
import {
  attrsEqual,
  copyAttrs,
  normalizeAttrs,
  subtractAttrs,
  unionAttrs,
} from '../utils/attrs'

type ElementData = { attrs: AttrDict }

/**
 * Internal state for typed graph management
 */
interface TypedGraphState {
  graph: Graph<ElementData, ElementData>
}

export interface TypedGraphOptions {
  /** Directed edges (default: true) */
  directed?: boolean
}

export interface TypedGraph {
  readonly directed: boolean

  nodes(): string[]
  edges(): Edge[]
  nodeCount(): number
  edgeCount(): number
  hasNode(id: string): boolean
  hasEdge(source: string, target: string): boolean

  /** Copy of the attributes of a node. @throws GraphStructureError if missing */
  getNodeAttrs(id: string): AttrDict
  /** Copy of the attributes of an edge. @throws GraphStructureError if missing */
  getEdgeAttrs(source: string, target: string): AttrDict

  /** Out-neighbours (all neighbours when undirected). */
  successors(id: string): string[]
  /** In-neighbours (all neighbours when undirected). */
  predecessors(id: string): string[]

  /** @throws GraphStructureError if the node already exists */
  addNode(id: string, attrs?: AttrInput): void
  /** Removes the node and its incident edges. */
  removeNode(id: string): void
  /** @throws GraphStructureError if an endpoint is missing or the edge exists */
  addEdge(source: string, target: string, attrs?: AttrInput): void
  removeEdge(source: string, target: string): void

  addNodeAttrs(id: string, attrs: AttrInput): void
  removeNodeAttrs(id: string, attrs: AttrInput): void
  /** Replace all attributes of the node. */
  updateNodeAttrs(id: string, attrs: AttrInput): void
  addEdgeAttrs(source: string, target: string, attrs: AttrInput): void
  removeEdgeAttrs(source: string, target: string, attrs: AttrInput): void
  updateEdgeAttrs(source: string, target: string, attrs: AttrInput): void

  /**
   * Clone a node with its attributes and all incident edges.
   * Returns the id of the clone (`<id>1`, `<id>2`... when not given).
   */
  cloneNode(id: string, newId?: string): string
  /**
   * Merge nodes into one carrying the union of their attributes. Edges
   * collapsing onto the same pair get the union of their attributes.
   * Returns the id of the merged node (ids joined by `_` when not given).
   */
  mergeNodes(ids: string[], newId?: string): string
  relabelNode(id: string, newId: string): void

  /** First id of the form `<prefix>`, `<prefix>_1`... not in the graph. */
  uniqueNodeId(prefix: string): string
  subgraph(nodes: Iterable<string>): TypedGraph
  copy(): TypedGraph
  /** Same ids, edges and attribute sets. */
  equals(other: TypedGraph): boolean
}

/**
 * Create an empty typed graph
 */
export function createTypedGraph(options: TypedGraphOptions = {}): TypedGraph {
  const directed = options.directed ?? true
  const state: TypedGraphState = {
    graph: new Graph<ElementData, ElementData>({
      type: directed ? 'directed' : 'undirected',
      multi: false,
      allowSelfLoops: true,
    }),
  }

  function assertNode(id: string): void {
    if (!state.graph.hasNode(id)) {
      throw new GraphStructureError(`Node "${id}" does not exist`, { node: id })
    }
  }

  function edgeKey(source: string, target: string): string {
    const key =
      state.graph.hasNode(source) && state.graph.hasNode(target)
        ? state.graph.edge(source, target)
        : undefined
    if (key === undefined) {
      throw new GraphStructureError(
        `Edge "${source}" -> "${target}" does not exist`,
        { source, target },
      )
    }
    return key
  }

  function nodeAttrs(id: string): AttrDict {
    assertNode(id)
    return state.graph.getNodeAttribute(id, 'attrs')
  }

  function setNodeAttrs(id: string, attrs: AttrDict): void {
    assertNode(id)
    state.graph.setNodeAttribute(id, 'attrs', attrs)
  }

  function setEdgeAttrs(source: string, target: string, attrs: AttrDict): void {
    state.graph.setEdgeAttribute(edgeKey(source, target), 'attrs', attrs)
  }

  function edgeAttrs(source: string, target: string): AttrDict {
    return state.graph.getEdgeAttribute(edgeKey(source, target), 'attrs')
  }

  function insertEdge(source: string, target: string, attrs: AttrDict): void {
    assertNode(source)
    assertNode(target)
    if (state.graph.hasEdge(source, target)) {
      throw new GraphStructureError(
        `Edge "${source}" -> "${target}" already exists`,
        { source, target },
      )
    }
    state.graph.addEdge(source, target, { attrs })
  }

  function successors(id: string): string[] {
    assertNode(id)
    return directed
      ? state.graph.outNeighbors(id)
      : state.graph.neighbors(id)
  }

  function predecessors(id: string): string[] {
    assertNode(id)
    return directed ? state.graph.inNeighbors(id) : state.graph.neighbors(id)
  }

  function freshCloneId(id: string): string {
    let i = 1
    while (state.graph.hasNode(`${id}${String(i)}`)) i++
    return `${id}${String(i)}`
  }

  const self: TypedGraph = {
    directed,

    nodes: () => state.graph.nodes(),

    edges: () => {
      const out: Edge[] = []
      state.graph.forEachEdge((_edge, _attrs, source, target) => {
        out.push([source, target])
      })
      return out
    },

    nodeCount: () => state.graph.order,

    edgeCount: () => state.graph.size,

    hasNode: (id) => state.graph.hasNode(id),

    hasEdge: (source, target) =>
      state.graph.hasNode(source) &&
      state.graph.hasNode(target) &&
      state.graph.hasEdge(source, target),

    getNodeAttrs: (id) => copyAttrs(nodeAttrs(id)),

    getEdgeAttrs: (source, target) => copyAttrs(edgeAttrs(source, target)),

    successors,

    predecessors,

    addNode(id, attrs) {
      if (state.graph.hasNode(id)) {
        throw new GraphStructureError(`Node "${id}" already exists`, {
          node: id,
        })
      }
      state.graph.addNode(id, { attrs: normalizeAttrs(attrs) })
    },

    removeNode(id) {
      assertNode(id)
      state.graph.dropNode(id)
    },

    addEdge(source, target, attrs) {
      insertEdge(source, target, normalizeAttrs(attrs))
    },

    removeEdge(source, target) {
      state.graph.dropEdge(edgeKey(source, target))
    },

    addNodeAttrs(id, attrs) {
      setNodeAttrs(id, unionAttrs(nodeAttrs(id), normalizeAttrs(attrs)))
    },

    removeNodeAttrs(id, attrs) {
      setNodeAttrs(id, subtractAttrs(nodeAttrs(id), normalizeAttrs(attrs)))
    },

    updateNodeAttrs(id, attrs) {
      setNodeAttrs(id, normalizeAttrs(attrs))
    },

    addEdgeAttrs(source, target, attrs) {
      setEdgeAttrs(
        source,
        target,
        unionAttrs(edgeAttrs(source, target), normalizeAttrs(attrs)),
      )
    },

    removeEdgeAttrs(source, target, attrs) {
      setEdgeAttrs(
        source,
        target,
        subtractAttrs(edgeAttrs(source, target), normalizeAttrs(attrs)),
      )
    },

    updateEdgeAttrs(source, target, attrs) {
      setEdgeAttrs(source, target, normalizeAttrs(attrs))
    },

    cloneNode(id, newId) {
      assertNode(id)
      if (newId !== undefined && state.graph.hasNode(newId)) {
        throw new GraphStructureError(`Node "${newId}" already exists`, {
          node: newId,
        })
      }
      const clone = newId ?? freshCloneId(id)
      const outs = successors(id)
      const ins = predecessors(id)
      const loop = state.graph.hasEdge(id, id)

      self.addNode(clone, nodeAttrs(id))
      for (const target of outs) {
        if (target === id) continue
        if (!state.graph.hasEdge(clone, target)) {
          insertEdge(clone, target, copyAttrs(edgeAttrs(id, target)))
        }
      }
      for (const source of ins) {
        if (source === id) continue
        if (!state.graph.hasEdge(source, clone)) {
          insertEdge(source, clone, copyAttrs(edgeAttrs(source, id)))
        }
      }
      if (loop) {
        const loopAttrs = edgeAttrs(id, id)
        const pairs: Edge[] = [
          [id, clone],
          [clone, id],
          [clone, clone],
        ]
        for (const [source, target] of pairs) {
          if (!state.graph.hasEdge(source, target)) {
            insertEdge(source, target, copyAttrs(loopAttrs))
          }
        }
      }
      return clone
    },

    mergeNodes(ids, newId) {
      const group = [...new Set(ids)]
      if (group.length === 0) {
        throw new GraphStructureError('Cannot merge an empty list of nodes')
      }
      group.forEach(assertNode)
      if (group.length === 1) {
        const [only] = group
        if (newId !== undefined && newId !== only) self.relabelNode(only, newId)
        return newId ?? only
      }

      const merged = newId ?? group.join('_')
      if (state.graph.hasNode(merged) && !group.includes(merged)) {
        throw new GraphStructureError(
          `Cannot merge into "${merged}": node already exists`,
          { node: merged },
        )
      }

      const members = new Set(group)
      const incoming = new Map<string, AttrDict>()
      const outgoing = new Map<string, AttrDict>()
      let loopAttrs: AttrDict | undefined
      const attrs = unionAttrs(...group.map(nodeAttrs))

      for (const node of group) {
        for (const target of successors(node)) {
          const current = edgeAttrs(node, target)
          if (members.has(target)) {
            loopAttrs = unionAttrs(loopAttrs ?? {}, current)
          } else {
            outgoing.set(target, unionAttrs(outgoing.get(target) ?? {}, current))
          }
        }
        if (directed) {
          for (const source of predecessors(node)) {
            if (members.has(source)) continue
            const current = edgeAttrs(source, node)
            incoming.set(
              source,
              unionAttrs(incoming.get(source) ?? {}, current),
            )
          }
        }
      }

      for (const node of group) state.graph.dropNode(node)
      self.addNode(merged, attrs)
      for (const [target, edge] of outgoing) insertEdge(merged, target, edge)
      for (const [source, edge] of incoming) insertEdge(source, merged, edge)
      if (loopAttrs) insertEdge(merged, merged, loopAttrs)
      return merged
    },

    relabelNode(id, newId) {
      assertNode(id)
      if (id === newId) return
      if (state.graph.hasNode(newId)) {
        throw new GraphStructureError(`Node "${newId}" already exists`, {
          node: newId,
        })
      }
      const rename = (node: string) => (node === id ? newId : node)
      const incident: [string, string, AttrDict][] = []
      state.graph.forEachEdge(id, (_edge, data, source, target) => {
        incident.push([rename(source), rename(target), data.attrs])
      })
      const attrs = nodeAttrs(id)
      state.graph.dropNode(id)
      state.graph.addNode(newId, { attrs })
      for (const [source, target, edge] of incident) {
        if (!state.graph.hasEdge(source, target)) {
          state.graph.addEdge(source, target, { attrs: edge })
        }
      }
    },

    uniqueNodeId(prefix) {
      if (!state.graph.hasNode(prefix)) return prefix
      let i = 1
      while (state.graph.hasNode(`${prefix}_${String(i)}`)) i++
      return `${prefix}_${String(i)}`
    },

    subgraph(nodes) {
      const keep = new Set(nodes)
      const sub = createTypedGraph({ directed })
      for (const node of keep) sub.addNode(node, nodeAttrs(node))
      for (const [source, target] of self.edges()) {
        if (keep.has(source) && keep.has(target)) {
          sub.addEdge(source, target, edgeAttrs(source, target))
        }
      }
      return sub
    },

    copy() {
      return self.subgraph(state.graph.nodes())
    },

    equals(other) {
      if (other.directed !== directed) return false
      if (other.nodeCount() !== state.graph.order) return false
      if (other.edgeCount() !== state.graph.size) return false
      for (const node of state.graph.nodes()) {
        if (!other.hasNode(node)) return false
        if (!attrsEqual(nodeAttrs(node), other.getNodeAttrs(node))) return false
      }
      for (const [source, target] of self.edges()) {
        if (!other.hasEdge(source, target)) return false
        const theirs = other.getEdgeAttrs(source, target)
        if (!attrsEqual(edgeAttrs(source, target), theirs)) return false
      }
      return true
    },
  }

  return self
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export type NodeSpec = string | [id: string, attrs: AttrInput]
export type EdgeSpec =
  | [source: string, target: string]
  | [source: string, target: string, attrs: AttrInput]

/**
 * Build a graph from node and edge lists.
 *
 * @example
 * buildTypedGraph(['a', ['b', { kind: 'x' }]], [['a', 'b']])
 */
export const buildTypedGraph = (
  nodes: NodeSpec[],
  edges: EdgeSpec[] = [],
  options: TypedGraphOptions = {},
): TypedGraph => {
  const graph = createTypedGraph(options)
  for (const node of nodes) {
    if (typeof node === 'string') graph.addNode(node)
    else graph.addNode(node[0], node[1])
  }
  for (const edge of edges) {
    graph.addEdge(edge[0], edge[1], edge.length === 3 ? edge[2] : undefined)
  }
  return graph
}
