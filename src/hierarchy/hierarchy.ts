/**
 * Hierarchy of typed graphs and rules
 *
 * A DAG whose nodes are graphs or rules and whose edges are typings. Every
 * construction call validates first and mutates last, so a failing call
 * leaves the hierarchy as it was. Two paths between the same nodes must
 * compose to typings that agree wherever both are defined.
 *
 * Rules only ever type into graphs; nothing types into a rule.
 */

import Graph from 'graphology'
import { bfsFromNode } from 'graphology-traversal'
import isEqual from 'lodash/isEqual'

import { resolveConfig } from '../core/defaults'
import {
  GraphStructureError,
  HierarchyConsistencyError,
  RewritingTypingError,
} from '../core/errors'
import type {
  AttrDict,
  AttrInput,
  HierarchyConfig,
  Mapping,
  Relation,
} from '../core/types'
import type { TypedGraph } from '../graphs/typedGraph'
import { checkHomomorphism } from '../homomorphisms/check'
import {
  findMatching as matchPattern,
  type PatternTyping,
} from '../matching/findMatching'
import { rewriteSquare, type Rule } from '../rules/rule'
import type { DeepRequired } from '../types/utils'
import { copyAttrs, normalizeAttrs } from '../utils/attrs'
import { createLogger, type HierarchyLogger } from '../utils/log'
import {
  compose,
  copyMapping,
  copyRelation,
  identityMapping,
  lookup,
  normalizeRelation,
  reverseRelation,
} from '../utils/mapping'
import { createTiming, type Timing } from '../utils/timing'
import { collectUpdates, propagateDown, propagateUp, type RewritePlan } from './rewriting'
import { checkRewriteTyping } from './typeChecking'
import type {
  GraphNode,
  HierarchyEdge,
  HierarchyNode,
  PathTyping,
  RelationEntry,
  RelationInput,
  RewriteOptions,
  RuleNode,
  RuleTyping,
} from './types'

type NodeData = { entry: HierarchyNode }
type EdgeData = { entry: HierarchyEdge }

/**
 * Internal state for hierarchy management
 */
interface HierarchyState {
  dag: Graph<NodeData, EdgeData>
  /** Keyed by the sorted pair of graph ids */
  relations: Map<string, RelationEntry>
  config: DeepRequired<HierarchyConfig>
  logger: HierarchyLogger
  timing: Timing
}

export interface RewriteResult {
  /** This hierarchy, or the rewritten copy when not in place */
  hierarchy: Hierarchy
  /** rhs node -> node of the rewritten graph */
  rhsInstance: Mapping
}

export interface AddTypingOptions {
  /** Every node of the source must be typed (default: false) */
  total?: boolean
  attrs?: AttrInput
}

export interface AddRuleTypingOptions {
  lhsTotal?: boolean
  rhsTotal?: boolean
  attrs?: AttrInput
}

export interface Hierarchy {
  readonly directed: boolean

  // Queries
  graphs(): string[]
  rules(): string[]
  /** Typing edges between graphs */
  typings(): [source: string, target: string][]
  /** Typing edges from rules */
  ruleTypings(): [source: string, target: string][]
  relations(): [left: string, right: string][]
  has(id: string): boolean
  isGraph(id: string): boolean
  isRule(id: string): boolean
  successors(id: string): string[]
  predecessors(id: string): string[]
  adjacentRelations(id: string): string[]
  /** Copy of the stored graph. */
  getGraph(id: string): TypedGraph
  /** Copy of the stored rule. */
  getRule(id: string): Rule
  getAttrs(id: string): AttrDict
  /** Copy of the edge entry between two adjacent nodes. */
  getEdge(source: string, target: string): HierarchyEdge
  /**
   * Typing of a graph by another one, composed along a path when they are
   * not adjacent.
   * @throws GraphStructureError when no path joins them
   */
  getTyping(source: string, target: string): Mapping
  /** Typing of `lhs`, `p` and `rhs` of a rule by a graph. */
  getRuleTyping(rule: string, graph: string): RuleTyping
  /** Relation oriented from `left` to `right`. */
  getRelation(left: string, right: string): Relation
  getRelationAttrs(left: string, right: string): AttrDict
  /** Graphs typed by `id`, directly or not, with their typing into it. */
  getAncestors(id: string): Record<string, Mapping>
  /** Graphs typing `id`, directly or not, with the typing of `id` by them. */
  getDescendants(id: string): Record<string, Mapping>
  /** Graphs and rules typed by `id`, closest first. */
  ancestorOrder(id: string): string[]
  /** Graphs typing `id`, closest first. */
  descendantOrder(id: string): string[]
  /** Types of a node in the graphs typing its graph directly. */
  nodeType(graph: string, node: string): Record<string, string>
  composePathTyping(path: string[]): PathTyping

  // Construction
  addGraph(id: string, graph: TypedGraph, attrs?: AttrInput): void
  addRule(id: string, rule: Rule, attrs?: AttrInput): void
  addTyping(
    source: string,
    target: string,
    mapping: Mapping,
    options?: AddTypingOptions,
  ): void
  /**
   * Type both sides of a rule by a graph. Missing rhs types are inferred
   * from the lhs through the interface.
   */
  addRuleTyping(
    rule: string,
    graph: string,
    lhsMapping: Mapping,
    rhsMapping?: Mapping,
    options?: AddRuleTypingOptions,
  ): void
  addRelation(
    left: string,
    right: string,
    relation: RelationInput,
    attrs?: AttrInput,
  ): void
  /** Type a node in graphs that already type its graph. */
  addNodeType(graph: string, node: string, types: Record<string, string>): void
  /**
   * Remove a graph or a rule with its typings and relations. With
   * `reconnect`, each predecessor gets the composed typing into each
   * successor.
   */
  removeNode(id: string, reconnect?: boolean): void
  removeGraph(id: string, reconnect?: boolean): void
  removeRule(id: string): void
  removeTyping(source: string, target: string): void
  removeRelation(left: string, right: string): void
  renameGraph(id: string, newId: string): void
  renameNode(graph: string, node: string, newNode: string): void

  // Rewriting
  /**
   * Instances of `pattern` in a graph. Pattern typing may refer to any
   * graph typing it, directly or not.
   */
  findMatching(graph: string, pattern: TypedGraph, patternTyping?: PatternTyping): Mapping[]
  /** Instances of the lhs of a stored rule, typed as the rule is. */
  findRuleMatching(graph: string, rule: string): Mapping[]
  /**
   * Rewrite a graph and propagate the change to every graph and rule
   * related to it.
   * @throws RewritingTypingError on contradictory typing of the rule
   * @throws HierarchyConsistencyError when a strict rewrite breaks totality
   */
  rewrite(graph: string, rule: Rule, options?: RewriteOptions): RewriteResult
  /** Rewrite with a stored rule, typed by its rule typings. */
  applyRule(
    graph: string,
    rule: string,
    instance: Mapping,
    options?: Pick<RewriteOptions, 'pTyping' | 'strict' | 'inplace'>,
  ): RewriteResult

  copy(): Hierarchy
  equals(other: Hierarchy): boolean
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const relationKey = (a: string, b: string) =>
  JSON.stringify(a < b ? [a, b] : [b, a])

/** Same images wherever both mappings are defined. */
const agreeOnCommonDomain = (a: Mapping, b: Mapping): boolean =>
  Object.entries(a).every(([key, value]) => {
    const other = lookup(b, key)
    return other === undefined || other === value
  })

const edgeComponents = (entry: HierarchyEdge): Mapping[] =>
  entry.kind === 'typing'
    ? [entry.mapping]
    : [entry.lhsMapping, entry.rhsMapping]

const copyNode = (entry: HierarchyNode): HierarchyNode =>
  entry.kind === 'graph'
    ? { kind: 'graph', graph: entry.graph.copy(), attrs: copyAttrs(entry.attrs) }
    : { kind: 'rule', rule: entry.rule.copy(), attrs: copyAttrs(entry.attrs) }

const copyEdge = (entry: HierarchyEdge): HierarchyEdge =>
  entry.kind === 'typing'
    ? { ...entry, mapping: copyMapping(entry.mapping), attrs: copyAttrs(entry.attrs) }
    : {
        ...entry,
        lhsMapping: copyMapping(entry.lhsMapping),
        rhsMapping: copyMapping(entry.rhsMapping),
        attrs: copyAttrs(entry.attrs),
      }

const emptyState = (config: DeepRequired<HierarchyConfig>): HierarchyState => ({
  dag: new Graph<NodeData, EdgeData>({
    type: 'directed',
    multi: false,
    allowSelfLoops: false,
  }),
  relations: new Map(),
  config,
  logger: createLogger(config.debug),
  timing: createTiming(config.debug),
})

const cloneState = (state: HierarchyState): HierarchyState => {
  const next = emptyState(state.config)
  state.dag.forEachNode((id, data) => {
    next.dag.addNode(id, { entry: copyNode(data.entry) })
  })
  state.dag.forEachEdge((_edge, data, source, target) => {
    next.dag.addEdge(source, target, { entry: copyEdge(data.entry) })
  })
  for (const [key, entry] of state.relations) {
    next.relations.set(key, {
      ...entry,
      relation: copyRelation(entry.relation),
      attrs: copyAttrs(entry.attrs),
    })
  }
  return next
}

/** Write a rewrite plan into a hierarchy state. */
const applyPlan = (state: HierarchyState, plan: RewritePlan): void => {
  for (const [id, graph] of plan.graphs) {
    const { entry } = state.dag.getNodeAttributes(id)
    if (entry.kind === 'graph') {
      state.dag.setNodeAttribute(id, 'entry', { ...entry, graph })
    }
  }
  for (const [id, rule] of plan.rules) {
    const { entry } = state.dag.getNodeAttributes(id)
    if (entry.kind === 'rule') {
      state.dag.setNodeAttribute(id, 'entry', { ...entry, rule })
    }
  }
  for (const { source, target, mapping, total } of plan.typings) {
    const { entry } = state.dag.getEdgeAttributes(source, target)
    if (entry.kind === 'typing') {
      state.dag.setEdgeAttribute(source, target, 'entry', { ...entry, mapping, total })
    }
  }
  for (const update of plan.ruleTypings) {
    const { entry } = state.dag.getEdgeAttributes(update.source, update.target)
    if (entry.kind === 'ruleTyping') {
      state.dag.setEdgeAttribute(update.source, update.target, 'entry', {
        ...entry,
        lhsMapping: update.lhsMapping,
        rhsMapping: update.rhsMapping,
        lhsTotal: update.lhsTotal,
        rhsTotal: update.rhsTotal,
      })
    }
  }
  for (const { left, right, relation } of plan.relations) {
    const entry = state.relations.get(relationKey(left, right))
    if (entry === undefined) continue
    entry.relation = entry.left === left ? relation : reverseRelation(relation)
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create an empty hierarchy
 */
export function createHierarchy(config: HierarchyConfig = {}): Hierarchy {
  return buildHierarchy(emptyState(resolveConfig(config)))
}

function buildHierarchy(state: HierarchyState): Hierarchy {
  const { dag } = state

  // ---------------------------------------------------------------------------
  // Lookups
  // ---------------------------------------------------------------------------

  function nodeEntry(id: string): HierarchyNode {
    if (!dag.hasNode(id)) {
      throw new GraphStructureError(`"${id}" is not in the hierarchy`, { id })
    }
    return dag.getNodeAttribute(id, 'entry')
  }

  function graphEntry(id: string): GraphNode {
    const entry = nodeEntry(id)
    if (entry.kind !== 'graph') {
      throw new GraphStructureError(`"${id}" is a rule, not a graph`, { id })
    }
    return entry
  }

  function ruleEntry(id: string): RuleNode {
    const entry = nodeEntry(id)
    if (entry.kind !== 'rule') {
      throw new GraphStructureError(`"${id}" is a graph, not a rule`, { id })
    }
    return entry
  }

  function edgeEntry(source: string, target: string): HierarchyEdge {
    nodeEntry(source)
    nodeEntry(target)
    if (!dag.hasEdge(source, target)) {
      throw new GraphStructureError(
        `No typing from "${source}" to "${target}"`,
        { source, target },
      )
    }
    return dag.getEdgeAttribute(source, target, 'entry')
  }

  function relationEntry(left: string, right: string): RelationEntry {
    const entry = state.relations.get(relationKey(left, right))
    if (entry === undefined) {
      throw new GraphStructureError(
        `No relation between "${left}" and "${right}"`,
        { left, right },
      )
    }
    return entry
  }

  // ---------------------------------------------------------------------------
  // Paths
  // ---------------------------------------------------------------------------

  function order(from: string, mode: 'inbound' | 'outbound'): string[] {
    nodeEntry(from)
    const out: string[] = []
    bfsFromNode(
      dag,
      from,
      (node) => {
        if (node !== from) out.push(node)
      },
      { mode },
    )
    return out
  }

  /**
   * Combine the typings of every path between two nodes. Partial typings
   * complete each other; two paths sending a node to different types fail.
   */
  function combinePaths(from: string, to: string, paths: Mapping[][]): Mapping[] {
    const out: Mapping[] = []
    for (const path of paths) {
      path.forEach((mapping, i) => {
        const combined = out[i] ?? {}
        for (const [node, type] of Object.entries(mapping)) {
          const current = lookup(combined, node)
          if (current !== undefined && current !== type) {
            throw new HierarchyConsistencyError(
              `Paths from "${from}" to "${to}" type "${node}" by both "${current}" and "${type}"`,
              { from, to, node, types: [current, type] },
            )
          }
          combined[node] = type
        }
        out[i] = combined
      })
    }
    return out
  }

  /** Typing of `from` into every node it reaches, over all paths. */
  function downClosure(from: string): Map<string, Mapping[]> {
    const reached = new Set(order(from, 'outbound'))
    const out = new Map<string, Mapping[]>()
    const visit = (node: string): Mapping[] => {
      const known = out.get(node)
      if (known !== undefined) return known
      const paths: Mapping[][] = []
      for (const parent of dag.inNeighbors(node)) {
        const direct = edgeComponents(dag.getEdgeAttribute(parent, node, 'entry'))
        if (parent === from) paths.push(direct)
        else if (reached.has(parent)) {
          paths.push(visit(parent).map((mapping) => compose(mapping, direct[0])))
        }
      }
      const typing = combinePaths(from, node, paths)
      out.set(node, typing)
      return typing
    }
    for (const node of reached) visit(node)
    return out
  }

  /** Typing of every node reaching `to` into it, over all paths. */
  function upClosure(to: string): Map<string, Mapping[]> {
    const reached = new Set(order(to, 'inbound'))
    const out = new Map<string, Mapping[]>()
    const visit = (node: string): Mapping[] => {
      const known = out.get(node)
      if (known !== undefined) return known
      const paths: Mapping[][] = []
      for (const child of dag.outNeighbors(node)) {
        const direct = edgeComponents(dag.getEdgeAttribute(node, child, 'entry'))
        if (child === to) paths.push(direct)
        else if (reached.has(child)) {
          const [base] = visit(child)
          paths.push(direct.map((mapping) => compose(mapping, base)))
        }
      }
      const typing = combinePaths(node, to, paths)
      out.set(node, typing)
      return typing
    }
    for (const node of reached) visit(node)
    return out
  }

  /** Typing over all paths, or undefined when there is none. */
  function typingPath(source: string, target: string): Mapping[] | undefined {
    return downClosure(source).get(target)
  }

  /**
   * Every path through a new edge `source -> target` must agree with the
   * typing the existing paths between the same nodes combine to.
   */
  function checkCommutation(source: string, target: string, components: Mapping[]): void {
    const heads = new Map<string, Mapping[]>([[source, components]])
    for (const [node, typing] of upClosure(source)) {
      heads.set(node, typing.map((mapping) => compose(mapping, components[0])))
    }
    const tails = new Map<string, Mapping | undefined>([[target, undefined]])
    for (const [node, [typing]] of downClosure(target)) tails.set(node, typing)

    for (const [head, viaEdge] of heads) {
      const existing = downClosure(head)
      for (const [tail, rest] of tails) {
        const current = existing.get(tail)
        if (current === undefined) continue
        const candidate = rest
          ? viaEdge.map((mapping) => compose(mapping, rest))
          : viaEdge
        current.forEach((mapping, i) => {
          if (!agreeOnCommonDomain(mapping, candidate[i])) {
            throw new HierarchyConsistencyError(
              `Typing "${source}" -> "${target}" does not commute with an existing path from "${head}" to "${tail}"`,
              { source, target, from: head, to: tail },
            )
          }
        })
      }
    }
  }

  function assertNewEdge(source: string, target: string): void {
    if (dag.hasEdge(source, target)) {
      throw new GraphStructureError(
        `Typing from "${source}" to "${target}" already exists`,
        { source, target },
      )
    }
    if (source === target || order(target, 'outbound').includes(source)) {
      throw new HierarchyConsistencyError(
        `Typing from "${source}" to "${target}" would create a cycle`,
        { source, target },
      )
    }
  }

  /** Rhs types inferred from the lhs through the interface. */
  function completeRhsTyping(rule: Rule, lhsMapping: Mapping, rhsMapping: Mapping): Mapping {
    const out = copyMapping(rhsMapping)
    for (const [pNode, lhsNode] of Object.entries(rule.pLhs)) {
      const type = lookup(lhsMapping, lhsNode)
      if (type === undefined) continue
      const rhsNode = rule.pRhs[pNode]
      const current = lookup(out, rhsNode)
      if (current === undefined) {
        out[rhsNode] = type
      } else if (current !== type) {
        throw new HierarchyConsistencyError(
          `Rhs node "${rhsNode}" is typed by both "${current}" and "${type}"`,
          { node: rhsNode, types: [current, type] },
        )
      }
    }
    return out
  }

  function dropRelationsOf(id: string): void {
    for (const [key, entry] of state.relations) {
      if (entry.left === id || entry.right === id) state.relations.delete(key)
    }
  }

  // ---------------------------------------------------------------------------
  // Hierarchy
  // ---------------------------------------------------------------------------

  const self: Hierarchy = {
    directed: state.config.directed,

    graphs: () => dag.filterNodes((_id, data) => data.entry.kind === 'graph'),

    rules: () => dag.filterNodes((_id, data) => data.entry.kind === 'rule'),

    typings: () => {
      const out: [string, string][] = []
      dag.forEachEdge((_edge, data, source, target) => {
        if (data.entry.kind === 'typing') out.push([source, target])
      })
      return out
    },

    ruleTypings: () => {
      const out: [string, string][] = []
      dag.forEachEdge((_edge, data, source, target) => {
        if (data.entry.kind === 'ruleTyping') out.push([source, target])
      })
      return out
    },

    relations: () =>
      [...state.relations.values()].map(({ left, right }): [string, string] => [left, right]),

    has: (id) => dag.hasNode(id),

    isGraph: (id) => dag.hasNode(id) && nodeEntry(id).kind === 'graph',

    isRule: (id) => dag.hasNode(id) && nodeEntry(id).kind === 'rule',

    successors(id) {
      nodeEntry(id)
      return dag.outNeighbors(id)
    },

    predecessors(id) {
      nodeEntry(id)
      return dag.inNeighbors(id)
    },

    adjacentRelations(id) {
      nodeEntry(id)
      const out: string[] = []
      for (const { left, right } of state.relations.values()) {
        if (left === id) out.push(right)
        else if (right === id) out.push(left)
      }
      return out
    },

    getGraph: (id) => graphEntry(id).graph.copy(),

    getRule: (id) => ruleEntry(id).rule.copy(),

    getAttrs: (id) => copyAttrs(nodeEntry(id).attrs),

    getEdge: (source, target) => copyEdge(edgeEntry(source, target)),

    getTyping(source, target) {
      const entry = nodeEntry(source)
      graphEntry(target)
      if (entry.kind === 'rule') {
        throw new GraphStructureError(
          `"${source}" is a rule, its typing has one mapping per side`,
          { source },
        )
      }
      if (source === target) return identityMapping(entry.graph.nodes())
      const typing = typingPath(source, target)
      if (typing === undefined) {
        throw new GraphStructureError(
          `No typing path from "${source}" to "${target}"`,
          { source, target },
        )
      }
      return copyMapping(typing[0])
    },

    getRuleTyping(ruleId, graphId) {
      const { rule } = ruleEntry(ruleId)
      graphEntry(graphId)
      const typing = typingPath(ruleId, graphId)
      if (typing === undefined) {
        throw new GraphStructureError(
          `No typing path from "${ruleId}" to "${graphId}"`,
          { source: ruleId, target: graphId },
        )
      }
      const [lhs, rhs] = typing
      return {
        lhs: copyMapping(lhs),
        p: compose(rule.pLhs, lhs),
        rhs: copyMapping(rhs),
      }
    },

    getRelation(left, right) {
      const entry = relationEntry(left, right)
      return entry.left === left
        ? copyRelation(entry.relation)
        : reverseRelation(entry.relation)
    },

    getRelationAttrs: (left, right) => copyAttrs(relationEntry(left, right).attrs),

    getAncestors(id) {
      graphEntry(id)
      const out: Record<string, Mapping> = {}
      for (const [node, typing] of upClosure(id)) {
        if (nodeEntry(node).kind === 'graph') out[node] = typing[0]
      }
      return out
    },

    getDescendants(id) {
      graphEntry(id)
      const out: Record<string, Mapping> = {}
      for (const [node, typing] of downClosure(id)) out[node] = typing[0]
      return out
    },

    ancestorOrder: (id) => order(id, 'inbound'),

    descendantOrder: (id) => order(id, 'outbound'),

    nodeType(graphId, node) {
      const { graph } = graphEntry(graphId)
      if (!graph.hasNode(node)) {
        throw new GraphStructureError(
          `Node "${node}" does not exist in "${graphId}"`,
          { graph: graphId, node },
        )
      }
      const out: Record<string, string> = {}
      for (const target of dag.outNeighbors(graphId)) {
        const entry = dag.getEdgeAttribute(graphId, target, 'entry')
        if (entry.kind !== 'typing') continue
        const type = lookup(entry.mapping, node)
        if (type !== undefined) out[target] = type
      }
      return out
    },

    composePathTyping(path) {
      if (path.length < 2) {
        throw new GraphStructureError('A typing path joins at least two nodes', { path })
      }
      let typing = edgeComponents(edgeEntry(path[0], path[1]))
      for (let i = 1; i < path.length - 1; i++) {
        const [next] = edgeComponents(edgeEntry(path[i], path[i + 1]))
        typing = typing.map((mapping) => compose(mapping, next))
      }
      const [first, second] = typing
      return second === undefined
        ? { kind: 'graph', mapping: first }
        : { kind: 'rule', lhs: first, rhs: second }
    },

    // ---------------------------------------------------------------------------
    // Construction
    // ---------------------------------------------------------------------------

    addGraph(id, graph, attrs) {
      if (dag.hasNode(id)) {
        throw new GraphStructureError(`"${id}" is already in the hierarchy`, { id })
      }
      if (graph.directed !== state.config.directed) {
        throw new HierarchyConsistencyError(
          `Graph "${id}" is ${graph.directed ? 'directed' : 'undirected'} unlike the hierarchy`,
          { id },
        )
      }
      dag.addNode(id, {
        entry: { kind: 'graph', graph: graph.copy(), attrs: normalizeAttrs(attrs) },
      })
    },

    addRule(id, rule, attrs) {
      if (dag.hasNode(id)) {
        throw new GraphStructureError(`"${id}" is already in the hierarchy`, { id })
      }
      if (rule.lhs.directed !== state.config.directed) {
        throw new HierarchyConsistencyError(
          `Rule "${id}" is ${rule.lhs.directed ? 'directed' : 'undirected'} unlike the hierarchy`,
          { id },
        )
      }
      dag.addNode(id, {
        entry: { kind: 'rule', rule: rule.copy(), attrs: normalizeAttrs(attrs) },
      })
    },

    addTyping(source, target, mapping, options = {}) {
      const entry = nodeEntry(source)
      const { graph: targetGraph } = graphEntry(target)
      if (entry.kind === 'rule') {
        throw new HierarchyConsistencyError(
          `"${source}" is a rule, type it with a rule typing`,
          { source },
        )
      }
      assertNewEdge(source, target)
      const total = options.total ?? false
      checkHomomorphism(entry.graph, targetGraph, mapping, total)
      checkCommutation(source, target, [mapping])

      dag.addEdge(source, target, {
        entry: {
          kind: 'typing',
          mapping: copyMapping(mapping),
          total,
          attrs: normalizeAttrs(options.attrs),
        },
      })
      state.logger.logTyping('typing', source, target, {
        mapping: Object.keys(mapping).length,
      })
    },

    addRuleTyping(ruleId, graphId, lhsMapping, rhsMapping = {}, options = {}) {
      const { rule } = ruleEntry(ruleId)
      const { graph } = graphEntry(graphId)
      assertNewEdge(ruleId, graphId)
      const lhsTotal = options.lhsTotal ?? false
      const rhsTotal = options.rhsTotal ?? false
      const rhs = completeRhsTyping(rule, lhsMapping, rhsMapping)
      checkHomomorphism(rule.lhs, graph, lhsMapping, lhsTotal)
      checkHomomorphism(rule.rhs, graph, rhs, rhsTotal)
      checkCommutation(ruleId, graphId, [lhsMapping, rhs])

      dag.addEdge(ruleId, graphId, {
        entry: {
          kind: 'ruleTyping',
          lhsMapping: copyMapping(lhsMapping),
          rhsMapping: rhs,
          lhsTotal,
          rhsTotal,
          attrs: normalizeAttrs(options.attrs),
        },
      })
      state.logger.logTyping('ruleTyping', ruleId, graphId, {
        lhs: Object.keys(lhsMapping).length,
        rhs: Object.keys(rhs).length,
      })
    },

    addRelation(left, right, input, attrs) {
      const leftGraph = graphEntry(left).graph
      const rightGraph = graphEntry(right).graph
      if (left === right) {
        throw new HierarchyConsistencyError(
          `Cannot relate "${left}" to itself`,
          { left },
        )
      }
      if (state.relations.has(relationKey(left, right))) {
        throw new GraphStructureError(
          `Relation between "${left}" and "${right}" already exists`,
          { left, right },
        )
      }
      const relation = normalizeRelation(input)
      for (const [node, related] of Object.entries(relation)) {
        if (!leftGraph.hasNode(node)) {
          throw new GraphStructureError(
            `Relation refers to "${node}" which is not a node of "${left}"`,
            { graph: left, node },
          )
        }
        for (const other of related) {
          if (!rightGraph.hasNode(other)) {
            throw new GraphStructureError(
              `Relation refers to "${other}" which is not a node of "${right}"`,
              { graph: right, node: other },
            )
          }
        }
      }
      state.relations.set(relationKey(left, right), {
        left,
        right,
        relation,
        attrs: normalizeAttrs(attrs),
      })
      state.logger.logTyping('relation', left, right, {
        pairs: Object.values(relation).reduce((sum, set) => sum + set.size, 0),
      })
    },

    addNodeType(graphId, node, types) {
      const { graph } = graphEntry(graphId)
      if (!graph.hasNode(node)) {
        throw new GraphStructureError(
          `Node "${node}" does not exist in "${graphId}"`,
          { graph: graphId, node },
        )
      }
      const updates: [string, Mapping][] = []
      for (const [target, type] of Object.entries(types)) {
        const entry = edgeEntry(graphId, target)
        if (entry.kind !== 'typing') continue
        const current = lookup(entry.mapping, node)
        if (current !== undefined && current !== type) {
          throw new HierarchyConsistencyError(
            `Node "${node}" of "${graphId}" is already typed by "${current}" in "${target}"`,
            { graph: graphId, node, target },
          )
        }
        const mapping = { ...entry.mapping, [node]: type }
        checkHomomorphism(graph, graphEntry(target).graph, mapping, entry.total)
        checkCommutation(graphId, target, [mapping])
        updates.push([target, mapping])
      }
      for (const [target, mapping] of updates) {
        const { entry } = dag.getEdgeAttributes(graphId, target)
        if (entry.kind === 'typing') {
          dag.setEdgeAttribute(graphId, target, 'entry', { ...entry, mapping })
        }
      }
    },

    removeNode(id, reconnect = false) {
      const kind = nodeEntry(id).kind
      const reconnected: [string, string][] = []
      if (reconnect) {
        for (const pred of dag.inNeighbors(id)) {
          for (const succ of dag.outNeighbors(id)) {
            if (dag.hasEdge(pred, succ)) continue
            const incoming = dag.getEdgeAttribute(pred, id, 'entry')
            const outgoing = dag.getEdgeAttribute(id, succ, 'entry')
            if (outgoing.kind !== 'typing') continue
            const entry: HierarchyEdge =
              incoming.kind === 'typing'
                ? {
                    kind: 'typing',
                    mapping: compose(incoming.mapping, outgoing.mapping),
                    total: incoming.total && outgoing.total,
                    attrs: {},
                  }
                : {
                    kind: 'ruleTyping',
                    lhsMapping: compose(incoming.lhsMapping, outgoing.mapping),
                    rhsMapping: compose(incoming.rhsMapping, outgoing.mapping),
                    lhsTotal: incoming.lhsTotal && outgoing.total,
                    rhsTotal: incoming.rhsTotal && outgoing.total,
                    attrs: {},
                  }
            dag.addEdge(pred, succ, { entry })
            reconnected.push([pred, succ])
          }
        }
      }
      dropRelationsOf(id)
      dag.dropNode(id)
      state.logger.logRemoval(kind, id, reconnected)
    },

    removeGraph(id, reconnect = false) {
      graphEntry(id)
      self.removeNode(id, reconnect)
    },

    removeRule(id) {
      ruleEntry(id)
      self.removeNode(id)
    },

    removeTyping(source, target) {
      edgeEntry(source, target)
      dag.dropEdge(source, target)
      state.logger.logRemoval('typing', `${source} -> ${target}`)
    },

    removeRelation(left, right) {
      relationEntry(left, right)
      state.relations.delete(relationKey(left, right))
      state.logger.logRemoval('relation', `${left} - ${right}`)
    },

    renameGraph(id, newId) {
      nodeEntry(id)
      if (dag.hasNode(newId)) {
        throw new GraphStructureError(`"${newId}" is already in the hierarchy`, { id: newId })
      }
      dag.addNode(newId, dag.getNodeAttributes(id))
      for (const target of dag.outNeighbors(id)) {
        dag.addEdge(newId, target, dag.getEdgeAttributes(id, target))
      }
      for (const source of dag.inNeighbors(id)) {
        dag.addEdge(source, newId, dag.getEdgeAttributes(source, id))
      }
      dag.dropNode(id)
      for (const [key, entry] of [...state.relations]) {
        if (entry.left !== id && entry.right !== id) continue
        state.relations.delete(key)
        const left = entry.left === id ? newId : entry.left
        const right = entry.right === id ? newId : entry.right
        state.relations.set(relationKey(left, right), { ...entry, left, right })
      }
    },

    renameNode(graphId, node, newNode) {
      graphEntry(graphId).graph.relabelNode(node, newNode)
      const renameKey = (mapping: Mapping): Mapping => {
        const out: Mapping = {}
        for (const [key, value] of Object.entries(mapping)) {
          out[key === node ? newNode : key] = value
        }
        return out
      }
      const renameValue = (mapping: Mapping): Mapping => {
        const out: Mapping = {}
        for (const [key, value] of Object.entries(mapping)) {
          out[key] = value === node ? newNode : value
        }
        return out
      }
      for (const target of dag.outNeighbors(graphId)) {
        const { entry } = dag.getEdgeAttributes(graphId, target)
        if (entry.kind === 'typing') {
          dag.setEdgeAttribute(graphId, target, 'entry', {
            ...entry,
            mapping: renameKey(entry.mapping),
          })
        }
      }
      for (const source of dag.inNeighbors(graphId)) {
        const { entry } = dag.getEdgeAttributes(source, graphId)
        dag.setEdgeAttribute(
          source,
          graphId,
          'entry',
          entry.kind === 'typing'
            ? { ...entry, mapping: renameValue(entry.mapping) }
            : {
                ...entry,
                lhsMapping: renameValue(entry.lhsMapping),
                rhsMapping: renameValue(entry.rhsMapping),
              },
        )
      }
      for (const entry of state.relations.values()) {
        if (entry.left === graphId) {
          const renamed: Relation = {}
          for (const [key, related] of Object.entries(entry.relation)) {
            renamed[key === node ? newNode : key] = related
          }
          entry.relation = renamed
        } else if (entry.right === graphId) {
          for (const related of Object.values(entry.relation)) {
            if (related.delete(node)) related.add(newNode)
          }
        }
      }
    },

    // ---------------------------------------------------------------------------
    // Rewriting
    // ---------------------------------------------------------------------------

    findMatching(graphId, pattern, patternTyping = {}) {
      const { graph } = graphEntry(graphId)
      const graphTyping: Record<string, Mapping> = {}
      for (const typeGraph of Object.keys(patternTyping)) {
        if (typeGraph === graphId) {
          graphTyping[typeGraph] = identityMapping(graph.nodes())
          continue
        }
        graphEntry(typeGraph)
        const typing = typingPath(graphId, typeGraph)
        if (typing === undefined) {
          throw new RewritingTypingError(
            `Graph "${graphId}" is not typed by "${typeGraph}"`,
            { graph: graphId, typeGraph },
          )
        }
        graphTyping[typeGraph] = typing[0]
      }
      const matches = state.timing.phase(graphId, 'matching', () =>
        matchPattern(graph, pattern, { patternTyping, graphTyping }),
      )
      state.timing.finish(graphId)
      return matches
    },

    findRuleMatching(graphId, ruleId) {
      const { rule } = ruleEntry(ruleId)
      const patternTyping: PatternTyping = {}
      for (const target of dag.outNeighbors(ruleId)) {
        const entry = dag.getEdgeAttribute(ruleId, target, 'entry')
        if (entry.kind === 'ruleTyping') patternTyping[target] = entry.lhsMapping
      }
      return self.findMatching(graphId, rule.lhs, patternTyping)
    },

    rewrite(graphId, rule, options = {}) {
      const { strict = false, inplace = true } = options
      if (nodeEntry(graphId).kind === 'rule') {
        throw new HierarchyConsistencyError(
          `"${graphId}" is a rule; only graphs can be rewritten`,
          { id: graphId },
        )
      }
      const { graph } = graphEntry(graphId)
      const start = performance.now()
      const instance = options.instance ?? identityMapping(rule.lhs.nodes())

      const typing = checkRewriteTyping(self, graphId, rule, instance, options, strict)
      const square = rewriteSquare(rule, graph, instance, (step, run) =>
        state.timing.phase(graphId, step, run),
      )
      const up = state.timing.phase(graphId, 'propagateUp', () =>
        propagateUp(self, graphId, rule, instance, square, typing.pTyping),
      )
      const down = state.timing.phase(graphId, 'propagateDown', () =>
        propagateDown(self, graphId, rule, typing.rhsTyping),
      )
      const plan = collectUpdates(self, graphId, square, up, down)
      state.timing.finish(graphId)

      const target = inplace ? state : cloneState(state)
      applyPlan(target, plan)
      const hierarchy = inplace ? self : buildHierarchy(target)

      state.logger.logRewrite({
        graph: graphId,
        rule: {
          removedNodes: rule.removedNodes().size,
          clonedNodes: Object.keys(rule.clonedNodes()).length,
          addedNodes: rule.addedNodes().size,
          mergedNodes: Object.keys(rule.mergedNodes()).length,
        },
        instance,
        rhsInstance: plan.rhsInstance,
        ancestors: plan.ancestors,
        descendants: plan.descendants,
        inplace,
        durationMs: performance.now() - start,
      })
      return { hierarchy, rhsInstance: copyMapping(plan.rhsInstance) }
    },

    applyRule(graphId, ruleId, instance, options = {}) {
      const { rule } = ruleEntry(ruleId)
      const below = new Set(order(graphId, 'outbound'))
      const lhsTyping: Record<string, Mapping> = {}
      const rhsTyping: Record<string, RelationInput> = {}
      for (const target of dag.outNeighbors(ruleId)) {
        const entry = dag.getEdgeAttribute(ruleId, target, 'entry')
        if (entry.kind !== 'ruleTyping' || !below.has(target)) continue
        lhsTyping[target] = entry.lhsMapping
        rhsTyping[target] = entry.rhsMapping
      }
      return self.rewrite(graphId, rule.copy(), {
        ...options,
        instance,
        lhsTyping,
        rhsTyping,
      })
    },

    copy: () => buildHierarchy(cloneState(state)),

    equals(other) {
      const sameIds = (a: string[], b: string[]) =>
        isEqual([...a].sort(), [...b].sort())
      const pairKeys = (pairs: [string, string][]) =>
        pairs.map((pair) => JSON.stringify(pair))
      if (
        other.directed !== self.directed ||
        !sameIds(self.graphs(), other.graphs()) ||
        !sameIds(self.rules(), other.rules()) ||
        !sameIds(pairKeys(self.typings()), pairKeys(other.typings())) ||
        !sameIds(pairKeys(self.ruleTypings()), pairKeys(other.ruleTypings()))
      ) {
        return false
      }
      const relations = self.relations()
      if (relations.length !== other.relations().length) return false
      return (
        self.graphs().every((id) => graphEntry(id).graph.equals(other.getGraph(id))) &&
        self.rules().every((id) => ruleEntry(id).rule.equals(other.getRule(id))) &&
        [...self.typings(), ...self.ruleTypings()].every(([source, target]) => {
          const mine = edgeEntry(source, target)
          const theirs = other.getEdge(source, target)
          return isEqual({ ...mine, attrs: {} }, { ...theirs, attrs: {} })
        }) &&
        relations.every(
          ([left, right]) =>
            other.adjacentRelations(left).includes(right) &&
            isEqual(self.getRelation(left, right), other.getRelation(left, right)),
        )
      )
    },
  }

  return self
}
