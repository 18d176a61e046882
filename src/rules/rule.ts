/**
 * Sesqui-pushout rules
 *
 * A rule is a span `lhs <- p -> rhs`. It owns independent copies of its
 * three graphs; edits go through the `inject*` methods, which keep both
 * legs valid homomorphisms and roll back on failure.
 */

import isEqual from 'lodash/isEqual'

import { pullbackComplement } from '../category/pullbackComplement'
import { pushout } from '../category/pushout'
import {
  GraphStructureError,
  InvalidHomomorphismError,
  RuleConstructionError,
} from '../core/errors'
import type { AttrDict, AttrInput, Edge, Mapping } from '../core/types'
import {
  createTypedGraph,
  type TypedGraph,
  type TypedGraphOptions,
} from '../graphs/typedGraph'
import { checkHomomorphism, identity } from '../homomorphisms/check'
import { normalizeAttrs, subtractAttrs, unionAttrs } from '../utils/attrs'
import { copyMapping, keysByValue } from '../utils/mapping'
import { applyRuleCommands, type RuleCommand } from './commands'
import * as queries from './queries'
import type { EdgeAttrsEntry, RuleParts } from './queries'
import { refineRule } from './refine'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RuleInit {
  lhs: TypedGraph
  p: TypedGraph
  rhs: TypedGraph
  /** Defaults to the identity on the nodes of `p` */
  pLhs?: Mapping
  /** Defaults to the identity on the nodes of `p` */
  pRhs?: Mapping
}

/** All arrows of one sesqui-pushout step on a graph G. */
export interface RewriteSquare {
  /** G_m: G with deletions and clones applied */
  gm: TypedGraph
  pGm: Mapping
  gmG: Mapping
  /** G': the rewritten graph */
  graph: TypedGraph
  gmG1: Mapping
  /** Image of `rhs` in G' */
  rhsInstance: Mapping
}

export interface Rule extends RuleParts {
  // Derived queries
  removedNodes(): Set<string>
  removedEdges(): Edge[]
  removedNodeAttrs(): Record<string, AttrDict>
  removedEdgeAttrs(): EdgeAttrsEntry[]
  clonedNodes(): Record<string, Set<string>>
  addedNodes(): Set<string>
  addedEdges(): Edge[]
  addedNodeAttrs(): Record<string, AttrDict>
  addedEdgeAttrs(): EdgeAttrsEntry[]
  mergedNodes(): Record<string, Set<string>>
  isRestrictive(): boolean
  isRelaxing(): boolean
  /** Neither restrictive nor relaxing */
  isIdentity(): boolean

  /**
   * Clone a node of `lhs` (through its first `p` preimage) or of `p`.
   * Returns the ids of the clone in `p` and in `rhs`.
   */
  injectCloneNode(node: string, newId?: string): [p: string, rhs: string]
  /** Remove a `p` node, or every `p` preimage of an `lhs` node. */
  injectRemoveNode(node: string): void
  injectRemoveEdge(source: string, target: string): void
  injectRemoveNodeAttrs(node: string, attrs: AttrInput): void
  injectRemoveEdgeAttrs(source: string, target: string, attrs: AttrInput): void
  /** Add a node to `rhs`. */
  injectAddNode(id: string, attrs?: AttrInput): void
  /** Add an edge between two `rhs` nodes. */
  injectAddEdge(source: string, target: string, attrs?: AttrInput): void
  /**
   * Merge the `rhs` images of the given nodes (`p`, `lhs` or `rhs` ids).
   * Returns the id of the merged `rhs` node.
   */
  injectMergeNodes(nodes: string[], newId?: string): string
  injectAddNodeAttrs(node: string, attrs: AttrInput): void
  injectAddEdgeAttrs(source: string, target: string, attrs: AttrInput): void
  /** Drop every attribute of the node in `p` and set `attrs` in `rhs`. */
  injectUpdateNodeAttrs(node: string, attrs: AttrInput): void
  injectUpdateEdgeAttrs(source: string, target: string, attrs: AttrInput): void

  /** Rewrite a copy of `graph` at `instance` (a monic `lhs -> graph`). */
  applyTo(graph: TypedGraph, instance: Mapping): RewriteSquare
  /**
   * Extend the rule with the context of `instance` in `graph`.
   * Returns the instance of the extended `lhs`.
   */
  refine(graph: TypedGraph, instance: Mapping): Mapping
  getInvertedRule(): Rule
  copy(): Rule
  equals(other: RuleParts): boolean
}

/**
 * Internal state for a rule
 */
interface RuleState {
  lhs: TypedGraph
  p: TypedGraph
  rhs: TypedGraph
  pLhs: Mapping
  pRhs: Mapping
}

// ---------------------------------------------------------------------------
// Rewriting step
// ---------------------------------------------------------------------------

/** Runs one half of the rewriting step. */
export type SquareStepRunner = <T>(
  step: 'pullbackComplement' | 'pushout',
  run: () => T,
) => T

const runStep: SquareStepRunner = (_step, run) => run()

/**
 * One sesqui-pushout step: pullback complement of `p -> lhs -> graph`,
 * then pushout of `G_m <- p -> rhs`.
 */
export const rewriteSquare = (
  rule: RuleParts,
  graph: TypedGraph,
  instance: Mapping,
  step: SquareStepRunner = runStep,
): RewriteSquare => {
  const complement = step('pullbackComplement', () =>
    pullbackComplement(rule.p, rule.lhs, graph, rule.pLhs, instance),
  )
  const result = step('pushout', () =>
    pushout(rule.p, complement.graph, rule.rhs, complement.aC, rule.pRhs),
  )
  return {
    gm: complement.graph,
    pGm: complement.aC,
    gmG: complement.cD,
    graph: result.graph,
    gmG1: result.bD,
    rhsInstance: result.cD,
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a rule from its span. Graphs and mappings are copied.
 * @throws RuleConstructionError if the graphs differ in directedness
 * @throws InvalidHomomorphismError if a leg is not a total homomorphism
 */
export function createRule(init: RuleInit): Rule {
  if (
    init.lhs.directed !== init.p.directed ||
    init.p.directed !== init.rhs.directed
  ) {
    throw new RuleConstructionError(
      'Graphs of a rule must all be directed or all undirected',
    )
  }

  const state: RuleState = {
    lhs: init.lhs.copy(),
    p: init.p.copy(),
    rhs: init.rhs.copy(),
    pLhs: init.pLhs ? copyMapping(init.pLhs) : identity(init.p, init.lhs),
    pRhs: init.pRhs ? copyMapping(init.pRhs) : identity(init.p, init.rhs),
  }
  checkHomomorphism(state.p, state.lhs, state.pLhs)
  checkHomomorphism(state.p, state.rhs, state.pRhs)

  const directed = state.p.directed

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  /** `p` nodes a reference stands for: itself, or the preimages of an lhs node. */
  function pNodesOf(node: string): string[] {
    if (state.p.hasNode(node)) return [node]
    if (!state.lhs.hasNode(node)) {
      throw new RuleConstructionError(
        `Node "${node}" is neither in the lhs nor in p`,
        { node },
      )
    }
    const preimages = keysByValue(state.pLhs, node)
    if (preimages.length === 0) {
      throw new RuleConstructionError(
        `Node "${node}" is already removed by the rule`,
        { node },
      )
    }
    return preimages
  }

  function rhsNodesOf(node: string): string[] {
    if (state.p.hasNode(node) || state.lhs.hasNode(node)) {
      return [...new Set(pNodesOf(node).map((pNode) => state.pRhs[pNode]))]
    }
    if (state.rhs.hasNode(node)) return [node]
    throw new RuleConstructionError(
      `Node "${node}" is not a node of the rule`,
      { node },
    )
  }

  function sameEdge(edge: Edge, source: string, target: string): boolean {
    const [u, v] = edge
    return (
      (u === source && v === target) ||
      (!directed && u === target && v === source)
    )
  }

  /** `p` edges sent onto the rhs edge (source, target). */
  function pEdgesOnto(source: string, target: string): Edge[] {
    return state.p
      .edges()
      .filter(([u, v]) =>
        sameEdge([state.pRhs[u], state.pRhs[v]], source, target),
      )
  }

  /** `p` edges between the nodes referenced by `source` and `target`. */
  function pEdgesBetween(source: string, target: string): Edge[] {
    const out: Edge[] = []
    for (const u of pNodesOf(source)) {
      for (const v of pNodesOf(target)) {
        if (!state.p.hasEdge(u, v)) continue
        if (out.some((edge) => sameEdge(edge, u, v))) continue
        out.push([u, v])
      }
    }
    if (out.length === 0) {
      throw new RuleConstructionError(
        `No edge "${source}" -> "${target}" in p`,
        { source, target },
      )
    }
    return out
  }

  function validate(): void {
    checkHomomorphism(state.p, state.lhs, state.pLhs)
    checkHomomorphism(state.p, state.rhs, state.pRhs)
  }

  /** Run an edit atomically; graph-level failures become RuleConstructionError. */
  function mutate<T>(action: string, edit: () => T): T {
    const snapshot: RuleState = {
      lhs: state.lhs,
      p: state.p.copy(),
      rhs: state.rhs.copy(),
      pLhs: copyMapping(state.pLhs),
      pRhs: copyMapping(state.pRhs),
    }
    try {
      const result = edit()
      validate()
      return result
    } catch (error) {
      Object.assign(state, snapshot)
      if (
        error instanceof GraphStructureError ||
        error instanceof InvalidHomomorphismError
      ) {
        throw new RuleConstructionError(`${action}: ${error.message}`, {
          ...error.context,
        })
      }
      throw error
    }
  }

  function removePNode(pNode: string): void {
    const image = state.pRhs[pNode]
    state.p.removeNode(pNode)
    delete state.pLhs[pNode]
    delete state.pRhs[pNode]
    if (keysByValue(state.pRhs, image).length === 0) {
      state.rhs.removeNode(image)
    }
  }

  // -------------------------------------------------------------------------
  // Rule object
  // -------------------------------------------------------------------------

  const self: Rule = {
    get lhs() {
      return state.lhs
    },
    get p() {
      return state.p
    },
    get rhs() {
      return state.rhs
    },
    get pLhs() {
      return state.pLhs
    },
    get pRhs() {
      return state.pRhs
    },

    removedNodes: () => queries.removedNodes(state),
    removedEdges: () => queries.removedEdges(state),
    removedNodeAttrs: () => queries.removedNodeAttrs(state),
    removedEdgeAttrs: () => queries.removedEdgeAttrs(state),
    clonedNodes: () => queries.clonedNodes(state),
    addedNodes: () => queries.addedNodes(state),
    addedEdges: () => queries.addedEdges(state),
    addedNodeAttrs: () => queries.addedNodeAttrs(state),
    addedEdgeAttrs: () => queries.addedEdgeAttrs(state),
    mergedNodes: () => queries.mergedNodes(state),
    isRestrictive: () => queries.isRestrictive(state),
    isRelaxing: () => queries.isRelaxing(state),
    isIdentity: () =>
      !queries.isRestrictive(state) && !queries.isRelaxing(state),

    injectCloneNode(node, newId) {
      return mutate(`Cannot clone "${node}"`, (): [string, string] => {
        const [source] = pNodesOf(node)
        if (newId !== undefined && state.p.hasNode(newId)) {
          throw new RuleConstructionError(
            `Node "${newId}" already exists in p`,
            { node: newId },
          )
        }
        const pId = state.p.cloneNode(source, newId)
        state.pLhs[pId] = state.pLhs[source]

        const rhsId = state.rhs.hasNode(pId) ? state.rhs.uniqueNodeId(pId) : pId
        state.rhs.addNode(rhsId, state.p.getNodeAttrs(pId))
        state.pRhs[pId] = rhsId
        for (const succ of state.p.successors(pId)) {
          const target = state.pRhs[succ]
          if (!state.rhs.hasEdge(rhsId, target)) {
            state.rhs.addEdge(rhsId, target, state.p.getEdgeAttrs(pId, succ))
          }
        }
        for (const pred of state.p.predecessors(pId)) {
          const source = state.pRhs[pred]
          if (!state.rhs.hasEdge(source, rhsId)) {
            state.rhs.addEdge(source, rhsId, state.p.getEdgeAttrs(pred, pId))
          }
        }
        return [pId, rhsId]
      })
    },

    injectRemoveNode(node) {
      mutate(`Cannot remove "${node}"`, () => {
        for (const pNode of pNodesOf(node)) removePNode(pNode)
      })
    },

    injectRemoveEdge(source, target) {
      mutate(`Cannot remove edge "${source}" -> "${target}"`, () => {
        for (const [u, v] of pEdgesBetween(source, target)) {
          state.p.removeEdge(u, v)
          const [ru, rv] = [state.pRhs[u], state.pRhs[v]]
          if (pEdgesOnto(ru, rv).length === 0 && state.rhs.hasEdge(ru, rv)) {
            state.rhs.removeEdge(ru, rv)
          }
        }
      })
    },

    injectRemoveNodeAttrs(node, attrs) {
      mutate(`Cannot remove attributes of "${node}"`, () => {
        const removed = normalizeAttrs(attrs)
        for (const pNode of pNodesOf(node)) {
          state.p.removeNodeAttrs(pNode, removed)
          const image = state.pRhs[pNode]
          const kept = unionAttrs(
            ...keysByValue(state.pRhs, image)
              .filter((other) => other !== pNode)
              .map((other) => state.p.getNodeAttrs(other)),
          )
          state.rhs.removeNodeAttrs(image, subtractAttrs(removed, kept))
        }
      })
    },

    injectRemoveEdgeAttrs(source, target, attrs) {
      mutate(`Cannot remove attributes of "${source}" -> "${target}"`, () => {
        const removed = normalizeAttrs(attrs)
        for (const [u, v] of pEdgesBetween(source, target)) {
          state.p.removeEdgeAttrs(u, v, removed)
          const [ru, rv] = [state.pRhs[u], state.pRhs[v]]
          const kept = unionAttrs(
            ...pEdgesOnto(ru, rv)
              .filter((edge) => !sameEdge(edge, u, v))
              .map(([a, b]) => state.p.getEdgeAttrs(a, b)),
          )
          state.rhs.removeEdgeAttrs(ru, rv, subtractAttrs(removed, kept))
        }
      })
    },

    injectAddNode(id, attrs) {
      mutate(`Cannot add "${id}"`, () => {
        state.rhs.addNode(id, attrs)
      })
    },

    injectAddEdge(source, target, attrs) {
      mutate(`Cannot add edge "${source}" -> "${target}"`, () => {
        state.rhs.addEdge(source, target, attrs)
      })
    },

    injectMergeNodes(nodes, newId) {
      return mutate(`Cannot merge ${nodes.join(', ')}`, () => {
        const images = [...new Set(nodes.flatMap(rhsNodesOf))]
        if (
          newId !== undefined &&
          state.rhs.hasNode(newId) &&
          !images.includes(newId)
        ) {
          throw new RuleConstructionError(
            `Node "${newId}" already exists in the rhs`,
            { node: newId },
          )
        }
        const merged = state.rhs.mergeNodes(images, newId)
        for (const [pNode, image] of Object.entries(state.pRhs)) {
          if (images.includes(image)) state.pRhs[pNode] = merged
        }
        return merged
      })
    },

    injectAddNodeAttrs(node, attrs) {
      mutate(`Cannot add attributes to "${node}"`, () => {
        state.rhs.addNodeAttrs(node, attrs)
      })
    },

    injectAddEdgeAttrs(source, target, attrs) {
      mutate(`Cannot add attributes to "${source}" -> "${target}"`, () => {
        state.rhs.addEdgeAttrs(source, target, attrs)
      })
    },

    injectUpdateNodeAttrs(node, attrs) {
      mutate(`Cannot update attributes of "${node}"`, () => {
        const updated = normalizeAttrs(attrs)
        const pNodes = pNodesOf(node)
        for (const pNode of pNodes) state.p.updateNodeAttrs(pNode, {})
        for (const image of new Set(pNodes.map((pNode) => state.pRhs[pNode]))) {
          const kept = unionAttrs(
            ...keysByValue(state.pRhs, image)
              .filter((other) => !pNodes.includes(other))
              .map((other) => state.p.getNodeAttrs(other)),
          )
          state.rhs.updateNodeAttrs(image, unionAttrs(updated, kept))
        }
      })
    },

    injectUpdateEdgeAttrs(source, target, attrs) {
      mutate(`Cannot update attributes of "${source}" -> "${target}"`, () => {
        const updated = normalizeAttrs(attrs)
        const edges = pEdgesBetween(source, target)
        for (const [u, v] of edges) state.p.updateEdgeAttrs(u, v, {})
        for (const [u, v] of edges) {
          const [ru, rv] = [state.pRhs[u], state.pRhs[v]]
          const kept = unionAttrs(
            ...pEdgesOnto(ru, rv)
              .filter(([a, b]) => !edges.some((edge) => sameEdge(edge, a, b)))
              .map(([a, b]) => state.p.getEdgeAttrs(a, b)),
          )
          state.rhs.updateEdgeAttrs(ru, rv, unionAttrs(updated, kept))
        }
      })
    },

    applyTo: (graph, instance) => rewriteSquare(state, graph, instance),

    refine(graph, instance) {
      const refined = refineRule(state, graph, instance)
      state.lhs = refined.lhs
      state.p = refined.p
      state.rhs = refined.rhs
      state.pLhs = refined.pLhs
      state.pRhs = refined.pRhs
      return refined.instance
    },

    getInvertedRule: () =>
      createRule({
        lhs: state.rhs,
        p: state.p,
        rhs: state.lhs,
        pLhs: state.pRhs,
        pRhs: state.pLhs,
      }),

    copy: () => createRule(state),

    equals: (other) =>
      state.lhs.equals(other.lhs) &&
      state.p.equals(other.p) &&
      state.rhs.equals(other.rhs) &&
      isEqual(state.pLhs, other.pLhs) &&
      isEqual(state.pRhs, other.pRhs),
  }

  return self
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

/**
 * Identity rule on `pattern`, then replay `commands` through `inject*`.
 *
 * @example
 * ruleFromTransform(pattern, [{ type: 'CLONE', node: 'a', newNode: 'a1' }])
 */
export const ruleFromTransform = (
  pattern: TypedGraph,
  commands: readonly RuleCommand[] = [],
): Rule => {
  const rule = createRule({ lhs: pattern, p: pattern, rhs: pattern })
  applyRuleCommands(rule, commands)
  return rule
}

/** Rule with three empty graphs. */
export const identityRule = (options: TypedGraphOptions = {}): Rule => {
  const empty = createTypedGraph(options)
  return createRule({ lhs: empty, p: empty, rhs: empty })
}
