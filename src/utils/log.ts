/**
 * Hierarchy logger: debug logging of mutations and rewrites.
 *
 * Three log functions:
 * 1. logRewrite: called once per rewrite with the rule summary and the
 *    graphs the rewrite touched
 * 2. logTyping: called once per added typing, rule typing or relation
 * 3. logRemoval: called once per removed graph, rule, typing or relation
 *
 * Zero runtime cost when log flag is false (returns no-op logger).
 */

import type { DebugConfig, Mapping } from '../core/types'

// ---------------------------------------------------------------------------
// Logger types
// ---------------------------------------------------------------------------

/** Counts of what a rule does, as reported by the rule queries. */
export interface RuleLogSummary {
  removedNodes: number
  clonedNodes: number
  addedNodes: number
  mergedNodes: number
}

export interface RewriteLogData {
  graph: string
  rule: RuleLogSummary
  instance: Mapping
  rhsInstance: Mapping
  /** Graphs rewritten by upward propagation */
  ancestors: string[]
  /** Graphs rewritten by downward propagation */
  descendants: string[]
  inplace: boolean
  durationMs: number
}

export type TypingLogKind = 'typing' | 'ruleTyping' | 'relation'
export type RemovalLogKind = 'graph' | 'rule' | 'typing' | 'relation'

export interface HierarchyLogger {
  logRewrite: (data: RewriteLogData) => void
  logTyping: (
    kind: TypingLogKind,
    source: string,
    target: string,
    /** Mapped node count per mapping carried by the edge */
    sizes: Record<string, number>,
  ) => void
  logRemoval: (
    kind: RemovalLogKind,
    id: string,
    /** Typings recomposed around a removed node */
    reconnected?: [string, string][],
  ) => void
}

// ---------------------------------------------------------------------------
// No-op singleton (zero overhead when log is false)
// ---------------------------------------------------------------------------

const noop = () => {
  // no-op
}

const NOOP_LOGGER: HierarchyLogger = {
  logRewrite: noop,
  logTyping: noop,
  logRemoval: noop,
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const PREFIX = 'sqpo-hierarchy'

/** Short label of a graph list. */
const buildGraphLabel = (graphs: string[]): string => {
  if (graphs.length === 0) return '(none)'
  if (graphs.length <= 3) return graphs.join(', ')
  return `${graphs[0]} +${String(graphs.length - 1)} more`
}

/** Build console summary object for a rewrite. @internal */
export const buildRewriteSummary = (
  data: RewriteLogData,
): Record<string, unknown> => {
  const summary: Record<string, unknown> = {
    instance: data.instance,
    rhsInstance: data.rhsInstance,
    duration: `${data.durationMs.toFixed(2)}ms`,
  }
  const counts = Object.entries(data.rule).filter(([, count]) => count > 0)
  summary['rule'] =
    counts.length > 0 ? Object.fromEntries(counts) : '(identity)'
  if (data.ancestors.length > 0) summary['up'] = buildGraphLabel(data.ancestors)
  if (data.descendants.length > 0) {
    summary['down'] = buildGraphLabel(data.descendants)
  }
  if (!data.inplace) summary['copy'] = true
  return summary
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a logger for a hierarchy.
 * Returns no-op when log flag is disabled (zero overhead).
 */
export const createLogger = (config: DebugConfig): HierarchyLogger => {
  const { log = false } = config

  if (!log) return NOOP_LOGGER

  return {
    logRewrite: (data) => {
      console.groupCollapsed(`${PREFIX}:rewrite | ${data.graph}`)
      console.log(buildRewriteSummary(data))
      console.groupEnd()
    },

    logTyping: (kind, source, target, sizes) => {
      console.groupCollapsed(`${PREFIX}:${kind} | ${source} -> ${target}`)
      console.log(sizes)
      console.groupEnd()
    },

    logRemoval: (kind, id, reconnected) => {
      console.groupCollapsed(`${PREFIX}:remove | ${kind} ${id}`)
      console.log({
        reconnected:
          reconnected && reconnected.length > 0
            ? reconnected.map(([s, t]) => `${s} -> ${t}`)
            : '(none)',
      })
      console.groupEnd()
    },
  }
}
