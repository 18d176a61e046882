/**
 * Rewrite timing
 *
 * Accumulates the duration of each phase of an operation on a graph and
 * reports the operation when its phases add up to more than the threshold.
 */

export type RewritePhase =
  | 'matching'
  | 'pullbackComplement'
  | 'pushout'
  | 'propagateUp'
  | 'propagateDown'

/** Milliseconds spent per phase of one operation on one graph. */
export interface PhaseReport {
  graph: string
  phases: Partial<Record<RewritePhase, number>>
  total: number
  threshold: number
}

export type OnSlowReport = (report: PhaseReport) => void

export interface TimingConfig {
  timing?: boolean
  timingThreshold?: number
  /** Called when `finish` closes an operation slower than the threshold */
  onSlow?: OnSlowReport
}

export interface Timing {
  /** Run `fn` as one phase of the current operation on `graph`. */
  phase: <T>(graph: string, phase: RewritePhase, fn: () => T) => T
  /**
   * Close the current operation on `graph`.
   * Returns its report, or undefined when timing is disabled.
   */
  finish: (graph: string) => PhaseReport | undefined
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

const PHASE_ORDER: RewritePhase[] = [
  'matching',
  'pullbackComplement',
  'pushout',
  'propagateUp',
  'propagateDown',
]

/** `pushout 1.20ms, propagateUp 0.40ms` in phase order. */
export const formatPhases = (
  phases: Partial<Record<RewritePhase, number>>,
): string =>
  PHASE_ORDER.flatMap((phase) => {
    const duration = phases[phase]
    return duration === undefined ? [] : [`${phase} ${duration.toFixed(2)}ms`]
  }).join(', ')

const defaultOnSlow: OnSlowReport = (report) => {
  console.warn(
    `[sqpo-hierarchy] Slow operation on "${report.graph}": ${report.total.toFixed(2)}ms (${formatPhases(report.phases)})`,
  )
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

const DISABLED: Timing = {
  phase: (_graph, _phase, fn) => fn(),
  finish: () => undefined,
}

export const createTiming = (config: TimingConfig): Timing => {
  const { timing = false, timingThreshold = 50, onSlow = defaultOnSlow } = config

  if (!timing) return DISABLED

  const open = new Map<string, Partial<Record<RewritePhase, number>>>()

  return {
    phase: (graph, phase, fn) => {
      const start = performance.now()
      try {
        return fn()
      } finally {
        const phases = open.get(graph) ?? {}
        phases[phase] = (phases[phase] ?? 0) + performance.now() - start
        open.set(graph, phases)
      }
    },

    finish: (graph) => {
      const phases = open.get(graph) ?? {}
      open.delete(graph)
      const total = PHASE_ORDER.reduce(
        (sum, phase) => sum + (phases[phase] ?? 0),
        0,
      )
      const report: PhaseReport = {
        graph,
        phases,
        total,
        threshold: timingThreshold,
      }
      if (total > timingThreshold) onSlow(report)
      return report
    },
  }
}
