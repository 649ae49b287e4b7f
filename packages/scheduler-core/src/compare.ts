// ---------------------------------------------------------------------------
// Side-by-side comparison of every algorithm over one workload
// ---------------------------------------------------------------------------
// Each run gets its own working copies, so the runs are independent and a
// host may evaluate them in any order or concurrently. A failing run (e.g.
// priority scheduling on unprioritised input) is captured as an error
// outcome instead of aborting the comparison.
// ---------------------------------------------------------------------------

import {
  err,
  ok,
  type AlgorithmId,
  type Process,
  type Result,
  type SchedulingResult,
} from '@schedsim/types'
import { roundRobinName } from './algorithms'
import { isSchedulingError, type SchedulingError } from './errors'
import { comparePid } from './process'
import { ALGORITHMS, runAlgorithm } from './registry'
import { hasMetrics } from './result'

export const DEFAULT_COMPARE_QUANTA: readonly number[] = [2, 4]

export interface AlgorithmRun {
  algorithm: AlgorithmId
  label: string
  /** Quantum used, or null for algorithms that take none. */
  timeQuantum: number | null
  outcome: Result<SchedulingResult, SchedulingError>
}

export interface CompareOptions {
  /** Round Robin runs once per quantum. */
  quanta?: readonly number[]
}

export interface RankedRun {
  algorithm: AlgorithmId
  label: string
  averageWaitingTime: number
  averageTurnaroundTime: number
  cpuUtilization: number
}

function attempt(run: () => SchedulingResult): Result<SchedulingResult, SchedulingError> {
  try {
    return ok(run())
  } catch (error) {
    if (isSchedulingError(error)) return err(error)
    throw error
  }
}

export function compareAlgorithms(
  processes: readonly Process[],
  options: CompareOptions = {},
): AlgorithmRun[] {
  const quanta = options.quanta ?? DEFAULT_COMPARE_QUANTA
  const runs: AlgorithmRun[] = []

  for (const descriptor of ALGORITHMS) {
    if (!descriptor.usesQuantum) {
      runs.push({
        algorithm: descriptor.id,
        label: descriptor.label,
        timeQuantum: null,
        outcome: attempt(() => runAlgorithm(descriptor.id, processes)),
      })
      continue
    }
    for (const timeQuantum of quanta) {
      runs.push({
        algorithm: descriptor.id,
        label: roundRobinName(timeQuantum),
        timeQuantum,
        outcome: attempt(() => runAlgorithm(descriptor.id, processes, { timeQuantum })),
      })
    }
  }

  return runs
}

/** Successful runs ordered by average waiting time, then label. */
export function rankByWaitingTime(runs: readonly AlgorithmRun[]): RankedRun[] {
  const ranked: RankedRun[] = []
  for (const run of runs) {
    if (!run.outcome.ok || !hasMetrics(run.outcome.value)) continue
    const { metrics } = run.outcome.value
    ranked.push({
      algorithm: run.algorithm,
      label: run.label,
      averageWaitingTime: metrics.averageWaitingTime,
      averageTurnaroundTime: metrics.averageTurnaroundTime,
      cpuUtilization: metrics.cpuUtilization,
    })
  }
  return ranked.sort(
    (a, b) => a.averageWaitingTime - b.averageWaitingTime || comparePid(a.label, b.label),
  )
}

/**
 * Relative reduction from `baseline` to `candidate` in percent, 1 decimal.
 * Null when the baseline is 0.
 */
export function improvementPercent(baseline: number, candidate: number): number | null {
  if (baseline === 0) return null
  return Math.round(((baseline - candidate) / baseline) * 1000) / 10
}
