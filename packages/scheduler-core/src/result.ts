import type {
  EmptyMetrics,
  Process,
  ScheduleEntry,
  SchedulingMetrics,
  SchedulingResult,
} from '@schedsim/types'
import { calculateMetrics } from './metrics'

/** Freeze a finished run; the caller owns it read-only from here on. */
export function createResult(
  algorithmName: string,
  processes: readonly Process[],
  schedule: readonly ScheduleEntry[],
): SchedulingResult {
  return Object.freeze({
    algorithmName,
    schedule: Object.freeze(schedule.map((entry) => Object.freeze(entry))),
    metrics: Object.freeze(calculateMetrics(processes, schedule)),
  })
}

/** Result of a run over no processes: no entries, no metrics. */
export function emptyResult(algorithmName: string): SchedulingResult {
  const metrics: EmptyMetrics = {}
  return Object.freeze({
    algorithmName,
    schedule: Object.freeze([]),
    metrics: Object.freeze(metrics),
  })
}

export function hasMetrics(
  result: SchedulingResult,
): result is SchedulingResult & { readonly metrics: Readonly<SchedulingMetrics> } {
  return 'totalTime' in result.metrics
}
