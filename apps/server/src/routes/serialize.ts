import {
  hasMetrics,
  summarizeProcesses,
  type AlgorithmRun,
  type ProcessSummary,
} from '@schedsim/scheduler-core'
import {
  priorityValue,
  type Process,
  type ProcessDescriptor,
  type SchedulingMetrics,
  type SchedulingResult,
} from '@schedsim/types'

export interface TimelineSlice {
  processId: string
  start: number
  end: number
}

export interface SimulationBody {
  algorithmName: string
  schedule: TimelineSlice[]
  metrics: SchedulingMetrics | null
  processes: ProcessSummary[]
}

export type ComparisonBody =
  | { algorithm: string; label: string; timeQuantum: number | null; ok: true; result: SimulationBody }
  | {
      algorithm: string
      label: string
      timeQuantum: number | null
      ok: false
      error: { message: string; code: string }
    }

/** Wire form of a result. Empty runs report `metrics: null`. */
export function toSimulationBody(
  result: SchedulingResult,
  processes: readonly Process[],
): SimulationBody {
  return {
    algorithmName: result.algorithmName,
    schedule: result.schedule.map(([processId, start, end]) => ({ processId, start, end })),
    metrics: hasMetrics(result) ? { ...result.metrics } : null,
    processes: summarizeProcesses(processes, result.schedule),
  }
}

export function toComparisonBody(run: AlgorithmRun, processes: readonly Process[]): ComparisonBody {
  const { algorithm, label, timeQuantum } = run
  if (run.outcome.ok) {
    return { algorithm, label, timeQuantum, ok: true, result: toSimulationBody(run.outcome.value, processes) }
  }
  const { message, code } = run.outcome.error
  return { algorithm, label, timeQuantum, ok: false, error: { message, code } }
}

export function toDescriptor(process: Process): ProcessDescriptor {
  return {
    pid: process.pid,
    arrivalTime: process.arrivalTime,
    burstTime: process.burstTime,
    priority: priorityValue(process.priority),
  }
}
