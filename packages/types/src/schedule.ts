import type { ProcessId } from './index'

/** Process id recorded for stretches where no process was ready. */
export const IDLE = 'IDLE'

/** Quantum used by Round Robin when the caller supplies none. */
export const DEFAULT_TIME_QUANTUM = 2

/** One contiguous interval on the CPU timeline, `start < end`. */
export type ScheduleEntry = readonly [processId: ProcessId | typeof IDLE, start: number, end: number]

/** Aggregate figures derived from a finished schedule, rounded to 2 decimals. */
export interface SchedulingMetrics {
  averageTurnaroundTime: number
  averageWaitingTime: number
  /** Percentage of `totalTime` spent running a process, 0–100. */
  cpuUtilization: number
  totalProcesses: number
  totalTime: number
}

/** Metrics of a run over an empty process list. */
export type EmptyMetrics = Record<string, never>

export interface SchedulingResult {
  readonly algorithmName: string
  readonly schedule: readonly ScheduleEntry[]
  readonly metrics: Readonly<SchedulingMetrics> | EmptyMetrics
}

export type AlgorithmId =
  | 'fcfs'
  | 'sjf-non-preemptive'
  | 'sjf-preemptive'
  | 'priority-non-preemptive'
  | 'priority-preemptive'
  | 'round-robin'

/** Static facts about an algorithm, for listing and for callers building forms. */
export interface AlgorithmDescriptor {
  id: AlgorithmId
  label: string
  preemptive: boolean
  requiresPriority: boolean
  usesQuantum: boolean
}
