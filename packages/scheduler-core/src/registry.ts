// ---------------------------------------------------------------------------
// Algorithm registry
// ---------------------------------------------------------------------------

import {
  assertNever,
  DEFAULT_TIME_QUANTUM,
  type AlgorithmDescriptor,
  type AlgorithmId,
  type Process,
  type SchedulingResult,
} from '@schedsim/types'
import {
  fcfs,
  priorityNonPreemptive,
  priorityPreemptive,
  roundRobin,
  sjfNonPreemptive,
  sjfPreemptive,
  FCFS_NAME,
  PRIORITY_NON_PREEMPTIVE_NAME,
  PRIORITY_PREEMPTIVE_NAME,
  SJF_NON_PREEMPTIVE_NAME,
  SJF_PREEMPTIVE_NAME,
} from './algorithms'

export interface RunOptions {
  /** Round Robin only. Defaults to `DEFAULT_TIME_QUANTUM`. */
  timeQuantum?: number
}

export const ALGORITHMS: readonly AlgorithmDescriptor[] = [
  { id: 'fcfs', label: FCFS_NAME, preemptive: false, requiresPriority: false, usesQuantum: false },
  { id: 'sjf-non-preemptive', label: SJF_NON_PREEMPTIVE_NAME, preemptive: false, requiresPriority: false, usesQuantum: false },
  { id: 'sjf-preemptive', label: SJF_PREEMPTIVE_NAME, preemptive: true, requiresPriority: false, usesQuantum: false },
  { id: 'priority-non-preemptive', label: PRIORITY_NON_PREEMPTIVE_NAME, preemptive: false, requiresPriority: true, usesQuantum: false },
  { id: 'priority-preemptive', label: PRIORITY_PREEMPTIVE_NAME, preemptive: true, requiresPriority: true, usesQuantum: false },
  { id: 'round-robin', label: 'Round Robin', preemptive: true, requiresPriority: false, usesQuantum: true },
]

export const ALGORITHM_IDS: readonly AlgorithmId[] = ALGORITHMS.map((a) => a.id)

export function isAlgorithmId(value: string): value is AlgorithmId {
  return ALGORITHMS.some((a) => a.id === value)
}

export function getAlgorithm(id: AlgorithmId): AlgorithmDescriptor {
  const descriptor = ALGORITHMS.find((a) => a.id === id)
  if (!descriptor) throw new Error(`Unknown algorithm: ${id}`)
  return descriptor
}

/** Dispatch a run by algorithm id. Errors propagate from the algorithm itself. */
export function runAlgorithm(
  id: AlgorithmId,
  processes: readonly Process[],
  options: RunOptions = {},
): SchedulingResult {
  switch (id) {
    case 'fcfs':
      return fcfs(processes)
    case 'sjf-non-preemptive':
      return sjfNonPreemptive(processes)
    case 'sjf-preemptive':
      return sjfPreemptive(processes)
    case 'priority-non-preemptive':
      return priorityNonPreemptive(processes)
    case 'priority-preemptive':
      return priorityPreemptive(processes)
    case 'round-robin':
      return roundRobin(processes, options.timeQuantum ?? DEFAULT_TIME_QUANTUM)
    default:
      return assertNever(id)
  }
}
