import type { Process, SchedulingResult } from '@schedsim/types'
import { toWorkingCopies } from '../process'
import { createResult, emptyResult } from '../result'
import { runNonPreemptive, runPreemptive } from './selection'

export const SJF_NON_PREEMPTIVE_NAME = 'Shortest Job First (Non-Preemptive)'
export const SJF_PREEMPTIVE_NAME = 'Shortest Job First (Preemptive)'

/** Shortest Job First: the arrived process with the smallest burst runs to completion. */
export function sjfNonPreemptive(processes: readonly Process[]): SchedulingResult {
  if (processes.length === 0) return emptyResult(SJF_NON_PREEMPTIVE_NAME)

  const schedule = runNonPreemptive(toWorkingCopies(processes), (copy) => copy.burstTime)
  return createResult(SJF_NON_PREEMPTIVE_NAME, processes, schedule)
}

/**
 * Shortest Remaining Time First, re-evaluated every time unit. A process that
 * arrives mid-step waits for the step boundary before it can preempt.
 */
export function sjfPreemptive(processes: readonly Process[]): SchedulingResult {
  if (processes.length === 0) return emptyResult(SJF_PREEMPTIVE_NAME)

  const schedule = runPreemptive(toWorkingCopies(processes), (copy) => copy.remaining)
  return createResult(SJF_PREEMPTIVE_NAME, processes, schedule)
}
