import type { Process, SchedulingResult } from '@schedsim/types'
import { toPrioritizedCopies } from '../process'
import { createResult, emptyResult } from '../result'
import { runNonPreemptive, runPreemptive } from './selection'

export const PRIORITY_NON_PREEMPTIVE_NAME = 'Priority (Non-Preemptive)'
export const PRIORITY_PREEMPTIVE_NAME = 'Priority (Preemptive)'

/**
 * Non-preemptive priority scheduling; lower value wins.
 * @throws MissingPriorityError if any process has no priority.
 */
export function priorityNonPreemptive(processes: readonly Process[]): SchedulingResult {
  const copies = toPrioritizedCopies(processes)
  if (copies.length === 0) return emptyResult(PRIORITY_NON_PREEMPTIVE_NAME)

  const schedule = runNonPreemptive(copies, (copy) => copy.priority)
  return createResult(PRIORITY_NON_PREEMPTIVE_NAME, processes, schedule)
}

/**
 * Preemptive priority scheduling on the same one-unit step as SRTF.
 * @throws MissingPriorityError if any process has no priority.
 */
export function priorityPreemptive(processes: readonly Process[]): SchedulingResult {
  const copies = toPrioritizedCopies(processes)
  if (copies.length === 0) return emptyResult(PRIORITY_PREEMPTIVE_NAME)

  const schedule = runPreemptive(copies, (copy) => copy.priority)
  return createResult(PRIORITY_PREEMPTIVE_NAME, processes, schedule)
}
