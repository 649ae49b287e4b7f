import type { Process, ScheduleEntry, SchedulingResult } from '@schedsim/types'
import { byArrival, execute, toWorkingCopies } from '../process'
import { createResult, emptyResult } from '../result'
import { appendIdle, appendRun } from '../timeline'

export const FCFS_NAME = 'First-Come, First-Served (FCFS)'

/** First-Come, First-Served: non-preemptive, in `(arrivalTime, pid)` order. */
export function fcfs(processes: readonly Process[]): SchedulingResult {
  if (processes.length === 0) return emptyResult(FCFS_NAME)

  const schedule: ScheduleEntry[] = []
  let now = 0

  for (const copy of toWorkingCopies(processes).sort(byArrival)) {
    if (now < copy.arrivalTime) {
      appendIdle(schedule, now, copy.arrivalTime)
      now = copy.arrivalTime
    }
    const ran = execute(copy, copy.remaining)
    appendRun(schedule, copy.pid, now, now + ran)
    now += ran
  }

  return createResult(FCFS_NAME, processes, schedule)
}
