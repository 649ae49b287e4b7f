import {
  DEFAULT_TIME_QUANTUM,
  type Process,
  type ScheduleEntry,
  type SchedulingResult,
} from '@schedsim/types'
import { InvalidQuantumError } from '../errors'
import { byArrival, execute, isComplete, toWorkingCopies, type WorkingProcess } from '../process'
import { createResult, emptyResult } from '../result'
import { appendIdle, appendRun } from '../timeline'
import { admitArrivals } from './selection'

/** Quantum with at least one decimal place: 2 → "2.0", 0.25 → "0.25". */
export function formatQuantum(quantum: number): string {
  return Number.isInteger(quantum) ? quantum.toFixed(1) : String(quantum)
}

export function roundRobinName(quantum: number): string {
  return `Round Robin (Quantum: ${formatQuantum(quantum)})`
}

/**
 * Round Robin over a FIFO ready queue. Processes that arrive while a slice
 * runs are queued ahead of the process that was just preempted.
 * The number of slices grows with total burst / quantum; hosts bound both
 * (see `minTimeQuantum` and `maxTotalBurst` in the server settings). A quantum
 * too small to reduce a burst at all never finishes.
 * @throws InvalidQuantumError if `timeQuantum` is not a positive finite number.
 */
export function roundRobin(
  processes: readonly Process[],
  timeQuantum: number = DEFAULT_TIME_QUANTUM,
): SchedulingResult {
  if (!Number.isFinite(timeQuantum) || timeQuantum <= 0) {
    throw new InvalidQuantumError(timeQuantum)
  }
  const name = roundRobinName(timeQuantum)
  if (processes.length === 0) return emptyResult(name)

  const pending = toWorkingCopies(processes).sort(byArrival)
  const queue: WorkingProcess[] = []
  const enqueue = (copy: WorkingProcess) => {
    queue.push(copy)
  }
  const schedule: ScheduleEntry[] = []
  let completed = 0
  let now = 0

  let admitted = admitArrivals(pending, 0, now, enqueue)

  while (completed < pending.length) {
    if (queue.length === 0) {
      const upcoming = pending[admitted]
      if (upcoming === undefined) {
        throw new Error('Round Robin invariant broken: empty queue and nothing pending')
      }
      appendIdle(schedule, now, upcoming.arrivalTime)
      now = upcoming.arrivalTime
      admitted = admitArrivals(pending, admitted, now, enqueue)
    }

    const current = queue.shift()
    if (current === undefined) continue

    const ran = execute(current, timeQuantum)
    appendRun(schedule, current.pid, now, now + ran)
    now += ran

    admitted = admitArrivals(pending, admitted, now, enqueue)

    if (isComplete(current)) {
      completed++
    } else {
      queue.push(current)
    }
  }

  return createResult(name, processes, schedule)
}
