// ---------------------------------------------------------------------------
// Key-driven selection loops shared by SJF and Priority scheduling
// ---------------------------------------------------------------------------
// Both families differ only in the criterion they minimise: burst or
// remaining time for SJF, priority for Priority scheduling. Ties always fall
// back to the ordinal pid order.
// ---------------------------------------------------------------------------

import type { ScheduleEntry } from '@schedsim/types'
import {
  byArrival,
  comparePid,
  execute,
  isComplete,
  type WorkingProcess,
} from '../process'
import { createReadyQueue, rqPop, rqPush } from '../ready-queue'
import { appendIdle, appendRun } from '../timeline'

/** Clock granularity of the preemptive loops. Preemption is only checked on these steps. */
export const PREEMPTION_STEP = 1

export type SelectionKey<T extends WorkingProcess> = (copy: T) => number

function precedes<T extends WorkingProcess>(a: T, b: T, keyOf: SelectionKey<T>): boolean {
  const ka = keyOf(a)
  const kb = keyOf(b)
  if (ka !== kb) return ka < kb
  return comparePid(a.pid, b.pid) < 0
}

/**
 * Admit every process in `pending` (sorted by arrival) from index `from`
 * whose arrival time is at or before `now`. Returns the next unadmitted index.
 */
export function admitArrivals<T extends WorkingProcess>(
  pending: readonly T[],
  from: number,
  now: number,
  admit: (copy: T) => void,
): number {
  let idx = from
  for (let copy = pending[idx]; copy !== undefined && copy.arrivalTime <= now; copy = pending[idx]) {
    admit(copy)
    idx++
  }
  return idx
}

/**
 * Non-preemptive loop: at each decision point run the arrived process with
 * the smallest key to completion, or idle to the earliest pending arrival.
 */
export function runNonPreemptive<T extends WorkingProcess>(
  copies: readonly T[],
  keyOf: SelectionKey<T>,
): ScheduleEntry[] {
  const schedule: ScheduleEntry[] = []
  const incomplete = [...copies]
  let now = 0

  while (incomplete.length > 0) {
    let selectedIdx = -1
    let nextArrival = Infinity

    for (const [idx, copy] of incomplete.entries()) {
      if (copy.arrivalTime > now) {
        nextArrival = Math.min(nextArrival, copy.arrivalTime)
        continue
      }
      const best = incomplete[selectedIdx]
      if (best === undefined || precedes(copy, best, keyOf)) selectedIdx = idx
    }

    const selected = incomplete[selectedIdx]
    if (selected === undefined) {
      appendIdle(schedule, now, nextArrival)
      now = nextArrival
      continue
    }

    const ran = execute(selected, selected.remaining)
    appendRun(schedule, selected.pid, now, now + ran)
    now += ran
    incomplete.splice(selectedIdx, 1)
  }

  return schedule
}

/**
 * Fixed-step preemptive loop. Every `PREEMPTION_STEP` the ready set admits
 * new arrivals and the process with the smallest key, the one that just ran
 * included, gets the next step. The running process is outside the heap while
 * it runs and is re-keyed when pushed back.
 *
 * Precondition: every burst is below 2^53. At that magnitude subtracting one
 * step no longer changes `remaining` and the loop cannot finish.
 */
export function runPreemptive<T extends WorkingProcess>(
  copies: readonly T[],
  keyOf: SelectionKey<T>,
): ScheduleEntry[] {
  const schedule: ScheduleEntry[] = []
  const pending = [...copies].sort(byArrival)
  const ready = createReadyQueue<T>()
  let admitted = 0
  let completed = 0
  let now = 0

  while (completed < pending.length) {
    admitted = admitArrivals(pending, admitted, now, (copy) => {
      rqPush(ready, copy, keyOf(copy), copy.pid)
    })

    const current = rqPop(ready)
    if (current === null) {
      const upcoming = pending[admitted]
      if (upcoming === undefined) {
        throw new Error('Preemptive loop invariant broken: nothing ready and nothing pending')
      }
      appendIdle(schedule, now, upcoming.arrivalTime)
      now = upcoming.arrivalTime
      continue
    }

    const ran = execute(current, PREEMPTION_STEP)
    appendRun(schedule, current.pid, now, now + ran)
    now += ran

    if (isComplete(current)) {
      completed++
    } else {
      rqPush(ready, current, keyOf(current), current.pid)
    }
  }

  return schedule
}
