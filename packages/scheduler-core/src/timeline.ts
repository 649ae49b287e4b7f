// ---------------------------------------------------------------------------
// Timeline builder
// ---------------------------------------------------------------------------

import { IDLE, type ProcessId, type ScheduleEntry } from '@schedsim/types'

/**
 * Record that `pid` ran over `[start, end)`. Extends the last entry when it
 * is the same process ending exactly at `start`; zero-length runs are dropped.
 */
export function appendRun(
  schedule: ScheduleEntry[],
  pid: ProcessId,
  start: number,
  end: number,
): void {
  if (end <= start) return

  const lastIdx = schedule.length - 1
  const last = schedule[lastIdx]
  if (last !== undefined && last[0] === pid && last[2] === start) {
    schedule[lastIdx] = [pid, last[1], end]
    return
  }
  schedule.push([pid, start, end])
}

/** Record idle CPU time over `[from, to)`. */
export function appendIdle(schedule: ScheduleEntry[], from: number, to: number): void {
  appendRun(schedule, IDLE, from, to)
}
