// ---------------------------------------------------------------------------
// Metrics reducer
// ---------------------------------------------------------------------------
// Reduces a finished schedule to waiting / turnaround / utilisation figures.
// Every derived value is rounded to 2 decimals, half to even; equality-based
// callers rely on that rounding.
// ---------------------------------------------------------------------------

import {
  IDLE,
  priorityValue,
  type Process,
  type ProcessId,
  type ScheduleEntry,
  type SchedulingMetrics,
} from '@schedsim/types'

/** Per-process row of a finished run. Time fields are null if it never ran. */
export interface ProcessSummary {
  pid: ProcessId
  arrivalTime: number
  burstTime: number
  priority: number | null
  firstStartTime: number | null
  completionTime: number | null
  turnaroundTime: number | null
  waitingTime: number | null
  /** First start minus arrival. */
  responseTime: number | null
}

/** Mantissa and exponent of a finite double: `|value| = mantissa * 2^exponent`. */
function decompose(value: number): { mantissa: bigint; exponent: number } {
  const view = new DataView(new ArrayBuffer(8))
  view.setFloat64(0, Math.abs(value))
  const bits = view.getBigUint64(0)
  const biased = Number((bits >> 52n) & 0x7ffn)
  const fraction = bits & ((1n << 52n) - 1n)
  return biased === 0
    ? { mantissa: fraction, exponent: -1074 }
    : { mantissa: fraction | (1n << 52n), exponent: biased - 1075 }
}

/**
 * Round to 2 decimals, half to even, on the exact binary value: 0.125 → 0.12,
 * 0.375 → 0.38, and 2.675 → 2.67 because its double lies just below the half.
 */
export function roundTo2(value: number): number {
  if (!Number.isFinite(value)) return value
  const { mantissa, exponent } = decompose(value)
  if (exponent >= 0) return value

  // |value| * 100 = numerator / denominator exactly
  const numerator = mantissa * 100n
  const denominator = 1n << BigInt(-exponent)
  let hundredths = numerator / denominator
  const twiceRemainder = (numerator % denominator) * 2n
  if (twiceRemainder > denominator || (twiceRemainder === denominator && hundredths % 2n === 1n)) {
    hundredths += 1n
  }

  const magnitude = Number(hundredths) / 100
  return value < 0 ? -magnitude : magnitude
}

function mean(values: number[]): number {
  if (values.length === 0) return 0
  return values.reduce((sum, v) => sum + v, 0) / values.length
}

/** Last end time of each process; idle entries excluded. */
function completionTimes(schedule: readonly ScheduleEntry[]): Map<ProcessId, number> {
  const completion = new Map<ProcessId, number>()
  for (const [pid, , end] of schedule) {
    if (pid !== IDLE) completion.set(pid, end)
  }
  return completion
}

export function calculateMetrics(
  processes: readonly Process[],
  schedule: readonly ScheduleEntry[],
): SchedulingMetrics {
  const completion = completionTimes(schedule)

  const turnaroundTimes: number[] = []
  const waitingTimes: number[] = []
  for (const process of processes) {
    const completedAt = completion.get(process.pid)
    if (completedAt === undefined) continue
    const turnaround = completedAt - process.arrivalTime
    turnaroundTimes.push(turnaround)
    waitingTimes.push(turnaround - process.burstTime)
  }

  let totalTime = 0
  let busyTime = 0
  for (const [pid, start, end] of schedule) {
    totalTime = Math.max(totalTime, end)
    if (pid !== IDLE) busyTime += end - start
  }
  const cpuUtilization = totalTime > 0 ? (busyTime / totalTime) * 100 : 0

  return {
    averageTurnaroundTime: roundTo2(mean(turnaroundTimes)),
    averageWaitingTime: roundTo2(mean(waitingTimes)),
    cpuUtilization: roundTo2(cpuUtilization),
    totalProcesses: processes.length,
    totalTime: roundTo2(totalTime),
  }
}

/** One row per input process, in input order. */
export function summarizeProcesses(
  processes: readonly Process[],
  schedule: readonly ScheduleEntry[],
): ProcessSummary[] {
  const completion = completionTimes(schedule)
  const firstStart = new Map<ProcessId, number>()
  for (const [pid, start] of schedule) {
    if (pid !== IDLE && !firstStart.has(pid)) firstStart.set(pid, start)
  }

  return processes.map((process) => {
    const startedAt = firstStart.get(process.pid)
    const completedAt = completion.get(process.pid)
    const turnaround = completedAt === undefined ? null : completedAt - process.arrivalTime
    return {
      pid: process.pid,
      arrivalTime: process.arrivalTime,
      burstTime: process.burstTime,
      priority: priorityValue(process.priority) ?? null,
      firstStartTime: startedAt ?? null,
      completionTime: completedAt ?? null,
      turnaroundTime: turnaround === null ? null : roundTo2(turnaround),
      waitingTime: turnaround === null ? null : roundTo2(turnaround - process.burstTime),
      responseTime: startedAt === undefined ? null : roundTo2(startedAt - process.arrivalTime),
    }
  })
}
