// ---------------------------------------------------------------------------
// Process model
// ---------------------------------------------------------------------------
// `Process` values belong to the caller and are never written to. Each
// algorithm call clones them into `WorkingProcess` records whose `remaining`
// counter lives only as long as that call.
// ---------------------------------------------------------------------------

import {
  UNASSIGNED_PRIORITY,
  assignedPriority,
  type Process,
  type ProcessDescriptor,
  type ProcessId,
} from '@schedsim/types'
import { MissingPriorityError } from './errors'

/** Mutable per-run copy of a process. */
export type WorkingProcess = {
  readonly pid: ProcessId
  readonly arrivalTime: number
  readonly burstTime: number
  remaining: number
}

/** Working copy of a process whose priority is known to be assigned. */
export type PrioritizedProcess = WorkingProcess & { readonly priority: number }

/**
 * Build a frozen `Process` from a plain descriptor. An omitted priority
 * becomes `UNASSIGNED_PRIORITY`.
 */
export function createProcess(descriptor: ProcessDescriptor): Process {
  return Object.freeze({
    pid: descriptor.pid,
    arrivalTime: descriptor.arrivalTime,
    burstTime: descriptor.burstTime,
    priority:
      descriptor.priority === undefined
        ? UNASSIGNED_PRIORITY
        : assignedPriority(descriptor.priority),
  })
}

export function describeProcess(process: Process): string {
  const priority =
    process.priority.kind === 'assigned' ? `, Priority: ${process.priority.value}` : ''
  return `Process ${process.pid} (Arrival: ${process.arrivalTime}s, Burst: ${process.burstTime}s${priority})`
}

export function toWorkingCopy(process: Process): WorkingProcess {
  return {
    pid: process.pid,
    arrivalTime: process.arrivalTime,
    burstTime: process.burstTime,
    remaining: process.burstTime,
  }
}

export function toWorkingCopies(processes: readonly Process[]): WorkingProcess[] {
  return processes.map(toWorkingCopy)
}

/**
 * Clone every process with its numeric priority, failing on the first one
 * that has none. Runs before any scheduling decision.
 */
export function toPrioritizedCopies(processes: readonly Process[]): PrioritizedProcess[] {
  return processes.map((process) => {
    if (process.priority.kind !== 'assigned') {
      throw new MissingPriorityError(process.pid)
    }
    return { ...toWorkingCopy(process), priority: process.priority.value }
  })
}

/**
 * Run `copy` for up to `slice` time units. Returns the time actually used;
 * `remaining` is clipped at exactly 0.
 */
export function execute(copy: WorkingProcess, slice: number): number {
  const ran = Math.min(slice, copy.remaining)
  copy.remaining -= ran
  return ran
}

export function isComplete(copy: WorkingProcess): boolean {
  return copy.remaining <= 0
}

/**
 * Ordinal pid comparison used for every tie-break. Compares Unicode code
 * points, so characters outside the BMP sort after U+FFFF.
 */
export function comparePid(a: ProcessId, b: ProcessId): number {
  if (a === b) return 0
  let idx = 0
  while (idx < a.length && idx < b.length) {
    const ca = a.codePointAt(idx) ?? 0
    const cb = b.codePointAt(idx) ?? 0
    if (ca !== cb) return ca < cb ? -1 : 1
    idx += ca > 0xffff ? 2 : 1
  }
  return idx >= a.length ? -1 : 1
}

/** Order by arrival time, then pid. */
export function byArrival(a: WorkingProcess, b: WorkingProcess): number {
  if (a.arrivalTime !== b.arrivalTime) return a.arrivalTime - b.arrivalTime
  return comparePid(a.pid, b.pid)
}
