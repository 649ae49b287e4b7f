import type { ProcessId } from './index'

// ─── Priority ────────────────────────────────────────────────────────────────

/** Priority explicitly assigned to a process. Lower value = higher priority. */
export interface AssignedPriority {
  kind: 'assigned'
  value: number
}

/** No priority given; only priority-based algorithms reject this. */
export interface UnassignedPriority {
  kind: 'unassigned'
}

export type Priority = AssignedPriority | UnassignedPriority

export const UNASSIGNED_PRIORITY: UnassignedPriority = Object.freeze({ kind: 'unassigned' })

export function assignedPriority(value: number): AssignedPriority {
  return Object.freeze({ kind: 'assigned', value })
}

/** Collapse a priority back to its wire form. */
export function priorityValue(priority: Priority): number | undefined {
  return priority.kind === 'assigned' ? priority.value : undefined
}

// ─── Process ─────────────────────────────────────────────────────────────────

/**
 * Immutable description of a process, owned by the caller.
 * Simulations never mutate it; they work on private copies.
 */
export interface Process {
  readonly pid: ProcessId
  /** Time at which the process becomes eligible to run. */
  readonly arrivalTime: number
  /** Total CPU time required. Always positive. */
  readonly burstTime: number
  readonly priority: Priority
}

/** Plain descriptor accepted by `createProcess` and the HTTP API. */
export interface ProcessDescriptor {
  pid: ProcessId
  arrivalTime: number
  burstTime: number
  priority?: number
}
