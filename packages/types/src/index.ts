// Shared entity types for the scheduling simulator: processes, schedules,
// results and the algorithm catalogue.

/** Opaque, caller-chosen process identifier. Unique within one simulation. */
export type ProcessId = string

export {
  UNASSIGNED_PRIORITY,
  assignedPriority,
  priorityValue,
  type Priority,
  type AssignedPriority,
  type UnassignedPriority,
  type Process,
  type ProcessDescriptor,
} from './process'

export {
  IDLE,
  DEFAULT_TIME_QUANTUM,
  type ScheduleEntry,
  type SchedulingMetrics,
  type EmptyMetrics,
  type SchedulingResult,
  type AlgorithmId,
  type AlgorithmDescriptor,
} from './schedule'

export { ok, err, assertNever, type Result } from './result'
