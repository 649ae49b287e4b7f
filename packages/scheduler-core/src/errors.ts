// ---------------------------------------------------------------------------
// Scheduling errors
// ---------------------------------------------------------------------------
// Raised synchronously before any scheduling decision is made. A run either
// produces its full schedule or throws one of these; there is no partial
// result.
// ---------------------------------------------------------------------------

import type { ProcessId } from '@schedsim/types'

export type SchedulingErrorCode = 'MISSING_ATTRIBUTE' | 'INVALID_CONFIGURATION'

export class SchedulingError extends Error {
  constructor(
    public readonly code: SchedulingErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'SchedulingError'
  }
}

/** A priority-based algorithm was given a process without a priority. */
export class MissingPriorityError extends SchedulingError {
  constructor(public readonly pid: ProcessId) {
    super('MISSING_ATTRIBUTE', `Process ${pid} does not have a priority assigned`)
    this.name = 'MissingPriorityError'
  }
}

/** Round Robin was given a quantum that is not a positive, finite number. */
export class InvalidQuantumError extends SchedulingError {
  constructor(public readonly quantum: number) {
    super('INVALID_CONFIGURATION', `Time quantum must be positive (got ${quantum})`)
    this.name = 'InvalidQuantumError'
  }
}

export function isSchedulingError(value: unknown): value is SchedulingError {
  return value instanceof SchedulingError
}
