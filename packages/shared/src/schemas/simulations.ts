import { z } from 'zod'
import type { AlgorithmId } from '@schedsim/types'
import { createProcessListSchema, type ProcessListLimits } from './processes'

export interface RequestLimits extends ProcessListLimits {
  /** Positive quanta below this are rejected. */
  minTimeQuantum: number
}

const ALGORITHM_ID_VALUES = [
  'fcfs',
  'sjf-non-preemptive',
  'sjf-preemptive',
  'priority-non-preemptive',
  'priority-preemptive',
  'round-robin',
] as const satisfies readonly AlgorithmId[]

export const algorithmIdSchema = z.enum(ALGORITHM_ID_VALUES)

// Quanta <= 0 pass through so the engine reports them as a scheduling error.
function createQuantumSchema(minTimeQuantum: number) {
  return z
    .number()
    .finite()
    .refine((q) => q <= 0 || q >= minTimeQuantum, {
      message: `Time quantum must be at least ${minTimeQuantum}`,
    })
}

export function createSimulateRequestSchema(limits: RequestLimits) {
  return z.object({
    algorithm: algorithmIdSchema,
    processes: createProcessListSchema(limits),
    timeQuantum: createQuantumSchema(limits.minTimeQuantum).optional(),
  })
}

export function createCompareRequestSchema(limits: RequestLimits) {
  return z.object({
    processes: createProcessListSchema(limits),
    quanta: z.array(createQuantumSchema(limits.minTimeQuantum)).min(1).max(8).optional(),
  })
}

export function createRandomWorkloadSchema(limits: Pick<ProcessListLimits, 'maxProcesses'>) {
  return z.object({
    count: z.number().int().min(1).max(limits.maxProcesses),
    seed: z.number().int().optional(),
    maxArrival: z.number().finite().positive().optional(),
  })
}

export type SimulateRequest = z.infer<ReturnType<typeof createSimulateRequestSchema>>
export type CompareRequest = z.infer<ReturnType<typeof createCompareRequestSchema>>
export type RandomWorkloadRequest = z.infer<ReturnType<typeof createRandomWorkloadSchema>>
