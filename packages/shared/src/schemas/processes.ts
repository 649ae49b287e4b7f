import { z } from 'zod'

export interface ProcessListLimits {
  maxProcesses: number
  maxTotalBurst: number
}

export const processDescriptorSchema = z.object({
  pid: z.string().min(1, 'Process id is required').max(64),
  arrivalTime: z.number().finite().min(0, 'Arrival time cannot be negative'),
  burstTime: z.number().finite().positive('Burst time must be positive'),
  priority: z.number().int().optional(),
})

/** Process list bounded by `limits`, with unique pids. */
export function createProcessListSchema(limits: ProcessListLimits) {
  return z
    .array(processDescriptorSchema)
    .max(limits.maxProcesses, `At most ${limits.maxProcesses} processes per request`)
    .superRefine((processes, ctx) => {
      const seen = new Set<string>()
      for (const [index, process] of processes.entries()) {
        if (seen.has(process.pid)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate process id: ${process.pid}`,
            path: [index, 'pid'],
          })
        }
        seen.add(process.pid)
      }

      const totalBurst = processes.reduce((sum, p) => sum + p.burstTime, 0)
      if (totalBurst > limits.maxTotalBurst) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Total burst time ${totalBurst} exceeds ${limits.maxTotalBurst}`,
        })
      }
    })
}

export type ProcessDescriptorInput = z.infer<typeof processDescriptorSchema>
