import type { Process } from '@schedsim/types'
import { createProcess } from '../index'

/** Shorthand: `proc('P1', 0, 3)` or `proc('P1', 0, 3, 2)`. */
export function proc(pid: string, arrivalTime: number, burstTime: number, priority?: number): Process {
  return createProcess({ pid, arrivalTime, burstTime, priority })
}
