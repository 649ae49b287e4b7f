// ---------------------------------------------------------------------------
// Seeded random workloads
// ---------------------------------------------------------------------------

import type { Process } from '@schedsim/types'
import { roundTo2 } from './metrics'
import { createProcess } from './process'

/** Seedable PRNG returning values in [0, 1). */
export type PRNG = () => number

/** mulberry32: identical seeds produce identical sequences. */
export function createPRNG(seed: number): PRNG {
  let s = seed | 0
  return () => {
    s = (s + 0x6d2b79f5) | 0
    let t = Math.imul(s ^ (s >>> 15), 1 | s)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export interface WorkloadOptions {
  seed: number
  /** Arrivals fall in [0, maxArrival). Defaults to `count * 0.5`. */
  maxArrival?: number
}

/**
 * `count` processes P1..Pn with arrivals spread over `[0, maxArrival)`,
 * bursts in [1, 10] and integer priorities 1–10. Times are rounded to 2
 * decimals.
 */
export function generateWorkload(count: number, options: WorkloadOptions): Process[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Workload size must be a positive integer (got ${count})`)
  }
  const rng = createPRNG(options.seed)
  const maxArrival = options.maxArrival ?? count * 0.5

  return Array.from({ length: count }, (_, i) =>
    createProcess({
      pid: `P${i + 1}`,
      arrivalTime: roundTo2(rng() * maxArrival),
      burstTime: roundTo2(1 + rng() * 9),
      priority: 1 + Math.floor(rng() * 10),
    }),
  )
}
