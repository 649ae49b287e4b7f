import { describe, it, expect } from 'vitest'
import { compareAlgorithms, rankByWaitingTime, improvementPercent } from '../index'
import { proc } from './helpers'

describe('compareAlgorithms', () => {
  it('runs every algorithm, Round Robin once per quantum', () => {
    const runs = compareAlgorithms([proc('P1', 0, 3, 2), proc('P2', 0, 1, 1)], { quanta: [1, 2, 4] })

    expect(runs.map((r) => r.label)).toEqual([
      'First-Come, First-Served (FCFS)',
      'Shortest Job First (Non-Preemptive)',
      'Shortest Job First (Preemptive)',
      'Priority (Non-Preemptive)',
      'Priority (Preemptive)',
      'Round Robin (Quantum: 1.0)',
      'Round Robin (Quantum: 2.0)',
      'Round Robin (Quantum: 4.0)',
    ])
    expect(runs.every((r) => r.outcome.ok)).toBe(true)
    expect(runs.map((r) => r.timeQuantum)).toEqual([null, null, null, null, null, 1, 2, 4])
  })

  it('uses quanta 2 and 4 by default', () => {
    const runs = compareAlgorithms([proc('P1', 0, 1)])

    expect(runs).toHaveLength(7)
    expect(runs.filter((r) => r.algorithm === 'round-robin').map((r) => r.timeQuantum)).toEqual([2, 4])
  })

  it('captures failures without dropping the other runs', () => {
    const runs = compareAlgorithms([proc('P1', 0, 3), proc('P2', 1, 2)])
    const failed = runs.filter((r) => !r.outcome.ok)

    expect(failed.map((r) => r.algorithm)).toEqual(['priority-non-preemptive', 'priority-preemptive'])
    for (const run of failed) {
      if (run.outcome.ok) continue
      expect(run.outcome.error.code).toBe('MISSING_ATTRIBUTE')
    }
    expect(runs.filter((r) => r.outcome.ok)).toHaveLength(5)
  })

  it('records invalid quanta as configuration errors', () => {
    const [rr] = compareAlgorithms([proc('P1', 0, 1)], { quanta: [0] }).filter(
      (r) => r.algorithm === 'round-robin',
    )

    if (rr === undefined || rr.outcome.ok) return expect.unreachable('expected a failed run')
    expect(rr.outcome.error.code).toBe('INVALID_CONFIGURATION')
  })
})

describe('rankByWaitingTime', () => {
  it('orders successful runs by average waiting time, then label', () => {
    const runs = compareAlgorithms([proc('P1', 0, 3, 2), proc('P2', 0, 1, 1)], { quanta: [2] })
    const ranked = rankByWaitingTime(runs)

    expect(ranked.map((r) => [r.label, r.averageWaitingTime])).toEqual([
      ['Priority (Non-Preemptive)', 0.5],
      ['Priority (Preemptive)', 0.5],
      ['Shortest Job First (Non-Preemptive)', 0.5],
      ['Shortest Job First (Preemptive)', 0.5],
      ['First-Come, First-Served (FCFS)', 1.5],
      ['Round Robin (Quantum: 2.0)', 1.5],
    ])
  })

  it('skips failed and empty runs', () => {
    expect(rankByWaitingTime(compareAlgorithms([]))).toEqual([])

    const ranked = rankByWaitingTime(compareAlgorithms([proc('P1', 0, 2)], { quanta: [] }))
    expect(ranked.map((r) => r.algorithm)).toEqual(['fcfs', 'sjf-non-preemptive', 'sjf-preemptive'])
  })
})

describe('improvementPercent', () => {
  it('reports the relative reduction to one decimal', () => {
    expect(improvementPercent(6, 3)).toBe(50)
    expect(improvementPercent(3, 2)).toBe(33.3)
    expect(improvementPercent(4, 5)).toBe(-25)
  })

  it('is null for a zero baseline', () => {
    expect(improvementPercent(0, 1)).toBeNull()
  })
})
