import { describe, it, expect } from 'vitest'
import { IDLE } from '@schedsim/types'
import { roundRobin, roundRobinName, formatQuantum, InvalidQuantumError } from '../index'
import { proc } from './helpers'

describe('roundRobin', () => {
  const simple = [proc('P1', 0, 3), proc('P2', 1, 1), proc('P3', 2, 2)]

  it('slices execution by the quantum', () => {
    const result = roundRobin(simple, 2)

    expect(result.algorithmName).toBe('Round Robin (Quantum: 2.0)')
    expect(result.schedule).toEqual([
      ['P1', 0, 2],
      ['P2', 2, 3],
      ['P3', 3, 5],
      ['P1', 5, 6],
    ])
  })

  it('defaults to a quantum of 2', () => {
    expect(roundRobin(simple)).toEqual(roundRobin(simple, 2))
  })

  it('produces more entries with a smaller quantum', () => {
    const processes = [proc('P1', 0, 5), proc('P2', 0, 3)]
    const fine = roundRobin(processes, 1)
    const coarse = roundRobin(processes, 3)

    expect(fine.schedule).toEqual([
      ['P1', 0, 1],
      ['P2', 1, 2],
      ['P1', 2, 3],
      ['P2', 3, 4],
      ['P1', 4, 5],
      ['P2', 5, 6],
      ['P1', 6, 8],
    ])
    expect(coarse.schedule).toEqual([
      ['P1', 0, 3],
      ['P2', 3, 6],
      ['P1', 6, 8],
    ])
    expect(fine.schedule.length).toBeGreaterThan(coarse.schedule.length)
    expect(fine.metrics).toMatchObject({ totalProcesses: 2, totalTime: 8 })
    expect(coarse.metrics).toMatchObject({ totalProcesses: 2, totalTime: 8 })
  })

  it('queues new arrivals ahead of the preempted process', () => {
    expect(roundRobin([proc('P1', 0, 4), proc('P2', 1, 2)], 2).schedule).toEqual([
      ['P1', 0, 2],
      ['P2', 2, 4],
      ['P1', 4, 6],
    ])
  })

  it('idles until the next arrival when the queue drains', () => {
    expect(roundRobin([proc('P1', 0, 1), proc('P2', 4, 2)], 2).schedule).toEqual([
      ['P1', 0, 1],
      [IDLE, 1, 4],
      ['P2', 4, 6],
    ])
  })

  it('admits simultaneous arrivals after an idle gap in pid order', () => {
    expect(roundRobin([proc('P3', 2, 1), proc('P2', 2, 1)], 1).schedule).toEqual([
      [IDLE, 0, 2],
      ['P2', 2, 3],
      ['P3', 3, 4],
    ])
  })

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('rejects quantum %s', (quantum) => {
    expect(() => roundRobin(simple, quantum)).toThrow(InvalidQuantumError)
    expect(() => roundRobin([], quantum)).toThrow(InvalidQuantumError)
  })

  it('reports the invalid-configuration code', () => {
    try {
      roundRobin(simple, 0)
      expect.unreachable('expected InvalidQuantumError')
    } catch (error) {
      expect(error).toMatchObject({ code: 'INVALID_CONFIGURATION', quantum: 0 })
      expect(error).toHaveProperty('message', 'Time quantum must be positive (got 0)')
    }
  })

  it('keeps the quantum in the name of an empty run', () => {
    const result = roundRobin([], 4)

    expect(result.algorithmName).toBe('Round Robin (Quantum: 4.0)')
    expect(result.schedule).toEqual([])
    expect(result.metrics).toEqual({})
  })
})

describe('roundRobinName', () => {
  it('prints integral quanta with one decimal', () => {
    expect(formatQuantum(2)).toBe('2.0')
    expect(roundRobinName(4)).toBe('Round Robin (Quantum: 4.0)')
  })

  it('prints fractional quanta as-is', () => {
    expect(formatQuantum(0.5)).toBe('0.5')
    expect(roundRobinName(1.25)).toBe('Round Robin (Quantum: 1.25)')
  })
})
