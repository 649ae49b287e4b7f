// ---------------------------------------------------------------------------
// Ready set: binary min-heap keyed by (criterion, pid)
// ---------------------------------------------------------------------------
// Lower criterion values are dequeued first. Equal criteria fall back to the
// ordinal pid order, so the dequeue order is a pure function of the contents
// and never depends on insertion order.
// ---------------------------------------------------------------------------

import type { ProcessId } from '@schedsim/types'
import { comparePid } from './process'

type HeapEntry<T> = {
  item: T
  key: number
  pid: ProcessId
}

/** Binary min-heap of ready processes. */
export type ReadyQueue<T> = {
  /** @internal backing array in heap order */
  _entries: Array<HeapEntry<T>>
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function lessThan<T>(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
  if (a.key !== b.key) return a.key < b.key
  return comparePid(a.pid, b.pid) < 0
}

function swap<T>(entries: Array<HeapEntry<T>>, i: number, j: number): void {
  const a = entries[i]
  const b = entries[j]
  if (a === undefined || b === undefined) return
  entries[i] = b
  entries[j] = a
}

function siftUp<T>(entries: Array<HeapEntry<T>>, idx: number): void {
  while (idx > 0) {
    const parentIdx = (idx - 1) >> 1
    const parent = entries[parentIdx]
    const current = entries[idx]
    if (parent === undefined || current === undefined || !lessThan(current, parent)) break
    swap(entries, idx, parentIdx)
    idx = parentIdx
  }
}

function siftDown<T>(entries: Array<HeapEntry<T>>, idx: number): void {
  while (true) {
    let smallest = idx
    for (const child of [2 * idx + 1, 2 * idx + 2]) {
      const candidate = entries[child]
      const best = entries[smallest]
      if (candidate !== undefined && best !== undefined && lessThan(candidate, best)) {
        smallest = child
      }
    }
    if (smallest === idx) return
    swap(entries, idx, smallest)
    idx = smallest
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function createReadyQueue<T>(): ReadyQueue<T> {
  return { _entries: [] }
}

/** Insert `item` under `(key, pid)`. */
export function rqPush<T>(rq: ReadyQueue<T>, item: T, key: number, pid: ProcessId): void {
  rq._entries.push({ item, key, pid })
  siftUp(rq._entries, rq._entries.length - 1)
}

/** Remove and return the entry with the smallest `(key, pid)`, or null. */
export function rqPop<T>(rq: ReadyQueue<T>): T | null {
  const top = rq._entries[0]
  const last = rq._entries.pop()
  if (top === undefined || last === undefined) return null

  if (rq._entries.length > 0) {
    rq._entries[0] = last
    siftDown(rq._entries, 0)
  }
  return top.item
}

export function rqPeek<T>(rq: ReadyQueue<T>): T | null {
  return rq._entries[0]?.item ?? null
}

export function rqSize<T>(rq: ReadyQueue<T>): number {
  return rq._entries.length
}

export function rqIsEmpty<T>(rq: ReadyQueue<T>): boolean {
  return rq._entries.length === 0
}
