/**
 * @schedsim/scheduler-core
 *
 * Discrete CPU-scheduling simulation: FCFS, SJF (non-preemptive and SRTF),
 * priority (non-preemptive and preemptive) and Round Robin, plus the metrics
 * reducer that turns a timeline into waiting, turnaround and utilisation
 * figures. Every call is synchronous and deterministic for a given input.
 */

// ─── Process model ─────────────────────────────────────────────────────────
export {
  createProcess,
  describeProcess,
  toWorkingCopy,
  toWorkingCopies,
  toPrioritizedCopies,
  execute,
  isComplete,
  comparePid,
  byArrival,
} from './process'
export type { WorkingProcess, PrioritizedProcess } from './process'

// ─── Errors ────────────────────────────────────────────────────────────────
export {
  SchedulingError,
  MissingPriorityError,
  InvalidQuantumError,
  isSchedulingError,
} from './errors'
export type { SchedulingErrorCode } from './errors'

// ─── Ready set & timeline ──────────────────────────────────────────────────
export {
  createReadyQueue,
  rqPush,
  rqPop,
  rqPeek,
  rqSize,
  rqIsEmpty,
} from './ready-queue'
export type { ReadyQueue } from './ready-queue'
export { appendRun, appendIdle } from './timeline'

// ─── Algorithms ────────────────────────────────────────────────────────────
export {
  fcfs,
  sjfNonPreemptive,
  sjfPreemptive,
  priorityNonPreemptive,
  priorityPreemptive,
  roundRobin,
  roundRobinName,
  formatQuantum,
  PREEMPTION_STEP,
  FCFS_NAME,
  SJF_NON_PREEMPTIVE_NAME,
  SJF_PREEMPTIVE_NAME,
  PRIORITY_NON_PREEMPTIVE_NAME,
  PRIORITY_PREEMPTIVE_NAME,
} from './algorithms'

// ─── Results & metrics ─────────────────────────────────────────────────────
export { createResult, emptyResult, hasMetrics } from './result'
export { calculateMetrics, summarizeProcesses, roundTo2 } from './metrics'
export type { ProcessSummary } from './metrics'

// ─── Registry, comparison & workloads ──────────────────────────────────────
export { ALGORITHMS, ALGORITHM_IDS, isAlgorithmId, getAlgorithm, runAlgorithm } from './registry'
export type { RunOptions } from './registry'
export {
  compareAlgorithms,
  rankByWaitingTime,
  improvementPercent,
  DEFAULT_COMPARE_QUANTA,
} from './compare'
export type { AlgorithmRun, CompareOptions, RankedRun } from './compare'
export { generateWorkload, createPRNG } from './workload'
export type { WorkloadOptions, PRNG } from './workload'
