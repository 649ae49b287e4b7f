export { fcfs, FCFS_NAME } from './fcfs'
export {
  sjfNonPreemptive,
  sjfPreemptive,
  SJF_NON_PREEMPTIVE_NAME,
  SJF_PREEMPTIVE_NAME,
} from './sjf'
export {
  priorityNonPreemptive,
  priorityPreemptive,
  PRIORITY_NON_PREEMPTIVE_NAME,
  PRIORITY_PREEMPTIVE_NAME,
} from './priority'
export { roundRobin, roundRobinName, formatQuantum } from './round-robin'
export { PREEMPTION_STEP } from './selection'
