import { DEFAULT_TIME_QUANTUM } from '@schedsim/types'

/** Simulator limits and defaults shared by every host of the engine. */
export interface SimulatorSettings {
  /** Round Robin quantum when a request names none. */
  defaultTimeQuantum: number
  /** Smallest positive quantum a request may ask for; caps Round Robin slices per unit of burst. */
  minTimeQuantum: number
  /** Round Robin quanta used by side-by-side comparisons. */
  compareQuanta: number[]
  /** Largest accepted workload. */
  maxProcesses: number
  /** Upper bound on the sum of bursts; caps the fixed-step preemptive loops. */
  maxTotalBurst: number
}

export type SettingKey = keyof SimulatorSettings

export type EnvRecord = Readonly<Record<string, string | undefined>>

/** Environment variable backing each setting. */
export const SETTING_ENV_KEYS: Record<SettingKey, string> = {
  defaultTimeQuantum: 'SCHEDSIM_DEFAULT_QUANTUM',
  minTimeQuantum: 'SCHEDSIM_MIN_QUANTUM',
  compareQuanta: 'SCHEDSIM_COMPARE_QUANTA',
  maxProcesses: 'SCHEDSIM_MAX_PROCESSES',
  maxTotalBurst: 'SCHEDSIM_MAX_TOTAL_BURST',
}

export const DEFAULT_SETTINGS: SimulatorSettings = {
  defaultTimeQuantum: DEFAULT_TIME_QUANTUM,
  minTimeQuantum: 0.01,
  compareQuanta: [2, 4],
  maxProcesses: 1000,
  maxTotalBurst: 100_000,
}

function parsePositive(raw: string): number | undefined {
  if (raw.trim() === '') return undefined
  const value = Number(raw)
  return Number.isFinite(value) && value > 0 ? value : undefined
}

/** Positive finite number from `env[key]`; anything else reads as unset. */
export function readEnvNumber(env: EnvRecord, key: string): number | undefined {
  const raw = env[key]
  return raw === undefined ? undefined : parsePositive(raw)
}

/** Comma-separated positive numbers. One bad entry discards the whole list. */
export function readEnvNumberList(env: EnvRecord, key: string): number[] | undefined {
  const raw = env[key]
  if (raw === undefined) return undefined
  const values: number[] = []
  for (const part of raw.split(',')) {
    const value = parsePositive(part)
    if (value === undefined) return undefined
    values.push(value)
  }
  return values.length > 0 ? values : undefined
}

function readEnvInteger(env: EnvRecord, key: string): number | undefined {
  const value = readEnvNumber(env, key)
  return value !== undefined && Number.isInteger(value) ? value : undefined
}

/** Resolve settings from an env record: env override > default. */
export function resolveSettings(env: EnvRecord = process.env): SimulatorSettings {
  return {
    defaultTimeQuantum:
      readEnvNumber(env, SETTING_ENV_KEYS.defaultTimeQuantum) ?? DEFAULT_SETTINGS.defaultTimeQuantum,
    minTimeQuantum:
      readEnvNumber(env, SETTING_ENV_KEYS.minTimeQuantum) ?? DEFAULT_SETTINGS.minTimeQuantum,
    compareQuanta:
      readEnvNumberList(env, SETTING_ENV_KEYS.compareQuanta) ?? [...DEFAULT_SETTINGS.compareQuanta],
    maxProcesses:
      readEnvInteger(env, SETTING_ENV_KEYS.maxProcesses) ?? DEFAULT_SETTINGS.maxProcesses,
    maxTotalBurst:
      readEnvNumber(env, SETTING_ENV_KEYS.maxTotalBurst) ?? DEFAULT_SETTINGS.maxTotalBurst,
  }
}

/** Settings resolved once from `process.env` at module load. */
export const settings: SimulatorSettings = resolveSettings()
