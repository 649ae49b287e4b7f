// Shared configuration: simulator defaults and limits with env overrides.
// Server-only variables (port, CORS, rate limit) live in apps/server/src/lib/env.ts.

export {
  settings,
  resolveSettings,
  readEnvNumber,
  readEnvNumberList,
  DEFAULT_SETTINGS,
  SETTING_ENV_KEYS,
  type SimulatorSettings,
  type SettingKey,
  type EnvRecord,
} from './settings'
