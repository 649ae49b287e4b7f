/**
 * Server environment, read once on startup.
 *
 * Simulator limits live in @schedsim/config; this module only covers how the
 * HTTP host itself is exposed.
 */

function optional(key: string, fallback: string): string {
  return process.env[key] ?? fallback
}

function positiveInt(key: string, fallback: number): number {
  const raw = process.env[key]
  if (raw === undefined) return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer (got "${raw}").`)
  }
  return value
}

export const env = {
  PORT: positiveInt('PORT', 4000),
  NODE_ENV: optional('NODE_ENV', 'development'),
  CORS_ORIGINS: optional('CORS_ORIGINS', 'http://localhost:3000').split(','),
  RATE_LIMIT_PER_MINUTE: positiveInt('RATE_LIMIT_PER_MINUTE', 120),
} as const
