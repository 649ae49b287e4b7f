import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { HTTPException } from 'hono/http-exception'
import { settings as defaultSettings, type SimulatorSettings } from '@schedsim/config'
import { isSchedulingError } from '@schedsim/scheduler-core'
import { env } from './lib/env'
import { logError } from './lib/log'
import { requestLogger, type LogSink } from './lib/request-logger'
import { rateLimit } from './lib/rate-limit'
import { simulationRoutes } from './routes/simulations'
import { workloadRoutes } from './routes/workloads'

export const API_NAME = 'schedsim API'
export const API_VERSION = '0.1.0'

export interface AppOptions {
  settings?: SimulatorSettings
  corsOrigins?: string[]
  rateLimitPerMinute?: number
  /** Destination of request log lines. Defaults to stdout. */
  logSink?: LogSink
  /** Seed source for random workloads when the request gives none. */
  randomSeed?: () => number
  production?: boolean
}

const defaultRandomSeed = () => Math.floor(Math.random() * 2 ** 31)

export function createApp(options: AppOptions = {}) {
  const settings = options.settings ?? defaultSettings
  const production = options.production ?? env.NODE_ENV === 'production'
  const app = new Hono()

  // ---------------------------------------------------------------------------
  // Global error handling
  // ---------------------------------------------------------------------------

  app.onError((err, c) => {
    if (isSchedulingError(err)) {
      return c.json({ error: err.message, code: err.code }, 422)
    }
    if (err instanceof HTTPException && err.status < 500) {
      return c.json({ error: err.message }, err.status)
    }
    logError('request', err, {
      includeStack: !production,
      fields: { method: c.req.method, path: c.req.path },
    })
    return c.json({ error: 'Internal server error.' }, 500)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // ---------------------------------------------------------------------------
  // Middleware stack (order matters)
  // ---------------------------------------------------------------------------

  // 1. Request logging (first so it captures total duration)
  app.use('*', requestLogger(options.logSink))

  // 2. CORS
  app.use(
    '*',
    cors({
      origin: options.corsOrigins ?? env.CORS_ORIGINS,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    }),
  )

  // 3. Rate limiting per route group
  const max = options.rateLimitPerMinute ?? env.RATE_LIMIT_PER_MINUTE
  app.use('/simulations/*', rateLimit({ windowMs: 60_000, max }))
  app.use('/workloads/*', rateLimit({ windowMs: 60_000, max }))

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  app.get('/', (c) => c.json({ name: API_NAME, version: API_VERSION }))
  app.get('/health', (c) => c.json({ status: 'healthy' }))

  app.route('/simulations', simulationRoutes(settings))
  app.route('/workloads', workloadRoutes(settings, options.randomSeed ?? defaultRandomSeed))

  return app
}
