/**
 * In-memory fixed-window rate limiter middleware for Hono.
 *
 * Each limiter keeps its own counters; expired windows are swept lazily on
 * the next request after a window has elapsed.
 */

import type { Context, Next } from 'hono'

export interface RateLimitConfig {
  /** Time window in milliseconds. */
  windowMs: number
  /** Maximum requests per window per key. */
  max: number
  /** Custom key extractor. Defaults to client IP. */
  keyFn?: (c: Context) => string
  /** Clock override for tests. */
  now?: () => number
}

interface Entry {
  count: number
  resetAt: number
}

export function rateLimit(config: RateLimitConfig) {
  const store = new Map<string, Entry>()
  const clock = config.now ?? Date.now
  let nextSweep = clock() + config.windowMs

  return async (c: Context, next: Next): Promise<Response | void> => {
    const key =
      config.keyFn?.(c) ??
      c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ??
      'unknown'

    const now = clock()
    if (now >= nextSweep) {
      for (const [k, entry] of store) {
        if (now >= entry.resetAt) store.delete(k)
      }
      nextSweep = now + config.windowMs
    }

    const entry = store.get(key)
    if (!entry || now >= entry.resetAt) {
      store.set(key, { count: 1, resetAt: now + config.windowMs })
      return next()
    }

    if (entry.count >= config.max) {
      c.header('Retry-After', String(Math.ceil((entry.resetAt - now) / 1000)))
      return c.json({ error: 'Too many requests. Please try again later.' }, 429)
    }

    entry.count++
    return next()
  }
}
