/**
 * Structured request logging middleware.
 *
 * Emits one JSON line per request: timestamp, HTTP method, path, response
 * status and duration in ms. Lines go to stdout unless a sink is given.
 */

import type { Context, Next } from 'hono'

export type LogSink = (line: string) => void

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line)
}

export function requestLogger(sink: LogSink = stdoutSink) {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now()
    await next()
    const ms = (performance.now() - start).toFixed(1)

    sink(
      JSON.stringify({
        ts: new Date().toISOString(),
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        ms: Number(ms),
      }) + '\n',
    )
  }
}
