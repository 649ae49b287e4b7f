import { serve } from '@hono/node-server'
import { createApp } from './app'
import { env } from './lib/env'
import { logEvent } from './lib/log'

const app = createApp()

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  logEvent('server_started', { port: info.port, env: env.NODE_ENV })
})

function shutdown(signal: string) {
  logEvent('shutdown', { signal })

  server.close(() => process.exit(0))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
