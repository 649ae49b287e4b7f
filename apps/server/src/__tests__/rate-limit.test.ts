import { describe, it, expect, beforeEach } from 'vitest'
import { Hono } from 'hono'
import { rateLimit } from '../lib/rate-limit'

describe('Rate Limiter', () => {
  let app: Hono

  beforeEach(() => {
    app = new Hono()
  })

  it('allows requests under the limit', async () => {
    app.post('/simulate', rateLimit({ windowMs: 60_000, max: 3 }), (c) => c.text('ok'))

    for (let i = 0; i < 3; i++) {
      const res = await app.request('/simulate', {
        method: 'POST',
        headers: { 'x-forwarded-for': '10.0.0.1' },
      })
      expect(res.status).toBe(200)
    }
  })

  it('returns 429 with Retry-After once the limit is exceeded', async () => {
    let now = 1_000_000
    app.post('/simulate', rateLimit({ windowMs: 60_000, max: 2, now: () => now }), (c) => c.text('ok'))

    const send = () =>
      app.request('/simulate', { method: 'POST', headers: { 'x-forwarded-for': '10.0.0.2' } })
    await send()
    await send()
    now += 15_000

    const res = await send()
    expect(res.status).toBe(429)
    expect(res.headers.get('Retry-After')).toBe('45')
    const body: unknown = await res.json()
    expect(body).toEqual({ error: 'Too many requests. Please try again later.' })
  })

  it('tracks different clients independently', async () => {
    app.get('/test', rateLimit({ windowMs: 60_000, max: 1 }), (c) => c.text('ok'))

    const res1 = await app.request('/test', { headers: { 'x-forwarded-for': '10.0.0.3' } })
    const res2 = await app.request('/test', { headers: { 'x-forwarded-for': '10.0.0.4, 10.0.0.9' } })

    expect(res1.status).toBe(200)
    expect(res2.status).toBe(200)
  })

  it('keeps counters separate per limiter', async () => {
    app.get('/a', rateLimit({ windowMs: 60_000, max: 1 }), (c) => c.text('a'))
    app.get('/b', rateLimit({ windowMs: 60_000, max: 1 }), (c) => c.text('b'))

    const headers = { 'x-forwarded-for': '10.0.0.5' }
    expect((await app.request('/a', { headers })).status).toBe(200)
    expect((await app.request('/b', { headers })).status).toBe(200)
    expect((await app.request('/a', { headers })).status).toBe(429)
  })

  it('supports custom key function', async () => {
    app.get(
      '/test',
      rateLimit({
        windowMs: 60_000,
        max: 1,
        keyFn: (c) => c.req.header('x-client-id') ?? 'anon',
      }),
      (c) => c.text('ok'),
    )

    const res1 = await app.request('/test', { headers: { 'x-client-id': 'client-a' } })
    const res2 = await app.request('/test', { headers: { 'x-client-id': 'client-a' } })

    expect(res1.status).toBe(200)
    expect(res2.status).toBe(429)
  })

  it('resets after the window expires', async () => {
    let now = 0
    app.get('/test', rateLimit({ windowMs: 50, max: 1, now: () => now }), (c) => c.text('ok'))

    const headers = { 'x-forwarded-for': '10.0.0.6' }
    expect((await app.request('/test', { headers })).status).toBe(200)
    expect((await app.request('/test', { headers })).status).toBe(429)

    now = 50
    expect((await app.request('/test', { headers })).status).toBe(200)
  })
})
