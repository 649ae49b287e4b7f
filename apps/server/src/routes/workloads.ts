import { Hono } from 'hono'
import type { SimulatorSettings } from '@schedsim/config'
import { generateWorkload } from '@schedsim/scheduler-core'
import { createRandomWorkloadSchema } from '@schedsim/shared'
import { parseBody, isResponse } from '../lib/validate'
import { toDescriptor } from './serialize'

export function workloadRoutes(settings: SimulatorSettings, randomSeed: () => number) {
  const randomSchema = createRandomWorkloadSchema(settings)
  const routes = new Hono()

  // POST /workloads/random. Echoes the seed it used.
  routes.post('/random', async (c) => {
    const body = await parseBody(c, randomSchema)
    if (isResponse(body)) return body

    const seed = body.seed ?? randomSeed()
    const processes = generateWorkload(body.count, { seed, maxArrival: body.maxArrival })
    return c.json({ seed, processes: processes.map(toDescriptor) })
  })

  return routes
}
