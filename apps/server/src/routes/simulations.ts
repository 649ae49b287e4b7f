import { Hono } from 'hono'
import type { SimulatorSettings } from '@schedsim/config'
import {
  ALGORITHMS,
  compareAlgorithms,
  createProcess,
  rankByWaitingTime,
  runAlgorithm,
} from '@schedsim/scheduler-core'
import { createCompareRequestSchema, createSimulateRequestSchema } from '@schedsim/shared'
import { parseBody, isResponse } from '../lib/validate'
import { toComparisonBody, toSimulationBody } from './serialize'

export function simulationRoutes(settings: SimulatorSettings) {
  const simulateSchema = createSimulateRequestSchema(settings)
  const compareSchema = createCompareRequestSchema(settings)
  const routes = new Hono()

  // GET /simulations/algorithms
  routes.get('/algorithms', (c) => c.json({ algorithms: ALGORITHMS }))

  // POST /simulations. Scheduling errors surface through the app error handler.
  routes.post('/', async (c) => {
    const body = await parseBody(c, simulateSchema)
    if (isResponse(body)) return body

    const processes = body.processes.map(createProcess)
    const result = runAlgorithm(body.algorithm, processes, {
      timeQuantum: body.timeQuantum ?? settings.defaultTimeQuantum,
    })
    return c.json({ result: toSimulationBody(result, processes) })
  })

  // POST /simulations/compare
  routes.post('/compare', async (c) => {
    const body = await parseBody(c, compareSchema)
    if (isResponse(body)) return body

    const processes = body.processes.map(createProcess)
    const runs = compareAlgorithms(processes, { quanta: body.quanta ?? settings.compareQuanta })
    return c.json({
      comparisons: runs.map((run) => toComparisonBody(run, processes)),
      ranking: rankByWaitingTime(runs),
    })
  })

  return routes
}
