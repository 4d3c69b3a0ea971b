import { Request, Response } from 'express'
import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client'
import { PredictionMode } from '@flight-delay/dto'
import { getLogger } from './logger'

let registry: Registry
let predictionCounter: Counter<string>
let rejectionCounter: Counter<string>
let httpHistogram: Histogram<string>

function initMetrics(reg?: Registry, withDefaults = false) {
  registry = reg ?? new Registry()
  if (withDefaults) collectDefaultMetrics({ register: registry })

  predictionCounter = new Counter({
    name: 'flight_predictions_total',
    help: 'Successfully scored flights',
    labelNames: ['mode'],
    registers: [registry]
  })

  rejectionCounter = new Counter({
    name: 'flight_rejections_total',
    help: 'Failed requests by reason code',
    labelNames: ['code'],
    registers: [registry]
  })

  httpHistogram = new Histogram({
    name: 'flight_http_request_duration_ms',
    help: 'HTTP request duration by route and status (ms)',
    labelNames: ['route', 'status'],
    buckets: [1, 2, 5, 10, 20, 50, 100, 250, 500, 1000],
    registers: [registry]
  })
}

// initialize default metrics on module load
initMetrics(undefined, true)

export function setRegistry(reg: Registry) {
  initMetrics(reg)
}

export function getRegistry(): Registry {
  return registry
}

export function countPredictions(mode: PredictionMode, n = 1) {
  if (n > 0) predictionCounter.labels({ mode }).inc(n)
}

export function countRejection(code: string) {
  rejectionCounter.labels({ code }).inc()
}

export function observeHttp(route: string, status: number, ms: number) {
  if (ms >= 0) httpHistogram.labels({ route, status: String(status) }).observe(ms)
}

export async function metricsHandler(_req: Request, res: Response) {
  try {
    const body = await registry.metrics()
    res.setHeader('Content-Type', registry.contentType)
    res.status(200).send(body)
  } catch (e) {
    getLogger().error({ event: 'metrics.render_failed', err: e })
    res.status(500).send('error')
  }
}
