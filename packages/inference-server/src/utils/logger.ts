import pino from 'pino'
import { PredictionMode } from '@flight-delay/dto'

type HttpPayload = {
  path: string
  method: string
  status: number
  corr_id?: string
  latency_ms?: number
}

type PredictionPayload = {
  mode: PredictionMode
  count: number
  corr_id?: string
  flight_id?: string
  delayed?: boolean
}

type RejectionPayload = {
  code: string
  http_status: number
  message: string
  corr_id?: string
  path?: string
}

// create default logger; tests can replace via setLogger
let logger: pino.Logger = pino({ level: process.env.LOG_LEVEL || 'info' })

export function setLogger(l: pino.Logger) {
  logger = l
}

export function getLogger(): pino.Logger {
  return logger
}

export function logHttp(payload: HttpPayload): void {
  const base = {
    event: 'http.request',
    path: payload.path,
    method: payload.method,
    status: payload.status,
    corr_id: payload.corr_id,
    latency_ms: payload.latency_ms
  }
  logger.info(base)
}

export function logPrediction(payload: PredictionPayload): void {
  logger.info({ event: 'prediction.served', ...payload })
}

// client errors are expected traffic; only server-side failures log at error level
export function logRejection(payload: RejectionPayload): void {
  const base = { event: 'request.rejected', ...payload }
  if (payload.http_status >= 500) logger.error(base)
  else logger.warn(base)
}
