/**
 * HTTP router for the inference server
 * Exposes `createApp()` to allow tests to mount the app without starting a server.
 */
import express from 'express'
import corr from './middleware/corr'
import accessLog from './middleware/accessLog'
import errorHandler, { notFound } from './middleware/errorHandler'
import createPredictHandler from './predict'
import createBatchHandler from './batch'
import createUsageHandler from './usage'
import getInfo, { getHealth } from './info'
import postSimulateError from './simulate'
import { metricsHandler } from '../utils/metrics'
import { CONSTANTS } from '../config'
import { Classifier } from '../services/Classifier'
import { MetricsTracker } from '../services/MetricsTracker'
import { Scorer } from '../services/Scorer'

export interface AppDeps {
  classifier: Classifier
  // defaults to the process-wide tracker
  metrics?: MetricsTracker
  // express.json() limit, bytes or a size string such as '10mb'
  bodyLimit?: number | string
}

export function createApp(deps: AppDeps) {
  const pipeline = {
    scorer: new Scorer(deps.classifier),
    metrics: deps.metrics ?? MetricsTracker.getInstance()
  }

  const app = express()
  app.use(corr)
  app.use(accessLog)
  app.use(express.json({ limit: deps.bodyLimit ?? CONSTANTS.JSON_BODY_LIMIT }))

  // Inference
  app.post('/predict', createPredictHandler(pipeline))
  app.post('/predict-batch', createBatchHandler(pipeline))

  // Telemetry and service metadata
  app.get('/metrics', createUsageHandler(pipeline.metrics))
  app.get('/metrics/prometheus', metricsHandler)
  app.get('/info', getInfo)
  app.get('/health', getHealth)

  // Diagnostics
  app.post('/simulate-error', postSimulateError)

  app.use(notFound)
  app.use(errorHandler)

  return app
}

export default createApp
