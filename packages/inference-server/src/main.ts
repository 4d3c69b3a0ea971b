/*
 * Application entry point for the flight delay inference server
 *
 * Responsibilities:
 *  1. Load the classifier artifact (fatal on failure, before anything listens)
 *  2. Start the HTTP API server (Express app)
 *  3. Provide graceful shutdown on SIGINT / SIGTERM
 */

import http from 'http'
import { StartupFailure } from '@flight-delay/reasons'
import { createApp } from './http'
import { ENV } from './config'
import { loadClassifier } from './services/ModelLoader'
import { Classifier } from './services/Classifier'
import { MetricsTracker } from './services/MetricsTracker'
import { getLogger } from './utils/logger'

// --- Runtime state ---
let server: http.Server | null = null
let shuttingDown = false

async function start(): Promise<void> {
  const logger = getLogger()
  logger.info({ event: 'service.starting', model_path: ENV.MODEL_PATH, node_env: ENV.NODE_ENV })

  // 1. Classifier first: no model, no service.
  let classifier: Classifier
  try {
    classifier = loadClassifier(ENV.MODEL_PATH)
  } catch (e) {
    const code = e instanceof StartupFailure ? e.reason.code : 'INTERNAL_ERROR'
    logger.fatal({ event: 'startup.failed', code, err: e })
    process.exitCode = 1
    return
  }
  logger.info({ event: 'model.loaded', version: classifier.version, model_path: ENV.MODEL_PATH })

  // Initialize the process-wide counters so uptime starts with the service.
  const metrics = MetricsTracker.getInstance()

  // 2. Start HTTP server
  const app = createApp({ classifier, metrics })
  await new Promise<void>(resolve => {
    server = app.listen(ENV.PORT, ENV.HOST, () => {
      logger.info({ event: 'service.listening', host: ENV.HOST, port: ENV.PORT })
      resolve()
    })
  })
}

function shutdown(signal: NodeJS.Signals): void {
  if (shuttingDown) return
  shuttingDown = true
  getLogger().info({ event: 'service.stopping', signal })
  if (!server) return
  server.close(err => {
    if (err) {
      getLogger().error({ event: 'service.stop_failed', err })
      process.exitCode = 1
    }
  })
}

process.on('SIGINT', shutdown)
process.on('SIGTERM', shutdown)

start().catch(e => {
  getLogger().fatal({ event: 'startup.failed', err: e })
  process.exitCode = 1
})
