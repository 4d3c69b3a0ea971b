/**
 * POST /predict-batch handler
 *
 * Invalid items are dropped without per-item errors. `?diagnostics=true`
 * adds the list of dropped indexes and their issues to the response.
 */
import { Request, Response, NextFunction, RequestHandler } from 'express'
import { parseFlightBatch } from '../validators/flightValidator'
import { predictBatch } from '../pipeline/predictBatch'
import { PipelineDeps } from '../pipeline/context'
import { countPredictions } from '../utils/metrics'
import { logPrediction } from '../utils/logger'
import { getCorrId, requestLogger } from './middleware/corr'

function wantsDiagnostics(req: Request): boolean {
  const flag = req.query.diagnostics
  return flag === 'true' || flag === '1'
}

export function createBatchHandler(deps: PipelineDeps): RequestHandler {
  return function postPredictBatch(req: Request, res: Response, next: NextFunction) {
    try {
      const items = parseFlightBatch(req.body)
      const result = predictBatch(items, deps, { diagnostics: wantsDiagnostics(req) })
      const droppedCount = items.length - result.count
      if (droppedCount > 0) requestLogger(res).debug({ event: 'batch.dropped', dropped: droppedCount, received: items.length })
      countPredictions('batch', result.count)
      logPrediction({ mode: 'batch', count: result.count, corr_id: getCorrId(res) })
      res.status(200).json(result)
    } catch (e) {
      next(e)
    }
  }
}

export default createBatchHandler
