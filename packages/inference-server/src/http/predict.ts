/**
 * POST /predict handler
 *
 * Validates one flight, scores it and returns the PredictionResult.
 * Validation runs before the pipeline so schema failures never reach the scorer.
 */
import { Request, Response, NextFunction, RequestHandler } from 'express'
import { parseFlightRecord } from '../validators/flightValidator'
import { predictSingle } from '../pipeline/predictSingle'
import { PipelineDeps } from '../pipeline/context'
import { countPredictions } from '../utils/metrics'
import { logPrediction } from '../utils/logger'
import { getCorrId } from './middleware/corr'

export function createPredictHandler(deps: PipelineDeps): RequestHandler {
  return function postPredict(req: Request, res: Response, next: NextFunction) {
    try {
      const record = parseFlightRecord(req.body)
      const result = predictSingle(record, deps)
      countPredictions('single')
      logPrediction({ mode: 'single', count: 1, corr_id: getCorrId(res), flight_id: result.flight_id, delayed: result.delayed })
      res.status(200).json(result)
    } catch (e) {
      next(e)
    }
  }
}

export default createPredictHandler
