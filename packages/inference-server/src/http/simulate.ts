/**
 * POST /simulate-error handler
 *
 * Diagnostic route only. `{ raise_error: true }` produces a 418 SimulatedError
 * envelope through the regular error middleware.
 */
import { Request, Response, NextFunction } from 'express'
import { parseErrorSimulation } from '../validators/flightValidator'
import { simulateError } from '../diagnostics/simulateError'

export function postSimulateError(req: Request, res: Response, next: NextFunction) {
  try {
    const ack = simulateError(parseErrorSimulation(req.body))
    res.status(200).json(ack)
  } catch (e) {
    next(e)
  }
}

export default postSimulateError
