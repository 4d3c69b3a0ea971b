/**
 * GET /metrics handler
 *
 * Read-only view of the usage counters: total predictions served and uptime.
 */
import { Request, Response, RequestHandler } from 'express'
import { MetricsTracker } from '../services/MetricsTracker'

export function createUsageHandler(metrics: MetricsTracker): RequestHandler {
  return function getUsage(_req: Request, res: Response) {
    res.status(200).json(metrics.snapshot())
  }
}

export default createUsageHandler
