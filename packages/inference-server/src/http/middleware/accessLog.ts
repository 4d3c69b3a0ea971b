import { Request, Response, NextFunction } from 'express'
import { logHttp } from '../../utils/logger'
import { observeHttp } from '../../utils/metrics'
import { getCorrId } from './corr'

function routeLabel(req: Request): string {
  const route: unknown = req.route
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') return route.path
  return 'unmatched'
}

// One structured line per request, written once the response has been sent.
export default function accessLog(req: Request, res: Response, next: NextFunction) {
  const start = Date.now()
  res.on('finish', () => {
    const latency_ms = Date.now() - start
    logHttp({ path: req.path, method: req.method, status: res.statusCode, corr_id: getCorrId(res), latency_ms })
    observeHttp(routeLabel(req), res.statusCode, latency_ms)
  })
  next()
}
