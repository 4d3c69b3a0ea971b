/**
 * corr middleware
 *
 * Enforces a stable correlation id for every request. If the incoming
 * request provides `x-corr-id` that value is used; otherwise a ULID-based
 * correlation id is generated. The id is kept in `res.locals.corr_id` and
 * echoed back in the `x-corr-id` response header.
 */
import { Request, Response, NextFunction } from 'express'
import { ulid } from 'ulid'
import pino from 'pino'
import { getLogger } from '../../utils/logger'

export function getCorrId(res: Response): string {
  const v: unknown = res.locals.corr_id
  return typeof v === 'string' ? v : '-'
}

/** Request-scoped child logger carrying the correlation id. */
export function requestLogger(res: Response): pino.Logger {
  return getLogger().child({ corr_id: getCorrId(res) })
}

export default function corr(req: Request, res: Response, next: NextFunction) {
  const header = req.header('x-corr-id') || ''
  const corr = header.length ? header : `corr_${ulid()}`
  res.locals.corr_id = corr
  res.setHeader('x-corr-id', corr)
  next()
}
