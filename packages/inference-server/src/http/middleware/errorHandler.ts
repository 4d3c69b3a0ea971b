/**
 * Translates every per-request failure into an ErrorEnvelope.
 *
 * ReasonedError subclasses carry their own ReasonDetail. Body-parser failures are
 * client-side: malformed JSON is a validation failure, an oversized body keeps its
 * 413 and other unreadable bodies keep the parser's 4xx status. Anything else is
 * INTERNAL_ERROR.
 */
import { Request, Response, NextFunction } from 'express'
import { ErrorEnvelope, ReasonDetail, ValidationIssue } from '@flight-delay/dto'
import { ReasonedError, ValidationError, describeCause, reason } from '@flight-delay/reasons'
import { logRejection } from '../../utils/logger'
import { countRejection } from '../../utils/metrics'
import { getCorrId } from './corr'

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed'
}

// body-parser raises http-errors carrying `type` and a 4xx `status`
function bodyReadStatus(err: unknown): number | undefined {
  if (!(err instanceof Error) || !('type' in err) || !('status' in err)) return undefined
  const { status } = err
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined
}

function classify(err: unknown): { detail: ReasonDetail; issues?: ValidationIssue[] } {
  if (err instanceof ValidationError) return { detail: err.reason, issues: err.issues }
  if (err instanceof ReasonedError) return { detail: err.reason }
  if (isBodyParseError(err)) {
    const issues = [{ path: '', message: `Malformed JSON body: ${describeCause(err)}` }]
    return { detail: new ValidationError(issues).reason, issues }
  }
  const status = bodyReadStatus(err)
  if (status === 413) return { detail: reason('CLIENT_PAYLOAD_TOO_LARGE') }
  if (status !== undefined) {
    return { detail: reason('CLIENT_UNREADABLE_BODY', { http_status: status, message: `Request body could not be read: ${describeCause(err)}` }) }
  }
  return { detail: reason('INTERNAL_ERROR') }
}

export default function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) return next(err)
  const corr_id = getCorrId(res)
  const { detail, issues } = classify(err)

  countRejection(detail.code)
  logRejection({ code: detail.code, http_status: detail.http_status, message: describeCause(err), corr_id, path: req.path })

  const envelope: ErrorEnvelope = { corr_id, detail: detail.message, reason: detail, ts: new Date().toISOString() }
  if (issues) envelope.issues = issues
  return res.status(detail.http_status).json(envelope)
}

export function notFound(_req: Request, res: Response) {
  const detail = reason('CLIENT_NOT_FOUND')
  const envelope: ErrorEnvelope = { corr_id: getCorrId(res), detail: detail.message, reason: detail, ts: new Date().toISOString() }
  return res.status(detail.http_status).json(envelope)
}
