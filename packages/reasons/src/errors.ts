/**
 * Error taxonomy for the inference pipeline.
 * Every error wraps a ReasonDetail so the HTTP edge can render a deterministic
 * envelope without inspecting error classes one by one.
 */
import { ReasonContext, ReasonDetail, ValidationIssue } from '@flight-delay/dto'
import { reason } from './factory'

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  return String(cause)
}

export class ReasonedError extends Error {
  public readonly reason: ReasonDetail

  constructor(detail: ReasonDetail, options?: { cause?: unknown }) {
    super(detail.message, options)
    this.name = 'ReasonedError'
    this.reason = detail
  }

  get httpStatus(): number {
    return this.reason.http_status
  }
}

/** Malformed client input. Raised before any scoring happens. */
export class ValidationError extends ReasonedError {
  public readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[], message?: string) {
    const first = issues[0]
    const summary = message ?? (first ? `${first.path || '(body)'}: ${first.message}` : undefined)
    super(reason('VALIDATION_SCHEMA_FAIL', { message: summary, context: { issue_count: issues.length } }))
    this.name = 'ValidationError'
    this.issues = issues
  }
}

/** The classifier could not produce a usable distribution. */
export class ScoringError extends ReasonedError {
  constructor(cause: unknown) {
    super(reason('SCORING_FAILED', { message: `Classifier invocation failed: ${describeCause(cause)}` }), { cause })
    this.name = 'ScoringError'
  }
}

/**
 * Request-level failure surfaced to callers as a server-side error.
 * `prefix` distinguishes single ("Prediction failed") from batch requests.
 */
export class InternalScoringError extends ReasonedError {
  constructor(cause: unknown, prefix = 'Prediction failed', context?: ReasonContext) {
    const root = cause instanceof ScoringError && cause.cause !== undefined ? cause.cause : cause
    super(reason('INTERNAL_SCORING_ERROR', { message: `${prefix}: ${describeCause(root)}`, context }), { cause })
    this.name = 'InternalScoringError'
  }
}

/** Deliberate diagnostic failure, used only by the error simulator. */
export class SimulatedError extends ReasonedError {
  constructor() {
    super(reason('DIAGNOSTIC_SIMULATED'))
    this.name = 'SimulatedError'
  }
}

/** Classifier artifact missing or corrupt. Fatal; raised before the server listens. */
export class StartupFailure extends ReasonedError {
  constructor(cause: unknown, context?: ReasonContext) {
    super(reason('STARTUP_MODEL_UNAVAILABLE', { message: `Could not load classifier: ${describeCause(cause)}`, context }), { cause })
    this.name = 'StartupFailure'
  }
}
