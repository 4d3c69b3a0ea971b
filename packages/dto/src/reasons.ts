import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, http_status, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // CLIENT
  CLIENT_NOT_FOUND: { code: 'CLIENT_NOT_FOUND', category: ReasonCategory.CLIENT, http_status: 404, message: 'Not found' },
  CLIENT_PAYLOAD_TOO_LARGE: { code: 'CLIENT_PAYLOAD_TOO_LARGE', category: ReasonCategory.CLIENT, http_status: 413, message: 'Request body exceeds the size limit' },
  CLIENT_UNREADABLE_BODY: { code: 'CLIENT_UNREADABLE_BODY', category: ReasonCategory.CLIENT, http_status: 400, message: 'Request body could not be read' },

  // VALIDATION
  VALIDATION_SCHEMA_FAIL: { code: 'VALIDATION_SCHEMA_FAIL', category: ReasonCategory.VALIDATION, http_status: 422, message: 'Schema validation failed' },

  // DIAGNOSTIC
  DIAGNOSTIC_SIMULATED: { code: 'DIAGNOSTIC_SIMULATED', category: ReasonCategory.DIAGNOSTIC, http_status: 418, message: 'Este es un error simulado para enseñar manejo' },

  // STARTUP
  STARTUP_MODEL_UNAVAILABLE: { code: 'STARTUP_MODEL_UNAVAILABLE', category: ReasonCategory.STARTUP, http_status: 500, message: 'Classifier artifact could not be loaded' },

  // INTERNAL
  SCORING_FAILED: { code: 'SCORING_FAILED', category: ReasonCategory.INTERNAL, http_status: 500, message: 'Classifier invocation failed' },
  INTERNAL_SCORING_ERROR: { code: 'INTERNAL_SCORING_ERROR', category: ReasonCategory.INTERNAL, http_status: 500, message: 'Prediction failed' },
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: ReasonCategory.INTERNAL, http_status: 500, message: 'Internal server error' },
}

