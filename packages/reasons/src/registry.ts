/**
 * Reasons Registry
 * Centralizes all machine-parsable failure codes for the inference API.
 * Each entry is stable and consumed by clients to interpret failures deterministically.
 */
import { REASONS as DTO_REASONS, ReasonCode, ReasonDetail } from '@flight-delay/dto'

export const REASONS: Record<ReasonCode, ReasonDetail> = DTO_REASONS

export type { ReasonDetail }
