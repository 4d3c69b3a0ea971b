export enum ReasonCategory {
  CLIENT = "CLIENT",
  VALIDATION = "VALIDATION",
  DIAGNOSTIC = "DIAGNOSTIC",
  STARTUP = "STARTUP",
  INTERNAL = "INTERNAL",
}

export type ReasonCode =
  | "CLIENT_NOT_FOUND"
  | "CLIENT_PAYLOAD_TOO_LARGE"
  | "CLIENT_UNREADABLE_BODY"
  | "VALIDATION_SCHEMA_FAIL"
  | "SCORING_FAILED"
  | "INTERNAL_SCORING_ERROR"
  | "DIAGNOSTIC_SIMULATED"
  | "STARTUP_MODEL_UNAVAILABLE"
  | "INTERNAL_ERROR";

export type ReasonContext = Record<string, string | number | boolean>;

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  http_status: number;
  message: string;
  context?: ReasonContext;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface ErrorEnvelope {
  corr_id: string;
  detail: string;
  reason: ReasonDetail;
  issues?: ValidationIssue[];
  ts: string; // RFC3339 UTC
}
