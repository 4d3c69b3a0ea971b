/* This file's purpose is to validate the body of a prediction request.
   A prediction request describes one flight: its id, distance in km and whether bad weather is expected. */

import { z } from 'zod'
import { FlightRecord, ValidationIssue } from '@flight-delay/dto'
import { ValidationError } from '@flight-delay/reasons'

export const FlightRecordSchema = z.object({
  flight_id: z.string().min(1),
  distance: z.number().int().min(100).max(5000),
  bad_weather: z.boolean(),
})

export const ErrorSimulationSchema = z.object({
  raise_error: z.boolean(),
})

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; issues: ValidationIssue[] }

export function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(i => ({ path: i.path.join('.'), message: i.message }))
}

export function validateFlightRecord(body: unknown): ValidationResult<Readonly<FlightRecord>> {
  const res = FlightRecordSchema.safeParse(body)
  if (!res.success) return { valid: false, issues: toIssues(res.error) }
  return { valid: true, value: Object.freeze(res.data) }
}

/** Throwing variant for request paths where one invalid record fails the request. */
export function parseFlightRecord(body: unknown): Readonly<FlightRecord> {
  const res = validateFlightRecord(body)
  if (!res.valid) throw new ValidationError(res.issues)
  return res.value
}

export function parseFlightBatch(body: unknown): unknown[] {
  if (!Array.isArray(body)) {
    throw new ValidationError([{ path: '', message: 'Expected an array of flights' }])
  }
  return body
}

export function parseErrorSimulation(body: unknown): z.infer<typeof ErrorSimulationSchema> {
  const res = ErrorSimulationSchema.safeParse(body)
  if (!res.success) throw new ValidationError(toIssues(res.error))
  return res.data
}
