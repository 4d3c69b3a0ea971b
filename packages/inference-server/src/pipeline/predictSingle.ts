import { FlightRecord, PredictionResult } from '@flight-delay/dto'
import { InternalScoringError } from '@flight-delay/reasons'
import { buildFeatures } from '../features/buildFeatures'
import { ScoreOutcome } from '../services/Scorer'
import { PipelineDeps } from './context'

/**
 * Scores one validated flight. The counter moves only after a successful score;
 * any failure is rethrown as InternalScoringError with the counter untouched.
 */
export function predictSingle(record: FlightRecord, deps: PipelineDeps): PredictionResult {
  let outcome: ScoreOutcome
  try {
    outcome = deps.scorer.score(buildFeatures(record))
  } catch (e) {
    throw new InternalScoringError(e)
  }
  deps.metrics.recordSuccess()
  return {
    flight_id: record.flight_id,
    delay_probability: outcome.probability,
    delayed: outcome.delayed,
  }
}

export default predictSingle
