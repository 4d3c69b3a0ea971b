/* Batch scoring.

   Items failing schema validation are dropped: they are absent from `predictions`,
   do not count, and are only reported back when `diagnostics` is requested.

   A classifier failure on any valid item aborts the whole batch. Successes are
   recorded in one step after the last item scores, so an aborted batch leaves
   the counter exactly where it was. */

import { BatchResult, DroppedItem, PredictionResult } from '@flight-delay/dto'
import { InternalScoringError } from '@flight-delay/reasons'
import { buildFeatures } from '../features/buildFeatures'
import { validateFlightRecord } from '../validators/flightValidator'
import { PipelineDeps } from './context'

export interface BatchOptions {
  diagnostics?: boolean
}

export function predictBatch(items: readonly unknown[], deps: PipelineDeps, opts: BatchOptions = {}): BatchResult {
  const predictions: PredictionResult[] = []
  const dropped: DroppedItem[] = []

  items.forEach((item, index) => {
    const checked = validateFlightRecord(item)
    if (!checked.valid) {
      dropped.push({ index, issues: checked.issues })
      return
    }
    const record = checked.value
    try {
      const outcome = deps.scorer.score(buildFeatures(record))
      predictions.push({ flight_id: record.flight_id, delay_probability: outcome.probability, delayed: outcome.delayed })
    } catch (e) {
      throw new InternalScoringError(e, 'Batch prediction failed', { index, flight_id: record.flight_id })
    }
  })

  deps.metrics.recordSuccess(predictions.length)

  const result: BatchResult = { predictions, count: predictions.length }
  if (opts.diagnostics) result.dropped = dropped
  return result
}

export default predictBatch
