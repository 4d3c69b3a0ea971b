/* The MetricsTracker owns the process-wide usage counters served by GET /metrics.

   The prediction counter can only move forward through recordSuccess(); nothing
   outside this class can write it. Every increment is a single synchronous
   statement on the event loop, so concurrent requests never lose an update. */

import { performance } from 'perf_hooks'
import { MetricsSnapshot } from '@flight-delay/dto'

export type MonotonicClock = () => number

export class MetricsTracker {
  private static instance: MetricsTracker | undefined
  private totalPredictions = 0
  private readonly startedAt: number

  /** `clock` returns milliseconds from a monotonic source. */
  constructor(private readonly clock: MonotonicClock = () => performance.now()) {
    this.startedAt = clock()
  }

  static getInstance(): MetricsTracker {
    if (!MetricsTracker.instance) MetricsTracker.instance = new MetricsTracker()
    return MetricsTracker.instance
  }

  recordSuccess(count = 1): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`prediction count must be a non-negative integer, got ${count}`)
    }
    this.totalPredictions += count
  }

  snapshot(): MetricsSnapshot {
    const elapsedMs = this.clock() - this.startedAt
    return {
      total_predictions: this.totalPredictions,
      uptime_seconds: Math.max(0, Math.floor(elapsedMs / 1000))
    }
  }
}

export default MetricsTracker
