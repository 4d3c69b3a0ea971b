/**
 * probability.ts
 * Helpers for two-class probability distributions; pure functions only (no I/O, no side-effects).
 */

export type BinaryDistribution = readonly [negative: number, positive: number]

const TOLERANCE = 1e-6

export function isProbability(p: unknown): p is number {
  return typeof p === 'number' && Number.isFinite(p) && p >= 0 && p <= 1
}

/**
 * positiveClassProbability
 * Returns the index-1 component of a two-class distribution. Throws a RangeError when the
 * input is not a distribution over exactly two classes.
 */
export function positiveClassProbability(dist: readonly number[]): number {
  if (dist.length !== 2) {
    throw new RangeError(`expected a distribution over 2 classes, got ${dist.length}`)
  }
  const [negative, positive] = dist
  if (!isProbability(negative) || !isProbability(positive)) {
    throw new RangeError(`class probabilities must be finite values in [0, 1], got [${negative}, ${positive}]`)
  }
  if (Math.abs(negative + positive - 1) > TOLERANCE) {
    throw new RangeError(`class probabilities must sum to 1, got ${negative + positive}`)
  }
  return positive
}
