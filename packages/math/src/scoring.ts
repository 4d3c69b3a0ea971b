/**
 * scoring.ts
 * Primitives for turning a linear model into a decision; pure functions only (no I/O, no side-effects).
 */

/** Cutoff above which a positive-class probability counts as a positive decision. */
export const DECISION_THRESHOLD = 0.5

/**
 * logisticScore
 * Maps a linear predictor into (0,1) with the standard logistic curve.
 */
export function logisticScore(z: number): number {
  return 1 / (1 + Math.exp(-z))
}

/**
 * linearPredictor
 * intercept + sum(w_i * x_i). Lengths must agree; callers validate beforehand.
 */
export function linearPredictor(weights: readonly number[], features: readonly number[], intercept = 0): number {
  if (weights.length !== features.length) {
    throw new RangeError(`feature vector has ${features.length} entries, model expects ${weights.length}`)
  }
  let z = intercept
  for (let i = 0; i < weights.length; i++) z += weights[i] * features[i]
  return z
}

/**
 * exceedsThreshold
 * Strict comparison: a probability exactly at the threshold is not a positive decision.
 */
export function exceedsThreshold(probability: number, threshold = DECISION_THRESHOLD): boolean {
  return probability > threshold
}
