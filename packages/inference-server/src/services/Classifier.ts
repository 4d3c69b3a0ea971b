/* Classifier capability consumed by the Scorer, plus the logistic-regression
   implementation backing the bundled model artifact. */

import { BinaryDistribution, linearPredictor, logisticScore } from '@flight-delay/math'

export interface Classifier {
  readonly version: string
  /** Probability of each class, negative first. */
  predictProba(features: readonly number[]): BinaryDistribution
}

export interface LogisticRegressionParams {
  version: string
  coefficients: number[]
  intercept: number
}

export class LogisticRegressionClassifier implements Classifier {
  public readonly version: string
  private readonly coefficients: readonly number[]
  private readonly intercept: number

  constructor(params: LogisticRegressionParams) {
    this.version = params.version
    this.coefficients = Object.freeze([...params.coefficients])
    this.intercept = params.intercept
  }

  predictProba(features: readonly number[]): BinaryDistribution {
    if (!features.every(Number.isFinite)) {
      throw new TypeError(`feature vector contains non-finite values: [${features.join(', ')}]`)
    }
    const positive = logisticScore(linearPredictor(this.coefficients, features, this.intercept))
    return [1 - positive, positive]
  }
}

export default LogisticRegressionClassifier
