import { DECISION_THRESHOLD, exceedsThreshold, positiveClassProbability } from '@flight-delay/math'
import { ScoringError } from '@flight-delay/reasons'
import { FeatureVector } from '../features/buildFeatures'
import { Classifier } from './Classifier'

export interface ScoreOutcome {
  probability: number
  delayed: boolean
}

/**
 * Invokes the shared classifier and applies the fixed decision threshold.
 * Every classifier failure, including an unusable distribution, surfaces as a ScoringError.
 */
export class Scorer {
  constructor(private readonly classifier: Classifier) {}

  score(features: FeatureVector): ScoreOutcome {
    let probability: number
    try {
      probability = positiveClassProbability(this.classifier.predictProba(features))
    } catch (e) {
      throw new ScoringError(e)
    }
    return { probability, delayed: exceedsThreshold(probability, DECISION_THRESHOLD) }
  }
}

export default Scorer
