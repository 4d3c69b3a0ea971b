import { MetricsTracker } from '../services/MetricsTracker'
import { Scorer } from '../services/Scorer'

export interface PipelineDeps {
  scorer: Scorer
  metrics: MetricsTracker
}
