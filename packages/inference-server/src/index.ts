// Public surface of the inference server package. `main.ts` is the runnable entry point;
// everything here can be mounted in-process, which is how the tests use it.

export { createApp } from './http'
export type { AppDeps } from './http'
export { ENV, CONSTANTS, loadConfig } from './config'
export type { AppConfig } from './config'
export { buildFeatures, FEATURE_NAMES } from './features/buildFeatures'
export type { FeatureVector } from './features/buildFeatures'
export { LogisticRegressionClassifier } from './services/Classifier'
export type { Classifier } from './services/Classifier'
export { loadClassifier, parseModelArtifact } from './services/ModelLoader'
export { MetricsTracker } from './services/MetricsTracker'
export { Scorer } from './services/Scorer'
export { predictSingle } from './pipeline/predictSingle'
export { predictBatch } from './pipeline/predictBatch'
export { simulateError } from './diagnostics/simulateError'
