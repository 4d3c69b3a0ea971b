/* Loads the classifier artifact at startup. Any problem reading or validating the
   file becomes a StartupFailure; the service must not start without a model. */

import fs from 'fs'
import { z } from 'zod'
import { StartupFailure } from '@flight-delay/reasons'
import { FEATURE_NAMES } from '../features/buildFeatures'
import { Classifier, LogisticRegressionClassifier } from './Classifier'

export const ModelArtifactSchema = z.object({
  kind: z.literal('logistic_regression'),
  version: z.string().min(1),
  feature_names: z.array(z.string()),
  coefficients: z.array(z.number().finite()),
  intercept: z.number().finite(),
  classes: z.tuple([z.literal(0), z.literal(1)]),
})

export type ModelArtifact = z.infer<typeof ModelArtifactSchema>

export function parseModelArtifact(raw: unknown): ModelArtifact {
  const artifact = ModelArtifactSchema.parse(raw)
  const expected = FEATURE_NAMES.join(',')
  if (artifact.feature_names.join(',') !== expected) {
    throw new Error(`artifact features [${artifact.feature_names.join(', ')}] do not match [${FEATURE_NAMES.join(', ')}]`)
  }
  if (artifact.coefficients.length !== FEATURE_NAMES.length) {
    throw new Error(`artifact has ${artifact.coefficients.length} coefficients, expected ${FEATURE_NAMES.length}`)
  }
  return artifact
}

export function loadClassifier(modelPath: string): Classifier {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(modelPath, 'utf8'))
    const artifact = parseModelArtifact(raw)
    return new LogisticRegressionClassifier({
      version: artifact.version,
      coefficients: artifact.coefficients,
      intercept: artifact.intercept,
    })
  } catch (e) {
    throw new StartupFailure(e, { model_path: modelPath })
  }
}
