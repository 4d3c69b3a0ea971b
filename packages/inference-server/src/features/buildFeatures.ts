import { FlightRecord } from '@flight-delay/dto'
import { Bit, flagToBit } from '@flight-delay/math'

/** Column order the classifier was fitted on. */
export const FEATURE_NAMES = ['distance', 'bad_weather'] as const

export type FeatureVector = readonly [distance: number, badWeather: Bit]

export function buildFeatures(record: FlightRecord): FeatureVector {
  return [record.distance, flagToBit(record.bad_weather)]
}

export default buildFeatures
