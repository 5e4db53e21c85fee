/**
 * Sentiment Drift Monitor - Distance metrics
 *
 * Both metrics are non-negative and zero iff the two distributions match
 */

import { DRIFT_CONFIG } from '../core/contracts.js'
import { LABELS } from '../core/types.js'
import type { LabelDistribution } from '../core/types.js'

export interface DistanceMetric {
  readonly name: string
  measure(current: LabelDistribution, baseline: LabelDistribution): number
}

export type DistanceMetricName = 'psi' | 'chi-square'

/**
 * Population Stability Index: Σ (a - e) · ln(a / e)
 * An unobserved label counts as ZERO_SHARE_EPSILON instead of 0
 */
export const populationStabilityIndex: DistanceMetric = {
  name: 'psi',
  measure(current, baseline) {
    let psi = 0
    for (const label of LABELS) {
      const actual = current[label] > 0 ? current[label] : DRIFT_CONFIG.ZERO_SHARE_EPSILON
      const expected = baseline[label]
      psi += (actual - expected) * Math.log(actual / expected)
    }
    return psi
  },
}

/**
 * Pearson chi-square over shares: Σ (a - e)² / e
 */
export const chiSquareDistance: DistanceMetric = {
  name: 'chi-square',
  measure(current, baseline) {
    let chi = 0
    for (const label of LABELS) {
      const diff = current[label] - baseline[label]
      chi += (diff * diff) / baseline[label]
    }
    return chi
  },
}

const METRICS: Readonly<Record<DistanceMetricName, DistanceMetric>> = {
  psi: populationStabilityIndex,
  'chi-square': chiSquareDistance,
}

export function getDistanceMetric(name: DistanceMetricName): DistanceMetric {
  return METRICS[name]
}
