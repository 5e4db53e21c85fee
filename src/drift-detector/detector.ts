/**
 * Sentiment Drift Monitor - Drift Detector
 * Label distribution and confidence drift against a fixed baseline
 *
 * Stateless: every evaluation starts from the snapshot it is given
 */

import { DRIFT_CONFIG } from '../core/contracts.js'
import { ValidationError } from '../core/errors.js'
import { LABELS } from '../core/types.js'
import type {
  BaselineDistribution,
  DriftEvaluation,
  DriftLevel,
  Label,
  LabelDistribution,
  PredictionRecord,
} from '../core/types.js'
import { populationStabilityIndex } from './metrics.js'
import type { DistanceMetric } from './metrics.js'

// =============================================================================
// DRIFT DETECTOR
// =============================================================================

export interface DriftDetectorConfig {
  minSampleCount?: number
  warnThreshold?: number
  criticalThreshold?: number
  /** Swappable distance; defaults to the population stability index */
  metric?: DistanceMetric
}

export class DriftDetector {
  private readonly minSampleCount: number
  private readonly warnThreshold: number
  private readonly criticalThreshold: number
  private readonly metric: DistanceMetric

  constructor(config: DriftDetectorConfig = {}) {
    this.minSampleCount = config.minSampleCount ?? DRIFT_CONFIG.MIN_SAMPLE_COUNT
    this.warnThreshold = config.warnThreshold ?? DRIFT_CONFIG.WARN_THRESHOLD
    this.criticalThreshold = config.criticalThreshold ?? DRIFT_CONFIG.CRITICAL_THRESHOLD
    this.metric = config.metric ?? populationStabilityIndex

    if (this.criticalThreshold <= this.warnThreshold) {
      throw new ValidationError('Invalid drift thresholds', [
        `criticalThreshold (${this.criticalThreshold}) must be greater than warnThreshold (${this.warnThreshold})`,
      ])
    }
  }

  /**
   * Evaluate drift of a window snapshot against the baseline
   * Returns INSUFFICIENT_DATA below the minimum sample count
   */
  evaluate(snapshot: readonly PredictionRecord[], baseline: BaselineDistribution): DriftEvaluation {
    const sampleCount = snapshot.length

    if (sampleCount < this.minSampleCount) {
      return {
        status: 'INSUFFICIENT_DATA',
        sampleCount,
        requiredSamples: this.minSampleCount,
      }
    }

    const distribution = computeLabelDistribution(snapshot)
    const meanConfidence = computeMeanConfidence(snapshot)
    const distance = this.metric.measure(distribution, baseline.distribution)

    return {
      status: 'OK',
      sampleCount,
      distribution,
      meanConfidence,
      distance,
      confidenceDelta: baseline.meanConfidence - meanConfidence,
      level: this.classify(distance),
      metric: this.metric.name,
    }
  }

  getMinSampleCount(): number {
    return this.minSampleCount
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  private classify(distance: number): DriftLevel {
    if (distance >= this.criticalThreshold) return 'CRITICAL'
    if (distance >= this.warnThreshold) return 'WARNING'
    return 'NONE'
  }
}

// =============================================================================
// STATISTICS
// =============================================================================

/**
 * Share of each label in the snapshot (all zero when empty)
 */
export function computeLabelDistribution(records: readonly PredictionRecord[]): LabelDistribution {
  const counts: Record<Label, number> = { Negative: 0, Neutral: 0, Positive: 0 }
  for (const record of records) {
    counts[record.label]++
  }

  const total = records.length
  if (total === 0) return counts

  for (const label of LABELS) {
    counts[label] = counts[label] / total
  }
  return counts
}

export function computeMeanConfidence(records: readonly PredictionRecord[]): number {
  if (records.length === 0) return 0
  return records.reduce((sum, r) => sum + r.confidence, 0) / records.length
}
