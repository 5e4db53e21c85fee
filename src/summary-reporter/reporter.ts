/**
 * Sentiment Drift Monitor - Summary Reporter
 * Point-in-time report over the window and alert history
 *
 * Pure functions: no state, no side effects
 */

import { ALERT_CONFIG, DRIFT_CONFIG, REPORT_CONFIG } from '../core/contracts.js'
import { LABELS } from '../core/types.js'
import type {
  Alert,
  ConfidenceTrend,
  Label,
  LabelDistribution,
  PredictionRecord,
  ReportStatus,
  SummaryReport,
} from '../core/types.js'
import { computeLabelDistribution, computeMeanConfidence } from '../drift-detector/detector.js'

export interface SummaryReportOptions {
  /** Below this sample count the trend is NEUTRAL */
  minSampleCount?: number
  recentAlertCount?: number
}

// =============================================================================
// REPORT
// =============================================================================

export function buildSummaryReport(
  snapshot: readonly PredictionRecord[],
  history: readonly Alert[],
  options: SummaryReportOptions,
  now: number,
): SummaryReport {
  const minSampleCount = options.minSampleCount ?? DRIFT_CONFIG.MIN_SAMPLE_COUNT
  const recentAlertCount = options.recentAlertCount ?? ALERT_CONFIG.RECENT_ALERT_COUNT
  const sampleCount = snapshot.length
  const confidences = snapshot.map((r) => r.confidence)

  const status: ReportStatus =
    sampleCount === 0 ? 'NO_DATA' : sampleCount < minSampleCount ? 'INSUFFICIENT_DATA' : 'OK'

  const slope = sampleCount >= minSampleCount ? linearSlope(confidences) : 0

  return {
    timestamp: now,
    status,
    sampleCount,
    distribution: toPercentages(computeLabelDistribution(snapshot)),
    meanConfidence: sampleCount > 0 ? computeMeanConfidence(snapshot) : null,
    minConfidence: sampleCount > 0 ? Math.min(...confidences) : null,
    maxConfidence: sampleCount > 0 ? Math.max(...confidences) : null,
    confidenceTrend: classifyTrend(slope),
    confidenceSlope: slope,
    recentAlerts: recentAlertCount > 0 ? history.slice(-recentAlertCount) : [],
    totalAlerts: history.length,
  }
}

// =============================================================================
// TREND
// =============================================================================

/**
 * Least-squares slope of values against their index (0 for fewer than 2 values)
 */
export function linearSlope(values: readonly number[]): number {
  const n = values.length
  if (n < 2) return 0

  const meanX = (n - 1) / 2
  const meanY = values.reduce((a, b) => a + b, 0) / n

  let numerator = 0
  let denominator = 0
  values.forEach((y, x) => {
    numerator += (x - meanX) * (y - meanY)
    denominator += (x - meanX) * (x - meanX)
  })

  return numerator / denominator
}

export function classifyTrend(slope: number): ConfidenceTrend {
  if (Math.abs(slope) < REPORT_CONFIG.TREND_FLAT_EPSILON) return 'NEUTRAL'
  return slope > 0 ? 'RISING' : 'FALLING'
}

function toPercentages(distribution: LabelDistribution): LabelDistribution {
  const percentages: Record<Label, number> = { Negative: 0, Neutral: 0, Positive: 0 }
  for (const label of LABELS) {
    percentages[label] = distribution[label] * 100
  }
  return percentages
}
