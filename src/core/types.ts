/**
 * Sentiment Drift Monitor - Core Types
 *
 * Observation, drift, alert and retrain types shared by every engine
 */

// =============================================================================
// CLASSIFIER OUTPUT TYPES
// =============================================================================

export const LABELS = ['Negative', 'Neutral', 'Positive'] as const

export type Label = (typeof LABELS)[number]

export type LabelDistribution = Readonly<Record<Label, number>>

/**
 * Raw classifier output as handed to the monitor
 * scores must sum to 1 within the configured tolerance
 */
export interface PredictionResult {
  readonly sentiment: Label
  readonly confidence: number // [0.0 - 1.0]
  readonly scores: LabelDistribution
}

// =============================================================================
// OBSERVATION TYPES
// =============================================================================

/**
 * Atomic observation unit, frozen on creation
 */
export interface PredictionRecord {
  readonly timestamp: number
  readonly text: string // Truncated source text
  readonly fingerprint: string // sha256 of the full source text
  readonly label: Label
  readonly confidence: number
  readonly scores: LabelDistribution
}

/**
 * Reference distribution the deployed model is expected to produce
 * Fixed at monitor construction
 */
export interface BaselineDistribution {
  readonly distribution: LabelDistribution
  readonly meanConfidence: number
}

// =============================================================================
// DRIFT TYPES
// =============================================================================

export type DriftLevel = 'NONE' | 'WARNING' | 'CRITICAL'

/**
 * Not enough samples to judge drift
 * Distinct from a zero distance so "no evidence" never reads as "no drift"
 */
export interface InsufficientDataEvaluation {
  readonly status: 'INSUFFICIENT_DATA'
  readonly sampleCount: number
  readonly requiredSamples: number
}

export interface DriftMetric {
  readonly status: 'OK'
  readonly sampleCount: number
  readonly distribution: LabelDistribution
  readonly meanConfidence: number
  readonly distance: number // >= 0, zero iff distribution equals baseline
  readonly confidenceDelta: number // baseline mean - current mean
  readonly level: DriftLevel
  readonly metric: string
}

export type DriftEvaluation = InsufficientDataEvaluation | DriftMetric

// =============================================================================
// ALERT TYPES
// =============================================================================

export type AlertSeverity = 'INFO' | 'WARNING' | 'CRITICAL'

export type AlertKind = 'DISTRIBUTION_DRIFT' | 'CONFIDENCE_DROP' | 'INSUFFICIENT_DATA'

export interface Alert {
  readonly id: number // Position in the alert history, starting at 1
  readonly severity: AlertSeverity
  readonly kind: AlertKind
  readonly timestamp: number
  readonly message: string
  readonly value: number
}

// =============================================================================
// REPORT TYPES
// =============================================================================

export type ConfidenceTrend = 'RISING' | 'FALLING' | 'NEUTRAL'

export type ReportStatus = 'NO_DATA' | 'INSUFFICIENT_DATA' | 'OK'

export interface SummaryReport {
  readonly timestamp: number
  readonly status: ReportStatus
  readonly sampleCount: number
  readonly distribution: LabelDistribution // Percentages [0 - 100]
  readonly meanConfidence: number | null
  readonly minConfidence: number | null
  readonly maxConfidence: number | null
  readonly confidenceTrend: ConfidenceTrend
  readonly confidenceSlope: number
  readonly recentAlerts: readonly Alert[]
  readonly totalAlerts: number
}

// =============================================================================
// RETRAIN TYPES
// =============================================================================

/**
 * CRITICAL_ALERTS: too many critical alerts inside the evaluation period
 * STALENESS: periodic refresh floor reached
 * NONE: model within policy
 */
export type RetrainReason = 'CRITICAL_ALERTS' | 'STALENESS' | 'NONE'

export interface RetrainDecision {
  readonly shouldRetrain: boolean
  readonly reason: RetrainReason
  readonly message: string
  readonly timestamp: number
  readonly criticalAlertCount: number
  readonly elapsedSinceRetrainMs: number
}

/**
 * Scheduler-side bookkeeping handed back on every retrain check
 */
export interface RetrainState {
  readonly lastRetrainAt?: number | null
}

export type RetrainStatus = 'SKIPPED' | 'COMPLETED' | 'FAILED'

export interface RetrainRun {
  readonly status: RetrainStatus
  readonly decision: RetrainDecision
  readonly modelVersion: string | null
  readonly timestamp: number
  readonly error?: string
}

// =============================================================================
// SYSTEM EVENT TYPES (for telemetry)
// =============================================================================

export type MonitorEvent =
  | { readonly type: 'PREDICTION'; readonly record: PredictionRecord }
  | { readonly type: 'ALERT'; readonly alert: Alert }
  | { readonly type: 'RETRAIN'; readonly run: RetrainRun }
  | { readonly type: 'ERROR'; readonly component: string; readonly error: string }
