/**
 * Sentiment Drift Monitor - Default Contracts
 *
 * These values are FROZEN - monitors copy them once at construction
 */

// =============================================================================
// OBSERVATION WINDOW
// =============================================================================

export const WINDOW_CONFIG = {
  /** Maximum number of records kept in the rolling window */
  CAPACITY: 100,

  /** Allowed deviation of the score vector sum from 1 */
  SCORE_TOLERANCE: 1e-3,

  /** Source text is truncated to this many characters before storage */
  TEXT_MAX_LENGTH: 200,
} as const

// =============================================================================
// DRIFT DETECTION
// =============================================================================

export const DRIFT_CONFIG = {
  /** Below this sample count drift evaluation reports INSUFFICIENT_DATA */
  MIN_SAMPLE_COUNT: 30,

  /** Distance at or above this raises a WARNING (PSI convention: 0.1) */
  WARN_THRESHOLD: 0.1,

  /** Distance at or above this raises a CRITICAL (PSI convention: 0.25) */
  CRITICAL_THRESHOLD: 0.25,

  /** Drop of mean confidence below baseline that raises CONFIDENCE_DROP */
  CONFIDENCE_DROP_THRESHOLD: 0.1,

  /** Share substituted for an unobserved label so log terms stay finite */
  ZERO_SHARE_EPSILON: 1e-6,

  /** Smallest baseline share accepted for any label */
  MIN_BASELINE_SHARE: 1e-3,
} as const

/** Reference distribution calibrated on the validation set */
export const DEFAULT_BASELINE = {
  distribution: {
    Negative: 0.33,
    Neutral: 0.34,
    Positive: 0.33,
  },
  meanConfidence: 0.75,
} as const

// =============================================================================
// ALERTING
// =============================================================================

export const ALERT_CONFIG = {
  /** Minimum gap between two alerts with the same kind and severity */
  COOLDOWN_MS: 15 * 60 * 1000, // 15 minutes

  /** Alerts listed in the summary report */
  RECENT_ALERT_COUNT: 10,
} as const

// =============================================================================
// RETRAIN POLICY
// =============================================================================

export const RETRAIN_CONFIG = {
  /** Retrain once critical alerts in the evaluation period exceed this */
  CRITICAL_ALERT_THRESHOLD: 3,

  /** Rolling period over which critical alerts are counted */
  EVALUATION_PERIOD_MS: 24 * 60 * 60 * 1000, // 1 day

  /** Periodic refresh floor regardless of alerts */
  MAX_STALENESS_MS: 7 * 24 * 60 * 60 * 1000, // 1 week
} as const

// =============================================================================
// REPORTING
// =============================================================================

export const REPORT_CONFIG = {
  /** Slopes smaller than this (confidence per sample) read as flat */
  TREND_FLAT_EPSILON: 1e-4,
} as const

// =============================================================================
// TYPE UTILITIES
// =============================================================================

/** Deep freeze helper for config objects */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj)
  Object.getOwnPropertyNames(obj).forEach((prop) => {
    const value: unknown = Reflect.get(obj, prop)
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  })
  return obj
}
