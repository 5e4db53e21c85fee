/**
 * Sentiment Drift Monitor - Configuration
 *
 * One validated, frozen structure per monitor instance
 */

import { z } from 'zod'
import {
  ALERT_CONFIG,
  DEFAULT_BASELINE,
  DRIFT_CONFIG,
  RETRAIN_CONFIG,
  WINDOW_CONFIG,
  deepFreeze,
} from './contracts.js'
import { ValidationError } from './errors.js'

// =============================================================================
// SCHEMA
// =============================================================================

const share = z.number().min(DRIFT_CONFIG.MIN_BASELINE_SHARE).max(1)
const positiveMs = z.number().int().positive()

const baselineSchema = z.object({
  distribution: z.object({
    Negative: share,
    Neutral: share,
    Positive: share,
  }),
  meanConfidence: z.number().min(0).max(1),
})

export const monitorConfigSchema = z
  .object({
    windowCapacity: z.number().int().positive().default(WINDOW_CONFIG.CAPACITY),
    maxAgeMs: positiveMs.nullable().default(null),
    scoreTolerance: z.number().positive().max(0.1).default(WINDOW_CONFIG.SCORE_TOLERANCE),
    minSampleCount: z.number().int().positive().default(DRIFT_CONFIG.MIN_SAMPLE_COUNT),
    baseline: baselineSchema.default(DEFAULT_BASELINE),
    metric: z.enum(['psi', 'chi-square']).default('psi'),
    driftWarnThreshold: z.number().positive().default(DRIFT_CONFIG.WARN_THRESHOLD),
    driftCriticalThreshold: z.number().positive().default(DRIFT_CONFIG.CRITICAL_THRESHOLD),
    confidenceDropThreshold: z
      .number()
      .positive()
      .max(1)
      .default(DRIFT_CONFIG.CONFIDENCE_DROP_THRESHOLD),
    alertCooldownMs: z.number().int().nonnegative().default(ALERT_CONFIG.COOLDOWN_MS),
    recentAlertCount: z.number().int().nonnegative().default(ALERT_CONFIG.RECENT_ALERT_COUNT),
    criticalAlertThreshold: z
      .number()
      .int()
      .nonnegative()
      .default(RETRAIN_CONFIG.CRITICAL_ALERT_THRESHOLD),
    retrainEvaluationPeriodMs: positiveMs.default(RETRAIN_CONFIG.EVALUATION_PERIOD_MS),
    maxStalenessMs: positiveMs.default(RETRAIN_CONFIG.MAX_STALENESS_MS),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.driftCriticalThreshold <= config.driftWarnThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['driftCriticalThreshold'],
        message: `must be greater than driftWarnThreshold (${config.driftWarnThreshold})`,
      })
    }

    if (config.minSampleCount > config.windowCapacity) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minSampleCount'],
        message: `must not exceed windowCapacity (${config.windowCapacity})`,
      })
    }

    const { Negative, Neutral, Positive } = config.baseline.distribution
    const total = Negative + Neutral + Positive
    if (Math.abs(total - 1) > WINDOW_CONFIG.SCORE_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['baseline', 'distribution'],
        message: `shares must sum to 1 (got ${total.toFixed(4)})`,
      })
    }
  })

export type MonitorConfigInput = z.input<typeof monitorConfigSchema>

export type MonitorConfig = Readonly<z.output<typeof monitorConfigSchema>>

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Merge overrides onto the defaults, validate, and freeze
 * @throws ValidationError on any invalid field or cross-field constraint
 */
export function resolveMonitorConfig(input: MonitorConfigInput = {}): MonitorConfig {
  const parsed = monitorConfigSchema.safeParse(input)

  if (!parsed.success) {
    throw ValidationError.fromZodIssues('Invalid monitor configuration', parsed.error.issues)
  }

  return deepFreeze(parsed.data)
}
