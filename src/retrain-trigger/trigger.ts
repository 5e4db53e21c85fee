/**
 * Sentiment Drift Monitor - Retrain Trigger
 * Deterministic retrain decision for an external scheduler
 *
 * Holds no state: identical inputs always give identical decisions
 */

import { RETRAIN_CONFIG } from '../core/contracts.js'
import type { Alert, RetrainDecision } from '../core/types.js'

// =============================================================================
// POLICY
// =============================================================================

export interface RetrainPolicy {
  /** Retrain when critical alerts in the period EXCEED this count */
  criticalAlertThreshold: number
  evaluationPeriodMs: number
  maxStalenessMs: number
}

export const DEFAULT_RETRAIN_POLICY: Readonly<RetrainPolicy> = Object.freeze({
  criticalAlertThreshold: RETRAIN_CONFIG.CRITICAL_ALERT_THRESHOLD,
  evaluationPeriodMs: RETRAIN_CONFIG.EVALUATION_PERIOD_MS,
  maxStalenessMs: RETRAIN_CONFIG.MAX_STALENESS_MS,
})

export interface RetrainInput {
  history: readonly Alert[]
  now: number
  /** Last completed retrain (or monitor start when none has happened) */
  lastRetrainAt: number
  policy?: Readonly<RetrainPolicy>
}

// =============================================================================
// DECISION
// =============================================================================

/**
 * Critical alerts are counted in (max(now - period, lastRetrainAt), now]
 * so alerts that already caused a retrain are not counted twice
 */
export function evaluateRetrain(input: RetrainInput): RetrainDecision {
  const policy = input.policy ?? DEFAULT_RETRAIN_POLICY
  const { history, now, lastRetrainAt } = input

  const periodStart = Math.max(now - policy.evaluationPeriodMs, lastRetrainAt)
  const criticalAlertCount = countCriticalAlerts(history, periodStart, now)
  const elapsedSinceRetrainMs = Math.max(0, now - lastRetrainAt)

  const base = { timestamp: now, criticalAlertCount, elapsedSinceRetrainMs }

  if (criticalAlertCount > policy.criticalAlertThreshold) {
    return {
      ...base,
      shouldRetrain: true,
      reason: 'CRITICAL_ALERTS',
      message: `${criticalAlertCount} critical alerts in evaluation period (threshold ${policy.criticalAlertThreshold})`,
    }
  }

  if (elapsedSinceRetrainMs > policy.maxStalenessMs) {
    return {
      ...base,
      shouldRetrain: true,
      reason: 'STALENESS',
      message: `Model not retrained for ${formatHours(elapsedSinceRetrainMs)} (limit ${formatHours(policy.maxStalenessMs)})`,
    }
  }

  return {
    ...base,
    shouldRetrain: false,
    reason: 'NONE',
    message: 'Performance within policy',
  }
}

function countCriticalAlerts(history: readonly Alert[], after: number, until: number): number {
  return history.filter(
    (alert) => alert.severity === 'CRITICAL' && alert.timestamp > after && alert.timestamp <= until,
  ).length
}

function formatHours(ms: number): string {
  return `${(ms / 3_600_000).toFixed(1)}h`
}
