/**
 * Sentiment Drift Monitor - Alert Manager
 * Severity-tiered, cool-down de-duplicated alerts
 *
 * History is append-only: alerts are never mutated or removed
 */

import { ALERT_CONFIG, DRIFT_CONFIG } from '../core/contracts.js'
import type { Alert, AlertKind, AlertSeverity, DriftEvaluation } from '../core/types.js'

// =============================================================================
// ALERT MANAGER
// =============================================================================

export interface AlertManagerConfig {
  confidenceDropThreshold?: number
  /** Same (kind, severity) alerts within this interval are suppressed */
  cooldownMs?: number
}

type AlertKey = `${AlertKind}:${AlertSeverity}`

interface AlertCandidate {
  kind: AlertKind
  severity: AlertSeverity
  message: string
  value: number
}

export class AlertManager {
  private history: Alert[] = []
  private lastEmitted = new Map<AlertKey, number>()
  private readonly confidenceDropThreshold: number
  private readonly cooldownMs: number

  constructor(config: AlertManagerConfig = {}) {
    this.confidenceDropThreshold =
      config.confidenceDropThreshold ?? DRIFT_CONFIG.CONFIDENCE_DROP_THRESHOLD
    this.cooldownMs = config.cooldownMs ?? ALERT_CONFIG.COOLDOWN_MS
  }

  /**
   * Produce the new alerts for one drift evaluation
   *
   * Lazy and single-pass: each alert is appended to the history as it is
   * yielded, so callers must drain the iterator to record every alert
   */
  *evaluate(evaluation: DriftEvaluation, now: number): IterableIterator<Alert> {
    for (const candidate of this.buildCandidates(evaluation)) {
      const key: AlertKey = `${candidate.kind}:${candidate.severity}`
      const last = this.lastEmitted.get(key)

      if (last !== undefined && now - last < this.cooldownMs) {
        continue
      }

      const alert: Alert = Object.freeze({
        id: this.history.length + 1,
        timestamp: now,
        ...candidate,
      })

      this.history.push(alert)
      this.lastEmitted.set(key, now)
      yield alert
    }
  }

  /**
   * Full alert history, oldest first
   */
  getHistory(): readonly Alert[] {
    return Object.freeze([...this.history])
  }

  /**
   * Most recent alerts, oldest first
   */
  getRecent(count: number): readonly Alert[] {
    if (count <= 0) return []
    return this.history.slice(-count)
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  private buildCandidates(evaluation: DriftEvaluation): AlertCandidate[] {
    if (evaluation.status === 'INSUFFICIENT_DATA') {
      return [
        {
          kind: 'INSUFFICIENT_DATA',
          severity: 'INFO',
          message: `Insufficient data for drift evaluation: ${evaluation.sampleCount}/${evaluation.requiredSamples} samples`,
          value: evaluation.sampleCount,
        },
      ]
    }

    const candidates: AlertCandidate[] = []

    if (evaluation.level !== 'NONE') {
      candidates.push({
        kind: 'DISTRIBUTION_DRIFT',
        severity: evaluation.level,
        message: `Label distribution drift detected (${evaluation.metric}=${evaluation.distance.toFixed(4)})`,
        value: evaluation.distance,
      })
    }

    if (evaluation.confidenceDelta >= this.confidenceDropThreshold) {
      const severity: AlertSeverity =
        evaluation.confidenceDelta >= this.confidenceDropThreshold * 2 ? 'CRITICAL' : 'WARNING'
      candidates.push({
        kind: 'CONFIDENCE_DROP',
        severity,
        message: `Mean confidence ${formatPercent(evaluation.meanConfidence)} is ${formatPercent(evaluation.confidenceDelta)} below baseline`,
        value: evaluation.confidenceDelta,
      })
    }

    return candidates
  }
}

function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`
}
