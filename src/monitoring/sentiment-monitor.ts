/**
 * Sentiment Drift Monitor - SentimentMonitor
 * Owns the observation window and alert history of one deployed model
 *
 * Key principles:
 * - Configuration validated once, frozen for the instance lifetime
 * - Window mutated only through logPrediction
 * - Readers work on frozen snapshots
 */

import { AlertManager } from '../alert-manager/manager.js'
import { resolveMonitorConfig } from '../core/config.js'
import type { MonitorConfig, MonitorConfigInput } from '../core/config.js'
import { ValidationError } from '../core/errors.js'
import type {
  Alert,
  DriftEvaluation,
  MonitorEvent,
  PredictionResult,
  RetrainDecision,
  RetrainState,
  SummaryReport,
} from '../core/types.js'
import { DriftDetector } from '../drift-detector/detector.js'
import { getDistanceMetric } from '../drift-detector/metrics.js'
import { ObservationWindow } from '../observation-window/window.js'
import { createPredictionRecord } from '../observation-window/record.js'
import { evaluateRetrain } from '../retrain-trigger/trigger.js'
import type { RetrainPolicy } from '../retrain-trigger/trigger.js'
import type { FileLogger } from '../runtime/file-logger.js'
import { buildSummaryReport } from '../summary-reporter/reporter.js'

// =============================================================================
// MONITOR TYPES
// =============================================================================

export interface SentimentMonitorOptions {
  /** Injectable clock function for testing */
  clock?: () => number
  logger?: FileLogger
}

// =============================================================================
// SENTIMENT MONITOR
// =============================================================================

export class SentimentMonitor {
  private readonly config: MonitorConfig
  private readonly window: ObservationWindow
  private readonly detector: DriftDetector
  private readonly alerts: AlertManager
  private readonly retrainPolicy: Readonly<RetrainPolicy>
  private readonly clock: () => number
  private readonly logger?: FileLogger
  private readonly startedAt: number
  private closed = false

  /**
   * @throws ValidationError when the configuration is invalid
   */
  constructor(config: MonitorConfigInput = {}, options: SentimentMonitorOptions = {}) {
    this.config = resolveMonitorConfig(config)
    this.clock = options.clock ?? (() => Date.now())
    if (options.logger) {
      this.logger = options.logger
    }

    this.window = new ObservationWindow({
      capacity: this.config.windowCapacity,
      maxAgeMs: this.config.maxAgeMs,
      scoreTolerance: this.config.scoreTolerance,
    })
    this.detector = new DriftDetector({
      minSampleCount: this.config.minSampleCount,
      warnThreshold: this.config.driftWarnThreshold,
      criticalThreshold: this.config.driftCriticalThreshold,
      metric: getDistanceMetric(this.config.metric),
    })
    this.alerts = new AlertManager({
      confidenceDropThreshold: this.config.confidenceDropThreshold,
      cooldownMs: this.config.alertCooldownMs,
    })
    this.retrainPolicy = Object.freeze({
      criticalAlertThreshold: this.config.criticalAlertThreshold,
      evaluationPeriodMs: this.config.retrainEvaluationPeriodMs,
      maxStalenessMs: this.config.maxStalenessMs,
    })
    this.startedAt = this.clock()
  }

  /**
   * Ingest one classifier result and return the alerts it raised
   *
   * @throws ValidationError on a malformed result; the window is unchanged
   */
  logPrediction(text: string, result: unknown): Alert[] {
    this.assertOpen()

    const now = this.clock()
    const parsed = this.parseResult(result)
    const record = createPredictionRecord(text, parsed, now)
    this.window.append(record)
    this.emit({ type: 'PREDICTION', record })

    const evaluation = this.detector.evaluate(this.window.snapshot(), this.config.baseline)
    const raised = [...this.alerts.evaluate(evaluation, now)]

    for (const alert of raised) {
      this.emit({ type: 'ALERT', alert })
    }

    return raised
  }

  /**
   * Drift of the current window against the baseline
   */
  evaluateDrift(): DriftEvaluation {
    return this.detector.evaluate(this.window.snapshot(), this.config.baseline)
  }

  getSummaryReport(): SummaryReport {
    return buildSummaryReport(
      this.window.snapshot(),
      this.alerts.getHistory(),
      {
        minSampleCount: this.config.minSampleCount,
        recentAlertCount: this.config.recentAlertCount,
      },
      this.clock(),
    )
  }

  /**
   * Retrain decision for an external scheduler
   * Without lastRetrainAt, staleness is measured from monitor start
   */
  shouldRetrain(now: number = this.clock(), state: RetrainState = {}): RetrainDecision {
    return evaluateRetrain({
      history: this.alerts.getHistory(),
      now,
      lastRetrainAt: state.lastRetrainAt ?? this.startedAt,
      policy: this.retrainPolicy,
    })
  }

  getAlertHistory(): readonly Alert[] {
    return this.alerts.getHistory()
  }

  getWindowSize(): number {
    return this.window.size
  }

  getConfig(): MonitorConfig {
    return this.config
  }

  getStartedAt(): number {
    return this.startedAt
  }

  isClosed(): boolean {
    return this.closed
  }

  /**
   * Flush the event log and release the window
   */
  close(): void {
    if (this.closed) return
    this.closed = true
    this.window.clear()
    this.logger?.flush()
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('SentimentMonitor: monitor is closed')
    }
  }

  private parseResult(result: unknown): PredictionResult {
    try {
      return this.window.parseResult(result)
    } catch (error) {
      if (error instanceof ValidationError) {
        this.emit({ type: 'ERROR', component: 'SentimentMonitor', error: error.message })
      }
      throw error
    }
  }

  private emit(event: MonitorEvent): void {
    this.logger?.log(event)
  }
}
