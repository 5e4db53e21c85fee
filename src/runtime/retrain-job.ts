/**
 * Sentiment Drift Monitor - Retrain Job
 * Scheduler-side bookkeeping around the retrain decision
 *
 * The monitor never remembers retrains; this job owns lastRetrainAt and
 * hands it back on every check
 */

import type { MonitorEvent, RetrainDecision, RetrainRun } from '../core/types.js'
import type { SentimentMonitor } from '../monitoring/sentiment-monitor.js'
import type { FileLogger } from './file-logger.js'
import { describeError } from './pipeline.js'

// =============================================================================
// RETRAINER INTERFACE
// =============================================================================

export interface RetrainOutcome {
  modelVersion: string
}

export interface Retrainer {
  retrain(decision: RetrainDecision): Promise<RetrainOutcome>
}

/**
 * Stand-in that reports a new model version without training anything
 * Default for development and testing
 */
export class SimulatedRetrainer implements Retrainer {
  private readonly requests: RetrainDecision[] = []

  async retrain(decision: RetrainDecision): Promise<RetrainOutcome> {
    this.requests.push(decision)
    return { modelVersion: modelVersionAt(decision.timestamp) }
  }

  getRequests(): readonly RetrainDecision[] {
    return this.requests
  }
}

/**
 * v<YYYYMMDD>_<HHMMSS> in UTC
 */
export function modelVersionAt(timestamp: number): string {
  const iso = new Date(timestamp).toISOString()
  const date = iso.slice(0, 10).replaceAll('-', '')
  const time = iso.slice(11, 19).replaceAll(':', '')
  return `v${date}_${time}`
}

// =============================================================================
// RETRAIN JOB
// =============================================================================

export interface RetrainJobConfig {
  monitor: SentimentMonitor
  retrainer?: Retrainer
  logger?: FileLogger
  /** Injectable clock function for testing */
  clock?: () => number
  /** Restored from the scheduler's own store; null = never retrained */
  lastRetrainAt?: number | null
}

export class RetrainJob {
  private readonly monitor: SentimentMonitor
  private readonly retrainer: Retrainer
  private readonly logger?: FileLogger
  private readonly clock: () => number
  private lastRetrainAt: number | null
  private history: RetrainRun[] = []

  constructor(config: RetrainJobConfig) {
    this.monitor = config.monitor
    this.retrainer = config.retrainer ?? new SimulatedRetrainer()
    this.clock = config.clock ?? (() => Date.now())
    this.lastRetrainAt = config.lastRetrainAt ?? null
    if (config.logger) {
      this.logger = config.logger
    }
  }

  /**
   * Ask the monitor, retrain when told to, and record the run
   * A failed retrain leaves lastRetrainAt unchanged
   */
  async checkAndRetrain(now: number = this.clock()): Promise<RetrainRun> {
    const decision = this.monitor.shouldRetrain(now, { lastRetrainAt: this.lastRetrainAt })

    if (!decision.shouldRetrain) {
      return this.record({ status: 'SKIPPED', decision, modelVersion: null, timestamp: now })
    }

    try {
      const outcome = await this.retrainer.retrain(decision)
      this.lastRetrainAt = now
      return this.record({
        status: 'COMPLETED',
        decision,
        modelVersion: outcome.modelVersion,
        timestamp: now,
      })
    } catch (error) {
      const message = describeError(error)
      this.pushEvent({ type: 'ERROR', component: 'Retrainer', error: message })
      return this.record({
        status: 'FAILED',
        decision,
        modelVersion: null,
        timestamp: now,
        error: message,
      })
    }
  }

  getLastRetrainAt(): number | null {
    return this.lastRetrainAt
  }

  /**
   * Every run that attempted a retrain, oldest first
   */
  getHistory(): readonly RetrainRun[] {
    return this.history
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  private record(run: RetrainRun): RetrainRun {
    if (run.status !== 'SKIPPED') {
      this.history.push(run)
    }
    this.pushEvent({ type: 'RETRAIN', run })
    return run
  }

  private pushEvent(event: MonitorEvent): void {
    this.logger?.log(event)
  }
}
