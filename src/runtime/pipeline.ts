/**
 * Sentiment Drift Monitor - Runtime Pipeline
 * Classifier call followed by monitor ingestion
 *
 * The await on the classifier happens before the monitor is touched, so
 * each ingestion runs as one synchronous step
 */

import type { SentimentClassifier } from '../classifier/classifier.js'
import { StaticClassifier } from '../classifier/classifier.js'
import type { Alert, MonitorEvent, PredictionResult } from '../core/types.js'
import type { SentimentMonitor } from '../monitoring/sentiment-monitor.js'
import type { FileLogger } from './file-logger.js'

// =============================================================================
// PIPELINE TYPES
// =============================================================================

export interface PipelineConfig {
  monitor: SentimentMonitor
  classifier?: SentimentClassifier
  logger?: FileLogger
}

export interface ProcessResult {
  text: string
  result: PredictionResult
  alerts: Alert[]
}

export interface PipelineFailure {
  text: string
  error: string
}

export interface PipelineResult {
  processed: ProcessResult[]
  failures: PipelineFailure[]
  alerts: Alert[]
}

// =============================================================================
// PIPELINE
// =============================================================================

export class MonitoringPipeline {
  private readonly monitor: SentimentMonitor
  private readonly classifier: SentimentClassifier
  private readonly logger?: FileLogger

  constructor(config: PipelineConfig) {
    this.monitor = config.monitor
    this.classifier = config.classifier ?? new StaticClassifier()
    if (config.logger) {
      this.logger = config.logger
    }
  }

  /**
   * Classify one text and feed the result to the monitor
   * Classifier failures are logged here, validation failures by the monitor; both are rethrown
   */
  async process(text: string): Promise<ProcessResult> {
    let result: PredictionResult
    try {
      result = await this.classifier.predict(text)
    } catch (error) {
      this.pushEvent({ type: 'ERROR', component: 'Classifier', error: describeError(error) })
      throw error
    }

    const alerts = this.monitor.logPrediction(text, result)
    return { text, result, alerts }
  }

  /**
   * Process texts in order; a failed text does not stop the run
   */
  async run(texts: readonly string[]): Promise<PipelineResult> {
    const processed: ProcessResult[] = []
    const failures: PipelineFailure[] = []

    for (const text of texts) {
      try {
        processed.push(await this.process(text))
      } catch (error) {
        failures.push({ text, error: describeError(error) })
      }
    }

    return {
      processed,
      failures,
      alerts: processed.flatMap((p) => p.alerts),
    }
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  private pushEvent(event: MonitorEvent): void {
    this.logger?.log(event)
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
