/**
 * Sentiment Drift Monitor - Classifier capability
 * The deployed model is consumed through this interface, never implemented here
 */

import type { PredictionResult } from '../core/types.js'

// =============================================================================
// CLASSIFIER INTERFACE
// =============================================================================

export interface SentimentClassifier {
  /**
   * Classify one text; the result is validated by the monitor on ingestion
   */
  predict(text: string): Promise<PredictionResult>
}

// =============================================================================
// STATIC CLASSIFIER
// =============================================================================

/**
 * Returns one configured result for every text
 * Default for development and testing
 */
export class StaticClassifier implements SentimentClassifier {
  private readonly calls: string[] = []

  constructor(
    private readonly result: PredictionResult = {
      sentiment: 'Neutral',
      confidence: 0.8,
      scores: { Negative: 0.1, Neutral: 0.8, Positive: 0.1 },
    },
  ) {}

  async predict(text: string): Promise<PredictionResult> {
    this.calls.push(text)
    return this.result
  }

  /**
   * Texts classified so far, in call order
   */
  getCalls(): readonly string[] {
    return this.calls
  }
}
