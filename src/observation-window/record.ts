/**
 * Sentiment Drift Monitor - Prediction records
 */

import { createHash } from 'crypto'
import { WINDOW_CONFIG } from '../core/contracts.js'
import type { PredictionRecord, PredictionResult } from '../core/types.js'

/**
 * Build a frozen record from a validated classifier result
 * Only the first maxTextLength characters of the text are kept; the
 * fingerprint always covers the full text
 */
export function createPredictionRecord(
  text: string,
  result: PredictionResult,
  timestamp: number,
  maxTextLength: number = WINDOW_CONFIG.TEXT_MAX_LENGTH,
): PredictionRecord {
  return Object.freeze({
    timestamp,
    text: text.slice(0, maxTextLength),
    fingerprint: fingerprintText(text),
    label: result.sentiment,
    confidence: result.confidence,
    scores: Object.freeze({ ...result.scores }),
  })
}

export function fingerprintText(text: string): string {
  return createHash('sha256').update(text, 'utf-8').digest('hex')
}
