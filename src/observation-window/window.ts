/**
 * Sentiment Drift Monitor - Observation Window
 * Bounded FIFO store of prediction records
 *
 * Evicts by count (capacity) and by age relative to the newest record
 */

import { WINDOW_CONFIG } from '../core/contracts.js'
import { ValidationError } from '../core/errors.js'
import type { PredictionRecord, PredictionResult } from '../core/types.js'
import { createPredictionResultSchema, parsePredictionResult } from './validation.js'
import type { PredictionResultSchema } from './validation.js'

// =============================================================================
// OBSERVATION WINDOW
// =============================================================================

export interface ObservationWindowConfig {
  capacity: number
  /** Records older than newest.timestamp - maxAgeMs are evicted (null = no limit) */
  maxAgeMs?: number | null
  scoreTolerance?: number
}

export class ObservationWindow {
  private records: PredictionRecord[] = []
  private readonly capacity: number
  private readonly maxAgeMs: number | null
  private readonly schema: PredictionResultSchema

  constructor(config: ObservationWindowConfig) {
    if (!Number.isInteger(config.capacity) || config.capacity < 1) {
      throw new ValidationError('Invalid window configuration', [
        `capacity: must be a positive integer (got ${config.capacity})`,
      ])
    }

    this.capacity = config.capacity
    this.maxAgeMs = config.maxAgeMs ?? null
    this.schema = createPredictionResultSchema(config.scoreTolerance ?? WINDOW_CONFIG.SCORE_TOLERANCE)
  }

  /**
   * Validate untrusted classifier output with this window's tolerance
   */
  parseResult(input: unknown): PredictionResult {
    return parsePredictionResult(this.schema, input)
  }

  /**
   * Append a record, then evict expired and overflowing entries
   * The window is untouched when validation fails
   *
   * @returns records evicted by this append, oldest first
   */
  append(record: PredictionRecord): PredictionRecord[] {
    if (!Number.isFinite(record.timestamp)) {
      throw new ValidationError('Malformed prediction record', [
        `timestamp: must be a finite number (got ${record.timestamp})`,
      ])
    }
    this.parseResult({
      sentiment: record.label,
      confidence: record.confidence,
      scores: record.scores,
    })

    this.records.push(record)
    return this.evict(record.timestamp)
  }

  /**
   * Immutable copy of the current contents, oldest first
   */
  snapshot(): readonly PredictionRecord[] {
    return Object.freeze([...this.records])
  }

  get size(): number {
    return this.records.length
  }

  /**
   * Drop every record
   */
  clear(): void {
    this.records = []
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  private evict(newest: number): PredictionRecord[] {
    const evicted: PredictionRecord[] = []

    if (this.maxAgeMs !== null) {
      const cutoff = newest - this.maxAgeMs
      const kept: PredictionRecord[] = []
      for (const record of this.records) {
        if (record.timestamp < cutoff) {
          evicted.push(record)
        } else {
          kept.push(record)
        }
      }
      this.records = kept
    }

    while (this.records.length > this.capacity) {
      const oldest = this.records.shift()
      if (oldest === undefined) break
      evicted.push(oldest)
    }

    return evicted
  }
}
