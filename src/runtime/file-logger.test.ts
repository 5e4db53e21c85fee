/**
 * FileLogger Tests
 */

import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { Alert, MonitorEvent } from '../core/types.js'
import { createPredictionRecord } from '../observation-window/record.js'
import { FileLogger } from './file-logger.js'

// =============================================================================
// TEST FIXTURES
// =============================================================================

function createAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    id: 1,
    kind: 'DISTRIBUTION_DRIFT',
    severity: 'WARNING',
    timestamp: 1000,
    message: 'drift',
    value: 0.12,
    ...overrides,
  }
}

function createAlertEvent(overrides: Partial<Alert> = {}): MonitorEvent {
  return { type: 'ALERT', alert: createAlert(overrides) }
}

// =============================================================================
// TESTS
// =============================================================================

describe('FileLogger', () => {
  let dir: string
  let outputPath: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'file-logger-'))
    outputPath = join(dir, 'nested', 'events.jsonl')
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should create output directory if it does not exist', () => {
    new FileLogger(outputPath)
    expect(existsSync(join(dir, 'nested'))).toBe(true)
  })

  it('should buffer events until threshold', () => {
    const logger = new FileLogger(outputPath, { flushThreshold: 5 })

    logger.log(createAlertEvent())
    logger.log(createAlertEvent())
    logger.log(createAlertEvent())

    expect(logger.getBufferSize()).toBe(3)
    expect(readFileSync(outputPath, 'utf-8')).toBe('')
  })

  it('should flush when threshold is reached', () => {
    const logger = new FileLogger(outputPath, { flushThreshold: 3 })

    logger.log(createAlertEvent())
    logger.log(createAlertEvent())
    logger.log(createAlertEvent())

    expect(logger.getBufferSize()).toBe(0)
    expect(readFileSync(outputPath, 'utf-8').trim().split('\n')).toHaveLength(3)
  })

  it('should write events in JSONL format', () => {
    const logger = new FileLogger(outputPath, { flushThreshold: 1 })
    const first = createAlertEvent({ id: 1, timestamp: 1000 })
    const second = createAlertEvent({ id: 2, timestamp: 2000 })

    logger.log(first)
    logger.log(second)

    const lines = readFileSync(outputPath, 'utf-8').trim().split('\n')
    expect(lines.map((line) => JSON.parse(line))).toEqual([first, second])
  })

  it('should handle every event type', () => {
    const logger = new FileLogger(outputPath, { flushThreshold: 10 })
    const record = createPredictionRecord(
      'great product',
      { sentiment: 'Positive', confidence: 0.9, scores: { Negative: 0.05, Neutral: 0.05, Positive: 0.9 } },
      1000,
    )

    const events: MonitorEvent[] = [
      { type: 'PREDICTION', record },
      createAlertEvent(),
      { type: 'ERROR', component: 'Classifier', error: 'timeout' },
    ]

    events.forEach((e) => logger.log(e))
    logger.flush()

    const types = readFileSync(outputPath, 'utf-8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line).type)
    expect(types).toEqual(['PREDICTION', 'ALERT', 'ERROR'])
  })

  it('should append to an existing log', () => {
    const first = new FileLogger(outputPath, { flushThreshold: 1 })
    first.log(createAlertEvent())

    const second = new FileLogger(outputPath, { flushThreshold: 1 })
    second.log(createAlertEvent())

    expect(readFileSync(outputPath, 'utf-8').trim().split('\n')).toHaveLength(2)
  })

  it('should clear buffer without flushing', () => {
    const logger = new FileLogger(outputPath, { flushThreshold: 100 })

    logger.log(createAlertEvent())
    logger.log(createAlertEvent())
    logger.clear()

    expect(logger.getBufferSize()).toBe(0)
    logger.flush()
    expect(readFileSync(outputPath, 'utf-8')).toBe('')
  })
})
