/**
 * RetrainJob Tests
 */

import { mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { RetrainDecision } from '../core/types.js'
import { SentimentMonitor } from '../monitoring/sentiment-monitor.js'
import { FileLogger } from './file-logger.js'
import { RetrainJob, SimulatedRetrainer, modelVersionAt } from './retrain-job.js'
import type { RetrainOutcome, Retrainer } from './retrain-job.js'

// =============================================================================
// TEST FIXTURES
// =============================================================================

const HOUR = 60 * 60 * 1000
const DAY = 24 * HOUR

class BrokenRetrainer implements Retrainer {
  async retrain(_decision: RetrainDecision): Promise<RetrainOutcome> {
    throw new Error('no training data')
  }
}

// =============================================================================
// TESTS
// =============================================================================

describe('RetrainJob', () => {
  let monitor: SentimentMonitor

  beforeEach(() => {
    monitor = new SentimentMonitor({}, { clock: () => 0 })
  })

  it('should skip while the model is within policy', async () => {
    const job = new RetrainJob({ monitor })

    const run = await job.checkAndRetrain(DAY)

    expect(run.status).toBe('SKIPPED')
    expect(run.modelVersion).toBeNull()
    expect(job.getHistory()).toEqual([])
    expect(job.getLastRetrainAt()).toBeNull()
  })

  it('should retrain once stale and reset the staleness clock', async () => {
    const retrainer = new SimulatedRetrainer()
    const job = new RetrainJob({ monitor, retrainer })

    const run = await job.checkAndRetrain(8 * DAY)
    const next = await job.checkAndRetrain(8 * DAY + HOUR)

    expect(run.status).toBe('COMPLETED')
    expect(run.decision.reason).toBe('STALENESS')
    expect(run.modelVersion).toBe('v19700109_000000')
    expect(job.getLastRetrainAt()).toBe(8 * DAY)
    expect(next.status).toBe('SKIPPED')
    expect(job.getHistory()).toHaveLength(1)
    expect(retrainer.getRequests()).toHaveLength(1)
  })

  it('should start from a restored last retrain time', async () => {
    const job = new RetrainJob({ monitor, lastRetrainAt: 7 * DAY })

    const run = await job.checkAndRetrain(8 * DAY)

    expect(run.status).toBe('SKIPPED')
    expect(run.decision.elapsedSinceRetrainMs).toBe(DAY)
  })

  describe('failures', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'retrain-job-'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it('should record a failed run and keep the staleness clock', async () => {
      const path = join(dir, 'events.jsonl')
      const logger = new FileLogger(path, { flushThreshold: 1 })
      const job = new RetrainJob({ monitor, retrainer: new BrokenRetrainer(), logger })

      const run = await job.checkAndRetrain(8 * DAY)

      expect(run.status).toBe('FAILED')
      expect(run.error).toBe('no training data')
      expect(job.getLastRetrainAt()).toBeNull()
      expect(job.getHistory()).toEqual([run])

      const types = readFileSync(path, 'utf-8')
        .trim()
        .split('\n')
        .map((line) => JSON.parse(line).type)
      expect(types).toEqual(['ERROR', 'RETRAIN'])
    })
  })
})

describe('modelVersionAt', () => {
  it('should format the UTC timestamp', () => {
    expect(modelVersionAt(Date.UTC(2026, 9, 18, 12, 34, 56))).toBe('v20261018_123456')
  })
})
