/**
 * Sentiment Drift Monitor - File Logger
 * Export monitor events to a JSONL file for telemetry
 */

import { appendFileSync, mkdirSync, writeFileSync } from 'fs'
import { dirname } from 'path'
import type { MonitorEvent } from '../core/types.js'

export interface FileLoggerOptions {
  /** Buffered events written once this many are pending */
  flushThreshold?: number
}

export class FileLogger {
  private buffer: MonitorEvent[] = []
  private readonly flushThreshold: number

  constructor(
    private readonly outputPath: string,
    options: FileLoggerOptions = {},
  ) {
    this.flushThreshold = options.flushThreshold ?? 100

    mkdirSync(dirname(outputPath), { recursive: true })

    // Touch the file in append mode so earlier runs are kept
    writeFileSync(outputPath, '', { flag: 'a' })
  }

  /**
   * Log a monitor event
   * Events are buffered and flushed when threshold is reached
   */
  log(event: MonitorEvent): void {
    this.buffer.push(event)

    if (this.buffer.length >= this.flushThreshold) {
      this.flush()
    }
  }

  /**
   * Flush buffered events to file, one JSON object per line
   * On a write failure the buffer is kept for the next attempt
   */
  flush(): void {
    if (this.buffer.length === 0) {
      return
    }

    try {
      const lines = this.buffer.map((event) => JSON.stringify(event)).join('\n') + '\n'
      appendFileSync(this.outputPath, lines, 'utf-8')
      this.buffer = []
    } catch (error) {
      console.error(`FileLogger: Failed to flush to ${this.outputPath}:`, error)
    }
  }

  getBufferSize(): number {
    return this.buffer.length
  }

  getOutputPath(): string {
    return this.outputPath
  }

  /**
   * Clear buffer without flushing
   */
  clear(): void {
    this.buffer = []
  }
}
