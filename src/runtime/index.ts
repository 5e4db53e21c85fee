/**
 * Sentiment Drift Monitor - runtime
 * Glue between the monitor, the classifier and the scheduler
 */

export { FileLogger } from './file-logger.js'
export type { FileLoggerOptions } from './file-logger.js'
export { MonitoringPipeline } from './pipeline.js'
export type { PipelineConfig, PipelineFailure, PipelineResult, ProcessResult } from './pipeline.js'
export { RetrainJob, SimulatedRetrainer, modelVersionAt } from './retrain-job.js'
export type { RetrainJobConfig, RetrainOutcome, Retrainer } from './retrain-job.js'
