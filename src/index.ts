/**
 * Sentiment Drift Monitor
 * Drift detection, alerting and retrain triggers for a deployed sentiment classifier
 */

// Core types
export type {
  Alert,
  AlertKind,
  AlertSeverity,
  BaselineDistribution,
  ConfidenceTrend,
  DriftEvaluation,
  DriftLevel,
  DriftMetric,
  InsufficientDataEvaluation,
  Label,
  LabelDistribution,
  MonitorEvent,
  PredictionRecord,
  PredictionResult,
  ReportStatus,
  RetrainDecision,
  RetrainReason,
  RetrainRun,
  RetrainState,
  RetrainStatus,
  SummaryReport,
} from './core/types.js'
export { LABELS } from './core/types.js'

// Contracts and configuration
export {
  ALERT_CONFIG,
  DEFAULT_BASELINE,
  DRIFT_CONFIG,
  REPORT_CONFIG,
  RETRAIN_CONFIG,
  WINDOW_CONFIG,
  deepFreeze,
} from './core/contracts.js'
export { monitorConfigSchema, resolveMonitorConfig } from './core/config.js'
export type { MonitorConfig, MonitorConfigInput } from './core/config.js'
export { ValidationError } from './core/errors.js'

// Engines
export { ObservationWindow } from './observation-window/window.js'
export type { ObservationWindowConfig } from './observation-window/window.js'
export { createPredictionRecord, fingerprintText } from './observation-window/record.js'

export {
  DriftDetector,
  computeLabelDistribution,
  computeMeanConfidence,
} from './drift-detector/detector.js'
export type { DriftDetectorConfig } from './drift-detector/detector.js'
export {
  chiSquareDistance,
  getDistanceMetric,
  populationStabilityIndex,
} from './drift-detector/metrics.js'
export type { DistanceMetric, DistanceMetricName } from './drift-detector/metrics.js'

export { AlertManager } from './alert-manager/manager.js'
export type { AlertManagerConfig } from './alert-manager/manager.js'

export { buildSummaryReport, classifyTrend, linearSlope } from './summary-reporter/reporter.js'
export type { SummaryReportOptions } from './summary-reporter/reporter.js'
export { formatSummaryReport } from './summary-reporter/format.js'

export { DEFAULT_RETRAIN_POLICY, evaluateRetrain } from './retrain-trigger/trigger.js'
export type { RetrainInput, RetrainPolicy } from './retrain-trigger/trigger.js'

// Monitor
export { SentimentMonitor } from './monitoring/sentiment-monitor.js'
export type { SentimentMonitorOptions } from './monitoring/sentiment-monitor.js'

// Classifier
export { StaticClassifier } from './classifier/classifier.js'
export type { SentimentClassifier } from './classifier/classifier.js'

// Runtime
export {
  FileLogger,
  MonitoringPipeline,
  RetrainJob,
  SimulatedRetrainer,
  modelVersionAt,
} from './runtime/index.js'
export type {
  FileLoggerOptions,
  PipelineConfig,
  PipelineFailure,
  PipelineResult,
  ProcessResult,
  RetrainJobConfig,
  RetrainOutcome,
  Retrainer,
} from './runtime/index.js'
