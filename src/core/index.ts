/**
 * Sentiment Drift Monitor - core
 * Shared types, contracts and configuration
 */

// Types
export { LABELS } from './types.js'
export type {
  Alert,
  AlertKind,
  AlertSeverity,
  BaselineDistribution,
  DriftEvaluation,
  DriftLevel,
  DriftMetric,
  InsufficientDataEvaluation,
  Label,
  LabelDistribution,
  MonitorEvent,
  PredictionRecord,
  PredictionResult,
  RetrainDecision,
  RetrainReason,
  RetrainState,
  SummaryReport,
} from './types.js'

// Contracts
export {
  ALERT_CONFIG,
  DEFAULT_BASELINE,
  DRIFT_CONFIG,
  REPORT_CONFIG,
  RETRAIN_CONFIG,
  WINDOW_CONFIG,
  deepFreeze,
} from './contracts.js'

// Configuration
export { monitorConfigSchema, resolveMonitorConfig } from './config.js'
export type { MonitorConfig, MonitorConfigInput } from './config.js'

// Errors
export { ValidationError } from './errors.js'
