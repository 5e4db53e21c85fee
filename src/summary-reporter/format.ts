/**
 * Plain-text rendering of a summary report for operators
 */

import { LABELS } from '../core/types.js'
import type { SummaryReport } from '../core/types.js'

const RULE = '='.repeat(60)

export function formatSummaryReport(report: SummaryReport): string {
  const lines = [
    RULE,
    'MONITORING REPORT',
    RULE,
    `Timestamp: ${new Date(report.timestamp).toISOString()}`,
    `Status: ${report.status}`,
    `Predictions in window: ${report.sampleCount}`,
    '',
    'Confidence:',
    `  mean: ${formatRatio(report.meanConfidence)}`,
    `  min/max: ${formatRatio(report.minConfidence)} / ${formatRatio(report.maxConfidence)}`,
    `  trend: ${report.confidenceTrend} (slope ${report.confidenceSlope.toFixed(4)})`,
    '',
    'Sentiment distribution:',
    ...LABELS.map((label) => `  ${label}: ${report.distribution[label].toFixed(1)}%`),
    '',
    `Alerts: ${report.totalAlerts} total, ${report.recentAlerts.length} shown`,
    ...report.recentAlerts.map((alert) => `  [${alert.severity}] ${alert.kind}: ${alert.message}`),
    RULE,
  ]

  return lines.join('\n')
}

function formatRatio(value: number | null): string {
  return value === null ? 'N/A' : `${(value * 100).toFixed(2)}%`
}
