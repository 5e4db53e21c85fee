/**
 * Sentiment Drift Monitor - Errors
 */

import type { ZodIssue } from 'zod'

/**
 * Malformed prediction result or invalid configuration
 * Always thrown synchronously; the offending input is never corrected
 */
export class ValidationError extends Error {
  readonly issues: readonly string[]

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'ValidationError'
    this.issues = issues
  }

  static fromZodIssues(message: string, issues: readonly ZodIssue[]): ValidationError {
    return new ValidationError(
      message,
      issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    )
  }
}
