/**
 * Sentiment Drift Monitor - Prediction validation
 * Shape checks for classifier output before it enters the window
 */

import { z } from 'zod'
import { LABELS } from '../core/types.js'
import type { Label, PredictionResult } from '../core/types.js'
import { ValidationError } from '../core/errors.js'

const probability = z.number().min(0).max(1)

/**
 * Build the result schema for a given score-sum tolerance
 */
export function createPredictionResultSchema(tolerance: number) {
  return z
    .object({
      sentiment: z.enum(LABELS),
      confidence: probability,
      scores: z.object({
        Negative: probability,
        Neutral: probability,
        Positive: probability,
      }),
    })
    .superRefine((result, ctx) => {
      const total = sumScores(result.scores)
      if (Math.abs(total - 1) > tolerance) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['scores'],
          message: `scores must sum to 1 ± ${tolerance} (got ${total.toFixed(4)})`,
        })
      }
    })
}

export type PredictionResultSchema = ReturnType<typeof createPredictionResultSchema>

/**
 * Validate untrusted classifier output
 * @throws ValidationError listing every failed check
 */
export function parsePredictionResult(
  schema: PredictionResultSchema,
  input: unknown,
): PredictionResult {
  const parsed = schema.safeParse(input)
  if (!parsed.success) {
    throw ValidationError.fromZodIssues('Malformed prediction result', parsed.error.issues)
  }
  return parsed.data
}

export function sumScores(scores: Readonly<Record<Label, number>>): number {
  return LABELS.reduce((sum, label) => sum + scores[label], 0)
}
