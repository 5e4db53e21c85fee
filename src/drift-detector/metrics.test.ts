/**
 * Distance metric tests
 */

import { describe, expect, it } from 'vitest'
import { LABELS } from '../core/types.js'
import type { Label, LabelDistribution } from '../core/types.js'
import { chiSquareDistance, getDistanceMetric, populationStabilityIndex } from './metrics.js'

const BASELINE: LabelDistribution = { Negative: 0.33, Neutral: 0.34, Positive: 0.33 }

/**
 * Point a fraction t of the way from the baseline to "all Positive"
 */
function towardPositive(t: number): LabelDistribution {
  const target: Record<Label, number> = { Negative: 0, Neutral: 0, Positive: 1 }
  const shifted: Record<Label, number> = { Negative: 0, Neutral: 0, Positive: 0 }
  for (const label of LABELS) {
    shifted[label] = BASELINE[label] + t * (target[label] - BASELINE[label])
  }
  return shifted
}

describe.each([populationStabilityIndex, chiSquareDistance])('$name', (metric) => {
  it('should be zero for identical distributions', () => {
    expect(metric.measure(BASELINE, BASELINE)).toBe(0)
  })

  it('should be positive for different distributions', () => {
    expect(metric.measure({ Negative: 0.5, Neutral: 0.25, Positive: 0.25 }, BASELINE)).toBeGreaterThan(0)
  })

  it('should not decrease as the distribution moves away from baseline', () => {
    let previous = 0
    for (let step = 0; step <= 9; step++) {
      const distance = metric.measure(towardPositive(step / 10), BASELINE)
      expect(distance).toBeGreaterThanOrEqual(previous)
      previous = distance
    }
  })
})

describe('populationStabilityIndex', () => {
  it('should match the closed form', () => {
    const distance = populationStabilityIndex.measure(
      { Negative: 0.5, Neutral: 0.25, Positive: 0.25 },
      { Negative: 0.25, Neutral: 0.25, Positive: 0.5 },
    )

    expect(distance).toBeCloseTo(0.5 * Math.log(2), 10)
  })

  it('should stay finite when a label is never observed', () => {
    const distance = populationStabilityIndex.measure({ Negative: 0, Neutral: 0, Positive: 1 }, BASELINE)

    expect(distance).toBeCloseTo(9.2665, 3)
  })
})

describe('chiSquareDistance', () => {
  it('should match the closed form', () => {
    const distance = chiSquareDistance.measure(
      { Negative: 0.5, Neutral: 0.25, Positive: 0.25 },
      { Negative: 0.25, Neutral: 0.25, Positive: 0.5 },
    )

    expect(distance).toBeCloseTo(0.375, 10)
  })
})

describe('getDistanceMetric', () => {
  it('should resolve metrics by name', () => {
    expect(getDistanceMetric('psi')).toBe(populationStabilityIndex)
    expect(getDistanceMetric('chi-square')).toBe(chiSquareDistance)
  })
})
