/**
 * StaticClassifier tests
 */

import { describe, expect, it } from 'vitest'
import { StaticClassifier } from './classifier.js'

describe('StaticClassifier', () => {
  it('should return a neutral result by default', async () => {
    const classifier = new StaticClassifier()

    await expect(classifier.predict('anything')).resolves.toEqual({
      sentiment: 'Neutral',
      confidence: 0.8,
      scores: { Negative: 0.1, Neutral: 0.8, Positive: 0.1 },
    })
  })

  it('should record every text it classifies', async () => {
    const classifier = new StaticClassifier({
      sentiment: 'Negative',
      confidence: 0.7,
      scores: { Negative: 0.7, Neutral: 0.2, Positive: 0.1 },
    })

    await classifier.predict('first')
    const result = await classifier.predict('second')

    expect(result.sentiment).toBe('Negative')
    expect(classifier.getCalls()).toEqual(['first', 'second'])
  })
})
