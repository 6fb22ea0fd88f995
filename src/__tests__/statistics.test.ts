import { describe, it, expect } from '@jest/globals'
import { calculateMean, calculatePercentile, medianOf } from '../utils/statistics'

describe('calculatePercentile', () => {
  it('should return exact ranks when the position is whole', () => {
    expect(calculatePercentile([1, 2, 3, 4, 5], 50)).toBe(3)
    expect(calculatePercentile([1, 2, 3, 4, 5], 0)).toBe(1)
    expect(calculatePercentile([1, 2, 3, 4, 5], 100)).toBe(5)
  })

  it('should interpolate between neighbours', () => {
    expect(calculatePercentile([1, 2, 3, 4], 50)).toBe(2.5)
  })

  it('should return 0 for no samples', () => {
    expect(calculatePercentile([], 50)).toBe(0)
  })
})

describe('medianOf', () => {
  it('should sort a copy before taking the median', () => {
    const samples = [5, 1, 3]

    expect(medianOf(samples)).toBe(3)
    expect(samples).toEqual([5, 1, 3])
  })
})

describe('calculateMean', () => {
  it('should skip non-finite values', () => {
    expect(calculateMean([1, 2, Infinity, 3])).toBe(2)
  })

  it('should return 0 when nothing is finite', () => {
    expect(calculateMean([])).toBe(0)
    expect(calculateMean([Infinity])).toBe(0)
  })
})
