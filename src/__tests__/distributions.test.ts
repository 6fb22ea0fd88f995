import { describe, it, expect } from '@jest/globals'
import { generateDistribution, generateTestCases } from '../bench/distributions'
import { SeededRandom } from '../utils/random'

describe('generateDistribution', () => {
  const random = new SeededRandom(4)

  it('should build sorted and reverse-sorted ranges', () => {
    expect(generateDistribution('sorted', 5, random)).toEqual([1, 2, 3, 4, 5])
    expect(generateDistribution('reverse_sorted', 5, random)).toEqual([5, 4, 3, 2, 1])
  })

  it('should fill all_equal with a single value', () => {
    expect(generateDistribution('all_equal', 4, random)).toEqual([42, 42, 42, 42])
  })

  it('should keep random values within [1, size * 10]', () => {
    const values = generateDistribution('random', 200, random)

    expect(values).toHaveLength(200)
    values.forEach((value) => {
      expect(value).toBeGreaterThanOrEqual(1)
      expect(value).toBeLessThanOrEqual(2000)
    })
  })

  it('should only use five distinct values for few_unique', () => {
    const values = generateDistribution('few_unique', 300, random)

    expect(new Set(values).size).toBeLessThanOrEqual(5)
    values.forEach((value) => expect([1, 2, 3, 4, 5]).toContain(value))
  })

  it('should return an empty array for size 0', () => {
    expect(generateDistribution('random', 0, random)).toEqual([])
  })
})

describe('generateTestCases', () => {
  it('should cross sizes with distributions, sizes first', () => {
    const cases = generateTestCases([10, 20], ['sorted', 'all_equal'], new SeededRandom(1))

    expect(cases.map(({ size, distribution }) => `${distribution}:${size}`)).toEqual([
      'sorted:10',
      'all_equal:10',
      'sorted:20',
      'all_equal:20',
    ])
    cases.forEach((testCase) => expect(testCase.values).toHaveLength(testCase.size))
  })

  it('should be reproducible for the same seed', () => {
    const a = generateTestCases([50], ['random', 'few_unique'], new SeededRandom(77))
    const b = generateTestCases([50], ['random', 'few_unique'], new SeededRandom(77))

    expect(a).toEqual(b)
  })
})
