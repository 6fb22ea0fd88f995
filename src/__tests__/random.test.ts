import { describe, it, expect } from '@jest/globals'
import { SeededRandom, createRandomSource, mathRandom } from '../utils/random'

describe('SeededRandom', () => {
  it('should produce the Park-Miller sequence', () => {
    const random = new SeededRandom(1)

    expect(random.next()).toBeCloseTo(48270 / 2147483646, 12)
  })

  it('should repeat the same sequence for the same seed', () => {
    const a = new SeededRandom(42)
    const b = new SeededRandom(42)

    const first = Array.from({ length: 20 }, () => a.nextInt(0, 1000))
    const second = Array.from({ length: 20 }, () => b.nextInt(0, 1000))

    expect(first).toEqual(second)
  })

  it('should keep nextInt within the inclusive bounds', () => {
    const random = new SeededRandom(0)
    const seen = new Set<number>()

    for (let i = 0; i < 500; i++) {
      const value = random.nextInt(3, 6)
      expect(value).toBeGreaterThanOrEqual(3)
      expect(value).toBeLessThanOrEqual(6)
      seen.add(value)
    }

    expect([...seen].sort()).toEqual([3, 4, 5, 6])
  })

  it('should accept negative seeds', () => {
    const value = new SeededRandom(-17).next()

    expect(value).toBeGreaterThanOrEqual(0)
    expect(value).toBeLessThan(1)
  })

  it('should reject non-finite seeds', () => {
    expect(() => new SeededRandom(NaN)).toThrow(RangeError)
    expect(() => new SeededRandom(Infinity)).toThrow('種子必須是有限數字，收到: Infinity')
  })

  it('should pick items from the list', () => {
    const random = new SeededRandom(9)
    const items = ['x', 'y', 'z']

    for (let i = 0; i < 20; i++) {
      expect(items).toContain(random.pick(items))
    }
  })
})

describe('createRandomSource', () => {
  it('should fall back to Math.random without a seed', () => {
    expect(createRandomSource()).toBe(mathRandom)
  })

  it('should build a seeded source when a seed is given', () => {
    expect(createRandomSource(5)).toBeInstanceOf(SeededRandom)
  })
})
