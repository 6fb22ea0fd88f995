import { describe, it, expect } from '@jest/globals'
import { groupMedian } from '../core/group-median'

describe('groupMedian', () => {
  it('should sort a group of five and return the middle index', () => {
    const work = [9, 2, 7, 4, 5]

    const index = groupMedian(work, 0, 4)

    expect(index).toBe(2)
    expect(work).toEqual([2, 4, 5, 7, 9])
    expect(work[index]).toBe(5)
  })

  it('should return the lower median for an even-sized group', () => {
    const work = [8, 1, 6, 3]

    const index = groupMedian(work, 0, 3)

    expect(index).toBe(1)
    expect(work[index]).toBe(3)
  })

  it('should work on a sub-range and leave the rest untouched', () => {
    const work = [100, 5, 4, 3, 2, 1, -1]

    const index = groupMedian(work, 1, 5)

    expect(index).toBe(3)
    expect(work).toEqual([100, 1, 2, 3, 4, 5, -1])
  })

  it('should return left for a single element', () => {
    const work = [3, 1]

    expect(groupMedian(work, 1, 1)).toBe(1)
    expect(work).toEqual([3, 1])
  })

  it('should use the comparator when given', () => {
    const work = ['kiwi', 'apple', 'fig']

    const index = groupMedian(work, 0, 2, (a, b) => a.length - b.length)

    expect(work).toEqual(['fig', 'kiwi', 'apple'])
    expect(work[index]).toBe('kiwi')
  })

  it('should reject ranges wider than five elements', () => {
    expect(() => groupMedian([1, 2, 3, 4, 5, 6], 0, 5)).toThrow(RangeError)
    expect(() => groupMedian([1, 2], 1, 0)).toThrow(RangeError)
  })
})
