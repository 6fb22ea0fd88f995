import { OrderedSequence, RandomizedSelectOptions } from '../types/selection-types'
import { naturalOrder, partition } from './partitioner'
import { assertSelectable } from './selection-errors'
import { mathRandom } from '../utils/random'

/**
 * 隨機快速選擇（quickselect）
 * 期望 O(n)，最壞 O(n²)（樞紐序列不利或大量重複值時）
 *
 * 在私有副本上工作，呼叫方的序列不會被修改。
 *
 * @example
 * randomizedSelect([5, 3, 8, 1, 9, 2], 2) // 3
 */
export function randomizedSelect<T>(sequence: OrderedSequence<T>, k: number, options: RandomizedSelectOptions<T> = {}): T {
  assertSelectable(sequence, k)

  const compare = options.compare ?? naturalOrder
  const random = options.random ?? mathRandom
  const stats = options.stats
  const work = Array.from(sequence)

  let left = 0
  let right = work.length - 1

  // 只往包含 k 的一側縮小，用循環代替尾遞迴
  while (left < right) {
    const pivotIndex = random.nextInt(left, right)
    if (stats) {
      stats.partitions++
      stats.comparisons += right - left
    }
    const p = partition(work, left, right, pivotIndex, compare)

    if (k === p) {
      return work[p]
    }
    if (k < p) {
      right = p - 1
    } else {
      left = p + 1
    }
  }

  return work[left]
}
