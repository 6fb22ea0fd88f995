import { Comparator, OrderedSequence, SelectOptions, SelectionStats } from '../types/selection-types'
import { naturalOrder, partition, swap } from './partitioner'
import { GROUP_SIZE, groupMedian } from './group-median'
import { assertSelectable } from './selection-errors'

/**
 * 確定性選擇（中位數的中位數）
 * 最壞情況 O(n)
 *
 * 中位數的中位數由本算法遞迴求得，而不是交給隨機選擇，
 * 因此每一輪至少捨棄約 3n/10 個元素。
 * 分割後與樞紐相等的元素會聚到樞紐右側一併捨棄，重複值很多時也不會退化。
 *
 * @example
 * deterministicSelect([4, 4, 4, 1, 4], 0) // 1
 */
export function deterministicSelect<T>(sequence: OrderedSequence<T>, k: number, options: SelectOptions<T> = {}): T {
  assertSelectable(sequence, k)

  const work = Array.from(sequence)
  const index = selectIndex(work, 0, work.length - 1, k, options.compare ?? naturalOrder, options.stats)
  return work[index]
}

/**
 * 在 work[left..right] 中把排名 k 的元素移到索引 k 並傳回 k
 * 前置條件：left <= k <= right
 */
function selectIndex<T>(
  work: T[],
  left: number,
  right: number,
  k: number,
  compare: Comparator<T>,
  stats: SelectionStats | undefined
): number {
  while (left < right) {
    const pivotIndex = medianOfMedians(work, left, right, compare, stats)
    if (stats) {
      stats.partitions++
      stats.comparisons += right - left
    }
    const p = partition(work, left, right, pivotIndex, compare)

    if (k === p) {
      return p
    }
    if (k < p) {
      right = p - 1
      continue
    }

    const equalEnd = gatherEqual(work, p, right, compare, stats)
    if (k < equalEnd) {
      return k
    }
    left = equalEnd
  }

  return left
}

/**
 * 求 [left, right] 的中位數的中位數，傳回它在 work 中的索引
 *
 * 各組中位數依序換到區間開頭 [left, left + count - 1]，
 * 再在這段前綴上遞迴選擇，得到的索引就是樞紐位置，不需要再按值回頭搜尋。
 */
function medianOfMedians<T>(
  work: T[],
  left: number,
  right: number,
  compare: Comparator<T>,
  stats: SelectionStats | undefined
): number {
  let count = 0
  for (let groupLeft = left; groupLeft <= right; groupLeft += GROUP_SIZE) {
    const groupRight = Math.min(groupLeft + GROUP_SIZE - 1, right)
    const median = groupMedian(work, groupLeft, groupRight, compare)
    // left + count 一定不晚於目前小組的起點，不會打亂尚未處理的小組
    swap(work, median, left + count)
    count++
  }

  if (count === 1) {
    return left
  }

  return selectIndex(work, left, left + count - 1, left + Math.floor(count / 2), compare, stats)
}

/**
 * 把 (p, right] 中與 work[p] 相等的元素換到 p 之後，傳回這段相等區塊的結尾（不含）
 * 嚴格 `<` 的分割會把相等元素全部留在右側，不聚攏時全等輸入每輪只縮小一個元素
 */
function gatherEqual<T>(
  work: T[],
  p: number,
  right: number,
  compare: Comparator<T>,
  stats: SelectionStats | undefined
): number {
  const pivot = work[p]
  let equalEnd = p + 1
  for (let i = p + 1; i <= right; i++) {
    if (compare(work[i], pivot) === 0) {
      swap(work, i, equalEnd)
      equalEnd++
    }
  }
  if (stats) {
    stats.comparisons += right - p
  }
  return equalEnd
}
