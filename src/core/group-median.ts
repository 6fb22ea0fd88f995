import { Comparator } from '../types/selection-types'
import { naturalOrder } from './partitioner'

export const GROUP_SIZE = 5

/**
 * 對不超過 5 個元素的小組就地排序，傳回中位數索引
 * 偶數個元素時取下中位數
 */
export function groupMedian<T>(work: T[], left: number, right: number, compare: Comparator<T> = naturalOrder): number {
  if (right < left || right - left >= GROUP_SIZE) {
    throw new RangeError(`小組範圍 [${left}, ${right}] 無效，最多只能包含 ${GROUP_SIZE} 個元素`)
  }

  // 插入排序，小組最多 5 個元素
  for (let i = left + 1; i <= right; i++) {
    const value = work[i]
    let j = i - 1
    while (j >= left && compare(work[j], value) > 0) {
      work[j + 1] = work[j]
      j--
    }
    work[j + 1] = value
  }

  return left + Math.floor((right - left) / 2)
}
