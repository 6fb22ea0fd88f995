import { Comparator } from '../types/selection-types'

/**
 * 自然順序比較：適用於 number、string、bigint
 */
export function naturalOrder<T>(a: T, b: T): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function swap<T>(work: T[], i: number, j: number): void {
  const tmp = work[i]
  work[i] = work[j]
  work[j] = tmp
}

/**
 * 以 pivotIndex 處的值為樞紐分割 [left, right]（Lomuto 方案）
 *
 * 分割後，傳回索引左側的元素嚴格小於樞紐值，右側的元素大於或等於樞紐值。
 * 與樞紐相等的元素一律被分到右側，所以重複值很多時分割會極度不平衡
 * （全部相等時傳回 left）。
 *
 * @returns 樞紐值的最終索引
 */
export function partition<T>(
  work: T[],
  left: number,
  right: number,
  pivotIndex: number,
  compare: Comparator<T> = naturalOrder
): number {
  const pivotValue = work[pivotIndex]
  swap(work, pivotIndex, right)

  let storeIndex = left
  for (let i = left; i < right; i++) {
    if (compare(work[i], pivotValue) < 0) {
      swap(work, i, storeIndex)
      storeIndex++
    }
  }

  swap(work, storeIndex, right)
  return storeIndex
}
