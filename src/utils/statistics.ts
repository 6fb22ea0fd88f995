/**
 * 統計工具函數
 * 用於彙總基準測試的多次計時
 */

/**
 * 計算百分位數（線性插值）
 * @param sortedValues 已遞增排序的數值陣列
 * @param percentile 百分位（0-100）
 *
 * @example
 * calculatePercentile([0.2, 0.4, 0.9], 50) // 0.4
 * calculatePercentile([1, 2, 3, 4], 50) // 2.5
 */
export function calculatePercentile(sortedValues: readonly number[], percentile: number): number {
  if (sortedValues.length === 0) return 0
  const position = (percentile / 100) * (sortedValues.length - 1)
  const lower = Math.floor(position)
  const upper = Math.ceil(position)

  if (lower === upper) {
    return sortedValues[lower]
  }

  const weight = position - lower
  return sortedValues[lower] * (1 - weight) + sortedValues[upper] * weight
}

/** 計時樣本的中位數，樣本不需預先排序 */
export function medianOf(samples: readonly number[]): number {
  const sorted = [...samples].sort((a, b) => a - b)
  return calculatePercentile(sorted, 50)
}

/** 算術平均，忽略非有限值（例如除以零得到的 Infinity） */
export function calculateMean(values: readonly number[]): number {
  const finite = values.filter((value) => Number.isFinite(value))
  if (finite.length === 0) return 0
  return finite.reduce((sum, value) => sum + value, 0) / finite.length
}
