/**
 * 比較函數：a < b 時傳回負數，相等傳回 0，a > b 時傳回正數
 */
export type Comparator<T> = (a: T, b: T) => number

/**
 * 選擇算法可接受的輸入：任意可隨機存取的有序序列
 */
export type OrderedSequence<T> = ArrayLike<T>

/**
 * 隨機來源，由呼叫方注入以便重現結果
 */
export interface RandomSource {
  /** 傳回 [min, max] 範圍内（含兩端）的整數 */
  nextInt(min: number, max: number): number
}

/**
 * 分割統計，由呼叫方持有並在每次選擇中累加
 */
export interface SelectionStats {
  partitions: number // 分割次數
  comparisons: number // 分割過程中的比較次數
}

export interface SelectOptions<T> {
  compare?: Comparator<T>
  stats?: SelectionStats
}

export interface RandomizedSelectOptions<T> extends SelectOptions<T> {
  random?: RandomSource
}

export type AlgorithmName = 'randomized' | 'deterministic'

export type Selector = <T>(sequence: OrderedSequence<T>, k: number, options?: RandomizedSelectOptions<T>) => T

export type SelectionErrorKind = 'EmptyInput' | 'RankOutOfRange'

/**
 * 基準測試的輸入分布
 */
export type DistributionName = 'random' | 'sorted' | 'reverse_sorted' | 'all_equal' | 'few_unique'

export interface TestCase {
  size: number
  distribution: DistributionName
  values: number[]
}

export interface AlgorithmMeasurement {
  time: number // 毫秒（多次執行取中位數）
  result: number
  partitions: number
}

export type BenchmarkRecord =
  | {
      status: 'success'
      size: number
      distribution: DistributionName
      k: number
      expected: number
      correct: boolean
      randomized: AlgorithmMeasurement
      deterministic: AlgorithmMeasurement
      ratio: number // 確定性 / 隨機
    }
  | {
      status: 'failed'
      size: number
      distribution: DistributionName
      k: number
      algorithm: AlgorithmName
      error: string
    }

export interface BenchmarkOptions {
  repeat: number
  random: RandomSource
  selectors?: Record<AlgorithmName, Selector> // 測試時可替換
  onProgress?: (current: number, total: number, label: string) => void
}

export interface SelectCommandOptions {
  rank?: string
  algorithm?: string
  seed?: string
  strings?: boolean
  file?: string
  stats?: boolean
}

export interface BenchCommandOptions {
  sizes?: string
  distributions?: string
  repeat?: string
  seed?: string
  chart?: boolean
  json?: boolean
}
