import { performance } from 'perf_hooks'
import {
  AlgorithmMeasurement,
  AlgorithmName,
  BenchmarkOptions,
  BenchmarkRecord,
  RandomSource,
  SelectionStats,
  Selector,
  TestCase,
} from '../types/selection-types'
import { SELECTORS } from '../core'
import { medianOf } from '../utils/statistics'

/**
 * 基準測試執行器
 * 對每個場景計時兩種算法、以完整排序驗證結果，並計算耗時比值
 */
export class BenchmarkRunner {
  /**
   * 依序執行所有場景
   * 單一場景失敗只會產生一筆 failed 記錄，不會中斷後續場景
   */
  static run(cases: readonly TestCase[], options: BenchmarkOptions): BenchmarkRecord[] {
    const selectors = options.selectors ?? SELECTORS
    const records: BenchmarkRecord[] = []
    const repeat = Math.max(1, Math.floor(options.repeat))

    cases.forEach((testCase, index) => {
      options.onProgress?.(index + 1, cases.length, `${testCase.distribution} × ${testCase.size}`)

      if (testCase.values.length === 0) {
        return
      }

      const k = Math.floor(testCase.size / 2)
      const base = { size: testCase.size, distribution: testCase.distribution, k }

      const measurements: Partial<Record<AlgorithmName, AlgorithmMeasurement>> = {}
      for (const algorithm of ['randomized', 'deterministic'] as const) {
        try {
          measurements[algorithm] = this.measure(selectors[algorithm], testCase.values, k, repeat, options.random)
        } catch (error) {
          records.push({ ...base, status: 'failed', algorithm, error: describeError(error) })
          return
        }
      }

      const randomized = measurements.randomized
      const deterministic = measurements.deterministic
      if (!randomized || !deterministic) {
        return
      }

      const expected = [...testCase.values].sort((a, b) => a - b)[k]
      records.push({
        ...base,
        status: 'success',
        expected,
        correct: randomized.result === expected && deterministic.result === expected,
        randomized,
        deterministic,
        ratio: calculateRatio(deterministic.time, randomized.time),
      })
    })

    return records
  }

  /**
   * 執行 repeat 次並取中位數耗時（毫秒）
   */
  private static measure(
    selector: Selector,
    values: number[],
    k: number,
    repeat: number,
    random: RandomSource
  ): AlgorithmMeasurement {
    const samples: number[] = []
    let result = 0
    let stats: SelectionStats = { partitions: 0, comparisons: 0 }

    for (let run = 0; run < repeat; run++) {
      stats = { partitions: 0, comparisons: 0 }
      const start = performance.now()
      result = selector(values, k, { random, stats })
      samples.push(performance.now() - start)
    }

    return { time: medianOf(samples), result, partitions: stats.partitions }
  }
}

/** 確定性 / 隨機 耗時比值；隨機耗時為 0 時傳回 Infinity */
export function calculateRatio(deterministicTime: number, randomizedTime: number): number {
  return randomizedTime > 0 ? deterministicTime / randomizedTime : Infinity
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
