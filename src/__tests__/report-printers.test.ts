import chalk from 'chalk'
import { describe, it, expect, beforeAll, beforeEach, afterEach, jest } from '@jest/globals'
import {
  formatMs,
  formatRatio,
  printBenchmarkSummary,
  printBenchmarkTable,
  printTimingChart,
  renderBar,
} from '../cli/commands/report'
import { BenchmarkRecord } from '../types/selection-types'

type SuccessRecord = Extract<BenchmarkRecord, { status: 'success' }>

function successRecord(size: number, randomizedTime: number, deterministicTime: number): SuccessRecord {
  return {
    status: 'success',
    size,
    distribution: 'sorted',
    k: Math.floor(size / 2),
    expected: Math.floor(size / 2) + 1,
    correct: true,
    randomized: { time: randomizedTime, result: Math.floor(size / 2) + 1, partitions: 4 },
    deterministic: { time: deterministicTime, result: Math.floor(size / 2) + 1, partitions: 2 },
    ratio: deterministicTime / randomizedTime,
  }
}

const spyOnLog = () => jest.spyOn(console, 'log').mockImplementation(() => undefined)

describe('report printers', () => {
  let logSpy: ReturnType<typeof spyOnLog>

  beforeAll(() => {
    chalk.level = 0
  })

  beforeEach(() => {
    logSpy = spyOnLog()
  })

  afterEach(() => {
    logSpy.mockRestore()
  })

  it('should format times and ratios', () => {
    expect(formatMs(1.23456)).toBe('1.235')
    expect(formatRatio(2.5)).toBe('2.50')
    expect(formatRatio(Infinity)).toBe('∞')
  })

  it('should scale bars against the maximum', () => {
    expect(renderBar(5, 10, 10)).toBe('█████     ')
    expect(renderBar(20, 10, 4)).toBe('████')
    expect(renderBar(0, 0, 4)).toBe('    ')
  })

  it('should warn when there is nothing to print', () => {
    printBenchmarkTable([])

    expect(logSpy).toHaveBeenCalledWith('⚠️ 沒有可顯示的基準測試結果')
  })

  it('should print one table row per record', () => {
    printBenchmarkTable([successRecord(10, 1, 2)])

    const table = String(logSpy.mock.calls.find((args) => String(args[0]).includes('規模'))?.[0])
    expect(table).toContain('sorted')
    expect(table).toContain('1.000')
    expect(table).toContain('2.000')
    expect(table).toContain('2.00')
    expect(table).toContain('4 / 2')
    expect(table).toContain('✓')
  })

  it('should list failures and wrong answers in the summary', () => {
    const base = successRecord(20, 1, 1)
    const wrong: SuccessRecord = { ...base, correct: false, randomized: { ...base.randomized, result: 10 } }

    printBenchmarkSummary([
      successRecord(10, 1, 3),
      wrong,
      { status: 'failed', size: 30, distribution: 'random', k: 15, algorithm: 'deterministic', error: 'boom' },
    ])

    expect(logSpy).toHaveBeenCalledWith('  完成場景: 2 個')
    expect(logSpy).toHaveBeenCalledWith('  執行失敗: 1 個')
    expect(logSpy).toHaveBeenCalledWith('  結果錯誤: 1 個')
    expect(logSpy).toHaveBeenCalledWith('  平均比值 (確定性/隨機): 2.00')
    expect(logSpy).toHaveBeenCalledWith('  最慢場景: sorted × 10')
    expect(logSpy).toHaveBeenCalledWith('  • deterministic 在 random × 30 執行失敗: boom')
    expect(logSpy).toHaveBeenCalledWith('  • sorted × 20 結果錯誤: 得到 10 / 11，預期 11')
  })

  it('should chart each size against the slowest run', () => {
    printTimingChart([successRecord(100, 2, 4), successRecord(10, 1, 1)])

    expect(logSpy).toHaveBeenCalledWith('📈 隨機選擇耗時 (ms):')
    expect(logSpy).toHaveBeenCalledWith(`   10: ${'█'.repeat(15)}${' '.repeat(15)} 1.000`)
    expect(logSpy).toHaveBeenCalledWith(`  100: ${'█'.repeat(30)} 2.000`)
    expect(logSpy).toHaveBeenCalledWith('📈 確定性選擇耗時 (ms):')
    expect(logSpy).toHaveBeenCalledWith(`   10: ${'█'.repeat(8)}${' '.repeat(22)} 1.000`)
  })
})
