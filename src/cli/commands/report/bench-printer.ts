import chalk from 'chalk'
import { BenchmarkRecord } from '../../../types/selection-types'
import { calculateMean } from '../../../utils/statistics'
import { createAdaptiveTable, getTerminalWidth } from '../../../utils/terminal'

type SuccessRecord = Extract<BenchmarkRecord, { status: 'success' }>
type FailedRecord = Extract<BenchmarkRecord, { status: 'failed' }>

/** 毫秒格式化 */
export function formatMs(time: number): string {
  return time.toFixed(3)
}

/** 比值格式化，除以零時顯示 ∞ */
export function formatRatio(ratio: number): string {
  return Number.isFinite(ratio) ? ratio.toFixed(2) : '∞'
}

/** 比值越高代表確定性算法相對越慢 */
function getRatioColor(ratio: number): (text: string) => string {
  if (ratio <= 1) return chalk.green
  if (ratio <= 3) return chalk.yellow
  return chalk.red
}

/**
 * 打印基準測試結果表
 */
export function printBenchmarkTable(records: BenchmarkRecord[]): void {
  if (records.length === 0) {
    console.log(chalk.yellow('⚠️ 沒有可顯示的基準測試結果'))
    console.log()
    return
  }

  console.log(chalk.cyan.bold('📊 選擇算法耗時對比:'))
  console.log()

  const table = createAdaptiveTable(Math.min(getTerminalWidth(), 100), 'results')
  table.push([
    chalk.bold('規模'),
    chalk.bold('分布'),
    chalk.bold('隨機 (ms)'),
    chalk.bold('確定性 (ms)'),
    chalk.bold('比值'),
    chalk.bold('分割次數'),
    chalk.bold('結果'),
  ])

  for (const record of records) {
    if (record.status === 'failed') {
      table.push([
        record.size.toString(),
        record.distribution,
        chalk.gray('-'),
        chalk.gray('-'),
        chalk.gray('-'),
        chalk.gray('-'),
        chalk.red('✗'),
      ])
      continue
    }

    table.push([
      record.size.toString(),
      record.distribution,
      formatMs(record.randomized.time),
      formatMs(record.deterministic.time),
      getRatioColor(record.ratio)(formatRatio(record.ratio)),
      `${record.randomized.partitions} / ${record.deterministic.partitions}`,
      record.correct ? chalk.green('✓') : chalk.red('≠'),
    ])
  }

  console.log(table.toString())
  console.log()
}

/**
 * 打印統計摘要與失敗原因
 */
export function printBenchmarkSummary(records: BenchmarkRecord[]): void {
  const succeeded = records.filter((record): record is SuccessRecord => record.status === 'success')
  const failed = records.filter((record): record is FailedRecord => record.status === 'failed')
  const incorrect = succeeded.filter((record) => !record.correct)

  console.log(chalk.blue('統計資訊:'))
  console.log(`  完成場景: ${chalk.green(succeeded.length)} 個`)
  if (failed.length > 0) {
    console.log(`  執行失敗: ${chalk.red(failed.length)} 個`)
  }
  if (incorrect.length > 0) {
    console.log(`  結果錯誤: ${chalk.red(incorrect.length)} 個`)
  }

  if (succeeded.length > 0) {
    const meanRatio = calculateMean(succeeded.map((record) => record.ratio))
    console.log(`  平均比值 (確定性/隨機): ${formatRatio(meanRatio)}`)

    const slowest = succeeded.reduce((max, record) =>
      record.deterministic.time + record.randomized.time > max.deterministic.time + max.randomized.time ? record : max
    )
    console.log(`  最慢場景: ${chalk.red(`${slowest.distribution} × ${slowest.size}`)}`)
  }

  if (failed.length > 0 || incorrect.length > 0) {
    console.log()
    console.log(chalk.red('❌ 問題明細:'))
    for (const record of failed) {
      console.log(`  ${chalk.red('•')} ${record.algorithm} 在 ${record.distribution} × ${record.size} 執行失敗: ${record.error}`)
    }
    for (const record of incorrect) {
      const actual = [record.randomized.result, record.deterministic.result].join(' / ')
      console.log(
        `  ${chalk.red('•')} ${record.distribution} × ${record.size} 結果錯誤: 得到 ${actual}，預期 ${record.expected}`
      )
    }
  }

  console.log()
}
