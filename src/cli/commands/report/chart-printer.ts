import chalk from 'chalk'
import { AlgorithmName, BenchmarkRecord, DistributionName } from '../../../types/selection-types'
import { formatMs } from './bench-printer'

const BAR_LENGTH = 30

const ALGORITHM_TITLES: Record<AlgorithmName, string> = {
  randomized: '隨機選擇',
  deterministic: '確定性選擇',
}

/**
 * 把一個耗時換成固定宽度的條形
 */
export function renderBar(value: number, maxValue: number, barLength: number = BAR_LENGTH): string {
  const scaled = maxValue > 0 ? (value / maxValue) * barLength : 0
  const filledLength = Math.min(barLength, Math.max(0, Math.round(scaled)))
  return '█'.repeat(filledLength) + ' '.repeat(barLength - filledLength)
}

/**
 * 打印「規模 - 耗時」條形圖，每個算法一塊，按分布分組
 */
export function printTimingChart(records: BenchmarkRecord[]): void {
  const succeeded = records.flatMap((record) => (record.status === 'success' ? [record] : []))
  if (succeeded.length === 0) {
    return
  }

  for (const algorithm of ['randomized', 'deterministic'] as const) {
    console.log(chalk.cyan.bold(`📈 ${ALGORITHM_TITLES[algorithm]}耗時 (ms):`))
    console.log()

    const maxTime = Math.max(...succeeded.map((record) => record[algorithm].time))
    const byDistribution = new Map<DistributionName, typeof succeeded>()
    for (const record of succeeded) {
      const group = byDistribution.get(record.distribution) ?? []
      group.push(record)
      byDistribution.set(record.distribution, group)
    }

    byDistribution.forEach((group, distribution) => {
      console.log(chalk.gray(distribution))
      const sizeWidth = Math.max(...group.map((record) => record.size.toString().length))
      for (const record of [...group].sort((a, b) => a.size - b.size)) {
        const time = record[algorithm].time
        console.log(`  ${record.size.toString().padStart(sizeWidth)}: ${renderBar(time, maxTime)} ${formatMs(time)}`)
      }
    })

    console.log()
  }
}
