import chalk from 'chalk'
import ora from 'ora'
import { BenchmarkRunner } from '../../bench/benchmark-runner'
import { generateTestCases } from '../../bench/distributions'
import { DEFAULT_REPEAT, DEFAULT_SIZES, DISTRIBUTION_NAMES } from '../../bench/defaults'
import { BenchCommandOptions, BenchmarkRecord, DistributionName } from '../../types/selection-types'
import { createRandomSource } from '../../utils/random'
import { OptionError, parseDistributions, parseIntegerOption, parseSizes } from '../common/option-parsers'
import { printBenchmarkSummary, printBenchmarkTable, printTimingChart } from './report'

interface BenchSettings {
  sizes: number[]
  distributions: DistributionName[]
  repeat: number
  seed?: number
}

/** 合併命令列選項與預設值 */
function resolveBenchSettings(options: BenchCommandOptions): BenchSettings {
  return {
    sizes: options.sizes ? parseSizes(options.sizes) : DEFAULT_SIZES,
    distributions: options.distributions ? parseDistributions(options.distributions) : DISTRIBUTION_NAMES,
    repeat: options.repeat ? parseIntegerOption(options.repeat, '重複次數', 1) : DEFAULT_REPEAT,
    seed: options.seed !== undefined ? parseIntegerOption(options.seed, '種子', 0) : undefined,
  }
}

/** 基準測試執行器，集中處理場景生成、計時與報表 */
export class BenchExecutor {
  static execute(options: BenchCommandOptions): BenchmarkRecord[] {
    let settings: BenchSettings
    try {
      settings = resolveBenchSettings(options)
    } catch (error) {
      if (error instanceof OptionError) {
        console.error(chalk.red('❌ 参數錯誤:'), error.message)
        process.exitCode = 1
        return []
      }
      throw error
    }

    const { sizes, distributions, repeat, seed } = settings
    const random = createRandomSource(seed)
    const cases = generateTestCases(sizes, distributions, random)

    if (options.json) {
      const records = BenchmarkRunner.run(cases, { repeat, random })
      console.log(JSON.stringify(records, (_key, value: unknown) => (value === Infinity ? 'Infinity' : value), 2))
      return records
    }

    console.log(chalk.blue('⏱️  場景數量:'), `${sizes.length} 種規模 × ${distributions.length} 種分布`)
    console.log(chalk.blue('🎲 隨機種子:'), seed !== undefined ? seed.toString() : '未指定（Math.random）')
    console.log()

    const spinner = ora('📦 開始基準測試').start()
    const records = BenchmarkRunner.run(cases, {
      repeat,
      random,
      onProgress: (current, total, label) => {
        spinner.text = `⚙️ 正在計時... (${current}/${total}: ${label})`
        spinner.render()
      },
    })

    if (records.some((record) => record.status === 'failed')) {
      spinner.warn('基準測試完成，部分場景執行失敗')
    } else {
      spinner.succeed('基準測試完成！')
    }
    console.log()

    printBenchmarkTable(records)
    printBenchmarkSummary(records)
    if (options.chart !== false) {
      printTimingChart(records)
    }

    return records
  }
}
