import fs from 'fs'
import chalk from 'chalk'
import { SELECTORS, SelectionError } from '../../core'
import { AlgorithmName, RandomSource, SelectCommandOptions, SelectionStats } from '../../types/selection-types'
import { createRandomSource } from '../../utils/random'
import { createAdaptiveTable, getTerminalWidth } from '../../utils/terminal'
import {
  OptionError,
  parseAlgorithms,
  parseIntegerOption,
  parseNumbers,
  tokenizeValues,
} from '../common/option-parsers'

export interface SelectionOutcome<T> {
  algorithm: AlgorithmName
  value: T
  stats: SelectionStats
}

const ALGORITHM_LABELS: Record<AlgorithmName, string> = {
  randomized: '隨機選擇',
  deterministic: '確定性選擇',
}

/** 讀取 --file 指定的文件，讀取失敗時轉為参數錯誤 */
function readValuesFile(file: string): string {
  try {
    return fs.readFileSync(file, 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new OptionError(`無法讀取文件 ${file}: ${reason}`)
  }
}

/** 單次選擇命令執行器 */
export class SelectExecutor {
  /**
   * 執行選擇並打印結果
   * 参數或前置條件錯誤時打印原因並把退出碼設為 1
   */
  static execute(tokens: string[], options: SelectCommandOptions): void {
    try {
      const raw = tokenizeValues(options.file ? [...tokens, readValuesFile(options.file)] : tokens)
      const algorithms = parseAlgorithms(options.algorithm)
      const random = createRandomSource(
        options.seed !== undefined ? parseIntegerOption(options.seed, '種子', 0) : undefined
      )

      if (options.strings) {
        this.report(raw, options, algorithms, random)
      } else {
        this.report(parseNumbers(raw), options, algorithms, random)
      }
    } catch (error) {
      if (error instanceof SelectionError || error instanceof OptionError) {
        console.error(chalk.red('❌ 選擇失敗:'), error.message)
        process.exitCode = 1
        return
      }
      throw error
    }
  }

  /**
   * 用指定算法選出排名 k 的元素
   * 未指定 k 時取下中位數
   */
  static run<T>(
    values: readonly T[],
    rankOption: string | undefined,
    algorithms: readonly AlgorithmName[],
    random: RandomSource
  ): { k: number; outcomes: SelectionOutcome<T>[] } {
    const k =
      rankOption !== undefined
        ? parseIntegerOption(rankOption, '排名 k', Number.MIN_SAFE_INTEGER)
        : Math.floor((values.length - 1) / 2)

    const outcomes = algorithms.map((algorithm) => {
      const stats: SelectionStats = { partitions: 0, comparisons: 0 }
      const value = SELECTORS[algorithm](values, k, { random, stats })
      return { algorithm, value, stats }
    })

    return { k, outcomes }
  }

  private static report<T>(
    values: readonly T[],
    options: SelectCommandOptions,
    algorithms: readonly AlgorithmName[],
    random: RandomSource
  ): void {
    const { k, outcomes } = this.run(values, options.rank, algorithms, random)

    console.log(chalk.blue('🔢 輸入元素:'), `${values.length} 個`)
    console.log(chalk.blue('🎯 目標排名:'), `k = ${k}`)
    console.log()

    const table = createAdaptiveTable(Math.min(getTerminalWidth(), 80), 'summary')
    for (const outcome of outcomes) {
      const statsText = options.stats
        ? chalk.gray(`（分割 ${outcome.stats.partitions} 次，比較 ${outcome.stats.comparisons} 次）`)
        : ''
      table.push([chalk.bold(ALGORITHM_LABELS[outcome.algorithm]), `${String(outcome.value)}${statsText}`])
    }
    console.log(table.toString())
  }
}
