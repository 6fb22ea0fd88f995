import { AlgorithmName, DistributionName } from '../../types/selection-types'
import { DISTRIBUTION_NAMES } from '../../bench/defaults'

/** 命令列参數格式錯誤 */
export class OptionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'OptionError'
  }
}

/** 解析整數選項，min 為允許的最小值 */
export function parseIntegerOption(raw: string, label: string, min: number): number {
  const trimmed = raw.trim()
  if (!/^-?\d+$/.test(trimmed)) {
    throw new OptionError(`${label} 必須是整數，收到: ${raw}`)
  }
  const value = Number(trimmed)
  if (value < min) {
    throw new OptionError(`${label} 不能小於 ${min}，收到: ${raw}`)
  }
  return value
}

/** 解析逗號分隔的規模列表，例如 100,500,1000 */
export function parseSizes(raw: string): number[] {
  const sizes = splitList(raw).map((item) => parseIntegerOption(item, '規模', 1))
  if (sizes.length === 0) {
    throw new OptionError('規模列表不能為空')
  }
  return sizes
}

/** 解析逗號分隔的分布列表 */
export function parseDistributions(raw: string): DistributionName[] {
  const names = splitList(raw)
  if (names.length === 0) {
    throw new OptionError('分布列表不能為空')
  }
  return names.map((name) => {
    const match = DISTRIBUTION_NAMES.find((candidate) => candidate === name)
    if (!match) {
      throw new OptionError(`未知的分布: ${name}（可用: ${DISTRIBUTION_NAMES.join(', ')}）`)
    }
    return match
  })
}

/** 解析 --algorithm，both 展開為兩個算法 */
export function parseAlgorithms(raw: string | undefined): AlgorithmName[] {
  switch (raw ?? 'both') {
    case 'both':
      return ['randomized', 'deterministic']
    case 'randomized':
      return ['randomized']
    case 'deterministic':
      return ['deterministic']
    default:
      throw new OptionError(`未知的算法: ${raw}（可用: randomized, deterministic, both）`)
  }
}

/** 把命令列或文件中的值拆成單個字串，支援空白與逗號分隔 */
export function tokenizeValues(tokens: readonly string[]): string[] {
  return tokens.flatMap((token) => splitList(token.replace(/\s+/g, ',')))
}

/** 要求每個值都是有限數字 */
export function parseNumbers(items: readonly string[]): number[] {
  return items.map((item) => {
    const parsed = Number(item)
    if (!Number.isFinite(parsed)) {
      throw new OptionError(`無法解析為數字: ${item}（比較字串請加上 --strings）`)
    }
    return parsed
  })
}

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}
