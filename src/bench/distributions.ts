import { DistributionName, RandomSource, TestCase } from '../types/selection-types'
import { ALL_EQUAL_VALUE, FEW_UNIQUE_VALUES, RANDOM_VALUE_FACTOR } from './defaults'

/**
 * 產生指定分布的輸入陣列
 */
export function generateDistribution(distribution: DistributionName, size: number, random: RandomSource): number[] {
  switch (distribution) {
    case 'random':
      return Array.from({ length: size }, () => random.nextInt(1, size * RANDOM_VALUE_FACTOR))
    case 'sorted':
      return Array.from({ length: size }, (_, i) => i + 1)
    case 'reverse_sorted':
      return Array.from({ length: size }, (_, i) => size - i)
    case 'all_equal':
      return new Array<number>(size).fill(ALL_EQUAL_VALUE)
    case 'few_unique':
      return Array.from(
        { length: size },
        () => FEW_UNIQUE_VALUES[random.nextInt(0, FEW_UNIQUE_VALUES.length - 1)]
      )
  }
}

/**
 * 按 規模 × 分布 產生全部測試場景，順序為先規模後分布
 */
export function generateTestCases(
  sizes: readonly number[],
  distributions: readonly DistributionName[],
  random: RandomSource
): TestCase[] {
  const cases: TestCase[] = []
  for (const size of sizes) {
    for (const distribution of distributions) {
      cases.push({ size, distribution, values: generateDistribution(distribution, size, random) })
    }
  }
  return cases
}
