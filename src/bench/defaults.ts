import { DistributionName } from '../types/selection-types'

/** 預設輸入規模 */
export const DEFAULT_SIZES = [100, 500, 1000, 5000]

export const DISTRIBUTION_NAMES: DistributionName[] = ['random', 'sorted', 'reverse_sorted', 'all_equal', 'few_unique']

/** 每個場景每個算法的預設執行次數，計時取中位數 */
export const DEFAULT_REPEAT = 1

/** all_equal 分布使用的常數值 */
export const ALL_EQUAL_VALUE = 42

/** few_unique 分布的取值集合 */
export const FEW_UNIQUE_VALUES = [1, 2, 3, 4, 5]

/** random 分布的取值上限為 size 的倍數 */
export const RANDOM_VALUE_FACTOR = 10
