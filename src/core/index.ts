import { AlgorithmName, Selector } from '../types/selection-types'
import { randomizedSelect } from './randomized-selector'
import { deterministicSelect } from './deterministic-selector'

export { naturalOrder, partition, swap } from './partitioner'
export { groupMedian, GROUP_SIZE } from './group-median'
export { randomizedSelect } from './randomized-selector'
export { deterministicSelect } from './deterministic-selector'
export { SelectionError, EmptyInputError, RankOutOfRangeError, assertSelectable } from './selection-errors'

/** 算法名稱到選擇函數的對照表 */
export const SELECTORS: Record<AlgorithmName, Selector> = {
  randomized: randomizedSelect,
  deterministic: deterministicSelect,
}

export const ALGORITHM_NAMES: AlgorithmName[] = ['randomized', 'deterministic']
