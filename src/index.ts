/**
 * rankselect 函式庫入口
 */
export * from './core'
export { SeededRandom, mathRandom, createRandomSource } from './utils/random'
export * from './types/selection-types'
