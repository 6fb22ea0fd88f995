import { RandomSource } from '../types/selection-types'

// Park-Miller 最小標準產生器
const LCG_MULTIPLIER = 48271
const LCG_MODULUS = 2147483647

/**
 * 可設定種子的虛擬隨機數產生器
 * 相同種子永遠產生相同序列，用於基準測試與測試中的重現
 */
export class SeededRandom implements RandomSource {
  private state: number

  constructor(seed: number) {
    if (!Number.isFinite(seed)) {
      throw new RangeError(`種子必須是有限數字，收到: ${seed}`)
    }
    // 將種子映射到 [1, LCG_MODULUS - 1]
    const span = LCG_MODULUS - 1
    this.state = (((Math.trunc(seed) % span) + span) % span) + 1
  }

  /** 傳回 [0, 1) 的浮點數 */
  next(): number {
    this.state = (this.state * LCG_MULTIPLIER) % LCG_MODULUS
    return (this.state - 1) / (LCG_MODULUS - 1)
  }

  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min
  }

  /** 從非空陣列中隨機取一個元素 */
  pick<T>(items: readonly T[]): T {
    return items[this.nextInt(0, items.length - 1)]
  }
}

/** 預設隨機來源（Math.random） */
export const mathRandom: RandomSource = {
  nextInt(min: number, max: number): number {
    return Math.floor(Math.random() * (max - min + 1)) + min
  },
}

/**
 * 依可選的種子建立隨機來源；未指定種子時退回 Math.random
 */
export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? mathRandom : new SeededRandom(seed)
}
