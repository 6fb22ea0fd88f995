import { OrderedSequence, SelectionErrorKind } from '../types/selection-types'

/**
 * 選擇前置條件錯誤的基底類別
 */
export class SelectionError extends Error {
  readonly kind: SelectionErrorKind

  constructor(kind: SelectionErrorKind, message: string) {
    super(message)
    this.name = new.target.name
    this.kind = kind
  }
}

/** 序列為空 */
export class EmptyInputError extends SelectionError {
  constructor() {
    super('EmptyInput', '序列為空，無法進行選擇')
  }
}

/** 排名不在 [0, n-1] 範圍内 */
export class RankOutOfRangeError extends SelectionError {
  readonly rank: number
  readonly length: number

  constructor(rank: number, length: number) {
    super('RankOutOfRange', `排名 k=${rank} 超出範圍，必須是 0 到 ${length - 1} 之間的整數`)
    this.rank = rank
    this.length = length
  }
}

/**
 * 在進入選擇循環前校驗一次輸入，之後的縮小步骤不再重複檢查
 */
export function assertSelectable<T>(sequence: OrderedSequence<T>, k: number): void {
  if (sequence.length === 0) {
    throw new EmptyInputError()
  }
  if (!Number.isInteger(k) || k < 0 || k >= sequence.length) {
    throw new RankOutOfRangeError(k, sequence.length)
  }
}
