import Table from 'cli-table3'

export type TableType = 'summary' | 'results'

/**
 * 獲取終端宽度，限制在 40-200 字符之間
 */
export function getTerminalWidth(): number {
  const width = process.stdout.columns || 80
  return Math.max(40, Math.min(width, 200))
}

/**
 * 計算基準結果表格列宽（7列），終端太窄時按比例压缩
 * @param terminalWidth 終端宽度
 */
export function calculateResultTableWidths(terminalWidth: number): number[] {
  const baseWidths = [8, 16, 12, 12, 9, 14, 8] // 規模、分布、隨機、確定性、比值、分割次數、結果
  const columnCount = baseWidths.length
  const minColumnWidth = 4

  // 列間分隔線 (columnCount - 1) + 左右边框 2
  const availableWidth = Math.max(terminalWidth - (columnCount + 1), columnCount * minColumnWidth)
  const baseTotal = baseWidths.reduce((sum, width) => sum + width, 0)

  if (baseTotal <= availableWidth) {
    return baseWidths
  }

  const scale = availableWidth / baseTotal
  return baseWidths.map((width) => Math.max(minColumnWidth, Math.floor(width * scale)))
}

/**
 * 兩列表格（標籤 / 數值）的列宽
 */
function calculateTwoColumnWidths(terminalWidth: number): number[] {
  // 左右边框 2 + 内边距 2 + 分隔符 1
  const availableWidth = terminalWidth - 5
  const labelColumnWidth = Math.max(14, Math.min(Math.floor(availableWidth * 0.35), 22))
  return [labelColumnWidth, availableWidth - labelColumnWidth]
}

/**
 * 创建自適應表格
 * @param terminalWidth 終端宽度
 * @param tableType 表格類型
 * @param options 额外的表格選項
 */
export function createAdaptiveTable(
  terminalWidth: number,
  tableType: TableType,
  options: Table.TableConstructorOptions = {}
) {
  const colWidths =
    tableType === 'results' ? calculateResultTableWidths(terminalWidth) : calculateTwoColumnWidths(terminalWidth)

  return new Table({
    chars: {
      top: '═',
      'top-mid': '╤',
      'top-left': '╔',
      'top-right': '╗',
      bottom: '═',
      'bottom-mid': '╧',
      'bottom-left': '╚',
      'bottom-right': '╝',
      left: '║',
      'left-mid': '╟',
      mid: '─',
      'mid-mid': '┼',
      right: '║',
      'right-mid': '╢',
      middle: '│',
    },
    style: { 'padding-left': 1, 'padding-right': 1, head: [], border: [] },
    wordWrap: true,
    ...options,
    colWidths,
  })
}
