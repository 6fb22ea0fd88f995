import chalk from 'chalk'

/** 基準測試結束後的說明 */
export function printGlobalNotices(): void {
  console.log(chalk.cyan.bold('ℹ️  使用提示:'))
  console.log()
  console.log('  ● 計時說明：耗時為單次呼叫的牆鐘時間，受 JIT 預熱與垃圾回收影響，小規模結果僅供參考，可用 --repeat 取中位數。')
  console.log(
    '  ● 重複值：分割採用嚴格小於比較，與樞紐相等的元素全部分到右側，all_equal 與 few_unique 分布下分割次數明顯增加。'
  )
  console.log('  ● 比值大於 1 表示確定性選擇較慢，它換來的是與輸入無關的最壞線性時間。')
  console.log('  ● 命令說明：使用 rankselect help 查看更多命令。')
  console.log()
}
