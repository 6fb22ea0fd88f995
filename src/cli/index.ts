import { Command } from 'commander'
import chalk from 'chalk'
import { getPackageVersion } from '../utils/version'
import { printGlobalNotices } from './common/notices'
import { BenchCommandOptions, SelectCommandOptions } from '../types/selection-types'
import { SelectExecutor } from './commands/select'
import { BenchExecutor } from './commands/bench'

export type { BenchCommandOptions, SelectCommandOptions }

export class CLIManager {
  private program: Command

  /** 初始化 Commander 實例並完成命令註冊 */
  constructor() {
    this.program = new Command()
    this.setupProgram()
  }

  /** 配置 CLI 的基礎資訊與可用命令 */
  private setupProgram(): void {
    this.program
      .name('rankselect')
      .description('不排序整個序列，直接找出第 k 小的元素，並對比隨機與確定性選擇算法')
      .version(getPackageVersion(), '-v, --version', '顯示版本號')

    this.addSelectCommand()
    this.addBenchCommand()
    this.addHelpCommand()

    this.setupErrorHandling()
  }

  /** 註冊 select 命令：對給定的值做一次排名查詢 */
  private addSelectCommand(): void {
    this.program
      .command('select')
      .description('找出排名 k（從 0 開始）的元素')
      .argument('[values...]', '待選擇的值（空白或逗號分隔）')
      .option('-k, --rank <k>', '目標排名，從 0 開始（預設為下中位數）')
      .option('-a, --algorithm <name>', '算法: randomized | deterministic | both', 'both')
      .option('--seed <n>', '隨機選擇使用的種子')
      .option('--strings', '按字串比較（預設按數字）')
      .option('-f, --file <path>', '從文件讀取值')
      .option('--stats', '顯示分割與比較次數')
      .action((values: string[], options: SelectCommandOptions) => {
        SelectExecutor.execute(values, options)
      })
  }

  /** 註冊 bench 命令：在多種規模與分布下對比兩種算法 */
  private addBenchCommand(): void {
    this.program
      .command('bench')
      .description('對比兩種選擇算法在不同規模與分布下的耗時')
      .option('--sizes <list>', '輸入規模列表 (例如: 100,500,1000,5000)')
      .option('--distributions <list>', '分布列表 (random,sorted,reverse_sorted,all_equal,few_unique)')
      .option('--repeat <n>', '每個場景重複次數，耗時取中位數')
      .option('--seed <n>', '產生輸入與選擇樞紐使用的種子')
      .option('--no-chart', '不顯示耗時條形圖')
      .option('--json', '以 JSON 輸出結果')
      .action((options: BenchCommandOptions) => {
        BenchExecutor.execute(options)
        if (!options.json) {
          printGlobalNotices()
        }
      })
  }

  /** 註冊 help 命令，提供統一的幫助入口 */
  private addHelpCommand(): void {
    const helpCmd = new Command('help').description('顯示幫助資訊').action(() => {
      this.showHelp()
    })

    this.program.addCommand(helpCmd)
  }

  /** 未知命令統一提示 */
  private setupErrorHandling(): void {
    this.program.on('command:*', (operands: string[]) => {
      console.error(chalk.red(`錯誤: 未知命令 '${operands[0]}'`))
      console.log('執行 rankselect help 查看可用命令')
      process.exit(1)
    })
  }

  /** 自定義幫助資訊展示，補充常用示例 */
  private showHelp(): void {
    console.log(`${chalk.bold('rankselect')} ${chalk.gray(`v${getPackageVersion()}`)}
> 在期望線性（隨機）或最壞線性（中位數的中位數）時間内找出第 k 小的元素。

${chalk.bold('使用方法:')}
  rankselect <命令> [選項]

${chalk.bold('命令:')}
  select [值...]    找出排名 k 的元素
  bench             對比兩種算法的耗時
  help              顯示幫助資訊

${chalk.bold('select 選項:')}
  -k, --rank <k>          目標排名，從 0 開始（預設為下中位數）
  -a, --algorithm <name>  randomized | deterministic | both（預設 both）
  --seed <n>              隨機選擇使用的種子
  --strings               按字串比較
  -f, --file <path>       從文件讀取值
  --stats                 顯示分割與比較次數

${chalk.bold('bench 選項:')}
  --sizes <list>          輸入規模列表（預設 100,500,1000,5000）
  --distributions <list>  分布列表（預設全部）
  --repeat <n>            每個場景重複次數（預設 1）
  --seed <n>              固定種子以重現結果
  --no-chart              不顯示耗時條形圖
  --json                  以 JSON 輸出

${chalk.bold('示例:')}
  rankselect select 5 3 8 1 9 2 -k 2          # 傳回 3
  rankselect select -f data.txt --stats       # 從文件讀取並求中位數
  rankselect select pear apple fig --strings  # 按字串比較
  rankselect bench --seed 7                   # 可重現的基準測試
  rankselect bench --sizes 1000 --distributions all_equal,few_unique
`)
  }

  /** 啟動 CLI 参數解析入口 */
  parse(argv: string[]): void {
    this.program.parse(argv)
  }
}
