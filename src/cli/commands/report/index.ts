export { printBenchmarkTable, printBenchmarkSummary, formatMs, formatRatio } from './bench-printer'
export { printTimingChart, renderBar } from './chart-printer'
