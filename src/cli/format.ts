import chalk from 'chalk'
import type { FileStats, TransformSummary } from './commands'

// Printable ASCII shown quoted, everything else as hex
export function symbolLabel(symbol: number): string {
  if (symbol > 0x20 && symbol < 0x7F) {
    return `'${String.fromCharCode(symbol)}'`
  }
  return `0x${symbol.toString(16).padStart(2, '0')}`
}

export function ratio(outputBytes: number, inputBytes: number): string {
  if (inputBytes === 0) return '-'
  return `${((outputBytes / inputBytes) * 100).toFixed(1)}%`
}

export function formatSummary(summary: TransformSummary): string {
  return `${summary.input} -> ${summary.output} ` +
    chalk.dim(`(${summary.inputBytes} B -> ${summary.outputBytes} B, ${ratio(summary.outputBytes, summary.inputBytes)})`)
}

export function formatStats(stats: FileStats): string {
  const lines = [
    '',
    `  ${chalk.bold(stats.input)}`,
    `  bytes            ${stats.inputBytes}`,
    `  distinct symbols ${stats.distinctSymbols}`,
    `  tree depth       ${stats.treeDepth}`,
    `  payload bits     ${stats.payloadBits}`,
    `  compressed size  ${stats.compressedBytes} B (${ratio(stats.compressedBytes, stats.inputBytes)})`,
    '',
  ]

  const labelWidth = Math.max(...stats.codes.map((c) => symbolLabel(c.symbol).length))
  const countWidth = Math.max(...stats.codes.map((c) => String(c.frequency).length))
  for (const { symbol, frequency, code } of stats.codes) {
    lines.push(
      `  ${symbolLabel(symbol).padEnd(labelWidth)}  ${String(frequency).padStart(countWidth)}  ${chalk.cyan(code)}`
    )
  }
  lines.push('')

  return lines.join('\n')
}
