import { Command } from 'commander'
import { HuffmanDataError, HuffmanError, HuffmanIoError } from '../errors'
import { loadConfig, resolveCommandOptions } from './config'
import type { CommandOptions, HuffpackConfig } from './config'
import { compressFile, decompressFile, describeFile } from './commands'
import { formatStats, formatSummary } from './format'
import { createLogger } from './logger'
import type { Logger } from './logger'

export const VERSION = '0.1.0'

export interface ProgramContext {
  env?: Record<string, string | undefined>
  out?: (line: string) => void
  err?: (line: string) => void
  setExitCode?: (code: number) => void
}

// 1: bad data or usage, 2: I/O failure
export function exitCodeFor(err: unknown): number {
  if (err instanceof HuffmanIoError) return 2
  return 1
}

function describeError(err: unknown): string {
  if (err instanceof HuffmanDataError) return `${err.message} [${err.reason}]`
  if (err instanceof HuffmanError) return err.message
  // Not one of ours: keep the stack
  if (err instanceof Error) return err.stack ?? err.message
  return String(err)
}

export function createProgram(context: ProgramContext = {}): Command {
  const setExitCode = context.setExitCode ?? ((code: number) => { process.exitCode = code })

  // Resolved per command so a bad environment is reported like any other failure
  const setup = (raw: unknown): { config: HuffpackConfig; options: CommandOptions; logger: Logger } => {
    const config = loadConfig(context.env ?? process.env)
    const options = resolveCommandOptions(raw, config)
    const logger = createLogger({ verbose: options.verbose, out: context.out, err: context.err })
    return { config, options, logger }
  }

  const run = async (action: () => Promise<void>): Promise<void> => {
    try {
      await action()
    } catch (err) {
      const logger = createLogger({ verbose: false, out: context.out, err: context.err })
      logger.error(describeError(err))
      setExitCode(exitCodeFor(err))
    }
  }

  const program = new Command()

  program
    .name('huffpack')
    .description('Compress and decompress files with Huffman coding')
    .version(VERSION)

  program
    .command('compress')
    .description('Compress a file into a huffpack container')
    .argument('<input>', 'file to compress')
    .option('-o, --output <path>', 'output file (default: <input><suffix>)')
    .option('-f, --force', 'overwrite an existing output file')
    .option('-v, --verbose', 'show debug output')
    .action(async (input: string, raw: unknown) => {
      await run(async () => {
        const { config, options, logger } = setup(raw)
        logger.debug(`compressing ${input}`)
        const summary = await compressFile(input, options, config.suffix, logger)
        logger.success(formatSummary(summary))
      })
    })

  program
    .command('decompress')
    .description('Restore a file from a huffpack container')
    .argument('<input>', 'container to decompress')
    .option('-o, --output <path>', 'output file (default: <input> without suffix)')
    .option('-f, --force', 'overwrite an existing output file')
    .option('-v, --verbose', 'show debug output')
    .option('--max-output-size <bytes>', 'refuse to produce more than this many bytes')
    .action(async (input: string, raw: unknown) => {
      await run(async () => {
        const { config, options, logger } = setup(raw)
        logger.debug(`decompressing ${input}`)
        const summary = await decompressFile(input, options, config.suffix, logger)
        logger.success(formatSummary(summary))
      })
    })

  program
    .command('stats')
    .description('Show the Huffman code a file would be compressed with')
    .argument('<input>', 'file to analyze')
    .option('-v, --verbose', 'show debug output')
    .action(async (input: string, raw: unknown) => {
      await run(async () => {
        const { logger } = setup(raw)
        logger.debug(`analyzing ${input}`)
        const stats = await describeFile(input)
        logger.info(formatStats(stats))
      })
    })

  return program
}
