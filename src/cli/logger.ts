import chalk from 'chalk'

export interface Logger {
  debug(...args: unknown[]): void
  info(message: string): void
  success(message: string): void
  warn(message: string): void
  error(message: string): void
}

export interface LoggerOptions {
  verbose: boolean
  out?: (line: string) => void
  err?: (line: string) => void
}

function format(args: unknown[]): string {
  return args
    .map((arg) => (typeof arg === 'string' ? arg : JSON.stringify(arg)))
    .join(' ')
}

/**
 * Results go to stdout; diagnostics, warnings and errors to stderr.
 */
export function createLogger(options: LoggerOptions): Logger {
  const out = options.out ?? ((line: string) => console.log(line))
  const err = options.err ?? ((line: string) => console.error(line))

  return {
    debug(...args) {
      if (options.verbose) {
        err(`${chalk.dim('[debug]')} ${format(args)}`)
      }
    },
    info(message) {
      out(message)
    },
    success(message) {
      out(`${chalk.green('+')} ${message}`)
    },
    warn(message) {
      err(chalk.yellow(message))
    },
    error(message) {
      err(`${chalk.red('error:')} ${message}`)
    },
  }
}
