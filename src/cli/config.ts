import { z } from 'zod'
import { HuffmanError } from '../errors'

export class ConfigError extends HuffmanError {}

const EnvSchema = z.object({
  HUFFPACK_SUFFIX: z
    .string()
    .regex(/^\.[^/\\]+$/, 'must start with a dot and contain no path separators')
    .default('.hfp'),
  HUFFPACK_MAX_OUTPUT_SIZE: z.coerce.number().int().positive().optional(),
  HUFFPACK_VERBOSE: z
    .enum(['0', '1', 'false', 'true'])
    .optional()
    .transform((v) => v === '1' || v === 'true'),
})

export const CommandOptionsSchema = z.object({
  output: z.string().min(1).optional(),
  force: z.boolean().default(false),
  verbose: z.boolean().default(false),
  maxOutputSize: z.coerce.number().int().positive().optional(),
})

export interface HuffpackConfig {
  suffix: string
  maxOutputSize?: number
  verbose: boolean
}

export interface CommandOptions {
  output?: string
  force: boolean
  verbose: boolean
  maxOutputSize?: number
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`)
    .join('; ')
}

/**
 * Read settings from the environment. Throws ConfigError if a variable is invalid.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): HuffpackConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`)
  }
  return {
    suffix: parsed.data.HUFFPACK_SUFFIX,
    maxOutputSize: parsed.data.HUFFPACK_MAX_OUTPUT_SIZE,
    verbose: parsed.data.HUFFPACK_VERBOSE,
  }
}

/**
 * Validate raw command-line options and merge them over the environment config.
 * Flags win over environment variables.
 */
export function resolveCommandOptions(raw: unknown, config: HuffpackConfig): CommandOptions {
  const parsed = CommandOptionsSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(`Invalid options: ${describeIssues(parsed.error)}`)
  }
  return {
    output: parsed.data.output,
    force: parsed.data.force,
    verbose: parsed.data.verbose || config.verbose,
    maxOutputSize: parsed.data.maxOutputSize ?? config.maxOutputSize,
  }
}
