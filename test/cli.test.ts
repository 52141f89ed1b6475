import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ConfigError, loadConfig, resolveCommandOptions } from '../src/cli/config'
import { createLogger } from '../src/cli/logger'
import { defaultOutputPath, describeFile } from '../src/cli/commands'
import { ratio, symbolLabel } from '../src/cli/format'
import { createProgram, exitCodeFor } from '../src/cli/program'
import { HuffmanDataError, HuffmanIoError } from '../src/errors'

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({ suffix: '.hfp', maxOutputSize: undefined, verbose: false })
  })

  it('reads and coerces environment variables', () => {
    const config = loadConfig({
      HUFFPACK_SUFFIX: '.huf',
      HUFFPACK_MAX_OUTPUT_SIZE: '1024',
      HUFFPACK_VERBOSE: 'true',
    })
    expect(config).toEqual({ suffix: '.huf', maxOutputSize: 1024, verbose: true })
  })

  it('rejects invalid values', () => {
    expect(() => loadConfig({ HUFFPACK_SUFFIX: 'huf' })).toThrow(ConfigError)
    expect(() => loadConfig({ HUFFPACK_MAX_OUTPUT_SIZE: 'lots' })).toThrow(/HUFFPACK_MAX_OUTPUT_SIZE/)
    expect(() => loadConfig({ HUFFPACK_VERBOSE: 'yes' })).toThrow(ConfigError)
  })
})

describe('resolveCommandOptions', () => {
  const config = { suffix: '.hfp', maxOutputSize: 5, verbose: false }

  it('lets flags override the environment', () => {
    expect(resolveCommandOptions({ force: true, maxOutputSize: '10' }, config)).toEqual({
      output: undefined,
      force: true,
      verbose: false,
      maxOutputSize: 10,
    })
  })

  it('falls back to the environment', () => {
    const options = resolveCommandOptions({}, { ...config, verbose: true })
    expect(options.verbose).toBe(true)
    expect(options.force).toBe(false)
    expect(options.maxOutputSize).toBe(5)
  })

  it('rejects a non-numeric size', () => {
    expect(() => resolveCommandOptions({ maxOutputSize: 'big' }, config)).toThrow(/Invalid options/)
  })
})

describe('createLogger', () => {
  it('only prints debug output when verbose', () => {
    const quiet: string[] = []
    createLogger({ verbose: false, err: (line) => quiet.push(line) }).debug('hidden')
    expect(quiet).toEqual([])

    const loud: string[] = []
    createLogger({ verbose: true, err: (line) => loud.push(line) }).debug('shown', { n: 1 })
    expect(loud).toHaveLength(1)
    expect(loud[0]).toContain('[debug]')
    expect(loud[0]).toContain('shown {"n":1}')
  })

  it('sends results to out and errors to err', () => {
    const out: string[] = []
    const err: string[] = []
    const logger = createLogger({ verbose: false, out: (l) => out.push(l), err: (l) => err.push(l) })
    logger.info('result')
    logger.error('broken')
    expect(out).toEqual(['result'])
    expect(err).toHaveLength(1)
    expect(err[0]).toContain('broken')
  })
})

describe('format helpers', () => {
  it('labels printable and non-printable symbols', () => {
    expect(symbolLabel(97)).toBe("'a'")
    expect(symbolLabel(10)).toBe('0x0a')
    expect(symbolLabel(32)).toBe('0x20')
    expect(symbolLabel(255)).toBe('0xff')
  })

  it('formats ratios', () => {
    expect(ratio(50, 100)).toBe('50.0%')
    expect(ratio(1, 3)).toBe('33.3%')
    expect(ratio(1, 0)).toBe('-')
  })
})

describe('defaultOutputPath', () => {
  it('appends the suffix when compressing', () => {
    expect(defaultOutputPath('notes.txt', 'compress', '.hfp')).toBe('notes.txt.hfp')
  })

  it('strips the suffix when decompressing', () => {
    expect(defaultOutputPath('notes.txt.hfp', 'decompress', '.hfp')).toBe('notes.txt')
  })

  it('appends .out when the suffix is missing', () => {
    expect(defaultOutputPath('archive', 'decompress', '.hfp')).toBe('archive.out')
    expect(defaultOutputPath('.hfp', 'decompress', '.hfp')).toBe('.hfp.out')
  })
})

describe('exitCodeFor', () => {
  it('maps I/O failures to 2 and everything else to 1', () => {
    expect(exitCodeFor(new HuffmanIoError('x', new Error('gone')))).toBe(2)
    expect(exitCodeFor(new HuffmanDataError('incomplete-code', 'bad'))).toBe(1)
    expect(exitCodeFor(new Error('other'))).toBe(1)
  })
})

describe('huffpack commands', () => {
  let dir: string
  let out: string[]
  let err: string[]
  let exitCodes: number[]

  const run = async (...args: string[]): Promise<void> => {
    const program = createProgram({
      env: {},
      out: (line) => out.push(line),
      err: (line) => err.push(line),
      setExitCode: (code) => exitCodes.push(code),
    })
    await program.parseAsync(['node', 'huffpack', ...args])
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'huffpack-cli-'))
    out = []
    err = []
    exitCodes = []
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('compresses and decompresses a file', async () => {
    const input = join(dir, 'notes.txt')
    const original = 'she sells sea shells by the sea shore\n'.repeat(50)
    writeFileSync(input, original)

    await run('compress', input)
    expect(exitCodes).toEqual([])
    expect(existsSync(`${input}.hfp`)).toBe(true)
    expect(out).toHaveLength(1)
    expect(out[0]).toContain(`${input} -> ${input}.hfp`)

    const restored = join(dir, 'restored.txt')
    await run('decompress', `${input}.hfp`, '-o', restored)
    expect(exitCodes).toEqual([])
    expect(readFileSync(restored, 'utf8')).toBe(original)
  })

  it('refuses to overwrite without --force', async () => {
    const input = join(dir, 'data.txt')
    writeFileSync(input, 'abcabc')

    await run('compress', input)
    await run('compress', input)
    expect(exitCodes).toEqual([1])
    expect(err[0]).toContain('already exists (use --force to overwrite)')

    await run('compress', input, '--force')
    expect(exitCodes).toEqual([1])
  })

  it('exits with 2 when the input cannot be read', async () => {
    await run('compress', join(dir, 'missing.txt'))
    expect(exitCodes).toEqual([2])
    expect(err[0]).toContain('Cannot read')
  })

  it('exits with 1 for input that cannot be coded', async () => {
    const input = join(dir, 'same.txt')
    writeFileSync(input, 'zzzz')
    await run('compress', input)
    expect(exitCodes).toEqual([1])
    expect(err[0]).toContain('Need at least 2 distinct symbols to build a code, found 1 [alphabet-too-small]')
  })

  it('enforces --max-output-size', async () => {
    const input = join(dir, 'big.txt')
    writeFileSync(input, 'ab'.repeat(100))
    await run('compress', input)

    await run('decompress', `${input}.hfp`, '-o', join(dir, 'out.txt'), '--max-output-size', '10')
    expect(exitCodes).toEqual([1])
    expect(err[0]).toContain('Decompressed size 200 exceeds limit 10')
    expect(existsSync(join(dir, 'out.txt'))).toBe(false)
  })

  it('prints code statistics', async () => {
    const input = join(dir, 'aab.txt')
    writeFileSync(input, 'aab')
    await run('stats', input)
    expect(exitCodes).toEqual([])
    expect(out).toHaveLength(1)
    expect(out[0]).toContain('distinct symbols 2')
    expect(out[0]).toContain('payload bits     3')
    expect(err).toEqual([])
  })

  it('prints debug output for stats with --verbose', async () => {
    const input = join(dir, 'aab.txt')
    writeFileSync(input, 'aab')
    await run('stats', input, '-v')
    expect(exitCodes).toEqual([])
    expect(out).toHaveLength(1)
    expect(err).toHaveLength(1)
    expect(err[0]).toContain('[debug]')
    expect(err[0]).toContain(`analyzing ${input}`)
  })
})

describe('describeFile', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'huffpack-stats-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('summarizes the code for a file', async () => {
    const input = join(dir, 'aab.txt')
    writeFileSync(input, 'aab')
    expect(await describeFile(input)).toEqual({
      input,
      inputBytes: 3,
      distinctSymbols: 2,
      treeDepth: 1,
      payloadBits: 3,
      compressedBytes: 25,
      codes: [
        { symbol: 97, frequency: 2, code: '1' },
        { symbol: 98, frequency: 1, code: '0' },
      ],
    })
  })
})
