import { readFile, writeFile } from 'node:fs/promises'
import { HuffmanError, HuffmanIoError } from '../errors'
import { huffmanCompress, huffmanDecompress } from '../container/container'
import { headerSize, payloadSize } from '../container/header'
import { distinctSymbols, readFrequencyTable, totalCount } from '../encode/frequency-table'
import { buildHuffmanTree, treeStats } from '../encode/huffman-tree'
import { buildCodeTable, weightedCodeLength } from '../encode/code-table'
import type { CommandOptions } from './config'
import type { Logger } from './logger'

export class OutputExistsError extends HuffmanError {
  readonly path: string

  constructor(path: string) {
    super(`${path} already exists (use --force to overwrite)`)
    this.path = path
  }
}

export interface TransformSummary {
  input: string
  output: string
  inputBytes: number
  outputBytes: number
}

export interface SymbolCode {
  symbol: number
  frequency: number
  code: string
}

export interface FileStats {
  input: string
  inputBytes: number
  distinctSymbols: number
  treeDepth: number
  payloadBits: number
  compressedBytes: number
  codes: SymbolCode[]
}

export type Direction = 'compress' | 'decompress'

export function defaultOutputPath(input: string, direction: Direction, suffix: string): string {
  if (direction === 'compress') {
    return input + suffix
  }
  if (input.endsWith(suffix) && input.length > suffix.length) {
    return input.slice(0, -suffix.length)
  }
  return `${input}.out`
}

async function readInput(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(path))
  } catch (err) {
    throw new HuffmanIoError(path, err)
  }
}

async function writeOutput(path: string, data: Uint8Array, force: boolean): Promise<void> {
  try {
    // 'wx' fails on an existing file instead of truncating it
    await writeFile(path, data, { flag: force ? 'w' : 'wx' })
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
      throw new OutputExistsError(path)
    }
    throw new HuffmanIoError(path, err, 'write')
  }
}

export async function compressFile(
  input: string,
  options: CommandOptions,
  suffix: string,
  logger: Logger
): Promise<TransformSummary> {
  const output = options.output ?? defaultOutputPath(input, 'compress', suffix)
  const data = await readInput(input)
  logger.debug(`read ${data.length} bytes from ${input}`)

  const compressed = huffmanCompress(data)
  logger.debug(`encoded into ${compressed.length} bytes`)

  await writeOutput(output, compressed, options.force)
  return { input, output, inputBytes: data.length, outputBytes: compressed.length }
}

export async function decompressFile(
  input: string,
  options: CommandOptions,
  suffix: string,
  logger: Logger
): Promise<TransformSummary> {
  const output = options.output ?? defaultOutputPath(input, 'decompress', suffix)
  const data = await readInput(input)
  logger.debug(`read ${data.length} bytes from ${input}`)

  const decompressed = huffmanDecompress(data, { maxOutputSize: options.maxOutputSize })
  logger.debug(`decoded ${decompressed.length} bytes`)

  await writeOutput(output, decompressed, options.force)
  return { input, output, inputBytes: data.length, outputBytes: decompressed.length }
}

export async function describeFile(input: string): Promise<FileStats> {
  const frequencies = await readFrequencyTable(input)
  const tree = buildHuffmanTree(frequencies)
  const table = buildCodeTable(tree)
  const payloadBits = weightedCodeLength(table, frequencies)
  const symbols = distinctSymbols(frequencies)

  const codes: SymbolCode[] = []
  for (let symbol = 0; symbol < table.length; symbol++) {
    const code = table[symbol]
    if (code !== null) {
      codes.push({ symbol, frequency: frequencies[symbol], code })
    }
  }
  // Most frequent first, then by byte value
  codes.sort((a, b) => b.frequency - a.frequency || a.symbol - b.symbol)

  return {
    input,
    inputBytes: totalCount(frequencies),
    distinctSymbols: symbols,
    treeDepth: treeStats(tree).depth,
    payloadBits,
    compressedBytes: headerSize(symbols) + payloadSize(payloadBits),
    codes,
  }
}
