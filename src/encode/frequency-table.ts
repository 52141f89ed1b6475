// Symbol frequency counting

import { createReadStream } from 'node:fs'
import { NUM_SYMBOLS, MAX_FREQUENCY } from '../common/constants'
import { HuffmanDataError, HuffmanIoError } from '../errors'

// Index = byte value, entry = occurrence count
export type FrequencyTable = Uint32Array

export function createFrequencyTable(): FrequencyTable {
  return new Uint32Array(NUM_SYMBOLS)
}

export function frequencyTableAdd(table: FrequencyTable, bytes: Uint8Array): void {
  for (let i = 0; i < bytes.length; i++) {
    const symbol = bytes[i]
    if (table[symbol] === MAX_FREQUENCY) {
      throw new HuffmanDataError(
        'frequency-overflow',
        `Symbol ${symbol} occurs more than ${MAX_FREQUENCY} times`
      )
    }
    table[symbol]++
  }
}

export function buildFrequencyTable(bytes: Uint8Array): FrequencyTable {
  const table = createFrequencyTable()
  frequencyTableAdd(table, bytes)
  return table
}

// Tally a file chunk by chunk without holding it in memory
export async function readFrequencyTable(path: string): Promise<FrequencyTable> {
  const table = createFrequencyTable()
  try {
    for await (const chunk of createReadStream(path)) {
      if (!(chunk instanceof Uint8Array)) {
        throw new TypeError('Expected binary chunks from file stream')
      }
      frequencyTableAdd(table, chunk)
    }
  } catch (err) {
    if (err instanceof HuffmanDataError) throw err
    throw new HuffmanIoError(path, err)
  }
  return table
}

export function distinctSymbols(table: FrequencyTable): number {
  let n = 0
  for (let i = 0; i < table.length; i++) {
    if (table[i] > 0) n++
  }
  return n
}

export function totalCount(table: FrequencyTable): number {
  let sum = 0
  for (let i = 0; i < table.length; i++) {
    sum += table[i]
  }
  return sum
}
