// Container header: frequency table and exact payload bit length
//
//   magic "HFPK" | version u8 | (symbols - 1) u8
//   | symbols x (symbol u8, frequency u32) | bit length u64 | payload
//
// All integers big-endian, symbols in ascending order.

import { NUM_SYMBOLS } from '../common/constants'
import { HuffmanDataError, invariant } from '../errors'
import { createFrequencyTable, distinctSymbols } from '../encode/frequency-table'
import type { FrequencyTable } from '../encode/frequency-table'

export const CONTAINER_MAGIC = new Uint8Array([0x48, 0x46, 0x50, 0x4B])
export const CONTAINER_VERSION = 1

const PREFIX_SIZE = CONTAINER_MAGIC.length + 2
const ENTRY_SIZE = 5
const BIT_LENGTH_SIZE = 8

export interface ContainerHeader {
  version: number
  frequencies: FrequencyTable
  bitLength: number
  headerSize: number // offset of the payload
}

export function headerSize(symbolCount: number): number {
  return PREFIX_SIZE + symbolCount * ENTRY_SIZE + BIT_LENGTH_SIZE
}

export function payloadSize(bitLength: number): number {
  return Math.ceil(bitLength / 8)
}

function corrupt(message: string): HuffmanDataError {
  return new HuffmanDataError('corrupt-container', message)
}

export function writeHeader(frequencies: FrequencyTable, bitLength: number): Uint8Array {
  const symbolCount = distinctSymbols(frequencies)
  invariant(symbolCount >= 2, 'A container needs at least 2 distinct symbols')
  invariant(Number.isSafeInteger(bitLength) && bitLength >= 0, `Invalid bit length ${bitLength}`)

  const out = new Uint8Array(headerSize(symbolCount))
  const view = new DataView(out.buffer)
  out.set(CONTAINER_MAGIC, 0)
  view.setUint8(4, CONTAINER_VERSION)
  view.setUint8(5, symbolCount - 1)

  let offset = PREFIX_SIZE
  for (let symbol = 0; symbol < NUM_SYMBOLS; symbol++) {
    if (frequencies[symbol] === 0) continue
    view.setUint8(offset, symbol)
    view.setUint32(offset + 1, frequencies[symbol])
    offset += ENTRY_SIZE
  }
  view.setBigUint64(offset, BigInt(bitLength))

  return out
}

export function readHeader(data: Uint8Array): ContainerHeader {
  if (data.length < PREFIX_SIZE) {
    throw corrupt(`Container truncated: ${data.length} bytes`)
  }
  for (let i = 0; i < CONTAINER_MAGIC.length; i++) {
    if (data[i] !== CONTAINER_MAGIC[i]) {
      throw corrupt('Not a huffpack container (bad magic)')
    }
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  const version = view.getUint8(4)
  if (version !== CONTAINER_VERSION) {
    throw corrupt(`Unsupported container version ${version}`)
  }

  const symbolCount = view.getUint8(5) + 1
  if (symbolCount < 2) {
    throw corrupt('Container declares fewer than 2 symbols')
  }
  const size = headerSize(symbolCount)
  if (data.length < size) {
    throw corrupt(`Container truncated: header needs ${size} bytes, got ${data.length}`)
  }

  const frequencies = createFrequencyTable()
  let offset = PREFIX_SIZE
  let previous = -1
  for (let i = 0; i < symbolCount; i++) {
    const symbol = view.getUint8(offset)
    const frequency = view.getUint32(offset + 1)
    if (symbol <= previous) {
      throw corrupt(`Symbol ${symbol} out of order in frequency table`)
    }
    if (frequency === 0) {
      throw corrupt(`Symbol ${symbol} stored with zero frequency`)
    }
    frequencies[symbol] = frequency
    previous = symbol
    offset += ENTRY_SIZE
  }

  const bitLength = view.getBigUint64(offset)
  if (bitLength > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw corrupt(`Payload bit length ${bitLength} is too large`)
  }

  return { version, frequencies, bitLength: Number(bitLength), headerSize: size }
}
