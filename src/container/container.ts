// One-shot compression into a self-describing container

import { HuffmanDataError, invariant } from '../errors'
import { buildFrequencyTable, totalCount } from '../encode/frequency-table'
import { buildHuffmanTree } from '../encode/huffman-tree'
import { buildCodeTable, weightedCodeLength } from '../encode/code-table'
import { writeSymbols } from '../encode/encode'
import { BitWriter } from '../encode/bit-writer'
import { decodePackedBits } from '../decode/decode'
import { payloadSize, readHeader, writeHeader } from './header'

export interface HuffmanDecompressOptions {
  maxOutputSize?: number
}

export function huffmanCompress(input: Uint8Array): Uint8Array {
  const frequencies = buildFrequencyTable(input)
  const tree = buildHuffmanTree(frequencies)
  const codes = buildCodeTable(tree)
  const bitLength = weightedCodeLength(codes, frequencies)

  // Codes go straight into the packed buffer, sized up front
  const writer = new BitWriter(payloadSize(bitLength))
  writeSymbols(writer, codes, input)
  invariant(writer.pos === bitLength, `Wrote ${writer.pos} payload bits, expected ${bitLength}`)
  const payload = writer.finish()
  const header = writeHeader(frequencies, bitLength)

  const out = new Uint8Array(header.length + payload.length)
  out.set(header, 0)
  out.set(payload, header.length)
  return out
}

// Output size declared by the header, without decoding the payload
export function huffmanDecodedSize(data: Uint8Array): number {
  return totalCount(readHeader(data).frequencies)
}

export function huffmanDecompress(
  data: Uint8Array,
  options: HuffmanDecompressOptions = {}
): Uint8Array {
  const header = readHeader(data)
  const outputSize = totalCount(header.frequencies)
  const { maxOutputSize } = options

  if (maxOutputSize !== undefined && outputSize > maxOutputSize) {
    throw new HuffmanDataError(
      'output-too-large',
      `Decompressed size ${outputSize} exceeds limit ${maxOutputSize}`
    )
  }

  const payload = data.subarray(header.headerSize)
  const expectedBytes = payloadSize(header.bitLength)
  if (payload.length !== expectedBytes) {
    throw new HuffmanDataError(
      'corrupt-container',
      `Payload is ${payload.length} bytes, header declares ${expectedBytes}`
    )
  }

  const tree = buildHuffmanTree(header.frequencies)
  const expectedBits = weightedCodeLength(buildCodeTable(tree), header.frequencies)
  if (header.bitLength !== expectedBits) {
    throw new HuffmanDataError(
      'corrupt-container',
      `Header declares ${header.bitLength} payload bits, frequencies give ${expectedBits}`
    )
  }

  // The zero padding of the last byte lies past bitLength and is never read
  const { symbols, count } = decodePackedBits(tree, payload, header.bitLength)
  if (count !== outputSize) {
    throw new HuffmanDataError(
      'corrupt-container',
      `Decoded ${count} symbols, header declares ${outputSize}`
    )
  }

  return symbols
}
