// Bit string to symbol stream, walking the Huffman tree

import { HuffmanContractError, HuffmanDataError, invariant } from '../errors'
import { BitReader } from './bit-reader'
import type { BitString } from '../encode/code-table'
import { isHuffmanTree } from '../encode/huffman-tree'
import type { HuffmanNode } from '../encode/huffman-tree'

export interface DecodeResult {
  symbols: Uint8Array
  count: number
}

// One bit of traversal: returns the next cursor position
function step(cursor: HuffmanNode, bits: BitString, i: number): HuffmanNode {
  if (cursor.kind !== 'interior') {
    throw new HuffmanContractError('Decoder cursor left the interior of the tree')
  }
  const bit = bits.charCodeAt(i)
  if (bit === 0x30) return cursor.left
  if (bit === 0x31) return cursor.right
  throw new HuffmanContractError(
    `Invalid bit ${JSON.stringify(bits[i])} at position ${i}`
  )
}

function checkTree(tree: HuffmanNode): void {
  invariant(isHuffmanTree(tree), 'Cannot decode with a malformed Huffman tree')
  invariant(tree.kind === 'interior', 'Huffman tree root must be an interior node')
}

// First pass: number of complete codes in the bit string
export function countSymbols(tree: HuffmanNode, bits: BitString): number {
  checkTree(tree)
  let count = 0
  let node = tree
  for (let i = 0; i < bits.length; i++) {
    node = step(node, bits, i)
    if (node.kind === 'leaf') {
      count++
      node = tree
    }
  }
  if (node !== tree) {
    throw new HuffmanDataError(
      'incomplete-code',
      `Bit string ends inside a code after ${count} symbols`
    )
  }
  return count
}

export function decodeBits(tree: HuffmanNode, bits: BitString): DecodeResult {
  const count = countSymbols(tree, bits)

  // Second pass fills the exactly-sized output
  const symbols = new Uint8Array(count)
  let pos = 0
  let node = tree
  for (let i = 0; i < bits.length; i++) {
    node = step(node, bits, i)
    if (node.kind === 'leaf') {
      symbols[pos++] = node.symbol
      node = tree
    }
  }
  invariant(pos === count, `Decoded ${pos} symbols, expected ${count}`)

  return { symbols, count }
}

function walkPacked(
  tree: HuffmanNode,
  packed: Uint8Array,
  bitLength: number,
  emit: (symbol: number) => void
): void {
  const reader = new BitReader(packed)
  invariant(
    Number.isInteger(bitLength) && bitLength >= 0 && bitLength <= reader.bitLength,
    `Cannot decode ${bitLength} bits from ${packed.length} bytes`
  )
  let count = 0
  let node = tree
  for (let i = 0; i < bitLength; i++) {
    if (node.kind !== 'interior') {
      throw new HuffmanContractError('Decoder cursor left the interior of the tree')
    }
    node = reader.readBit() === 1 ? node.right : node.left
    if (node.kind === 'leaf') {
      emit(node.symbol)
      count++
      node = tree
    }
  }
  if (node !== tree) {
    throw new HuffmanDataError(
      'incomplete-code',
      `Bit string ends inside a code after ${count} symbols`
    )
  }
}

// decodeBits over the first bitLength bits of a packed buffer; bits past
// bitLength (the zero padding) are never read
export function decodePackedBits(
  tree: HuffmanNode,
  packed: Uint8Array,
  bitLength: number
): DecodeResult {
  checkTree(tree)
  let count = 0
  walkPacked(tree, packed, bitLength, () => { count++ })

  const symbols = new Uint8Array(count)
  let pos = 0
  walkPacked(tree, packed, bitLength, (symbol) => { symbols[pos++] = symbol })
  invariant(pos === count, `Decoded ${pos} symbols, expected ${count}`)

  return { symbols, count }
}
