// Code table derivation from a Huffman tree

import { NUM_SYMBOLS } from '../common/constants'
import { invariant } from '../errors'
import type { FrequencyTable } from './frequency-table'
import { isHuffmanTree } from './huffman-tree'
import type { HuffmanNode } from './huffman-tree'

// Sequence of '0' and '1' characters
export type BitString = string

// Index = symbol; null where the symbol does not occur
export type CodeTable = Array<BitString | null>

export function buildCodeTable(tree: HuffmanNode): CodeTable {
  invariant(isHuffmanTree(tree), 'Cannot derive codes from a malformed Huffman tree')
  invariant(tree.kind === 'interior', 'Huffman tree root must be an interior node')

  const table: CodeTable = new Array<BitString | null>(NUM_SYMBOLS).fill(null)
  const stack: Array<{ node: HuffmanNode; path: BitString }> = [{ node: tree, path: '' }]

  while (stack.length > 0) {
    const top = stack.pop()
    if (top === undefined) break
    const { node, path } = top
    if (node.kind === 'leaf') {
      table[node.symbol] = path
      continue
    }
    // Right pushed first so the left subtree is walked first
    stack.push({ node: node.right, path: path + '1' })
    stack.push({ node: node.left, path: path + '0' })
  }

  return table
}

export function codeLengths(table: CodeTable): Uint8Array {
  const lengths = new Uint8Array(table.length)
  for (let i = 0; i < table.length; i++) {
    lengths[i] = table[i]?.length ?? 0
  }
  return lengths
}

export function isPrefixFree(table: CodeTable): boolean {
  // After sorting, a prefix sits immediately before some code it prefixes
  const codes = table.filter((code): code is BitString => code !== null).sort()
  for (let i = 1; i < codes.length; i++) {
    if (codes[i].startsWith(codes[i - 1])) return false
  }
  return true
}

// Exact size in bits of the encoded payload for these frequencies
export function weightedCodeLength(table: CodeTable, frequencies: FrequencyTable): number {
  let bits = 0
  for (let symbol = 0; symbol < frequencies.length; symbol++) {
    const count = frequencies[symbol]
    if (count === 0) continue
    const code = table[symbol]
    invariant(code !== null && code !== undefined, `Symbol ${symbol} has no code`)
    bits += code.length * count
  }
  return bits
}
