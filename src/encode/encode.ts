// Symbol stream to bit string

import { HuffmanContractError } from '../errors'
import type { BitWriter } from './bit-writer'
import type { BitString, CodeTable } from './code-table'

function codeFor(table: CodeTable, symbols: Uint8Array, i: number): BitString {
  const code = table[symbols[i]]
  if (code === null || code === undefined || code.length === 0) {
    throw new HuffmanContractError(
      `Symbol ${symbols[i]} at position ${i} has no code in the table`
    )
  }
  return code
}

export function encodeSymbols(table: CodeTable, symbols: Uint8Array): BitString {
  const parts = new Array<string>(symbols.length)
  for (let i = 0; i < symbols.length; i++) {
    parts[i] = codeFor(table, symbols, i)
  }
  return parts.join('')
}

// Same bits as encodeSymbols, written straight into a packed buffer.
// Payloads past the engine's string length limit go through here.
export function writeSymbols(writer: BitWriter, table: CodeTable, symbols: Uint8Array): void {
  for (let i = 0; i < symbols.length; i++) {
    writer.writeBitString(codeFor(table, symbols, i))
  }
}
