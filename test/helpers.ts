import { createFrequencyTable } from '../src/encode/frequency-table'
import type { FrequencyTable } from '../src/encode/frequency-table'

// Classic textbook distribution
export const TEXTBOOK = { a: 5, b: 9, c: 12, d: 13, e: 16, f: 45 }

export function tableFrom(counts: Record<string, number>): FrequencyTable {
  const table = createFrequencyTable()
  for (const [char, count] of Object.entries(counts)) {
    table[char.charCodeAt(0)] = count
  }
  return table
}

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text)
}

export function text(symbols: Uint8Array): string {
  return new TextDecoder().decode(symbols)
}

export function makeXorshift32(seed: number): () => number {
  let x = seed | 0
  return () => {
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    return x >>> 0
  }
}

export function randomBytes(len: number, nextU32: () => number, alphabet: number = 256): Uint8Array {
  const out = new Uint8Array(len)
  for (let i = 0; i < len; i++) out[i] = nextU32() % alphabet
  return out
}
