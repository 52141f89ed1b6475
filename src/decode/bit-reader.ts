// Bit reading for Huffman payloads

import { invariant } from '../errors'
import type { BitString } from '../encode/code-table'

// Reads bits MSB-first within each byte. Inverse of BitWriter.
export class BitReader {
  readonly buffer: Uint8Array
  readonly bitLength: number
  pos: number = 0 // bit position

  constructor(buffer: Uint8Array, byteLength: number = buffer.length) {
    invariant(
      Number.isInteger(byteLength) && byteLength >= 0 && byteLength <= buffer.length,
      `Cannot read ${byteLength} bytes from a buffer of ${buffer.length}`
    )
    this.buffer = buffer
    this.bitLength = byteLength * 8
  }

  get bitsRemaining(): number {
    return this.bitLength - this.pos
  }

  readBit(): number {
    invariant(this.pos < this.bitLength, 'Unexpected end of input')
    const bit = (this.buffer[Math.floor(this.pos / 8)] >>> (7 - (this.pos % 8))) & 1
    this.pos++
    return bit
  }

  // Up to 32 bits, first bit read is the most significant
  readBits(nBits: number): number {
    invariant(nBits >= 0 && nBits <= 32, `Cannot read ${nBits} bits at once`)
    let value = 0
    for (let i = 0; i < nBits; i++) {
      value = (value * 2) + this.readBit()
    }
    return value
  }

  readBitString(nBits: number = this.bitsRemaining): BitString {
    const out = new Array<string>(nBits)
    for (let i = 0; i < nBits; i++) {
      out[i] = this.readBit() === 1 ? '1' : '0'
    }
    return out.join('')
  }
}

// Always 8 bits per byte; padding is not distinguished from payload
export function unpackBits(bytes: Uint8Array, length: number = bytes.length): BitString {
  return new BitReader(bytes, length).readBitString()
}
