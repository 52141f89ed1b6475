// Bit writing for Huffman payloads

import { invariant } from '../errors'
import type { BitString } from './code-table'

// Writes bits to a byte array in MSB-first order within each byte.
// Inverse of BitReader.
//
// Example: 3 bits 'RRR' written -> BYTE-0: RRR0 0000
// Writing 7 more 'SSSSSSS' -> BYTE-0: RRRS SSSS, BYTE-1: SS00 0000
export class BitWriter {
  buffer: Uint8Array
  pos: number // bit position

  constructor(initialSize: number = 4096) {
    this.buffer = new Uint8Array(Math.max(1, initialSize))
    this.pos = 0
  }

  private ensureCapacity(bits: number): void {
    const bytesNeeded = Math.ceil((this.pos + bits) / 8)
    if (bytesNeeded > this.buffer.length) {
      const newSize = Math.max(this.buffer.length * 2, bytesNeeded)
      const newBuffer = new Uint8Array(newSize)
      newBuffer.set(this.buffer)
      this.buffer = newBuffer
    }
  }

  writeBit(bit: number): void {
    this.ensureCapacity(1)
    if (bit & 1) {
      // Division, not >>> 3: payloads can pass 2^32 bits
      this.buffer[Math.floor(this.pos / 8)] |= 0x80 >>> (this.pos % 8)
    }
    this.pos++
  }

  // Most significant of the nBits written first; up to 32 bits
  writeBits(nBits: number, value: number): void {
    invariant(nBits >= 0 && nBits <= 32, `Cannot write ${nBits} bits at once`)
    this.ensureCapacity(nBits)
    for (let i = nBits - 1; i >= 0; i--) {
      this.writeBit((value >>> i) & 1)
    }
  }

  writeBitString(bits: BitString): void {
    this.ensureCapacity(bits.length)
    for (let i = 0; i < bits.length; i++) {
      const c = bits.charCodeAt(i)
      invariant(c === 0x30 || c === 0x31, `Invalid bit ${JSON.stringify(bits[i])} at position ${i}`)
      this.writeBit(c - 0x30)
    }
  }

  // Align to byte boundary, returns number of padding bits written
  alignToByte(): number {
    const padding = (8 - (this.pos % 8)) % 8
    this.pos += padding
    return padding
  }

  finish(): Uint8Array {
    // Round up to include partial final byte; its unused low bits stay zero
    const byteLength = Math.ceil(this.pos / 8)
    return this.buffer.slice(0, byteLength)
  }
}

// ceil(L / 8) bytes, the last one zero-padded
export function packBits(bits: BitString): Uint8Array {
  const writer = new BitWriter(Math.ceil(bits.length / 8))
  writer.writeBitString(bits)
  return writer.finish()
}
