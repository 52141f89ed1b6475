import { bench, describe } from 'vitest'
import { huffmanCompress, huffmanDecompress } from '../src/container/container'
import { buildFrequencyTable } from '../src/encode/frequency-table'
import { buildHuffmanTree } from '../src/encode/huffman-tree'
import { buildCodeTable } from '../src/encode/code-table'
import { encodeSymbols } from '../src/encode/encode'
import { packBits } from '../src/encode/bit-writer'

// Test data
const mediumText = 'The quick brown fox jumps over the lazy dog. '.repeat(100)
const longText = mediumText.repeat(10)
const html = `<!DOCTYPE html><html><head><title>Test</title></head><body>${'<p>Content</p>'.repeat(500)}</body></html>`
const ramp = new Uint8Array(64 * 1024)
for (let i = 0; i < ramp.length; i++) ramp[i] = (i * 31) & 0xFF

const inputs = [
  { name: 'medium (4.5 KB)', data: new TextEncoder().encode(mediumText) },
  { name: 'long (45 KB)', data: new TextEncoder().encode(longText) },
  { name: 'html (7 KB)', data: new TextEncoder().encode(html) },
  { name: 'ramp (64 KB)', data: ramp },
]

// Quick sanity check - print compression ratios
console.log('\nCompression ratios:')
for (const { name, data } of inputs) {
  const packed = huffmanCompress(data)
  console.log(`${name}: ${data.length} -> ${packed.length} (${(packed.length / data.length).toFixed(2)}x)`)
}
console.log('')

describe('pipeline stages', () => {
  const data = inputs[1].data
  const freqs = buildFrequencyTable(data)
  const tree = buildHuffmanTree(freqs)
  const codes = buildCodeTable(tree)
  const bits = encodeSymbols(codes, data)

  bench('frequency table', () => {
    buildFrequencyTable(data)
  })

  bench('tree + code table', () => {
    buildCodeTable(buildHuffmanTree(freqs))
  })

  bench('encode symbols', () => {
    encodeSymbols(codes, data)
  })

  bench('pack bits', () => {
    packBits(bits)
  })
})

for (const { name, data } of inputs) {
  const packed = huffmanCompress(data)

  describe(name, () => {
    bench('compress', () => {
      huffmanCompress(data)
    })

    bench('decompress', () => {
      huffmanDecompress(packed)
    })
  })
}
