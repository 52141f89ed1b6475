// Core pipeline
export {
  buildFrequencyTable,
  readFrequencyTable,
  createFrequencyTable,
  frequencyTableAdd,
  distinctSymbols,
  totalCount,
} from './encode/frequency-table'
export type { FrequencyTable } from './encode/frequency-table'
export {
  buildHuffmanTree,
  isHuffmanTree,
  isHuffmanLeaf,
  isHuffmanInterior,
  walkPostOrder,
  treeDepth,
  treeStats,
} from './encode/huffman-tree'
export type { HuffmanNode, HuffmanLeaf, HuffmanInterior, HuffmanTreeStats } from './encode/huffman-tree'
export { buildCodeTable, codeLengths, isPrefixFree, weightedCodeLength } from './encode/code-table'
export type { BitString, CodeTable } from './encode/code-table'
export { encodeSymbols, writeSymbols } from './encode/encode'
export { decodeBits, countSymbols, decodePackedBits } from './decode/decode'
export type { DecodeResult } from './decode/decode'
export { BitWriter, packBits } from './encode/bit-writer'
export { BitReader, unpackBits } from './decode/bit-reader'
export { PriorityQueue } from './common/priority-queue'
export type { HigherPriority, PriorityQueueOptions } from './common/priority-queue'
export { NUM_SYMBOLS } from './common/constants'

// Container
export { huffmanCompress, huffmanDecompress, huffmanDecodedSize } from './container/container'
export type { HuffmanDecompressOptions } from './container/container'
export { readHeader, writeHeader, CONTAINER_MAGIC, CONTAINER_VERSION } from './container/header'
export type { ContainerHeader } from './container/header'

// Errors
export {
  HuffmanError,
  HuffmanContractError,
  HuffmanDataError,
  HuffmanIoError,
} from './errors'
export type { HuffmanDataErrorReason } from './errors'
