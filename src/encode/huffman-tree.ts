// Huffman tree construction from a frequency table

import { NUM_SYMBOLS } from '../common/constants'
import { PriorityQueue } from '../common/priority-queue'
import { HuffmanDataError, invariant } from '../errors'
import type { FrequencyTable } from './frequency-table'

export interface HuffmanLeaf {
  kind: 'leaf'
  symbol: number
  frequency: number
}

export interface HuffmanInterior {
  kind: 'interior'
  frequency: number
  left: HuffmanNode
  right: HuffmanNode
}

export type HuffmanNode = HuffmanLeaf | HuffmanInterior

export interface HuffmanTreeStats {
  leafCount: number
  nodeCount: number
  depth: number
  totalFrequency: number
}

export function isHuffmanLeaf(node: HuffmanNode): node is HuffmanLeaf {
  return node.kind === 'leaf'
    && node.frequency > 0
    && Number.isInteger(node.symbol)
    && node.symbol >= 0
    && node.symbol < NUM_SYMBOLS
}

export function isHuffmanInterior(node: HuffmanNode): node is HuffmanInterior {
  return node.kind === 'interior'
    && isHuffmanTree(node.left)
    && isHuffmanTree(node.right)
    && node.frequency === node.left.frequency + node.right.frequency
}

export function isHuffmanTree(node: HuffmanNode): boolean {
  return isHuffmanLeaf(node) || isHuffmanInterior(node)
}

// Lower frequency leaves the queue first
function higherPriority(a: HuffmanNode, b: HuffmanNode): boolean {
  return a.frequency < b.frequency
}

export function buildHuffmanTree(table: FrequencyTable): HuffmanNode {
  invariant(table.length === NUM_SYMBOLS, `Frequency table must have ${NUM_SYMBOLS} entries`)

  const queue = new PriorityQueue<HuffmanNode>({ capacity: NUM_SYMBOLS, higherPriority })
  for (let symbol = 0; symbol < NUM_SYMBOLS; symbol++) {
    const frequency = table[symbol]
    if (frequency > 0) {
      queue.add({ kind: 'leaf', symbol, frequency })
    }
  }

  if (queue.size < 2) {
    const found = queue.size
    queue.dispose()
    throw new HuffmanDataError(
      'alphabet-too-small',
      `Need at least 2 distinct symbols to build a code, found ${found}`
    )
  }

  while (true) {
    const first = queue.removeMin()
    if (queue.isEmpty()) {
      invariant(isHuffmanTree(first), 'Built a malformed Huffman tree')
      return first
    }
    const second = queue.removeMin()

    // Ties keep the first-removed node on the left
    const [left, right] = first.frequency <= second.frequency
      ? [first, second]
      : [second, first]
    queue.add({
      kind: 'interior',
      frequency: first.frequency + second.frequency,
      left,
      right,
    })
  }
}

// Visits children before their parent, every node exactly once
export function walkPostOrder(tree: HuffmanNode, visit: (node: HuffmanNode, depth: number) => void): void {
  const stack: Array<{ node: HuffmanNode; depth: number; expanded: boolean }> = [
    { node: tree, depth: 0, expanded: false },
  ]
  while (stack.length > 0) {
    const top = stack[stack.length - 1]
    if (top.node.kind === 'interior' && !top.expanded) {
      top.expanded = true
      stack.push({ node: top.node.right, depth: top.depth + 1, expanded: false })
      stack.push({ node: top.node.left, depth: top.depth + 1, expanded: false })
      continue
    }
    stack.pop()
    visit(top.node, top.depth)
  }
}

// Length of the longest root-to-leaf path; a lone leaf has depth 0
export function treeDepth(tree: HuffmanNode): number {
  let depth = 0
  walkPostOrder(tree, (node, d) => {
    if (node.kind === 'leaf' && d > depth) depth = d
  })
  return depth
}

export function treeStats(tree: HuffmanNode): HuffmanTreeStats {
  const stats: HuffmanTreeStats = {
    leafCount: 0,
    nodeCount: 0,
    depth: 0,
    totalFrequency: tree.frequency,
  }
  walkPostOrder(tree, (node, depth) => {
    stats.nodeCount++
    if (node.kind === 'leaf') {
      stats.leafCount++
      if (depth > stats.depth) stats.depth = depth
    }
  })
  return stats
}
