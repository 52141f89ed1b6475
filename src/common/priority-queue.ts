// Fixed-capacity binary min-heap

import { invariant } from '../errors'

// True when a must leave the queue strictly before b
export type HigherPriority<T> = (a: T, b: T) => boolean

export interface PriorityQueueOptions<T> {
  capacity: number
  higherPriority: HigherPriority<T>
  onDispose?: (elem: T) => void
}

// Ties are resolved by heap position, so the order is deterministic for a
// given sequence of operations but is not insertion order.
export class PriorityQueue<T> {
  readonly capacity: number
  private readonly heap: T[] = []
  private readonly higherPriority: HigherPriority<T>
  private readonly onDispose: ((elem: T) => void) | undefined

  constructor(options: PriorityQueueOptions<T>) {
    invariant(
      Number.isInteger(options.capacity) && options.capacity > 0,
      `Queue capacity must be a positive integer, got ${options.capacity}`
    )
    this.capacity = options.capacity
    this.higherPriority = options.higherPriority
    this.onDispose = options.onDispose
  }

  get size(): number {
    return this.heap.length
  }

  isEmpty(): boolean {
    return this.heap.length === 0
  }

  isFull(): boolean {
    return this.heap.length === this.capacity
  }

  add(elem: T): void {
    invariant(!this.isFull(), `Queue is full (capacity ${this.capacity})`)
    this.heap.push(elem)
    this.siftUp(this.heap.length - 1)
  }

  peek(): T {
    invariant(!this.isEmpty(), 'Queue is empty')
    return this.heap[0]
  }

  removeMin(): T {
    invariant(!this.isEmpty(), 'Queue is empty')
    const heap = this.heap
    const min = heap[0]
    const last = heap.pop()
    if (last !== undefined && heap.length > 0) {
      heap[0] = last
      this.siftDown(0)
    }
    return min
  }

  // Empties the queue, handing every remaining element to onDispose
  dispose(): void {
    const remaining = this.heap.splice(0, this.heap.length)
    if (this.onDispose) {
      for (const elem of remaining) {
        this.onDispose(elem)
      }
    }
  }

  private siftUp(index: number): void {
    const heap = this.heap
    let i = index
    while (i > 0) {
      const parent = (i - 1) >>> 1
      if (!this.higherPriority(heap[i], heap[parent])) break
      this.swap(i, parent)
      i = parent
    }
  }

  private siftDown(index: number): void {
    const heap = this.heap
    const n = heap.length
    let i = index
    while (true) {
      const left = 2 * i + 1
      const right = left + 1
      let best = i
      if (left < n && this.higherPriority(heap[left], heap[best])) best = left
      if (right < n && this.higherPriority(heap[right], heap[best])) best = right
      if (best === i) return
      this.swap(i, best)
      i = best
    }
  }

  private swap(i: number, j: number): void {
    const tmp = this.heap[i]
    this.heap[i] = this.heap[j]
    this.heap[j] = tmp
  }
}
