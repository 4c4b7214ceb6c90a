import { InvalidArgumentError, UnderflowError } from "@tessera/errors"
import { NullLogger } from "@tessera/logger"
import type { CollectionDeps, ResolvedCollectionDeps } from "../../ports/collection-deps"
import { CapacityTracker } from "../capacity/capacity-tracker"
import { SquaredCapacityPolicy } from "../capacity/squared-capacity-policy"

const COLLECTION = "PriorityQueue"

export type HeapNode<T> = Readonly<{
  value: T
  priority: number

  /** Insertion counter; the earlier stamp wins a priority tie. */
  stamp: number
}>

/**
 * Positive when `a` must leave the queue before `b`.
 */
export function compareNodes<T>(a: HeapNode<T>, b: HeapNode<T>): number {
  if (a.priority !== b.priority) return a.priority > b.priority ? 1 : -1
  if (a.stamp !== b.stamp) return a.stamp < b.stamp ? 1 : -1

  return 0
}

/**
 * Binary max-heap of values ordered by integer priority, first in first
 * out among equal priorities.
 *
 * Iterating a queue pops it: a `for...of` loop leaves it empty.
 * `toArray()` returns the same order without consuming anything.
 *
 * @example
 * ```ts
 * const queue = new PriorityQueue<string>()
 * queue.push("x", 5)
 * queue.push("y", 10)
 * queue.push("z", 5)
 *
 * queue.toArray() // ["y", "x", "z"]
 * ```
 */
export class PriorityQueue<T> implements Iterable<T> {
  private heap: HeapNode<T>[] = []
  private stamp = 0
  private readonly deps: ResolvedCollectionDeps
  private tracker: CapacityTracker

  constructor(deps: CollectionDeps = {}) {
    this.deps = {
      policy: deps.policy ?? new SquaredCapacityPolicy(),
      logger: deps.logger ?? new NullLogger(),
    }
    this.tracker = new CapacityTracker(this.deps, COLLECTION)
  }

  size(): number {
    return this.heap.length
  }

  isEmpty(): boolean {
    return this.heap.length === 0
  }

  capacity(): number {
    return this.tracker.value
  }

  allocate(capacity: number): void {
    this.tracker.reserve(capacity, this.heap.length)
  }

  clear(): void {
    this.heap = []
    this.stamp = 0
    this.tracker.reset()
  }

  copy(): PriorityQueue<T> {
    const copy = new PriorityQueue<T>(this.deps)

    copy.heap = [...this.heap]
    copy.stamp = this.stamp
    copy.tracker = this.tracker.copy()

    return copy
  }

  push(value: T, priority: number): void {
    if (!Number.isSafeInteger(priority)) {
      throw new InvalidArgumentError(
        { collection: COLLECTION, operation: "push", argument: "priority" },
        `expected a safe integer, got ${priority}`,
      )
    }

    this.tracker.fit(this.heap.length + 1, "push")

    this.heap.push({ value, priority, stamp: this.stamp })
    this.stamp += 1
    this.siftUp(this.heap.length - 1)
  }

  pop(): T {
    if (this.heap.length === 0) throw new UnderflowError({ collection: COLLECTION, operation: "pop" })

    const { value } = this.extract()
    this.tracker.settle(this.heap.length, "pop")

    return value
  }

  peek(): T {
    if (this.heap.length === 0) throw new UnderflowError({ collection: COLLECTION, operation: "peek" })

    return this.heap[0].value
  }

  /** Values in pop order. The queue is left as it was. */
  toArray(): T[] {
    const saved = [...this.heap]
    const values: T[] = []

    while (this.heap.length > 0) values.push(this.extract().value)

    this.heap = saved

    return values
  }

  toJSON(): T[] {
    return this.toArray()
  }

  /** Pops each value in turn. */
  *[Symbol.iterator](): Iterator<T> {
    while (this.heap.length > 0) yield this.pop()
  }

  private extract(): HeapNode<T> {
    const root = this.heap[0]
    const last = this.heap.pop()

    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last
      this.siftDown(0)
    }

    return root
  }

  private siftUp(index: number): void {
    let child = index

    while (child > 0) {
      const parent = (child - 1) >> 1

      if (compareNodes(this.heap[child], this.heap[parent]) <= 0) return

      this.swap(child, parent)
      child = parent
    }
  }

  private siftDown(index: number): void {
    const size = this.heap.length
    let parent = index

    for (;;) {
      const left = 2 * parent + 1
      const right = left + 1

      if (left >= size) return

      const larger = right < size && compareNodes(this.heap[right], this.heap[left]) > 0 ? right : left

      if (compareNodes(this.heap[larger], this.heap[parent]) <= 0) return

      this.swap(parent, larger)
      parent = larger
    }
  }

  private swap(a: number, b: number): void {
    const node = this.heap[a]
    this.heap[a] = this.heap[b]
    this.heap[b] = node
  }
}
