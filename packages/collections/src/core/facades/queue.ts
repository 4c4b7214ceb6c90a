import { UnderflowError } from "@tessera/errors"
import type { CollectionDeps } from "../../ports/collection-deps"
import { Deque } from "../sequence/deque"

const COLLECTION = "Queue"

/**
 * First in, first out, backed by a {@link Deque}.
 *
 * Iteration pops: a `for...of` loop leaves the queue empty.
 */
export class Queue<T> implements Iterable<T> {
  private readonly deque: Deque<T>

  constructor(
    values: Iterable<T> = [],
    private readonly deps: CollectionDeps = {},
  ) {
    this.deque = new Deque(values, deps)
  }

  size(): number {
    return this.deque.size()
  }

  isEmpty(): boolean {
    return this.deque.isEmpty()
  }

  capacity(): number {
    return this.deque.capacity()
  }

  allocate(capacity: number): void {
    this.deque.allocate(capacity)
  }

  clear(): void {
    this.deque.clear()
  }

  copy(): Queue<T> {
    return new Queue(this.deque, this.deps)
  }

  push(...values: T[]): void {
    this.deque.push(...values)
  }

  pushAll(values: Iterable<T>): void {
    this.deque.pushAll(values)
  }

  pop(): T {
    if (this.deque.isEmpty()) throw new UnderflowError({ collection: COLLECTION, operation: "pop" })

    return this.deque.shift()
  }

  peek(): T {
    if (this.deque.isEmpty()) throw new UnderflowError({ collection: COLLECTION, operation: "peek" })

    return this.deque.first()
  }

  /** Values from the front of the queue to the back. */
  toArray(): T[] {
    return this.deque.toArray()
  }

  toJSON(): T[] {
    return this.toArray()
  }

  *[Symbol.iterator](): Iterator<T> {
    while (!this.deque.isEmpty()) yield this.deque.shift()
  }
}
