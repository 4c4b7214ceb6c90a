import { UnderflowError } from "@tessera/errors"
import type { CollectionDeps } from "../../ports/collection-deps"
import { Vector } from "../sequence/vector"

const COLLECTION = "Stack"

/**
 * Last in, first out, backed by a {@link Vector}.
 *
 * Iteration pops: a `for...of` loop leaves the stack empty.
 */
export class Stack<T> implements Iterable<T> {
  private readonly vector: Vector<T>

  constructor(
    values: Iterable<T> = [],
    private readonly deps: CollectionDeps = {},
  ) {
    this.vector = new Vector(values, deps)
  }

  size(): number {
    return this.vector.size()
  }

  isEmpty(): boolean {
    return this.vector.isEmpty()
  }

  capacity(): number {
    return this.vector.capacity()
  }

  allocate(capacity: number): void {
    this.vector.allocate(capacity)
  }

  clear(): void {
    this.vector.clear()
  }

  copy(): Stack<T> {
    return new Stack(this.vector, this.deps)
  }

  push(...values: T[]): void {
    this.vector.push(...values)
  }

  pushAll(values: Iterable<T>): void {
    this.vector.pushAll(values)
  }

  pop(): T {
    if (this.vector.isEmpty()) throw new UnderflowError({ collection: COLLECTION, operation: "pop" })

    return this.vector.pop()
  }

  peek(): T {
    if (this.vector.isEmpty()) throw new UnderflowError({ collection: COLLECTION, operation: "peek" })

    return this.vector.last()
  }

  /** Values from the top of the stack down. */
  toArray(): T[] {
    return this.vector.toArray().reverse()
  }

  toJSON(): T[] {
    return this.toArray()
  }

  *[Symbol.iterator](): Iterator<T> {
    while (!this.vector.isEmpty()) yield this.vector.pop()
  }
}
