import { IndexOutOfRangeError, InvalidArgumentError, UnderflowError } from "@tessera/errors"
import type { ResolvedCollectionDeps } from "../../ports/collection-deps"
import type { Comparator } from "../../ports/comparator"
import type { Sequence } from "../../ports/sequence"
import { CapacityTracker } from "../capacity/capacity-tracker"
import { naturalOrder } from "../compare/natural-order"
import { sameValueZero } from "../compare/same-value-zero"
import { sortValues } from "../compare/sort-values"
import { collect } from "../utils/collect"
import { sliceBounds } from "../utils/slice-bounds"

/**
 * Ring buffer shared by {@link Vector} and {@link Deque}.
 *
 * The backing array is exactly `capacity()` slots long. Logical index `i`
 * lives at `(head + i) % capacity`, which makes both ends O(1) amortized.
 * Every resize copies the live values in order into a fresh buffer that
 * starts at slot 0.
 *
 * Subclasses pick the capacity policy and implement {@link derive}, the
 * builder behind every operation that returns a new sequence.
 */
export abstract class DynamicArray<T> implements Sequence<T> {
  private buffer: T[]
  private head = 0
  private length = 0
  private readonly tracker: CapacityTracker

  protected constructor(
    protected readonly collection: string,
    protected readonly deps: ResolvedCollectionDeps,
    values: Iterable<T>,
  ) {
    this.tracker = new CapacityTracker(deps, collection)
    this.buffer = new Array<T>(this.tracker.value)

    this.append(collect(values, { collection, operation: "constructor" }), "constructor")
  }

  /** Build a sequence of this kind, sharing policy and logger. */
  protected abstract derive<U>(values: Iterable<U>): DynamicArray<U>

  size(): number {
    return this.length
  }

  isEmpty(): boolean {
    return this.length === 0
  }

  capacity(): number {
    return this.buffer.length
  }

  allocate(capacity: number): void {
    this.resize(this.tracker.reserve(capacity, this.length))
  }

  clear(): void {
    this.buffer = new Array<T>(this.tracker.reset())
    this.head = 0
    this.length = 0
  }

  copy(): DynamicArray<T> {
    return this.derive(this)
  }

  get(index: number): T {
    this.assertIndex(index)

    return this.read(index)
  }

  set(index: number, value: T): void {
    this.assertIndex(index)
    this.write(index, value)
  }

  push(...values: T[]): void {
    this.append(values, "push")
  }

  pushAll(values: Iterable<T>): void {
    this.append(collect(values, { collection: this.collection, operation: "pushAll" }), "pushAll")
  }

  pop(): T {
    this.assertNotEmpty("pop")

    const index = this.length - 1
    const value = this.read(index)

    this.release(index)
    this.length -= 1
    this.resize(this.tracker.settle(this.length, "pop"))

    return value
  }

  unshift(...values: T[]): void {
    if (values.length === 0) return

    this.resize(this.tracker.fit(this.length + values.length, "unshift"))

    for (let i = values.length - 1; i >= 0; i--) {
      this.head = (this.head - 1 + this.buffer.length) % this.buffer.length
      this.buffer[this.head] = values[i]
      this.length += 1
    }
  }

  shift(): T {
    this.assertNotEmpty("shift")

    const value = this.read(0)

    this.release(0)
    this.head = (this.head + 1) % this.buffer.length
    this.length -= 1
    this.resize(this.tracker.settle(this.length, "shift"))

    return value
  }

  insert(index: number, ...values: T[]): void {
    this.assertRange(index, this.length)

    if (values.length === 0) return

    this.resize(this.tracker.fit(this.length + values.length, "insert"))

    const count = values.length
    for (let i = this.length - 1; i >= index; i--) {
      this.write(i + count, this.read(i))
    }

    values.forEach((value, offset) => this.write(index + offset, value))
    this.length += count
  }

  remove(index: number): T {
    this.assertIndex(index)

    const value = this.read(index)

    for (let i = index; i < this.length - 1; i++) {
      this.write(i, this.read(i + 1))
    }

    this.release(this.length - 1)
    this.length -= 1
    this.resize(this.tracker.settle(this.length, "remove"))

    return value
  }

  first(): T {
    this.assertNotEmpty("first")

    return this.read(0)
  }

  last(): T {
    this.assertNotEmpty("last")

    return this.read(this.length - 1)
  }

  rotate(rotations: number): void {
    if (!Number.isInteger(rotations)) {
      throw new InvalidArgumentError(
        { collection: this.collection, operation: "rotate", argument: "rotations" },
        `expected an integer, got ${rotations}`,
      )
    }

    if (this.length < 2) return

    let r = Math.abs(rotations) % this.length
    if (rotations < 0 && r > 0) r = this.length - r
    if (r === 0) return

    this.reverseRange(0, r)
    this.reverseRange(r, this.length)
    this.reverseRange(0, this.length)
  }

  sort(comparator: Comparator<T> = naturalOrder): void {
    sortValues(this.toArray(), comparator).forEach((value, index) => this.write(index, value))
  }

  sorted(comparator: Comparator<T> = naturalOrder): DynamicArray<T> {
    return this.derive(sortValues(this.toArray(), comparator))
  }

  reverse(): void {
    this.reverseRange(0, this.length)
  }

  reversed(): DynamicArray<T> {
    return this.derive(this.toArray().reverse())
  }

  slice(offset: number, length?: number): DynamicArray<T> {
    const { start, end } = sliceBounds(this.collection, this.length, offset, length)
    const values: T[] = []

    for (let i = start; i < end; i++) values.push(this.read(i))

    return this.derive(values)
  }

  contains(...values: T[]): boolean {
    if (values.length === 0) return false

    return values.every((value) => this.find(value) !== undefined)
  }

  find(value: T): number | undefined {
    for (let i = 0; i < this.length; i++) {
      if (sameValueZero(this.read(i), value)) return i
    }

    return undefined
  }

  map<U>(callback: (value: T, index: number) => U): DynamicArray<U> {
    return this.derive(this.toArray().map(callback))
  }

  filter(predicate: (value: T, index: number) => unknown = Boolean): DynamicArray<T> {
    return this.derive(this.toArray().filter(predicate))
  }

  reduce<U>(callback: (carry: U, value: T, index: number) => U, initial: U): U {
    let carry = initial

    for (let i = 0; i < this.length; i++) carry = callback(carry, this.read(i), i)

    return carry
  }

  apply(callback: (value: T, index: number) => T): void {
    for (let i = 0; i < this.length; i++) this.write(i, callback(this.read(i), i))
  }

  join(glue = ""): string {
    return this.toArray().join(glue)
  }

  sum(this: Sequence<number>): number {
    return this.reduce((total, value) => total + value, 0)
  }

  merge(values: Iterable<T>): DynamicArray<T> {
    const merged = this.copy()
    merged.pushAll(values)

    return merged
  }

  toArray(): T[] {
    const values = new Array<T>(this.length)

    for (let i = 0; i < this.length; i++) values[i] = this.read(i)

    return values
  }

  toJSON(): T[] {
    return this.toArray()
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.length; i++) yield this.read(i)
  }

  private append(values: readonly T[], operation: string): void {
    if (values.length === 0) return

    this.resize(this.tracker.fit(this.length + values.length, operation))

    for (const value of values) {
      this.write(this.length, value)
      this.length += 1
    }
  }

  private read(index: number): T {
    return this.buffer[(this.head + index) % this.buffer.length]
  }

  private write(index: number, value: T): void {
    this.buffer[(this.head + index) % this.buffer.length] = value
  }

  private release(index: number): void {
    delete this.buffer[(this.head + index) % this.buffer.length]
  }

  private resize(capacity: number): void {
    if (capacity === this.buffer.length) return

    const next = new Array<T>(capacity)
    for (let i = 0; i < this.length; i++) next[i] = this.read(i)

    this.buffer = next
    this.head = 0
  }

  private reverseRange(from: number, to: number): void {
    for (let i = from, j = to - 1; i < j; i++, j--) {
      const value = this.read(i)
      this.write(i, this.read(j))
      this.write(j, value)
    }
  }

  private assertIndex(index: number): void {
    this.assertRange(index, this.length - 1)
  }

  private assertRange(index: number, max: number): void {
    if (Number.isInteger(index) && index >= 0 && index <= max) return

    throw new IndexOutOfRangeError({ collection: this.collection, index, min: 0, max })
  }

  private assertNotEmpty(operation: string): void {
    if (this.length === 0) throw new UnderflowError({ collection: this.collection, operation })
  }
}
