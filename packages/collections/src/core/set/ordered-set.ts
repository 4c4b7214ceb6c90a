import type { CollectionDeps } from "../../ports/collection-deps"
import type { Comparator } from "../../ports/comparator"
import { naturalOrder } from "../compare/natural-order"
import { sortValues } from "../compare/sort-values"
import { OrderedMap } from "../map/ordered-map"
import { collect } from "../utils/collect"

const COLLECTION = "OrderedSet"

/**
 * Insertion-ordered set of unique values, stored as the keys of an
 * {@link OrderedMap}. Value equality follows the map's key rules.
 */
export class OrderedSet<T> implements Iterable<T> {
  private readonly backing: OrderedMap<T, true>

  constructor(
    values: Iterable<T> = [],
    private readonly deps: CollectionDeps = {},
  ) {
    this.backing = new OrderedMap<T, true>([], deps, { collection: COLLECTION })

    for (const value of collect(values, { collection: COLLECTION, operation: "constructor" })) {
      this.backing.put(value, true)
    }
  }

  size(): number {
    return this.backing.size()
  }

  isEmpty(): boolean {
    return this.backing.isEmpty()
  }

  capacity(): number {
    return this.backing.capacity()
  }

  allocate(capacity: number): void {
    this.backing.allocate(capacity)
  }

  clear(): void {
    this.backing.clear()
  }

  copy(): OrderedSet<T> {
    return this.derive(this)
  }

  add(...values: T[]): void {
    for (const value of values) this.backing.put(value, true)
  }

  addAll(values: Iterable<T>): void {
    this.add(...collect(values, { collection: COLLECTION, operation: "addAll" }))
  }

  /** Remove the given values; absent ones are ignored. */
  remove(...values: T[]): void {
    this.backing.removeAll(values)
  }

  contains(...values: T[]): boolean {
    return this.backing.hasKey(...values)
  }

  first(): T {
    return this.backing.first().key
  }

  last(): T {
    return this.backing.last().key
  }

  get(position: number): T {
    return this.backing.skip(position).key
  }

  /** Values of this set followed by the new values of `other`. */
  union(other: OrderedSet<T>): OrderedSet<T> {
    const union = this.copy()
    union.add(...other)

    return union
  }

  intersect(other: OrderedSet<T>): OrderedSet<T> {
    return this.filter((value) => other.contains(value))
  }

  diff(other: OrderedSet<T>): OrderedSet<T> {
    return this.filter((value) => !other.contains(value))
  }

  xor(other: OrderedSet<T>): OrderedSet<T> {
    const result = this.diff(other)

    for (const value of other) {
      if (!this.contains(value)) result.add(value)
    }

    return result
  }

  filter(predicate: (value: T) => unknown = Boolean): OrderedSet<T> {
    return this.derive(this.toArray().filter((value) => predicate(value)))
  }

  map<U>(callback: (value: T) => U): OrderedSet<U> {
    return new OrderedSet(
      this.toArray().map((value) => callback(value)),
      this.deps,
    )
  }

  reduce<U>(callback: (carry: U, value: T) => U, initial: U): U {
    return this.backing.reduce((carry, key) => callback(carry, key), initial)
  }

  sum(this: OrderedSet<number>): number {
    return this.reduce((total, value) => total + value, 0)
  }

  sort(comparator: Comparator<T> = naturalOrder): void {
    this.backing.ksort(comparator)
  }

  sorted(comparator: Comparator<T> = naturalOrder): OrderedSet<T> {
    return this.derive(sortValues(this.toArray(), comparator))
  }

  reverse(): void {
    this.backing.reverse()
  }

  reversed(): OrderedSet<T> {
    return this.derive(this.toArray().reverse())
  }

  slice(offset: number, length?: number): OrderedSet<T> {
    return this.derive(this.backing.slice(offset, length).keys())
  }

  join(glue = ""): string {
    return this.toArray().join(glue)
  }

  toArray(): T[] {
    return [...this]
  }

  toJSON(): T[] {
    return this.toArray()
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const [key] of this.backing) yield key
  }

  private derive(values: Iterable<T>): OrderedSet<T> {
    return new OrderedSet(values, this.deps)
  }
}
