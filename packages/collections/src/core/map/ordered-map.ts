import { IndexOutOfRangeError, InvalidArgumentError, KeyNotFoundError, UnderflowError } from "@tessera/errors"
import { NullLogger } from "@tessera/logger"
import type { CollectionDeps, ResolvedCollectionDeps } from "../../ports/collection-deps"
import type { Comparator } from "../../ports/comparator"
import { CapacityTracker } from "../capacity/capacity-tracker"
import { SquaredCapacityPolicy } from "../capacity/squared-capacity-policy"
import { naturalOrder } from "../compare/natural-order"
import { sameValueZero } from "../compare/same-value-zero"
import { Pair } from "../facades/pair"
import { HashIndex } from "../hashing/hash-index"
import { hashOf } from "../hashing/hash-of"
import { Vector } from "../sequence/vector"
import { OrderedSet } from "../set/ordered-set"
import { collect } from "../utils/collect"
import { sliceBounds } from "../utils/slice-bounds"
import type { Lookup } from "./lookup"

export type MapEntryLike<K, V> = readonly [K, V] | Pair<K, V>

export type OrderedMapOptions = Readonly<{
  /** Name used in errors and logs. Default: "OrderedMap" */
  collection?: string
}>

function isEntryTuple<K, V>(item: MapEntryLike<K, V>): item is readonly [K, V] {
  return Array.isArray(item) && item.length === 2
}

type MapEntry<K, V> = {
  readonly key: K
  readonly hash: unknown
  value: V
  prev: MapEntry<K, V> | undefined
  next: MapEntry<K, V> | undefined
  removed: boolean
}

/**
 * Hash map that iterates in insertion order.
 *
 * Each entry sits once in a doubly linked list (the order) and once in a
 * {@link HashIndex} bucket (the lookup). Both are updated in the same
 * step, so removal is O(1) on average and keeps the relative order of
 * everything else. A removed entry keeps its back link, which lets an
 * iterator that is parked on it carry on with whatever now follows its
 * nearest live predecessor, including entries put after the removal.
 *
 * Re-putting an existing key replaces the value in place; removing and
 * putting it again moves it to the end.
 *
 * Keys are compared with `equals()` when they implement `Hashable`,
 * by `SameValueZero` otherwise.
 */
export class OrderedMap<K, V> implements Iterable<[K, V]> {
  private readonly index = new HashIndex<K, MapEntry<K, V>>()
  private readonly deps: ResolvedCollectionDeps
  private readonly collection: string
  private readonly tracker: CapacityTracker
  private head: MapEntry<K, V> | undefined
  private tail: MapEntry<K, V> | undefined

  constructor(
    entries: Iterable<MapEntryLike<K, V>> = [],
    deps: CollectionDeps = {},
    private readonly opts: OrderedMapOptions = {},
  ) {
    this.deps = {
      policy: deps.policy ?? new SquaredCapacityPolicy(),
      logger: deps.logger ?? new NullLogger(),
    }
    this.collection = opts.collection ?? "OrderedMap"
    this.tracker = new CapacityTracker(this.deps, this.collection)

    for (const [key, value] of this.toEntries(entries, "constructor")) {
      this.store(key, value, "constructor")
    }
  }

  size(): number {
    return this.index.size()
  }

  isEmpty(): boolean {
    return this.index.size() === 0
  }

  capacity(): number {
    return this.tracker.value
  }

  allocate(capacity: number): void {
    this.tracker.reserve(capacity, this.size())
  }

  clear(): void {
    for (const entry of [...this.live()]) entry.removed = true

    this.index.clear()
    this.head = undefined
    this.tail = undefined
    this.tracker.reset()
  }

  copy(): OrderedMap<K, V> {
    return this.derive(this)
  }

  put(key: K, value: V): void {
    this.store(key, value, "put")
  }

  putAll(entries: Iterable<MapEntryLike<K, V>>): void {
    for (const [key, value] of this.toEntries(entries, "putAll")) {
      this.store(key, value, "putAll")
    }
  }

  /**
   * Value stored under `key`.
   *
   * With a second argument, that argument is returned for an absent key,
   * even when it is `undefined`. Without one, an absent key throws
   * `KeyNotFoundError`.
   */
  get(key: K): V
  get<D>(key: K, fallback: D): V | D
  get<D>(key: K, ...fallback: [] | [D]): V | D {
    const entry = this.entryFor(key)

    if (entry) return entry.value
    if (fallback.length === 1) return fallback[0]

    throw new KeyNotFoundError({ collection: this.collection, key })
  }

  getOr<D>(key: K, fallback: D): V | D {
    return this.get(key, fallback)
  }

  lookup(key: K): Lookup<V> {
    const entry = this.entryFor(key)

    return entry ? { found: true, value: entry.value } : { found: false }
  }

  /**
   * Replace the value under `key` with `callback(value)` and return it.
   *
   * @throws {KeyNotFoundError} when `key` is absent.
   */
  update(key: K, callback: (value: V, key: K) => V): V {
    const entry = this.entryFor(key)

    if (!entry) throw new KeyNotFoundError({ collection: this.collection, key })

    entry.value = callback(entry.value, entry.key)

    return entry.value
  }

  /** Same default rule as {@link get}. */
  remove(key: K): V
  remove<D>(key: K, fallback: D): V | D
  remove<D>(key: K, ...fallback: [] | [D]): V | D {
    const entry = this.entryFor(key)

    if (entry) {
      this.detach(entry, "remove")
      return entry.value
    }

    if (fallback.length === 1) return fallback[0]

    throw new KeyNotFoundError({ collection: this.collection, key })
  }

  /** Remove every key present; absent keys are skipped. */
  removeAll(keys: Iterable<K>): void {
    for (const key of collect(keys, { collection: this.collection, operation: "removeAll", argument: "keys" })) {
      const entry = this.entryFor(key)
      if (entry) this.detach(entry, "removeAll")
    }
  }

  hasKey(...keys: K[]): boolean {
    if (keys.length === 0) return false

    return keys.every((key) => this.entryFor(key) !== undefined)
  }

  hasValue(...values: V[]): boolean {
    if (values.length === 0) return false

    return values.every((value) => {
      for (const entry of this.live()) {
        if (sameValueZero(entry.value, value)) return true
      }

      return false
    })
  }

  first(): Pair<K, V> {
    if (!this.head) throw new UnderflowError({ collection: this.collection, operation: "first" })

    return new Pair(this.head.key, this.head.value)
  }

  last(): Pair<K, V> {
    if (!this.tail) throw new UnderflowError({ collection: this.collection, operation: "last" })

    return new Pair(this.tail.key, this.tail.value)
  }

  /** Pair at `position` in iteration order. */
  skip(position: number): Pair<K, V> {
    if (Number.isInteger(position) && position >= 0) {
      let current = 0

      for (const entry of this.live()) {
        if (current === position) return new Pair(entry.key, entry.value)
        current += 1
      }
    }

    throw new IndexOutOfRangeError({
      collection: this.collection,
      index: position,
      min: 0,
      max: this.size() - 1,
    })
  }

  keys(): OrderedSet<K> {
    return new OrderedSet(this.keyValues(), this.deps)
  }

  values(): Vector<V> {
    const values: V[] = []
    for (const entry of this.live()) values.push(entry.value)

    return new Vector(values, { logger: this.deps.logger })
  }

  pairs(): Vector<Pair<K, V>> {
    const pairs: Pair<K, V>[] = []
    for (const entry of this.live()) pairs.push(new Pair(entry.key, entry.value))

    return new Vector(pairs, { logger: this.deps.logger })
  }

  /** Replace every value with `callback(key, value)`, keeping the order. */
  apply(callback: (key: K, value: V) => V): void {
    for (const entry of this.live()) entry.value = callback(entry.key, entry.value)
  }

  map<U>(callback: (key: K, value: V) => U): OrderedMap<K, U> {
    const mapped: [K, U][] = []
    for (const entry of this.live()) mapped.push([entry.key, callback(entry.key, entry.value)])

    return this.derive(mapped)
  }

  /** Entries for which `predicate` is truthy; by default, truthy values. */
  filter(predicate: (key: K, value: V) => unknown = (_key, value) => value): OrderedMap<K, V> {
    const kept: [K, V][] = []

    for (const entry of this.live()) {
      if (predicate(entry.key, entry.value)) kept.push([entry.key, entry.value])
    }

    return this.derive(kept)
  }

  reduce<U>(callback: (carry: U, key: K, value: V) => U, initial: U): U {
    let carry = initial

    for (const entry of this.live()) carry = callback(carry, entry.key, entry.value)

    return carry
  }

  /** Sum of the values; 0 when empty. */
  sum(this: OrderedMap<K, number>): number {
    return this.reduce((total, _key, value) => total + value, 0)
  }

  /** Copy with `entries` put on top; existing keys keep their position. */
  merge(entries: Iterable<MapEntryLike<K, V>>): OrderedMap<K, V> {
    const merged = this.copy()
    merged.putAll(entries)

    return merged
  }

  union(other: OrderedMap<K, V>): OrderedMap<K, V> {
    return this.merge(other)
  }

  /** Entries whose key is also in `other`, with this map's values. */
  intersect(other: OrderedMap<K, V>): OrderedMap<K, V> {
    return this.filter((key) => other.hasKey(key))
  }

  /** Entries whose key is not in `other`. */
  diff(other: OrderedMap<K, V>): OrderedMap<K, V> {
    return this.filter((key) => !other.hasKey(key))
  }

  /** Entries whose key is in exactly one of the two maps. */
  xor(other: OrderedMap<K, V>): OrderedMap<K, V> {
    const result = this.diff(other)

    for (const [key, value] of other) {
      if (!this.hasKey(key)) result.put(key, value)
    }

    return result
  }

  /** Reorder entries by value. */
  sort(comparator: Comparator<V> = naturalOrder): void {
    this.relink([...this.live()].sort((a, b) => comparator(a.value, b.value)))
  }

  sorted(comparator: Comparator<V> = naturalOrder): OrderedMap<K, V> {
    const sorted = this.copy()
    sorted.sort(comparator)

    return sorted
  }

  /** Reorder entries by key. */
  ksort(comparator: Comparator<K> = naturalOrder): void {
    this.relink([...this.live()].sort((a, b) => comparator(a.key, b.key)))
  }

  ksorted(comparator: Comparator<K> = naturalOrder): OrderedMap<K, V> {
    const sorted = this.copy()
    sorted.ksort(comparator)

    return sorted
  }

  reverse(): void {
    this.relink([...this.live()].reverse())
  }

  reversed(): OrderedMap<K, V> {
    const reversed = this.copy()
    reversed.reverse()

    return reversed
  }

  slice(offset: number, length?: number): OrderedMap<K, V> {
    const { start, end } = sliceBounds(this.collection, this.size(), offset, length)

    return this.derive(this.toArray().slice(start, end))
  }

  toArray(): [K, V][] {
    return [...this]
  }

  toJSON(): [K, V][] {
    return this.toArray()
  }

  *[Symbol.iterator](): Iterator<[K, V]> {
    for (const entry of this.live()) yield [entry.key, entry.value]
  }

  private *live(): Generator<MapEntry<K, V>> {
    let entry = this.head

    while (entry) {
      if (!entry.removed) yield entry
      entry = this.successor(entry)
    }
  }

  /**
   * Next entry in the current order. For a removed entry that is the next
   * entry after its nearest live predecessor, or the head when none is left.
   */
  private successor(entry: MapEntry<K, V>): MapEntry<K, V> | undefined {
    if (!entry.removed) return entry.next

    let anchor = entry.prev
    while (anchor?.removed) anchor = anchor.prev

    return anchor ? anchor.next : this.head
  }

  private *keyValues(): Generator<K> {
    for (const entry of this.live()) yield entry.key
  }

  private derive<U>(entries: Iterable<MapEntryLike<K, U>>): OrderedMap<K, U> {
    return new OrderedMap(entries, this.deps, this.opts)
  }

  private entryFor(key: K): MapEntry<K, V> | undefined {
    return this.index.find(key, hashOf(key))
  }

  private store(key: K, value: V, operation: string): void {
    const hash = hashOf(key)
    const existing = this.index.find(key, hash)

    if (existing) {
      existing.value = value
      return
    }

    this.tracker.fit(this.index.size() + 1, operation)

    const entry: MapEntry<K, V> = { key, hash, value, prev: this.tail, next: undefined, removed: false }

    if (this.tail) this.tail.next = entry
    else this.head = entry

    this.tail = entry
    this.index.add(entry)
  }

  private detach(entry: MapEntry<K, V>, operation: string): void {
    this.index.delete(entry)

    if (entry.prev) entry.prev.next = entry.next
    else this.head = entry.next

    if (entry.next) entry.next.prev = entry.prev
    else this.tail = entry.prev

    entry.removed = true
    this.tracker.settle(this.index.size(), operation)
  }

  private relink(entries: MapEntry<K, V>[]): void {
    this.head = entries[0]
    this.tail = entries[entries.length - 1]

    entries.forEach((entry, position) => {
      entry.prev = entries[position - 1]
      entry.next = entries[position + 1]
    })
  }

  private toEntries(entries: Iterable<MapEntryLike<K, V>>, operation: string): [K, V][] {
    return collect(entries, { collection: this.collection, operation, argument: "entries" }).map(
      (item): [K, V] => {
        if (item instanceof Pair) return [item.key, item.value]
        if (isEntryTuple(item)) return [item[0], item[1]]

        throw new InvalidArgumentError(
          { collection: this.collection, operation, argument: "entries" },
          "expected [key, value] tuples or Pair instances",
        )
      },
    )
  }
}
