import type { Comparator } from "./comparator"

/**
 * An ordered, 0-indexed sequence that allows duplicates.
 *
 * Positional reads and writes accept `[0, size)`; `insert` also accepts
 * `size`. Operations that return a sequence build a new, independent one
 * of the same kind.
 */
export interface Sequence<T> extends Iterable<T> {
  size(): number
  isEmpty(): boolean
  capacity(): number
  allocate(capacity: number): void
  clear(): void
  copy(): Sequence<T>

  get(index: number): T
  set(index: number, value: T): void

  push(...values: T[]): void
  pushAll(values: Iterable<T>): void
  pop(): T

  unshift(...values: T[]): void
  shift(): T

  insert(index: number, ...values: T[]): void
  remove(index: number): T

  first(): T
  last(): T

  /** Rotate left by `rotations`; negative values rotate right. */
  rotate(rotations: number): void

  sort(comparator?: Comparator<T>): void
  sorted(comparator?: Comparator<T>): Sequence<T>
  reverse(): void
  reversed(): Sequence<T>
  slice(offset: number, length?: number): Sequence<T>

  /** True when every given value is present; false when called with none. */
  contains(...values: T[]): boolean
  find(value: T): number | undefined

  map<U>(callback: (value: T, index: number) => U): Sequence<U>
  filter(predicate?: (value: T, index: number) => unknown): Sequence<T>
  reduce<U>(callback: (carry: U, value: T, index: number) => U, initial: U): U
  apply(callback: (value: T, index: number) => T): void
  join(glue?: string): string
  /** Sum of the values; 0 when empty. */
  sum(this: Sequence<number>): number
  merge(values: Iterable<T>): Sequence<T>

  toArray(): T[]
  toJSON(): T[]
}
