export type HashCode = string | number | bigint

/**
 * Structural equality for keys of {@link OrderedMap} and values of
 * {@link OrderedSet}.
 *
 * Keys that do not implement it compare by `SameValueZero`, so two
 * distinct objects are always two distinct keys.
 *
 * @remarks
 * - `a.equals(b)` implies `a.hash() === b.hash()`.
 * - `hash()` must not change while the key is stored.
 *
 * @example
 * ```ts
 * class Point implements Hashable {
 *   constructor(readonly x: number, readonly y: number) {}
 *
 *   hash() {
 *     return `${this.x}:${this.y}`
 *   }
 *
 *   equals(other: unknown) {
 *     return other instanceof Point && other.x === this.x && other.y === this.y
 *   }
 * }
 * ```
 */
export interface Hashable {
  hash(): HashCode
  equals(other: unknown): boolean
}

export function isHashable(value: unknown): value is Hashable {
  return (
    typeof value === "object" &&
    value !== null &&
    "hash" in value &&
    "equals" in value &&
    typeof value.hash === "function" &&
    typeof value.equals === "function"
  )
}
