import type { Comparator } from "../../ports/comparator"

/**
 * Stable sort that hands every value to `comparator`, `undefined` included.
 * `Array.prototype.sort` alone skips `undefined` and always puts it last.
 */
export function sortValues<T>(values: readonly T[], comparator: Comparator<T>): T[] {
  return values
    .map((value) => ({ value }))
    .sort((a, b) => comparator(a.value, b.value))
    .map(({ value }) => value)
}
