import type { Comparator } from "../../ports/comparator"

/**
 * Default ordering. Numbers and bigints compare numerically, anything
 * else by its string form, code unit by code unit.
 */
export const naturalOrder: Comparator<unknown> = (a, b) => {
  if (typeof a === "number" && typeof b === "number") return a < b ? -1 : a > b ? 1 : 0
  if (typeof a === "bigint" && typeof b === "bigint") return a < b ? -1 : a > b ? 1 : 0

  const left = String(a)
  const right = String(b)

  return left < right ? -1 : left > right ? 1 : 0
}
