import { InvalidArgumentError } from "@tessera/errors"
import type { CapacityPolicy } from "../../ports/capacity-policy"
import { quarterShrink } from "./shrink"

export const DEFAULT_SQUARED_MIN_CAPACITY = 8

/** Smallest power of two that is at least `n`. */
export function square(n: number): number {
  if (n <= 1) return 1

  return 2 ** Math.ceil(Math.log2(n))
}

/**
 * Power-of-two growth used by Deque, OrderedMap, OrderedSet and
 * PriorityQueue.
 */
export class SquaredCapacityPolicy implements CapacityPolicy {
  readonly minCapacity: number

  constructor(minCapacity = DEFAULT_SQUARED_MIN_CAPACITY) {
    if (!Number.isSafeInteger(minCapacity) || minCapacity < 1 || square(minCapacity) !== minCapacity) {
      throw new InvalidArgumentError(
        { collection: "SquaredCapacityPolicy", operation: "constructor", argument: "minCapacity" },
        `expected a power of two, got ${minCapacity}`,
      )
    }

    this.minCapacity = minCapacity
  }

  grow(_current: number, minimum: number): number {
    return Math.max(this.minCapacity, square(minimum))
  }

  shrink(current: number, size: number): number {
    return quarterShrink(this.minCapacity, current, size)
  }

  reserve(current: number, requested: number): number {
    return Math.max(current, square(requested))
  }
}
