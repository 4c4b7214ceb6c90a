import { InvalidArgumentError } from "@tessera/errors"
import type { CapacityPolicy } from "../../ports/capacity-policy"
import { quarterShrink } from "./shrink"

export const DEFAULT_VECTOR_MIN_CAPACITY = 10
export const DEFAULT_VECTOR_GROWTH_FACTOR = 1.5

export type MultiplicativeCapacityOptions = Readonly<{
  minCapacity?: number
  growthFactor?: number
}>

/** Vector growth: each resize multiplies the capacity by `growthFactor`. */
export class MultiplicativeCapacityPolicy implements CapacityPolicy {
  readonly minCapacity: number
  readonly growthFactor: number

  constructor(opts: MultiplicativeCapacityOptions = {}) {
    const minCapacity = opts.minCapacity ?? DEFAULT_VECTOR_MIN_CAPACITY
    const growthFactor = opts.growthFactor ?? DEFAULT_VECTOR_GROWTH_FACTOR

    if (!Number.isSafeInteger(minCapacity) || minCapacity < 1) {
      throw new InvalidArgumentError(
        { collection: "MultiplicativeCapacityPolicy", operation: "constructor", argument: "minCapacity" },
        `expected a positive integer, got ${minCapacity}`,
      )
    }

    if (!Number.isFinite(growthFactor) || growthFactor <= 1) {
      throw new InvalidArgumentError(
        { collection: "MultiplicativeCapacityPolicy", operation: "constructor", argument: "growthFactor" },
        `expected a finite number above 1, got ${growthFactor}`,
      )
    }

    this.minCapacity = minCapacity
    this.growthFactor = growthFactor
  }

  grow(current: number, minimum: number): number {
    return Math.max(this.minCapacity, minimum, Math.floor(current * this.growthFactor))
  }

  shrink(current: number, size: number): number {
    return quarterShrink(this.minCapacity, current, size)
  }

  reserve(current: number, requested: number): number {
    return Math.max(current, requested)
  }
}
