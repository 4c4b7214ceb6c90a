import { InvalidArgumentError } from "@tessera/errors"
import type { ResolvedCollectionDeps } from "../../ports/collection-deps"

/** Longest array a JS engine can hold. */
export const MAX_CAPACITY = 2 ** 32 - 1

/**
 * Applies a `CapacityPolicy` on behalf of one structure and logs
 * every change at trace level.
 *
 * Growth triggers once the size reaches the capacity, shrinking once it
 * drops under a quarter of it, so `capacity > size` holds between calls.
 */
export class CapacityTracker {
  private current: number

  constructor(
    private readonly deps: ResolvedCollectionDeps,
    private readonly collection: string,
    initial?: number,
  ) {
    this.current = initial ?? deps.policy.minCapacity
  }

  get value(): number {
    return this.current
  }

  /** Capacity needed before `size` values are stored. */
  fit(size: number, operation: string): number {
    if (size < this.current) return this.current

    return this.change(this.deps.policy.grow(this.current, size + 1), size, operation, "grown")
  }

  /** Capacity after a removal left `size` values. */
  settle(size: number, operation: string): number {
    return this.change(this.deps.policy.shrink(this.current, size), size, operation, "shrunk")
  }

  reserve(requested: number, size: number): number {
    if (!Number.isSafeInteger(requested) || requested < 0) {
      throw new InvalidArgumentError(
        { collection: this.collection, operation: "allocate", argument: "capacity" },
        `expected a non-negative integer, got ${requested}`,
      )
    }

    const next = this.deps.policy.reserve(this.current, requested)

    if (next > MAX_CAPACITY) {
      throw new InvalidArgumentError(
        { collection: this.collection, operation: "allocate", argument: "capacity" },
        `${requested} needs a capacity of ${next}, above the maximum of ${MAX_CAPACITY}`,
      )
    }

    return this.change(next, size, "allocate", "reserved")
  }

  reset(): number {
    this.current = this.deps.policy.minCapacity

    return this.current
  }

  copy(): CapacityTracker {
    return new CapacityTracker(this.deps, this.collection, this.current)
  }

  private change(next: number, size: number, operation: string, verb: string): number {
    if (next === this.current) return next

    this.current = next
    this.deps.logger.trace(`capacity ${verb}`, {
      collection: this.collection,
      operation,
      size,
      capacity: next,
    })

    return next
  }
}
