import { NullLogger } from "@tessera/logger"
import type { CollectionDeps } from "../../ports/collection-deps"
import { MultiplicativeCapacityPolicy } from "../capacity/multiplicative-capacity-policy"
import { DynamicArray } from "./dynamic-array"

/**
 * General purpose sequence. Grows by a constant factor (1.5 by default)
 * starting from 10 slots.
 *
 * @example
 * ```ts
 * const v = new Vector([3, 1, 2])
 * v.sort()
 * v.toArray() // [1, 2, 3]
 * ```
 */
export class Vector<T> extends DynamicArray<T> {
  constructor(values: Iterable<T> = [], deps: CollectionDeps = {}) {
    super(
      "Vector",
      {
        policy: deps.policy ?? new MultiplicativeCapacityPolicy(),
        logger: deps.logger ?? new NullLogger(),
      },
      values,
    )
  }

  protected derive<U>(values: Iterable<U>): Vector<U> {
    return new Vector(values, this.deps)
  }
}
