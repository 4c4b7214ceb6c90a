import { NullLogger } from "@tessera/logger"
import type { CollectionDeps } from "../../ports/collection-deps"
import { SquaredCapacityPolicy } from "../capacity/squared-capacity-policy"
import { DynamicArray } from "./dynamic-array"

/** Double-ended sequence with power-of-two capacities (8 slots minimum). */
export class Deque<T> extends DynamicArray<T> {
  constructor(values: Iterable<T> = [], deps: CollectionDeps = {}) {
    super(
      "Deque",
      {
        policy: deps.policy ?? new SquaredCapacityPolicy(),
        logger: deps.logger ?? new NullLogger(),
      },
      values,
    )
  }

  protected derive<U>(values: Iterable<U>): Deque<U> {
    return new Deque(values, this.deps)
  }
}
