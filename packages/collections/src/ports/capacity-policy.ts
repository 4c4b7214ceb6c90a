/**
 * Decides how large a structure's backing buffer should be.
 *
 * A policy is pure: it never sees the values, only counts. Structures call
 * it after each mutation and apply whatever it returns.
 */
export interface CapacityPolicy {
  /** Capacity of an empty structure; no result is ever smaller. */
  readonly minCapacity: number

  /**
   * Capacity to use when the buffer must hold at least `minimum` slots.
   *
   * @param current - Capacity before growing.
   * @param minimum - Smallest acceptable result.
   */
  grow(current: number, minimum: number): number

  /**
   * Capacity to use after a removal left `size` values behind.
   * Returns `current` when no shrink is due.
   */
  shrink(current: number, size: number): number

  /**
   * Capacity satisfying an explicit `allocate(requested)` call.
   * Never smaller than `current`.
   */
  reserve(current: number, requested: number): number
}
