import { isHashable } from "../../ports/hashable"

/**
 * Bucket identifier for a key: `hash()` for {@link Hashable} keys, the key
 * itself otherwise. Buckets live in a native `Map`, so the identifier is
 * compared by `SameValueZero`.
 */
export function hashOf(key: unknown): unknown {
  return isHashable(key) ? key.hash() : key
}
