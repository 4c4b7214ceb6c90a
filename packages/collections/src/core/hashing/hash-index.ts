import { keysAreEqual } from "./keys-are-equal"

export type HashedEntry<K> = {
  readonly key: K

  /** Result of `hashOf(key)` at insertion time. */
  readonly hash: unknown
}

/**
 * Buckets of entries grouped by hash. Callers compute the hash once per
 * operation and pass it in, so a lookup costs one `hash()` call however
 * many candidates share the bucket.
 */
export class HashIndex<K, E extends HashedEntry<K>> {
  private readonly buckets = new Map<unknown, E[]>()
  private count = 0

  find(key: K, hash: unknown): E | undefined {
    return this.buckets.get(hash)?.find((entry) => keysAreEqual(entry.key, key))
  }

  add(entry: E): void {
    const bucket = this.buckets.get(entry.hash)

    if (bucket) bucket.push(entry)
    else this.buckets.set(entry.hash, [entry])

    this.count += 1
  }

  delete(entry: E): boolean {
    const bucket = this.buckets.get(entry.hash)
    const position = bucket?.indexOf(entry) ?? -1

    if (!bucket || position === -1) return false

    bucket.splice(position, 1)
    if (bucket.length === 0) this.buckets.delete(entry.hash)

    this.count -= 1

    return true
  }

  clear(): void {
    this.buckets.clear()
    this.count = 0
  }

  size(): number {
    return this.count
  }
}
