export { EnvSource, type EnvSourceOptions, DEFAULT_ENV_PREFIX } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { CapacityTracker, MAX_CAPACITY } from "./core/capacity/capacity-tracker"
export {
  DEFAULT_VECTOR_GROWTH_FACTOR,
  DEFAULT_VECTOR_MIN_CAPACITY,
  MultiplicativeCapacityPolicy,
  type MultiplicativeCapacityOptions,
} from "./core/capacity/multiplicative-capacity-policy"
export {
  DEFAULT_SQUARED_MIN_CAPACITY,
  SquaredCapacityPolicy,
  square,
} from "./core/capacity/squared-capacity-policy"
export { naturalOrder } from "./core/compare/natural-order"
export { sameValueZero } from "./core/compare/same-value-zero"
export {
  type CollectionsConfig,
  collectionsConfigSchema,
  loadCollectionsConfig,
  type LoadCollectionsConfigOptions,
  parseCollectionsConfig,
} from "./core/config/collections-config"
export {
  type Collections,
  createCollections,
  type CreateCollectionsOptions,
} from "./core/create-collections"
export { Pair } from "./core/facades/pair"
export { Queue } from "./core/facades/queue"
export { Stack } from "./core/facades/stack"
export { HashIndex, type HashedEntry } from "./core/hashing/hash-index"
export { hashOf } from "./core/hashing/hash-of"
export { keysAreEqual } from "./core/hashing/keys-are-equal"
export { compareNodes, type HeapNode, PriorityQueue } from "./core/heap/priority-queue"
export type { Lookup } from "./core/map/lookup"
export { type MapEntryLike, OrderedMap, type OrderedMapOptions } from "./core/map/ordered-map"
export { Deque } from "./core/sequence/deque"
export { DynamicArray } from "./core/sequence/dynamic-array"
export { Vector } from "./core/sequence/vector"
export { OrderedSet } from "./core/set/ordered-set"
export type { CapacityPolicy } from "./ports/capacity-policy"
export type { CollectionDeps, ResolvedCollectionDeps } from "./ports/collection-deps"
export type { Comparator } from "./ports/comparator"
export type { ConfigSource } from "./ports/config-source"
export { type Hashable, type HashCode, isHashable } from "./ports/hashable"
export type { Sequence } from "./ports/sequence"
