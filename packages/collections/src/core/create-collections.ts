import { createPinoLogger, type Logger } from "@tessera/logger"
import type { CapacityPolicy } from "../ports/capacity-policy"
import { MultiplicativeCapacityPolicy } from "./capacity/multiplicative-capacity-policy"
import { SquaredCapacityPolicy } from "./capacity/squared-capacity-policy"
import { type CollectionsConfig, parseCollectionsConfig } from "./config/collections-config"
import { Pair } from "./facades/pair"
import { Queue } from "./facades/queue"
import { Stack } from "./facades/stack"
import { PriorityQueue } from "./heap/priority-queue"
import { type MapEntryLike, OrderedMap } from "./map/ordered-map"
import { Deque } from "./sequence/deque"
import { Vector } from "./sequence/vector"
import { OrderedSet } from "./set/ordered-set"

export type CreateCollectionsOptions = Readonly<{
  /** Validated the same way as `loadCollectionsConfig`. Missing keys use defaults. */
  config?: Partial<CollectionsConfig>

  /** Default: a pino logger built from `LOG_LEVEL` and `LOG_PRETTY`. */
  logger?: Logger
}>

export type Collections = Readonly<{
  config: Readonly<CollectionsConfig>
  logger: Logger
  vectorPolicy: CapacityPolicy
  squaredPolicy: CapacityPolicy

  vector<T>(values?: Iterable<T>): Vector<T>
  deque<T>(values?: Iterable<T>): Deque<T>
  map<K, V>(entries?: Iterable<MapEntryLike<K, V>>): OrderedMap<K, V>
  set<T>(values?: Iterable<T>): OrderedSet<T>
  stack<T>(values?: Iterable<T>): Stack<T>
  queue<T>(values?: Iterable<T>): Queue<T>
  priorityQueue<T>(): PriorityQueue<T>
  pair<K, V>(key: K, value: V): Pair<K, V>
}>

/**
 * Build every structure from one configuration and logger.
 *
 * @example
 * ```ts
 * const collections = createCollections({ config: await loadCollectionsConfig() })
 *
 * const queue = collections.priorityQueue<string>()
 * queue.push("urgent", 10)
 * ```
 */
export function createCollections(opts: CreateCollectionsOptions = {}): Collections {
  const config = parseCollectionsConfig(opts.config ?? {})

  const logger = (
    opts.logger ?? createPinoLogger({}, { level: config.LOG_LEVEL, prettify: config.LOG_PRETTY })
  ).child({ module: "collections" })

  const vectorPolicy = new MultiplicativeCapacityPolicy({
    minCapacity: config.VECTOR_MIN_CAPACITY,
    growthFactor: config.VECTOR_GROWTH_FACTOR,
  })
  const squaredPolicy = new SquaredCapacityPolicy(config.SQUARED_MIN_CAPACITY)

  const vectorDeps = { policy: vectorPolicy, logger }
  const squaredDeps = { policy: squaredPolicy, logger }

  return {
    config,
    logger,
    vectorPolicy,
    squaredPolicy,

    vector: (values = []) => new Vector(values, vectorDeps),
    deque: (values = []) => new Deque(values, squaredDeps),
    map: (entries = []) => new OrderedMap(entries, squaredDeps),
    set: (values = []) => new OrderedSet(values, squaredDeps),
    stack: (values = []) => new Stack(values, vectorDeps),
    queue: (values = []) => new Queue(values, squaredDeps),
    priorityQueue: () => new PriorityQueue(squaredDeps),
    pair: (key, value) => new Pair(key, value),
  }
}
