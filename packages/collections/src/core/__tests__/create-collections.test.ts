import { Pair } from "../facades/pair"
import { Queue } from "../facades/queue"
import { Stack } from "../facades/stack"
import { PriorityQueue } from "../heap/priority-queue"
import { OrderedMap } from "../map/ordered-map"
import { Deque } from "../sequence/deque"
import { Vector } from "../sequence/vector"
import { OrderedSet } from "../set/ordered-set"
import { createCollections } from "../create-collections"
import { RecordingLogger } from "./recording-logger"

describe("createCollections", () => {
  it("builds every structure", () => {
    const collections = createCollections({ logger: new RecordingLogger() })

    expect(collections.vector([1])).toBeInstanceOf(Vector)
    expect(collections.deque([1])).toBeInstanceOf(Deque)
    expect(collections.map([["a", 1]])).toBeInstanceOf(OrderedMap)
    expect(collections.set([1])).toBeInstanceOf(OrderedSet)
    expect(collections.stack([1])).toBeInstanceOf(Stack)
    expect(collections.queue([1])).toBeInstanceOf(Queue)
    expect(collections.priorityQueue()).toBeInstanceOf(PriorityQueue)
    expect(collections.pair("k", "v")).toEqual(new Pair("k", "v"))
  })

  it("uses defaults without a config", () => {
    const collections = createCollections({ logger: new RecordingLogger() })

    expect(collections.config.VECTOR_MIN_CAPACITY).toBe(10)
    expect(collections.vector().capacity()).toBe(10)
    expect(collections.deque().capacity()).toBe(8)
  })

  it("hands the configured policies to every structure", () => {
    const collections = createCollections({
      config: { VECTOR_MIN_CAPACITY: 4, VECTOR_GROWTH_FACTOR: 2, SQUARED_MIN_CAPACITY: 2 },
      logger: new RecordingLogger(),
    })

    const vector = collections.vector([1, 2, 3, 4])

    expect(vector.capacity()).toBe(8)
    expect(collections.stack<number>().capacity()).toBe(4)
    expect(collections.deque<number>().capacity()).toBe(2)
    expect(collections.queue<number>().capacity()).toBe(2)
    expect(collections.map<string, number>().capacity()).toBe(2)
    expect(collections.set<number>().capacity()).toBe(2)
    expect(collections.priorityQueue<number>().capacity()).toBe(2)
  })

  it("rejects an invalid config", () => {
    expect(() => createCollections({ config: { SQUARED_MIN_CAPACITY: 3 } })).toThrow(
      /Configuration validation failed/,
    )
  })

  it("scopes the logger to the collections module", () => {
    const logger = new RecordingLogger()
    const collections = createCollections({ logger })

    collections.deque(Array.from({ length: 8 }, (_, i) => i))

    expect(logger.logs).toEqual([
      {
        level: "trace",
        message: "capacity grown",
        fields: { module: "collections", collection: "Deque", operation: "constructor", size: 8, capacity: 16 },
      },
    ])
  })
})
