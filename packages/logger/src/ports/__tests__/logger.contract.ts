import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "collections" })
      const child = parent.child({ collection: "Vector" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        module: "collections",
        collection: "Vector",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ collection: "Vector" })
      const child = parent.child({ collection: "Deque" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.collection).toBe("Deque")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ module: "collections" })
      const child = parent.child({ collection: "OrderedMap" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ module: "collections" })
      expect(logs[0]?.payload).not.toHaveProperty("collection")
      expect(logs[1]?.payload).toMatchObject({
        module: "collections",
        collection: "OrderedMap",
      })

      clear()
    })

    it("per-call meta merges with context (meta overrides)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const scoped = logger.child({ operation: "push" })
      scoped.trace("capacity grown", { operation: "unshift", size: 8, capacity: 16 })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ operation: "unshift", size: 8, capacity: 16 })
    })

    it("capacity entries carry the collection fields", () => {
      const { logger, read } = h.make({ level: "trace", context: { module: "collections" } })

      logger.child({ collection: "Deque" }).trace("capacity grown", {
        operation: "push",
        size: 8,
        capacity: 16,
      })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.message).toBe("capacity grown")
      expect(logs[0]?.context).toEqual({
        module: "collections",
        collection: "Deque",
        operation: "push",
        size: 8,
        capacity: 16,
      })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      const levels = read().map((l) => l.level)

      expect(levels).toEqual(["warn", "error"])
    })

    it("trace is emitted when the minimum level is trace", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.trace("capacity shrunk")

      expect(read().map((l) => l.level)).toEqual(["trace"])
    })
  })
}
