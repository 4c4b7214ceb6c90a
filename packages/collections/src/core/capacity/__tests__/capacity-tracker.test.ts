import { InvalidArgumentError } from "@tessera/errors"
import { RecordingLogger } from "../../__tests__/recording-logger"
import { CapacityTracker } from "../capacity-tracker"
import { SquaredCapacityPolicy } from "../squared-capacity-policy"

describe("CapacityTracker", () => {
  let logger: RecordingLogger
  let tracker: CapacityTracker

  beforeEach(() => {
    logger = new RecordingLogger()
    tracker = new CapacityTracker({ policy: new SquaredCapacityPolicy(), logger }, "Deque")
  })

  it("starts at the policy minimum", () => {
    expect(tracker.value).toBe(8)
  })

  it("fit() keeps the capacity while the size is below it", () => {
    expect(tracker.fit(7, "push")).toBe(8)
    expect(logger.logs).toEqual([])
  })

  it("fit() grows once the size reaches the capacity", () => {
    expect(tracker.fit(8, "push")).toBe(16)
    expect(tracker.value).toBe(16)
  })

  it("logs growth at trace level with the structure and operation", () => {
    tracker.fit(8, "unshift")

    expect(logger.logs).toEqual([
      {
        level: "trace",
        message: "capacity grown",
        fields: { collection: "Deque", operation: "unshift", size: 8, capacity: 16 },
      },
    ])
  })

  it("settle() shrinks below a quarter and logs it", () => {
    tracker.fit(40, "pushAll")
    expect(tracker.value).toBe(64)

    expect(tracker.settle(15, "pop")).toBe(32)
    expect(logger.logs.at(-1)).toEqual({
      level: "trace",
      message: "capacity shrunk",
      fields: { collection: "Deque", operation: "pop", size: 15, capacity: 32 },
    })
  })

  it("reserve() raises but never lowers the capacity", () => {
    expect(tracker.reserve(20, 0)).toBe(32)
    expect(tracker.reserve(4, 0)).toBe(32)
    expect(logger.messages()).toEqual(["capacity reserved"])
  })

  it.each([-1, 2.5, Number.NaN])("reserve() rejects %s", (requested) => {
    expect(() => tracker.reserve(requested, 0)).toThrow(InvalidArgumentError)
    expect(tracker.value).toBe(8)
  })

  it("reserve() rejects a capacity no array can hold", () => {
    expect(() => tracker.reserve(2 ** 31 + 1, 0)).toThrow(
      `${2 ** 31 + 1} needs a capacity of ${2 ** 32}, above the maximum of ${2 ** 32 - 1}`,
    )
    expect(tracker.value).toBe(8)
    expect(logger.messages()).toEqual([])
  })

  it("reset() returns to the minimum", () => {
    tracker.fit(100, "push")

    expect(tracker.reset()).toBe(8)
  })

  it("copy() is independent", () => {
    tracker.fit(8, "push")
    const copy = tracker.copy()

    copy.fit(16, "push")

    expect(tracker.value).toBe(16)
    expect(copy.value).toBe(32)
  })
})
