import { RecordingLogger } from "../../__tests__/recording-logger"
import { MultiplicativeCapacityPolicy } from "../../capacity/multiplicative-capacity-policy"
import { Deque } from "../deque"
import { Vector } from "../vector"

describe("Vector behavior", () => {
  it("starts with 10 slots", () => {
    expect(new Vector().capacity()).toBe(10)
  })

  it("grows by 1.5 once the size reaches the capacity", () => {
    const vector = new Vector<number>()

    vector.pushAll([1, 2, 3, 4, 5, 6, 7, 8, 9])
    expect(vector.capacity()).toBe(10)

    vector.push(10)
    expect(vector.capacity()).toBe(15)

    vector.pushAll([11, 12, 13, 14, 15])
    expect(vector.capacity()).toBe(22)
  })

  it("shrinks by half once fewer than a quarter of the slots are used", () => {
    const vector = new Vector(Array.from({ length: 30 }, (_, i) => i))
    expect(vector.capacity()).toBe(31)

    while (vector.size() > 8) vector.pop()
    expect(vector.capacity()).toBe(31)

    vector.pop()
    expect(vector.size()).toBe(7)
    expect(vector.capacity()).toBe(15)
  })

  it("allocate() reserves the exact request", () => {
    const vector = new Vector<number>()

    vector.allocate(33)

    expect(vector.capacity()).toBe(33)
  })

  it("derived sequences are Vectors sharing the policy", () => {
    const policy = new MultiplicativeCapacityPolicy({ minCapacity: 4, growthFactor: 2 })
    const vector = new Vector([1, 2, 3], { policy })

    const derived = vector.map((n) => n * 2)

    expect(derived).toBeInstanceOf(Vector)
    expect(derived).not.toBeInstanceOf(Deque)
    expect(derived.capacity()).toBe(4)
  })

  it("logs capacity changes at trace level", () => {
    const logger = new RecordingLogger()
    const vector = new Vector<number>([], { logger })

    vector.pushAll(Array.from({ length: 10 }, (_, i) => i))
    vector.allocate(40)

    expect(logger.logs).toEqual([
      {
        level: "trace",
        message: "capacity grown",
        fields: { collection: "Vector", operation: "pushAll", size: 10, capacity: 15 },
      },
      {
        level: "trace",
        message: "capacity reserved",
        fields: { collection: "Vector", operation: "allocate", size: 10, capacity: 40 },
      },
    ])
  })

  it("pop() on an empty vector names the operation", () => {
    expect(() => new Vector().pop()).toThrow("Vector.pop() called on an empty collection")
  })
})
