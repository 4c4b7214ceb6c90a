import { CollectionError } from "../collection-error"
import {
  IndexOutOfRangeError,
  InvalidArgumentError,
  KeyNotFoundError,
  UnderflowError,
} from "../errors"

describe("collection errors", () => {
  describe("UnderflowError", () => {
    it("names the collection and operation", () => {
      const err = new UnderflowError({ collection: "Vector", operation: "pop" })

      expect(err.code).toBe("underflow")
      expect(err.message).toBe("Vector.pop() called on an empty collection")
      expect(err.context).toEqual({ collection: "Vector", operation: "pop" })
    })

    it("is a CollectionError", () => {
      const err = new UnderflowError({ collection: "Deque", operation: "shift" })

      expect(err).toBeInstanceOf(CollectionError)
      expect(err.name).toBe("UnderflowError")
    })
  })

  describe("IndexOutOfRangeError", () => {
    it("reports the valid range", () => {
      const err = new IndexOutOfRangeError({ collection: "Vector", index: 5, min: 0, max: 2 })

      expect(err.code).toBe("index_out_of_range")
      expect(err.message).toBe("Index 5 is out of range for Vector, valid: [0, 2]")
      expect(err.context).toEqual({ collection: "Vector", index: 5, min: 0, max: 2 })
    })

    it("reports an empty range", () => {
      const err = new IndexOutOfRangeError({ collection: "Deque", index: 0, min: 0, max: -1 })

      expect(err.message).toBe("Index 0 is out of range for Deque, valid: none (empty)")
    })
  })

  describe("KeyNotFoundError", () => {
    it("describes the key instead of storing it", () => {
      const err = new KeyNotFoundError({ collection: "OrderedMap", key: "missing" })

      expect(err.code).toBe("key_not_found")
      expect(err.message).toBe('Key "missing" not found in OrderedMap')
      expect(err.context).toEqual({ collection: "OrderedMap", key: '"missing"' })
    })
  })

  describe("InvalidArgumentError", () => {
    it("includes the argument and reason", () => {
      const err = new InvalidArgumentError(
        { collection: "PriorityQueue", operation: "push", argument: "priority" },
        "expected a safe integer, got 1.5",
      )

      expect(err.code).toBe("invalid_argument")
      expect(err.message).toBe(
        'Invalid argument "priority" for PriorityQueue.push(): expected a safe integer, got 1.5',
      )
      expect(err.context).toEqual({
        collection: "PriorityQueue",
        operation: "push",
        argument: "priority",
      })
    })
  })
})
