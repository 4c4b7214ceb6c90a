import { InvalidArgumentError } from "@tessera/errors"
import { sliceBounds } from "../slice-bounds"

describe("sliceBounds", () => {
  it.each([
    [0, undefined, { start: 0, end: 5 }],
    [2, undefined, { start: 2, end: 5 }],
    [-2, undefined, { start: 3, end: 5 }],
    [1, 3, { start: 1, end: 4 }],
    [1, -1, { start: 1, end: 4 }],
    [4, 10, { start: 4, end: 5 }],
    [9, undefined, { start: 5, end: 5 }],
    [-9, 1, { start: 0, end: 1 }],
    [3, -4, { start: 3, end: 3 }],
  ])("size 5, slice(%s, %s)", (offset, length, expected) => {
    expect(sliceBounds("Vector", 5, offset, length)).toEqual(expected)
  })

  it("handles an empty collection", () => {
    expect(sliceBounds("Vector", 0, -1, 2)).toEqual({ start: 0, end: 0 })
  })

  it("rejects fractional arguments", () => {
    expect(() => sliceBounds("Deque", 5, 1.5)).toThrow(InvalidArgumentError)
    expect(() => sliceBounds("Deque", 5, 1, 0.5)).toThrow(
      'Invalid argument "length" for Deque.slice(): expected an integer, got 0.5',
    )
  })
})
