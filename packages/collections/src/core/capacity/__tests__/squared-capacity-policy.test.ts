import { InvalidArgumentError } from "@tessera/errors"
import { SquaredCapacityPolicy, square } from "../squared-capacity-policy"

describe("square", () => {
  it.each([
    [0, 1],
    [1, 1],
    [2, 2],
    [3, 4],
    [8, 8],
    [9, 16],
    [1000, 1024],
  ])("square(%i) = %i", (n, expected) => {
    expect(square(n)).toBe(expected)
  })
})

describe("SquaredCapacityPolicy", () => {
  const policy = new SquaredCapacityPolicy()

  it("defaults to a minimum of 8", () => {
    expect(policy.minCapacity).toBe(8)
  })

  describe("grow", () => {
    it("rounds the minimum up to a power of two", () => {
      expect(policy.grow(8, 9)).toBe(16)
      expect(policy.grow(16, 17)).toBe(32)
      expect(policy.grow(8, 100)).toBe(128)
    })

    it("never goes below the minimum capacity", () => {
      expect(policy.grow(8, 3)).toBe(8)
    })
  })

  describe("shrink", () => {
    it("halves once size drops below a quarter", () => {
      expect(policy.shrink(64, 15)).toBe(32)
    })

    it("keeps the capacity at exactly a quarter", () => {
      expect(policy.shrink(64, 16)).toBe(64)
    })

    it("never goes below the minimum capacity", () => {
      expect(policy.shrink(16, 0)).toBe(8)
      expect(policy.shrink(8, 0)).toBe(8)
    })
  })

  describe("reserve", () => {
    it("rounds the request up to a power of two", () => {
      expect(policy.reserve(8, 20)).toBe(32)
    })

    it("never decreases the capacity", () => {
      expect(policy.reserve(64, 20)).toBe(64)
      expect(policy.reserve(8, 0)).toBe(8)
    })
  })

  it("accepts a custom power-of-two minimum", () => {
    expect(new SquaredCapacityPolicy(4).grow(4, 2)).toBe(4)
  })

  it.each([0, 6, -8, 2.5])("rejects minimum capacity %s", (min) => {
    expect(() => new SquaredCapacityPolicy(min)).toThrow(InvalidArgumentError)
  })
})
