import { Pair } from "../pair"

describe("Pair", () => {
  it("exposes a mutable key and value", () => {
    const pair = new Pair("a", 1)

    pair.value = 2

    expect(pair.key).toBe("a")
    expect(pair.value).toBe(2)
  })

  it("copy() is a distinct pair sharing the values", () => {
    const value = { n: 1 }
    const pair = new Pair("a", value)
    const copy = pair.copy()

    copy.key = "b"

    expect(copy).not.toBe(pair)
    expect(pair.key).toBe("a")
    expect(copy.value).toBe(value)
  })

  it("serializes as an object", () => {
    expect(JSON.stringify(new Pair("a", [1]))).toBe('{"key":"a","value":[1]}')
  })
})
