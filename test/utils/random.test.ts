import { describe, expect, it } from "vitest"

import { pickOne, uniformDelay } from "../../src/utils/random.js"

describe("uniformDelay", () => {
  it("maps the random source onto the range", () => {
    const range = { minMs: 3000, maxMs: 7000 }

    expect(uniformDelay(range, () => 0)).toBe(3000)
    expect(uniformDelay(range, () => 0.5)).toBe(5000)
    expect(uniformDelay(range, () => 0.99999)).toBe(7000)
  })

  it("returns the bound when min equals max", () => {
    expect(uniformDelay({ minMs: 1500, maxMs: 1500 }, () => 0.7)).toBe(1500)
  })
})

describe("pickOne", () => {
  it("picks by the random source", () => {
    const items = ["a", "b", "c", "d"]

    expect(pickOne(items, () => 0)).toBe("a")
    expect(pickOne(items, () => 0.5)).toBe("c")
    expect(pickOne(items, () => 0.999)).toBe("d")
  })

  it("stays in bounds when the source returns 1", () => {
    expect(pickOne(["a", "b"], () => 1)).toBe("b")
  })

  it("throws on an empty list", () => {
    expect(() => pickOne([], () => 0)).toThrow("Cannot pick from an empty list")
  })
})
