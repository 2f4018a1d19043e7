import { afterEach, describe, expect, it, vi } from "vitest"

import { compactText } from "../../src/rendering/format.js"
import { createRenderer } from "../../src/rendering/index.js"
import { PlainRenderer } from "../../src/rendering/plain.js"

const record = {
  address: "https://example.com/in/ada",
  display_name: "Ada Example",
  headline: "Engineer",
  location: "Lyon",
  summary: "unknown",
}

describe("compactText", () => {
  it("collapses whitespace and truncates", () => {
    expect(compactText("  a\n\nb  c ", 10)).toBe("a b c")
    expect(compactText("abcdefghijkl", 8)).toBe("abcde...")
  })
})

describe("PlainRenderer", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("formats a successful target line", () => {
    const line = new PlainRenderer().formatTargetLine({ index: 1, total: 3, record, failed: false })

    expect(line).toBe("[1/3] OK  Ada Example | Engineer")
  })

  it("omits an unknown headline", () => {
    const line = new PlainRenderer().formatTargetLine({
      index: 2,
      total: 3,
      record: { ...record, headline: "unknown" },
      failed: false,
    })

    expect(line).toBe("[2/3] OK  Ada Example")
  })

  it("formats a failed target with its message", () => {
    const line = new PlainRenderer().formatTargetLine({
      index: 3,
      total: 3,
      record: { ...record, display_name: "ERROR", headline: "Timeout" },
      failed: true,
    })

    expect(line).toBe("[3/3] ERR https://example.com/in/ada — Timeout")
  })

  it("shows a multi-line failure on one line", () => {
    const line = new PlainRenderer().formatTargetLine({
      index: 1,
      total: 1,
      record: { ...record, display_name: "ERROR", headline: "Timeout.\nCall log:\n  - navigating" },
      failed: true,
    })

    expect(line).toBe("[1/1] ERR https://example.com/in/ada — Timeout. Call log: - navigating")
  })

  it("prints a spinner as start and end lines", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})

    const spinner = new PlainRenderer().createSpinner("Logging in")
    spinner.succeed("Logged in")

    expect(Object.keys(spinner)).toEqual(["succeed", "fail", "warn"])
    expect(log.mock.calls.map(([line]) => line)).toEqual(["Starting: Logging in", "Done: Logged in"])
  })

  it("prints the run summary", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})

    new PlainRenderer().runComplete({ attempted: 2, succeeded: 1, failed: 1 }, 12, "out.csv")

    expect(log.mock.calls.map(([line]) => line)).toEqual([
      "",
      "=== Run Complete ===",
      "Attempted: 2",
      "Succeeded: 1",
      "Failed:    1",
      "Duration:  12s",
      "Output:    out.csv",
    ])
  })

  it("is selected for plain mode", () => {
    expect(createRenderer("plain")).toBeInstanceOf(PlainRenderer)
  })
})
