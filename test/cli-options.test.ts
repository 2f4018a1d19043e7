import { describe, expect, it } from "vitest"

import { parseGenerateOptions, parseScrapeOptions } from "../src/cli-options.js"

describe("parseScrapeOptions", () => {
  it("applies defaults and converts delays to milliseconds", () => {
    expect(parseScrapeOptions({})).toEqual({
      targets: "targets.txt",
      output: "output/profiles.csv",
      headed: false,
      windowSize: { width: 1920, height: 1080 },
      delayRange: { minMs: 3000, maxMs: 7000 },
      loginUrl: "https://www.linkedin.com/login",
      navigationTimeoutMs: 30000,
      settleMs: 3000,
      plain: false,
      verbose: false,
    })
  })

  it("coerces string values from the command line", () => {
    const options = parseScrapeOptions({
      windowSize: "1280x720",
      minDelay: "0.5",
      maxDelay: "2",
      navigationTimeout: "15000",
      headed: true,
    })

    expect(options.windowSize).toEqual({ width: 1280, height: 720 })
    expect(options.delayRange).toEqual({ minMs: 500, maxMs: 2000 })
    expect(options.navigationTimeoutMs).toBe(15000)
    expect(options.headed).toBe(true)
  })

  it("rejects a malformed window size", () => {
    expect(() => parseScrapeOptions({ windowSize: "wide" })).toThrow(
      "Invalid option (windowSize): Expected WIDTHxHEIGHT, e.g. 1920x1080",
    )
  })

  it("rejects min-delay above max-delay", () => {
    expect(() => parseScrapeOptions({ minDelay: "9", maxDelay: "2" })).toThrow(
      "Invalid option (minDelay): min-delay must not exceed max-delay",
    )
  })

  it("rejects a non-numeric delay", () => {
    expect(() => parseScrapeOptions({ minDelay: "soon" })).toThrow(/^Invalid option \(minDelay\)/)
  })

  it("rejects a login URL that is not a URL", () => {
    expect(() => parseScrapeOptions({ loginUrl: "login" })).toThrow(/^Invalid option \(loginUrl\)/)
  })
})

describe("parseGenerateOptions", () => {
  it("applies defaults", () => {
    expect(parseGenerateOptions({})).toEqual({
      titles: "titles.txt",
      outputDir: "output/articles",
      model: "gpt-5-nano",
      delayRange: { minMs: 3000, maxMs: 6000 },
      dryRun: false,
      plain: false,
      verbose: false,
    })
  })

  it("accepts stdin as the title source", () => {
    expect(parseGenerateOptions({ titles: "-", dryRun: true })).toMatchObject({
      titles: "-",
      dryRun: true,
    })
  })

  it("rejects min-delay above max-delay", () => {
    expect(() => parseGenerateOptions({ minDelay: 10, maxDelay: 1 })).toThrow(
      "Invalid option (minDelay): min-delay must not exceed max-delay",
    )
  })
})
