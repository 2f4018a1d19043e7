import { describe, expect, it } from "vitest"

import { readEnvConfig, resolveCredentials } from "../src/config.js"

describe("readEnvConfig", () => {
  it("reads keys, credentials and the proxy pool", () => {
    const env = readEnvConfig({
      OPENAI_API_KEY: "test-key",
      SCRAPE_USERNAME: "test-user",
      SCRAPE_PASSWORD: "test-secret",
      SCRAPE_PROXIES: " http://proxy-1:8080, ,http://proxy-2:8080 ",
    })

    expect(env).toEqual({
      openaiApiKey: "test-key",
      scrapeUsername: "test-user",
      scrapePassword: "test-secret",
      proxyServers: ["http://proxy-1:8080", "http://proxy-2:8080"],
    })
  })

  it("passes the password through untrimmed", () => {
    const env = readEnvConfig({ SCRAPE_USERNAME: " test-user ", SCRAPE_PASSWORD: " test secret " })

    expect(env.scrapeUsername).toBe("test-user")
    expect(env.scrapePassword).toBe(" test secret ")
  })

  it("treats blank values as missing", () => {
    expect(readEnvConfig({ OPENAI_API_KEY: "  ", SCRAPE_USERNAME: "", SCRAPE_PASSWORD: " \t" })).toEqual({
      openaiApiKey: null,
      scrapeUsername: null,
      scrapePassword: null,
      proxyServers: [],
    })
  })
})

describe("resolveCredentials", () => {
  it("returns credentials when both halves are set", () => {
    const env = readEnvConfig({ SCRAPE_USERNAME: "test-user", SCRAPE_PASSWORD: "test-secret" })

    expect(resolveCredentials(env)).toEqual({ username: "test-user", password: "test-secret" })
  })

  it("returns null when either half is missing", () => {
    expect(resolveCredentials(readEnvConfig({ SCRAPE_USERNAME: "test-user" }))).toBeNull()
    expect(resolveCredentials(readEnvConfig({ SCRAPE_PASSWORD: "test-secret" }))).toBeNull()
  })
})
