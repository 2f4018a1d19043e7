import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { describe, expect, it } from "vitest"

import { buildArticlePrompt, loadArticleTemplate } from "../../src/generate/prompt.js"

describe("buildArticlePrompt", () => {
  it("substitutes every placeholder and trims the result", () => {
    const template = "\nTopic: {{title}}\nAgain: {{title}}\n\n"

    expect(buildArticlePrompt("Streams", template)).toBe("Topic: Streams\nAgain: Streams")
  })
})

describe("loadArticleTemplate", () => {
  it("loads the shipped template", async () => {
    const template = await loadArticleTemplate()
    const prompt = buildArticlePrompt("Typed Event Emitters", template)

    expect(prompt.startsWith("You are a technical writer")).toBe(true)
    expect(prompt).toContain('"Typed Event Emitters"')
    expect(prompt).not.toContain("{{title}}")
  })

  it("rejects a template without the placeholder", async () => {
    const dir = await mkdtemp(join(tmpdir(), "profile-scout-prompt-"))
    try {
      const file = join(dir, "prompt.md")
      await writeFile(file, "Write something.", "utf-8")

      await expect(loadArticleTemplate(file)).rejects.toThrow("has no {{title}} placeholder")
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })
})
