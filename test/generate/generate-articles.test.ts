import { access, mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"

import {
  generateArticles,
  type ArticleProgressEvent,
  type GenerateArticlesArgs,
} from "../../src/generate/generate-articles.js"
import type { TextGenerator } from "../../src/generate/text-generator.js"
import { GenerationError, PersistenceError } from "../../src/pipeline/errors.js"
import { sleep } from "../../src/utils/sleep.js"

vi.mock("../../src/utils/sleep.js", () => ({ sleep: vi.fn(async () => {}) }))

const TEMPLATE = "Write about {{title}}."

/** Echoes the prompt back; titles listed in `failing` throw. */
const fakeGenerator = (failing: string[] = []): TextGenerator & { prompts: string[] } => {
  const prompts: string[] = []
  return {
    prompts,
    async generate(title, prompt) {
      prompts.push(prompt)
      if (failing.includes(title)) {
        throw new GenerationError("API error: 500 upstream", title)
      }
      return `Article for ${title}`
    },
  }
}

describe("generateArticles", () => {
  let dir: string
  let outputDir: string

  const baseArgs = (overrides: Partial<GenerateArticlesArgs>): GenerateArticlesArgs => ({
    titles: [],
    generator: fakeGenerator(),
    model: "gpt-5-nano",
    template: TEMPLATE,
    outputDir,
    delayRange: { minMs: 3000, maxMs: 6000 },
    dryRun: false,
    random: () => 0,
    ...overrides,
  })

  beforeEach(async () => {
    vi.mocked(sleep).mockClear()
    dir = await mkdtemp(join(tmpdir(), "profile-scout-articles-"))
    outputDir = join(dir, "articles")
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("writes one markdown file per title", async () => {
    const generator = fakeGenerator()

    const result = await generateArticles(
      baseArgs({ titles: ["Intro to Streams", "Typed Errors"], generator }),
    )

    expect(result.summary).toEqual({ attempted: 2, succeeded: 2, failed: 0 })
    expect(generator.prompts).toEqual(["Write about Intro to Streams.", "Write about Typed Errors."])
    expect((await readdir(outputDir)).sort()).toEqual(["intro_to_streams.md", "typed_errors.md"])
    expect(await readFile(join(outputDir, "typed_errors.md"), "utf-8")).toBe(
      "# Typed Errors\n\nArticle for Typed Errors",
    )
  })

  it("pauses between titles but not after the last one", async () => {
    await generateArticles(baseArgs({ titles: ["One", "Two", "Three"], random: () => 0.5 }))

    expect(vi.mocked(sleep).mock.calls).toEqual([[4500], [4500]])
  })

  it("records a failed title, writes no file for it and continues", async () => {
    const result = await generateArticles(
      baseArgs({ titles: ["Good One", "Bad One", "Good Two"], generator: fakeGenerator(["Bad One"]) }),
    )

    expect(result.outcomes.map((outcome) => outcome.status)).toEqual(["saved", "failed", "saved"])
    expect(result.summary).toEqual({ attempted: 3, succeeded: 2, failed: 1 })
    expect((await readdir(outputDir)).sort()).toEqual(["good_one.md", "good_two.md"])
  })

  it("wraps unexpected generator errors", async () => {
    const generator: TextGenerator = {
      async generate() {
        throw new Error("socket hang up")
      },
    }

    const result = await generateArticles(baseArgs({ titles: ["Only"], generator }))
    const [outcome] = result.outcomes

    expect(outcome?.status).toBe("failed")
    if (outcome?.status === "failed") {
      expect(outcome.error).toBeInstanceOf(GenerationError)
      expect(outcome.error.title).toBe("Only")
      expect(outcome.error.message).toBe("socket hang up")
    }
  })

  it("skips generation and writing in a dry run", async () => {
    const generator = fakeGenerator()

    const result = await generateArticles(baseArgs({ titles: ["One", "Two"], generator, dryRun: true }))

    expect(result.outcomes).toEqual([
      { status: "skipped", title: "One", prompt: "Write about One." },
      { status: "skipped", title: "Two", prompt: "Write about Two." },
    ])
    expect(result.summary).toEqual({ attempted: 0, succeeded: 0, failed: 0 })
    expect(generator.prompts).toEqual([])
    expect(sleep).not.toHaveBeenCalled()
    await expect(access(outputDir)).rejects.toThrow()
  })

  it("emits generating and done events per title", async () => {
    const events: ArticleProgressEvent[] = []

    await generateArticles(baseArgs({ titles: ["One"], onProgress: (event) => events.push(event) }))

    expect(events.map((event) => `${event.index}/${event.total} ${event.phase}`)).toEqual([
      "1/1 generating",
      "1/1 done",
    ])
    expect(events[1]?.outcome).toEqual({
      status: "saved",
      title: "One",
      file: join(outputDir, "one.md"),
      content: "Article for One",
    })
  })

  it("keeps the article that could not be written on the error", async () => {
    await mkdir(join(outputDir, "first.md"), { recursive: true })
    const generator = fakeGenerator()

    const error = await generateArticles(
      baseArgs({ titles: ["First", "Second"], generator }),
    ).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(PersistenceError)
    if (error instanceof PersistenceError) {
      expect(error.path).toBe(join(outputDir, "first.md"))
      expect(error.rows).toEqual([
        {
          status: "saved",
          title: "First",
          file: join(outputDir, "first.md"),
          content: "Article for First",
        },
      ])
    }
    expect(generator.prompts).toEqual(["Write about First."])
  })

  it("raises a PersistenceError when the output directory cannot be created", async () => {
    await writeFile(join(dir, "blocker"), "", "utf-8")

    await expect(
      generateArticles(baseArgs({ titles: ["One"], outputDir: join(dir, "blocker") })),
    ).rejects.toBeInstanceOf(PersistenceError)
  })
})
