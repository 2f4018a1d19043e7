import { mkdir, writeFile } from "node:fs/promises"
import { join } from "node:path"

import { GenerationError, PersistenceError, getErrorMessage } from "../pipeline/errors.js"
import type { RunSummary, VerboseLog } from "../pipeline/types.js"
import { uniformDelay, type DelayRange, type RandomSource } from "../utils/random.js"
import { sleep } from "../utils/sleep.js"
import { articleFileName, renderArticle } from "./file-name.js"
import { buildArticlePrompt } from "./prompt.js"
import type { TextGenerator } from "./text-generator.js"

export type ArticleOutcome =
  | { status: "saved"; title: string; file: string; content: string }
  | { status: "failed"; title: string; error: GenerationError }
  | { status: "skipped"; title: string; prompt: string }

export interface ArticleProgressEvent {
  index: number
  total: number
  title: string
  phase: "generating" | "done"
  outcome?: ArticleOutcome
  elapsedMs: number
}

export type OnArticleProgress = (event: ArticleProgressEvent) => void

export interface GenerateArticlesArgs {
  titles: readonly string[]
  generator: TextGenerator | null
  model: string
  template: string
  outputDir: string
  delayRange: DelayRange
  dryRun: boolean
  random?: RandomSource
  onProgress?: OnArticleProgress
  verbose?: VerboseLog
}

export interface GenerateArticlesResult {
  outcomes: ArticleOutcome[]
  summary: RunSummary
}

const generateOne = async (
  title: string,
  args: GenerateArticlesArgs,
): Promise<ArticleOutcome> => {
  const prompt = buildArticlePrompt(title, args.template)
  if (args.dryRun || !args.generator) {
    return { status: "skipped", title, prompt }
  }

  let content: string
  try {
    content = await args.generator.generate(title, prompt, args.model)
  } catch (error) {
    const generationError =
      error instanceof GenerationError
        ? error
        : new GenerationError(getErrorMessage(error), title, { cause: error })
    return { status: "failed", title, error: generationError }
  }

  const file = join(args.outputDir, articleFileName(title))
  return { status: "saved", title, file, content }
}

const prepareOutputDir = async (outputDir: string): Promise<void> => {
  try {
    await mkdir(outputDir, { recursive: true })
  } catch (error) {
    throw new PersistenceError<ArticleOutcome>(
      `Could not create ${outputDir}: ${getErrorMessage(error)}`,
      outputDir,
      [],
      { cause: error },
    )
  }
}

const saveArticle = async (
  outcome: Extract<ArticleOutcome, { status: "saved" }>,
  written: readonly ArticleOutcome[],
): Promise<void> => {
  try {
    await writeFile(outcome.file, renderArticle(outcome.title, outcome.content), "utf-8")
  } catch (error) {
    throw new PersistenceError<ArticleOutcome>(
      `Could not write article to ${outcome.file}: ${getErrorMessage(error)}`,
      outcome.file,
      [...written, outcome],
      { cause: error },
    )
  }
}

/**
 * Generate one article per title, sequentially. A title whose generation
 * fails is reported and skipped: no file is written for it.
 */
export const generateArticles = async (
  args: GenerateArticlesArgs,
): Promise<GenerateArticlesResult> => {
  const total = args.titles.length
  const outcomes: ArticleOutcome[] = []

  if (!args.dryRun && total > 0) {
    await prepareOutputDir(args.outputDir)
  }

  for (const [i, title] of args.titles.entries()) {
    const index = i + 1
    const startedAt = Date.now()
    args.onProgress?.({ index, total, title, phase: "generating", elapsedMs: 0 })

    const outcome = await generateOne(title, args)
    if (outcome.status === "saved") {
      await saveArticle(outcome, outcomes)
    }
    outcomes.push(outcome)
    args.onProgress?.({
      index,
      total,
      title,
      phase: "done",
      outcome,
      elapsedMs: Date.now() - startedAt,
    })

    if (index < total && !args.dryRun) {
      const delayMs = uniformDelay(args.delayRange, args.random)
      args.verbose?.("generate", `pausing ${delayMs}ms`)
      await sleep(delayMs)
    }
  }

  const failed = outcomes.filter((outcome) => outcome.status === "failed").length
  const succeeded = outcomes.filter((outcome) => outcome.status === "saved").length
  return {
    outcomes,
    summary: { attempted: args.dryRun ? 0 : total, succeeded, failed },
  }
}
