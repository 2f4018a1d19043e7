import { z } from "zod"

import { DEFAULT_MODEL } from "./generate/text-generator.js"
import {
  DEFAULT_LOGIN_URL,
  DEFAULT_NAVIGATION_TIMEOUT_MS,
  DEFAULT_SETTLE_MS,
} from "./session/config.js"
import type { WindowSize } from "./session/types.js"
import type { DelayRange } from "./utils/random.js"

export interface ScrapeOptions {
  targets: string
  output: string
  headed: boolean
  windowSize: WindowSize
  delayRange: DelayRange
  loginUrl: string
  navigationTimeoutMs: number
  settleMs: number
  plain: boolean
  verbose: boolean
}

export interface GenerateOptions {
  titles: string
  outputDir: string
  model: string
  delayRange: DelayRange
  dryRun: boolean
  plain: boolean
  verbose: boolean
}

const numeric = z.union([z.string(), z.number()]).transform((v) => Number(v))

const seconds = numeric.pipe(z.number().finite().min(0))

const milliseconds = numeric.pipe(z.number().int().min(0))

const windowSizeSchema = z
  .string()
  .regex(/^\d+x\d+$/, "Expected WIDTHxHEIGHT, e.g. 1920x1080")
  .transform((value): WindowSize => {
    const [width, height] = value.split("x").map(Number)
    return { width: width ?? 0, height: height ?? 0 }
  })
  .refine((size) => size.width > 0 && size.height > 0, "Window size must be positive")

const toDelayRange = (minSeconds: number, maxSeconds: number): DelayRange => ({
  minMs: Math.round(minSeconds * 1000),
  maxMs: Math.round(maxSeconds * 1000),
})

const delayOrder = {
  message: "min-delay must not exceed max-delay",
  path: ["minDelay"],
}

const scrapeOptionsSchema = z
  .object({
    targets: z.string().min(1),
    output: z.string().min(1),
    headed: z.boolean().default(false),
    windowSize: windowSizeSchema,
    minDelay: seconds,
    maxDelay: seconds,
    loginUrl: z.string().url(),
    navigationTimeout: milliseconds.pipe(z.number().min(1)),
    settle: milliseconds,
    plain: z.boolean().default(false),
    verbose: z.boolean().default(false),
  })
  .refine((o) => o.minDelay <= o.maxDelay, delayOrder)
  .transform(
    (o): ScrapeOptions => ({
      targets: o.targets,
      output: o.output,
      headed: o.headed,
      windowSize: o.windowSize,
      delayRange: toDelayRange(o.minDelay, o.maxDelay),
      loginUrl: o.loginUrl,
      navigationTimeoutMs: o.navigationTimeout,
      settleMs: o.settle,
      plain: o.plain,
      verbose: o.verbose,
    }),
  )

const generateOptionsSchema = z
  .object({
    titles: z.string().min(1),
    outputDir: z.string().min(1),
    model: z.string().min(1),
    minDelay: seconds,
    maxDelay: seconds,
    dryRun: z.boolean().default(false),
    plain: z.boolean().default(false),
    verbose: z.boolean().default(false),
  })
  .refine((o) => o.minDelay <= o.maxDelay, delayOrder)
  .transform(
    (o): GenerateOptions => ({
      titles: o.titles,
      outputDir: o.outputDir,
      model: o.model,
      delayRange: toDelayRange(o.minDelay, o.maxDelay),
      dryRun: o.dryRun,
      plain: o.plain,
      verbose: o.verbose,
    }),
  )

const formatIssue = (error: z.ZodError): Error => {
  const issue = error.issues[0]
  const path = issue.path.join(".")
  return new Error(`Invalid option${path ? ` (${path})` : ""}: ${issue.message}`)
}

export const parseScrapeOptions = (opts: Record<string, unknown>): ScrapeOptions => {
  const parsed = scrapeOptionsSchema.safeParse({
    targets: opts["targets"] ?? "targets.txt",
    output: opts["output"] ?? "output/profiles.csv",
    headed: opts["headed"] ?? false,
    windowSize: opts["windowSize"] ?? "1920x1080",
    minDelay: opts["minDelay"] ?? "3",
    maxDelay: opts["maxDelay"] ?? "7",
    loginUrl: opts["loginUrl"] ?? DEFAULT_LOGIN_URL,
    navigationTimeout: opts["navigationTimeout"] ?? String(DEFAULT_NAVIGATION_TIMEOUT_MS),
    settle: opts["settle"] ?? String(DEFAULT_SETTLE_MS),
    plain: opts["plain"] ?? false,
    verbose: opts["verbose"] ?? false,
  })
  if (!parsed.success) {
    throw formatIssue(parsed.error)
  }
  return parsed.data
}

export const parseGenerateOptions = (opts: Record<string, unknown>): GenerateOptions => {
  const parsed = generateOptionsSchema.safeParse({
    titles: opts["titles"] ?? "titles.txt",
    outputDir: opts["outputDir"] ?? "output/articles",
    model: opts["model"] ?? DEFAULT_MODEL,
    minDelay: opts["minDelay"] ?? "3",
    maxDelay: opts["maxDelay"] ?? "6",
    dryRun: opts["dryRun"] ?? false,
    plain: opts["plain"] ?? false,
    verbose: opts["verbose"] ?? false,
  })
  if (!parsed.success) {
    throw formatIssue(parsed.error)
  }
  return parsed.data
}
