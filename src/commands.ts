import OpenAI from "openai"

import type { GenerateOptions, ScrapeOptions } from "./cli-options.js"
import { readEnvConfig, resolveCredentials } from "./config.js"
import { generateArticles, type ArticleProgressEvent } from "./generate/generate-articles.js"
import { loadArticleTemplate } from "./generate/prompt.js"
import { createOpenAITextGenerator } from "./generate/text-generator.js"
import { readTitles } from "./generate/titles.js"
import { loadIdentityProvider } from "./identity/identity-provider.js"
import { LaunchError, PersistenceError, getErrorMessage } from "./pipeline/errors.js"
import { createRenderer } from "./rendering/index.js"
import type {
  CliRenderer,
  ProgressTracker,
  SpinnerHandle,
  VerboseLog,
} from "./rendering/types.js"
import { runScrape, type ScrapeProgressEvent } from "./scrape/run-scrape.js"
import { readTargets } from "./scrape/targets.js"
import { buildSessionConfig } from "./session/config.js"
import { PlaywrightSessionDriver } from "./session/playwright-driver.js"
import type { DelayRange } from "./utils/random.js"

const rendererFor = (plain: boolean): CliRenderer =>
  createRenderer(plain || !process.stdout.isTTY ? "plain" : "interactive")

const createVerboseLog = (enabled: boolean, renderer: CliRenderer): VerboseLog | undefined => {
  const t0 = Date.now()
  return enabled
    ? (scope, message) => {
        renderer.logVerbose(scope, message, (Date.now() - t0) / 1000)
      }
    : undefined
}

const formatDelay = (range: DelayRange): string => `${range.minMs / 1000}-${range.maxMs / 1000}s`

const elapsedSince = (startedAt: number): number => Math.round((Date.now() - startedAt) / 1000)

// ── scrape ──────────────────────────────────────────────────────────

export const runScrapeCommand = async (options: ScrapeOptions): Promise<number> => {
  const startedAt = Date.now()
  const renderer = rendererFor(options.plain)
  const env = readEnvConfig()
  const credentials = resolveCredentials(env)
  const { width, height } = options.windowSize

  renderer.header("profile-scout scrape", [
    { label: "Targets", value: options.targets },
    { label: "Output", value: options.output },
    { label: "Browser", value: `${options.headed ? "headed" : "headless"} ${width}x${height}` },
    { label: "Delay", value: formatDelay(options.delayRange) },
  ])
  renderer.envTable([
    { name: "Login", ready: credentials !== null },
    { name: "Proxy pool", ready: env.proxyServers.length > 0 },
  ])

  const verboseLog = createVerboseLog(options.verbose, renderer)

  let targets: string[]
  try {
    targets = await readTargets(options.targets)
  } catch (error) {
    renderer.error(`Could not read targets from ${options.targets}: ${getErrorMessage(error)}`)
    return 1
  }
  if (targets.length === 0) {
    renderer.warn("No targets to visit; writing an empty result table.")
  }

  const identity = (await loadIdentityProvider(env.proxyServers)).nextIdentity()
  verboseLog?.("identity", `user agent: ${identity.userAgent}`)
  verboseLog?.("identity", identity.proxy ? `proxy: ${identity.proxy}` : "direct connection")

  const config = buildSessionConfig({
    identity,
    headless: !options.headed,
    windowSize: options.windowSize,
    loginUrl: options.loginUrl,
    navigationTimeoutMs: options.navigationTimeoutMs,
    settleMs: options.settleMs,
    delayRange: options.delayRange,
  })

  let loginSpinner: SpinnerHandle | null = null
  let tracker: ProgressTracker | null = null
  const stopProgress = (): void => {
    tracker?.stop()
  }

  const onProgress = (event: ScrapeProgressEvent): void => {
    switch (event.kind) {
      case "login-started":
        loginSpinner = renderer.createSpinner("Logging in")
        return
      case "login": {
        const spinner = loginSpinner ?? renderer.createSpinner("Logging in")
        if (event.outcome.status === "logged-in") {
          spinner.succeed("Logged in")
        } else if (event.outcome.status === "failed") {
          spinner.warn(`${event.outcome.error.message}; continuing without a session`)
        }
        loginSpinner = null
        return
      }
      case "target": {
        tracker ??= renderer.createProgressTracker("Profiles")
        if (event.phase === "fetching") {
          tracker.onProgress(event.index - 1, event.total, event.target)
          return
        }
        tracker.onProgress(event.index, event.total, event.phase)
        if (event.record) {
          tracker.log(
            renderer.formatTargetLine({
              index: event.index,
              total: event.total,
              record: event.record,
              failed: event.phase === "error",
            }),
          )
        }
        return
      }
    }
  }

  try {
    const result = await runScrape({
      targets,
      config,
      credentials,
      driver: new PlaywrightSessionDriver({ verbose: verboseLog }),
      outputFile: options.output,
      onProgress,
      verbose: verboseLog,
    })
    stopProgress()
    renderer.runComplete(result.summary, elapsedSince(startedAt), result.outputFile)
    return 0
  } catch (error) {
    stopProgress()
    if (error instanceof LaunchError) {
      renderer.error(error.message)
      return 1
    }
    if (error instanceof PersistenceError) {
      renderer.error(`${error.message} (${error.rows.length} row(s) not saved)`)
      return 1
    }
    throw error
  }
}

// ── generate ────────────────────────────────────────────────────────

export const runGenerateCommand = async (options: GenerateOptions): Promise<number> => {
  const startedAt = Date.now()
  const renderer = rendererFor(options.plain)
  const env = readEnvConfig()

  renderer.header("profile-scout generate", [
    { label: "Titles", value: options.titles === "-" ? "stdin" : options.titles },
    { label: "Output dir", value: options.outputDir },
    { label: "Model", value: options.model },
    { label: "Delay", value: formatDelay(options.delayRange) },
    { label: "Dry run", value: options.dryRun ? "yes" : "no" },
  ])
  renderer.envTable([
    { name: "OpenAI API", ready: Boolean(env.openaiApiKey), required: !options.dryRun },
  ])

  if (!options.dryRun && !env.openaiApiKey) {
    renderer.error("OPENAI_API_KEY is not set (use --dry-run to preview prompts without it)")
    return 1
  }

  const verboseLog = createVerboseLog(options.verbose, renderer)

  if (options.titles === "-" && process.stdin.isTTY) {
    renderer.info("Enter one title per line, then Ctrl+D:")
  }
  let titles: string[]
  try {
    titles = await readTitles(options.titles)
  } catch (error) {
    renderer.error(`Could not read titles from ${options.titles}: ${getErrorMessage(error)}`)
    return 1
  }
  if (titles.length === 0) {
    renderer.error("No titles to process")
    return 1
  }

  const template = await loadArticleTemplate()
  const generator =
    options.dryRun || !env.openaiApiKey
      ? null
      : createOpenAITextGenerator(new OpenAI({ apiKey: env.openaiApiKey }))

  let spinner: SpinnerHandle | null = null
  const onProgress = (event: ArticleProgressEvent): void => {
    const label = `[${event.index}/${event.total}] ${event.title}`
    if (event.phase === "generating") {
      spinner = renderer.createSpinner(label)
      return
    }
    const current = spinner ?? renderer.createSpinner(label)
    spinner = null
    const seconds = (event.elapsedMs / 1000).toFixed(1)
    const outcome = event.outcome
    if (!outcome) {
      current.fail(`${label}: no outcome`)
      return
    }
    switch (outcome.status) {
      case "saved":
        current.succeed(`${label} (${seconds}s) -> ${outcome.file}`)
        renderer.info(renderer.formatPreview(outcome.title, outcome.content))
        return
      case "failed":
        current.fail(`${label}: ${outcome.error.message}`)
        return
      case "skipped":
        current.warn(`${label} (dry run)`)
        verboseLog?.("generate", `prompt: ${outcome.prompt.length} characters`)
        return
    }
  }

  try {
    const result = await generateArticles({
      titles,
      generator,
      model: options.model,
      template,
      outputDir: options.outputDir,
      delayRange: options.delayRange,
      dryRun: options.dryRun,
      onProgress,
      verbose: verboseLog,
    })
    renderer.runComplete(result.summary, elapsedSince(startedAt), options.outputDir)
    return 0
  } catch (error) {
    if (error instanceof PersistenceError) {
      renderer.error(error.message)
      return 1
    }
    throw error
  }
}
