#!/usr/bin/env node
import { Command } from "commander"

import { parseGenerateOptions, parseScrapeOptions } from "./cli-options.js"
import { runGenerateCommand, runScrapeCommand } from "./commands.js"
import { DEFAULT_MODEL } from "./generate/text-generator.js"
import { getErrorMessage } from "./pipeline/errors.js"

// ── Program ─────────────────────────────────────────────────────────

const createProgram = (onExit: (code: number) => void): Command => {
  const program = new Command()
  program
    .name("profile-scout")
    .description("Collect public profile fields into a CSV and draft articles from titles")

  program
    .command("scrape")
    .description("Visit each target address once and write one CSV row per target")
    .option("--targets <path>", "File with one profile URL per line", "targets.txt")
    .option("--output <path>", "CSV file to write", "output/profiles.csv")
    .option("--headed", "Show the browser window", false)
    .option("--window-size <WxH>", "Browser window size", "1920x1080")
    .option("--min-delay <seconds>", "Minimum pause after each page load", "3")
    .option("--max-delay <seconds>", "Maximum pause after each page load", "7")
    .option("--login-url <url>", "Login page address")
    .option("--navigation-timeout <ms>", "Page load timeout")
    .option("--settle <ms>", "Wait after submitting the login form")
    .option("--plain", "Line-oriented output", false)
    .option("--verbose", "Show detailed timing logs", false)
    .action(async (opts: Record<string, unknown>) => {
      onExit(await runScrapeCommand(parseScrapeOptions(opts)))
    })

  program
    .command("generate")
    .description("Generate one markdown article per title")
    .option("--titles <path>", 'File with one title per line, or "-" for stdin', "titles.txt")
    .option("--output-dir <path>", "Directory for the articles", "output/articles")
    .option("--model <name>", "OpenAI model", DEFAULT_MODEL)
    .option("--min-delay <seconds>", "Minimum pause between titles", "3")
    .option("--max-delay <seconds>", "Maximum pause between titles", "6")
    .option("--dry-run", "Build prompts without calling the API", false)
    .option("--plain", "Line-oriented output", false)
    .option("--verbose", "Show detailed timing logs", false)
    .action(async (opts: Record<string, unknown>) => {
      onExit(await runGenerateCommand(parseGenerateOptions(opts)))
    })

  return program
}

const main = async (): Promise<number> => {
  let exitCode = 0
  const program = createProgram((code) => {
    exitCode = code
  })
  const rawArgs = process.argv.slice(2)
  const normalizedArgs = rawArgs[0] === "--" ? rawArgs.slice(1) : rawArgs
  await program.parseAsync(["node", "profile-scout", ...normalizedArgs])
  return exitCode
}

main()
  .then((code) => {
    process.exit(code)
  })
  .catch((error: unknown) => {
    console.error(`Unexpected error: ${getErrorMessage(error)}`)
    process.exit(1)
  })
