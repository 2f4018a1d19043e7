import { extractProfileFields } from "../extract/extract-profile.js"
import { DEFAULT_SELECTOR_TABLE, type SelectorTable } from "../extract/selector-table.js"
import { writeResultTable } from "../output/csv.js"
import { redactSecrets, type NavigationError } from "../pipeline/errors.js"
import {
  ERROR_MARKER,
  UNKNOWN,
  type ProfileRecord,
  type ResultTable,
  type RunSummary,
  type VerboseLog,
} from "../pipeline/types.js"
import type {
  Credentials,
  LoginOutcome,
  SessionConfig,
  SessionDriver,
  SessionHandle,
} from "../session/types.js"

export type ScrapeProgressEvent =
  | { kind: "login-started" }
  | { kind: "login"; outcome: LoginOutcome }
  | {
      kind: "target"
      index: number
      total: number
      target: string
      phase: "fetching" | "done" | "error"
      record?: ProfileRecord
      message?: string
    }

export type OnScrapeProgress = (event: ScrapeProgressEvent) => void

export interface ScrapeRunArgs<THandle extends SessionHandle> {
  targets: readonly string[]
  config: SessionConfig
  credentials: Credentials | null
  driver: SessionDriver<THandle>
  outputFile: string
  selectorTable?: SelectorTable
  onProgress?: OnScrapeProgress
  verbose?: VerboseLog
}

export interface ScrapeRunResult {
  records: ResultTable
  summary: RunSummary
  outputFile: string
}

/** The headline keeps the whole message, multi-line call logs included. */
export const errorRecord = (address: string, error: NavigationError): ProfileRecord => {
  const message = error.message.trim().length > 0 ? redactSecrets(error.message) : UNKNOWN
  return Object.freeze({
    address,
    display_name: ERROR_MARKER,
    headline: message,
    location: UNKNOWN,
    summary: UNKNOWN,
  })
}

/**
 * Visit every target once, in order, through a single browser session and
 * write one row per target. A target that cannot be fetched becomes an
 * error row; only a launch failure or an unwritable output file abort.
 */
export const runScrape = async <THandle extends SessionHandle>(
  args: ScrapeRunArgs<THandle>,
): Promise<ScrapeRunResult> => {
  const table = args.selectorTable ?? DEFAULT_SELECTOR_TABLE
  const records: ProfileRecord[] = []
  const total = args.targets.length
  let failed = 0

  if (total === 0) {
    args.verbose?.("scrape", "no targets, skipping browser session")
  } else {
    const handle = await args.driver.open(args.config)
    try {
      if (args.credentials) {
        args.onProgress?.({ kind: "login-started" })
      }
      const loginOutcome = await args.driver.login(handle, args.credentials)
      args.onProgress?.({ kind: "login", outcome: loginOutcome })

      for (const [i, target] of args.targets.entries()) {
        const index = i + 1
        args.onProgress?.({ kind: "target", index, total, target, phase: "fetching" })

        const outcome = await args.driver.fetch(handle, target)
        if (outcome.success) {
          const record: ProfileRecord = Object.freeze({
            address: target,
            ...extractProfileFields(outcome.html, table),
          })
          records.push(record)
          args.onProgress?.({ kind: "target", index, total, target, phase: "done", record })
        } else {
          const record = errorRecord(target, outcome.error)
          records.push(record)
          failed += 1
          args.onProgress?.({
            kind: "target",
            index,
            total,
            target,
            phase: "error",
            record,
            message: record.headline,
          })
        }
      }
    } finally {
      await args.driver.close(handle)
      args.verbose?.("scrape", "browser session closed")
    }
  }

  await writeResultTable(args.outputFile, records)
  args.verbose?.("scrape", `wrote ${records.length} row(s) to ${args.outputFile}`)

  return {
    records,
    summary: { attempted: records.length, succeeded: records.length - failed, failed },
    outputFile: args.outputFile,
  }
}
