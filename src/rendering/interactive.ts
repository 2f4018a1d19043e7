import boxen from "boxen"
import chalk from "chalk"
import cliProgress from "cli-progress"
import Table from "cli-table3"
import ora from "ora"

import { UNKNOWN, type RunSummary } from "../pipeline/types.js"
import { compactText } from "./format.js"
import type {
  CliRenderer,
  HeaderField,
  ProgressTracker,
  ServiceStatus,
  SpinnerHandle,
  TargetLineEntry,
} from "./types.js"

export class InteractiveRenderer implements CliRenderer {
  private multiBar: cliProgress.MultiBar | null = null

  header(title: string, fields: HeaderField[]): void {
    const width = Math.max(0, ...fields.map((field) => field.label.length)) + 2
    const body = fields
      .map((field) => `${chalk.bold(field.label.padEnd(width))}${field.value}`)
      .join("\n")

    console.log(
      boxen(body, {
        title: chalk.bold(title),
        borderColor: "blue",
        padding: 1,
      }),
    )
  }

  envTable(services: ServiceStatus[]): void {
    const table = new Table({
      head: [chalk.bold("Service"), chalk.bold("Status")],
    })

    for (const service of services) {
      let status: string
      if (service.ready) {
        status = chalk.green("ready")
      } else if (service.required) {
        status = chalk.red("missing (required)")
      } else {
        status = chalk.gray("not configured")
      }
      table.push([service.name, status])
    }

    console.log(table.toString())
  }

  createProgressTracker(label: string): ProgressTracker {
    const multi = this.getOrCreateMultiBar()
    const bar = multi.create(1, 0, { label, status: "starting" })
    let lastTotal = 1

    return {
      onProgress(current, total, status) {
        if (total > 0 && total !== lastTotal) {
          bar.setTotal(total)
          lastTotal = total
        }
        bar.update(current, { label, status })
      },
      log(line) {
        multi.log(`${line}\n`)
      },
      stop: () => {
        this.stopProgress()
      },
    }
  }

  createSpinner(text: string): SpinnerHandle {
    const spinner = ora(text).start()
    return {
      succeed(finalText) {
        spinner.succeed(finalText)
      },
      fail(finalText) {
        spinner.fail(finalText)
      },
      warn(finalText) {
        spinner.warn(finalText)
      },
    }
  }

  formatTargetLine(entry: TargetLineEntry): string {
    const prefix = chalk.dim(`[${entry.index}/${entry.total}]`)
    if (entry.failed) {
      return `${prefix} ${chalk.red("ERR")} ${entry.record.address} — ${chalk.dim(compactText(entry.record.headline, 120))}`
    }
    const headline =
      entry.record.headline === UNKNOWN
        ? ""
        : ` ${chalk.dim("|")} ${compactText(entry.record.headline, 50)}`
    return `${prefix} ${chalk.green("OK")}  ${chalk.bold(entry.record.display_name)}${headline}`
  }

  formatPreview(title: string, content: string): string {
    return `${chalk.dim(`Preview (${title}):`)} ${compactText(content, 140)}`
  }

  info(message: string): void {
    console.log(message)
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    console.log(chalk.gray(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`))
  }

  runComplete(summary: RunSummary, elapsedSeconds: number, output: string): void {
    const failed = summary.failed > 0 ? chalk.red(String(summary.failed)) : "0"
    console.log(
      boxen(
        [
          `${chalk.bold("Attempted")}   ${summary.attempted}`,
          `${chalk.bold("Succeeded")}   ${chalk.green(String(summary.succeeded))}`,
          `${chalk.bold("Failed")}      ${failed}`,
          `${chalk.bold("Duration")}    ${elapsedSeconds}s`,
          `${chalk.bold("Output")}      ${output}`,
        ].join("\n"),
        {
          title: chalk.green("Run Complete"),
          borderColor: summary.failed > 0 ? "yellow" : "green",
          padding: 1,
        },
      ),
    )
  }

  warn(message: string): void {
    console.warn(chalk.yellow(message))
  }

  error(message: string): void {
    console.error(chalk.red(message))
  }

  private stopProgress(): void {
    this.multiBar?.stop()
    this.multiBar = null
  }

  private getOrCreateMultiBar(): cliProgress.MultiBar {
    if (!this.multiBar) {
      this.multiBar = new cliProgress.MultiBar(
        {
          clearOnComplete: false,
          hideCursor: true,
          emptyOnZero: true,
          format: (options, params, payload: Record<string, unknown>) => {
            const label = typeof payload.label === "string" ? payload.label : ""
            const status = typeof payload.status === "string" ? payload.status : ""
            const barSize = options.barsize ?? 20
            const completeSize = Math.round(params.progress * barSize)
            const bar =
              (options.barCompleteString ?? "").substring(0, completeSize) +
              (options.barIncompleteString ?? "").substring(0, barSize - completeSize)
            return `  ${bar} ${params.value}/${params.total} | ${label} | ${chalk.dim(status)}`
          },
        },
        cliProgress.Presets.shades_classic,
      )
    }

    return this.multiBar
  }
}
