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

export class PlainRenderer implements CliRenderer {
  header(title: string, fields: HeaderField[]): void {
    console.log(`=== ${title} ===`)
    const width = Math.max(0, ...fields.map((field) => field.label.length)) + 1
    for (const field of fields) {
      console.log(`${`${field.label}:`.padEnd(width + 1)} ${field.value}`)
    }
    console.log("")
  }

  envTable(services: ServiceStatus[]): void {
    console.log("Service         Status")
    for (const service of services) {
      let status: string
      if (service.ready) {
        status = "ready"
      } else if (service.required) {
        status = "missing (required)"
      } else {
        status = "not configured"
      }
      console.log(`${service.name.padEnd(15)} ${status}`)
    }
    console.log("")
  }

  createProgressTracker(label: string): ProgressTracker {
    let lastLine = ""
    return {
      onProgress(current, total, status) {
        const line = `[${label}] ${current}/${total} ${status}`
        if (line === lastLine) {
          return
        }
        console.log(line)
        lastLine = line
      },
      log(line) {
        console.log(line)
      },
      stop() {
        // no-op
      },
    }
  }

  createSpinner(text: string): SpinnerHandle {
    console.log(`Starting: ${text}`)
    return {
      succeed(finalText) {
        console.log(`Done: ${finalText}`)
      },
      fail(finalText) {
        console.log(`Failed: ${finalText}`)
      },
      warn(finalText) {
        console.log(`Warning: ${finalText}`)
      },
    }
  }

  formatTargetLine(entry: TargetLineEntry): string {
    const prefix = `[${entry.index}/${entry.total}]`
    if (entry.failed) {
      return `${prefix} ERR ${entry.record.address} — ${compactText(entry.record.headline, 120)}`
    }
    const headline =
      entry.record.headline === UNKNOWN ? "" : ` | ${compactText(entry.record.headline, 50)}`
    return `${prefix} OK  ${entry.record.display_name}${headline}`
  }

  formatPreview(title: string, content: string): string {
    return `Preview (${title}): ${compactText(content, 140)}`
  }

  info(message: string): void {
    console.log(message)
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    console.log(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`)
  }

  runComplete(summary: RunSummary, elapsedSeconds: number, output: string): void {
    console.log("")
    console.log("=== Run Complete ===")
    console.log(`Attempted: ${summary.attempted}`)
    console.log(`Succeeded: ${summary.succeeded}`)
    console.log(`Failed:    ${summary.failed}`)
    console.log(`Duration:  ${elapsedSeconds}s`)
    console.log(`Output:    ${output}`)
  }

  warn(message: string): void {
    console.warn(message)
  }

  error(message: string): void {
    console.error(message)
  }
}
