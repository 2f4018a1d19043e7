import type { ProfileRecord, RunSummary } from "../pipeline/types.js"

export type { VerboseLog } from "../pipeline/types.js"

export interface ServiceStatus {
  name: string
  ready: boolean
  required?: boolean
}

export interface HeaderField {
  label: string
  value: string
}

export interface ProgressTracker {
  onProgress(current: number, total: number, status: string): void
  /** Print a line without tearing the progress display. */
  log(line: string): void
  stop(): void
}

export interface SpinnerHandle {
  succeed(text: string): void
  fail(text: string): void
  warn(text: string): void
}

export interface TargetLineEntry {
  index: number
  total: number
  record: ProfileRecord
  failed: boolean
}

export interface CliRenderer {
  // --- Setup ---
  header(title: string, fields: HeaderField[]): void
  envTable(services: ServiceStatus[]): void

  // --- Progress ---
  createProgressTracker(label: string): ProgressTracker
  createSpinner(text: string): SpinnerHandle
  formatTargetLine(entry: TargetLineEntry): string
  formatPreview(title: string, content: string): string

  // --- General ---
  info(message: string): void
  logVerbose(scope: string, message: string, elapsedSec: number): void
  runComplete(summary: RunSummary, elapsedSeconds: number, output: string): void
  warn(message: string): void
  error(message: string): void
}
