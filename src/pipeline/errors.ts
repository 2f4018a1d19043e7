// ── Error model ─────────────────────────────────────────────────────

export type PipelineErrorKind = "launch" | "login" | "navigation" | "generation" | "persistence"

abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
  }
}

/** The browser engine could not start. Aborts the run before any target. */
export class LaunchError extends PipelineError {
  readonly kind = "launch"

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "LaunchError"
  }
}

export class LoginError extends PipelineError {
  readonly kind = "login"

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "LoginError"
  }
}

export class NavigationError extends PipelineError {
  readonly kind = "navigation"

  constructor(
    message: string,
    readonly target: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "NavigationError"
  }
}

export class GenerationError extends PipelineError {
  readonly kind = "generation"

  constructor(
    message: string,
    readonly title: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "GenerationError"
  }
}

/**
 * The result file could not be written. Processing has already finished;
 * the in-memory rows travel with the error.
 */
export class PersistenceError<TRow = unknown> extends PipelineError {
  readonly kind = "persistence"

  constructor(
    message: string,
    readonly path: string,
    readonly rows: readonly TRow[],
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "PersistenceError"
  }
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

// ── Message sanitizing ──────────────────────────────────────────────

const SENSITIVE_PARAM_NAMES = new Set([
  "apikey",
  "api_key",
  "token",
  "auth",
  "key",
  "secret",
  "password",
  "access_token",
  "bearer",
])

const MAX_MESSAGE_LENGTH = 200

const AUTH_TOKEN_PATTERN = /\b(Bearer|Basic)[ \t]+[A-Za-z0-9\-._~+/]+=*/gi
const SENSITIVE_PARAM_PATTERN =
  /([?&])(apikey|api_key|token|auth|key|secret|password|access_token|bearer)=[^&\s]*/gi

/**
 * Redact auth tokens and sensitive query parameters, leaving every other
 * character (line breaks, length) as it was.
 */
export const redactSecrets = (input: string): string =>
  input
    .replaceAll(AUTH_TOKEN_PATTERN, "$1 [REDACTED]")
    .replaceAll(SENSITIVE_PARAM_PATTERN, "$1$2=[REDACTED]")

/**
 * Strip auth tokens and sensitive query parameters from a message or URL,
 * collapse whitespace and cap the length, so it can be written to output.
 */
export const sanitizeForError = (input: string): string => {
  let cleaned = input
    .replaceAll(/\b(Bearer|Basic)\s+[A-Za-z0-9\-._~+/]+=*/gi, "$1 [REDACTED]")
    .replaceAll(/\s+/g, " ")
    .trim()

  try {
    const url = new URL(cleaned)
    let hasSensitive = false
    for (const key of [...url.searchParams.keys()]) {
      if (SENSITIVE_PARAM_NAMES.has(key.toLowerCase())) {
        url.searchParams.set(key, "[REDACTED]")
        hasSensitive = true
      }
    }
    if (hasSensitive) {
      cleaned = url.toString()
    }
  } catch {
    // Not a bare URL: redact query parameters embedded in the text
    cleaned = cleaned.replaceAll(SENSITIVE_PARAM_PATTERN, "$1$2=[REDACTED]")
  }

  if (cleaned.length > MAX_MESSAGE_LENGTH) {
    return `${cleaned.slice(0, MAX_MESSAGE_LENGTH - 3)}...`
  }
  return cleaned
}
