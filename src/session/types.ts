import type { Identity } from "../identity/identity-provider.js"
import type { LoginError, NavigationError } from "../pipeline/errors.js"
import type { DelayRange } from "../utils/random.js"

export interface WindowSize {
  width: number
  height: number
}

/** Browser launch and pacing settings for one run. Frozen once built. */
export interface SessionConfig {
  readonly headless: boolean
  readonly windowSize: Readonly<WindowSize>
  /** Extra engine flags (sandboxing, automation fingerprint). */
  readonly browserArgs: readonly string[]
  readonly identity: Readonly<Identity>
  readonly loginUrl: string
  readonly navigationTimeoutMs: number
  /** Wait after submitting the login form. */
  readonly settleMs: number
  /** Random pause after each page load. */
  readonly delayRange: Readonly<DelayRange>
}

export interface Credentials {
  username: string
  password: string
}

export type SessionState = "open" | "logged-in" | "closed"

export interface SessionHandle {
  readonly state: SessionState
}

// ── Operation outcomes ──────────────────────────────────────────────

export type LoginOutcome =
  | { status: "skipped" }
  | { status: "logged-in" }
  | { status: "failed"; error: LoginError }

export type FetchOutcome =
  | { success: true; target: string; html: string }
  | { success: false; target: string; error: NavigationError }

/**
 * One browser-automation session per run: open, optionally log in, fetch
 * each target, close exactly once. `open` throws `LaunchError`; `login` and
 * `fetch` report failures in their outcome. Any call on a closed handle
 * throws.
 */
export interface SessionDriver<THandle extends SessionHandle = SessionHandle> {
  open(config: SessionConfig): Promise<THandle>
  login(handle: THandle, credentials: Credentials | null): Promise<LoginOutcome>
  fetch(handle: THandle, target: string): Promise<FetchOutcome>
  close(handle: THandle): Promise<void>
}

export const assertSessionUsable = (handle: SessionHandle, operation: string): void => {
  if (handle.state === "closed") {
    throw new Error(`Cannot ${operation}: session is closed`)
  }
}
