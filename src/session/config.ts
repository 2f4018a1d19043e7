import type { Identity } from "../identity/identity-provider.js"
import type { DelayRange } from "../utils/random.js"
import type { SessionConfig, WindowSize } from "./types.js"

export const DEFAULT_LOGIN_URL = "https://www.linkedin.com/login"
export const DEFAULT_WINDOW_SIZE: WindowSize = { width: 1920, height: 1080 }
export const DEFAULT_NAVIGATION_TIMEOUT_MS = 30_000
export const DEFAULT_SETTLE_MS = 3_000
export const DEFAULT_DELAY_RANGE: DelayRange = { minMs: 3_000, maxMs: 7_000 }

export const DEFAULT_BROWSER_ARGS = [
  "--no-sandbox",
  "--disable-dev-shm-usage",
  "--disable-blink-features=AutomationControlled",
] as const

export interface SessionConfigInput {
  identity: Identity
  headless?: boolean
  windowSize?: WindowSize
  browserArgs?: readonly string[]
  loginUrl?: string
  navigationTimeoutMs?: number
  settleMs?: number
  delayRange?: DelayRange
}

export const buildSessionConfig = (input: SessionConfigInput): SessionConfig => {
  const delayRange = input.delayRange ?? DEFAULT_DELAY_RANGE
  if (delayRange.minMs < 0 || delayRange.minMs > delayRange.maxMs) {
    throw new Error(
      `Invalid delay range: ${delayRange.minMs}ms..${delayRange.maxMs}ms`,
    )
  }
  return Object.freeze({
    headless: input.headless ?? true,
    windowSize: Object.freeze({ ...(input.windowSize ?? DEFAULT_WINDOW_SIZE) }),
    browserArgs: Object.freeze([...(input.browserArgs ?? DEFAULT_BROWSER_ARGS)]),
    identity: Object.freeze({ ...input.identity }),
    loginUrl: input.loginUrl ?? DEFAULT_LOGIN_URL,
    navigationTimeoutMs: input.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS,
    settleMs: input.settleMs ?? DEFAULT_SETTLE_MS,
    delayRange: Object.freeze({ ...delayRange }),
  })
}
