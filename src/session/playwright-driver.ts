import { chromium } from "playwright-core"

import {
  LaunchError,
  LoginError,
  NavigationError,
  getErrorMessage,
  sanitizeForError,
} from "../pipeline/errors.js"
import type { VerboseLog } from "../pipeline/types.js"
import { uniformDelay, type RandomSource } from "../utils/random.js"
import { sleep } from "../utils/sleep.js"
import {
  assertSessionUsable,
  type Credentials,
  type FetchOutcome,
  type LoginOutcome,
  type SessionConfig,
  type SessionDriver,
  type SessionHandle,
  type SessionState,
} from "./types.js"

// ── Engine surface ──────────────────────────────────────────────────
// The slice of the Playwright API the driver touches; `chromium` from
// playwright-core satisfies it, tests pass an in-process fake.

export interface PageLike {
  goto(url: string, options: { timeout: number; waitUntil: "domcontentloaded" }): Promise<unknown>
  fill(selector: string, value: string, options: { timeout: number }): Promise<void>
  click(selector: string, options: { timeout: number }): Promise<void>
  content(): Promise<string>
}

export interface BrowserContextLike {
  newPage(): Promise<PageLike>
}

export interface BrowserLike {
  newContext(options: {
    userAgent: string
    viewport: { width: number; height: number }
  }): Promise<BrowserContextLike>
  close(): Promise<void>
}

export interface EngineLaunchOptions {
  headless: boolean
  args: string[]
  proxy?: { server: string }
}

export interface BrowserEngine {
  launch(options: EngineLaunchOptions): Promise<BrowserLike>
}

// ── Login form ──────────────────────────────────────────────────────

export const LOGIN_SELECTORS = {
  username: "#username",
  password: "#password",
  submit: "button[type='submit']",
} as const

const LOGIN_PAGE_WAIT_MS = 2_000
const ACTION_TIMEOUT_MS = 8_000

// ── Session ─────────────────────────────────────────────────────────

export class PlaywrightSession implements SessionHandle {
  state: SessionState = "open"

  constructor(
    readonly config: SessionConfig,
    readonly browser: BrowserLike,
    readonly page: PageLike,
  ) {}
}

export const buildLaunchOptions = (config: SessionConfig): EngineLaunchOptions => {
  const { width, height } = config.windowSize
  const options: EngineLaunchOptions = {
    headless: config.headless,
    args: [...config.browserArgs, `--window-size=${width},${height}`],
  }
  if (config.identity.proxy) {
    options.proxy = { server: config.identity.proxy }
  }
  return options
}

export interface PlaywrightSessionDriverOptions {
  engine?: BrowserEngine
  random?: RandomSource
  verbose?: VerboseLog
}

export class PlaywrightSessionDriver implements SessionDriver<PlaywrightSession> {
  private readonly engine: BrowserEngine
  private readonly random: RandomSource
  private readonly verbose: VerboseLog | undefined

  constructor(options: PlaywrightSessionDriverOptions = {}) {
    this.engine = options.engine ?? chromium
    this.random = options.random ?? Math.random
    this.verbose = options.verbose
  }

  async open(config: SessionConfig): Promise<PlaywrightSession> {
    let browser: BrowserLike
    try {
      browser = await this.engine.launch(buildLaunchOptions(config))
    } catch (error) {
      throw new LaunchError(`Browser launch failed: ${getErrorMessage(error)}`, { cause: error })
    }

    try {
      const context = await browser.newContext({
        userAgent: config.identity.userAgent,
        viewport: { width: config.windowSize.width, height: config.windowSize.height },
      })
      const page = await context.newPage()
      this.verbose?.("session", `browser ready (headless=${config.headless})`)
      return new PlaywrightSession(config, browser, page)
    } catch (error) {
      await this.closeBrowser(browser)
      throw new LaunchError(`Browser session setup failed: ${getErrorMessage(error)}`, {
        cause: error,
      })
    }
  }

  async login(handle: PlaywrightSession, credentials: Credentials | null): Promise<LoginOutcome> {
    assertSessionUsable(handle, "login")
    if (!credentials) {
      return { status: "skipped" }
    }

    const { config, page } = handle
    try {
      await page.goto(config.loginUrl, {
        timeout: config.navigationTimeoutMs,
        waitUntil: "domcontentloaded",
      })
      await sleep(LOGIN_PAGE_WAIT_MS)
      await page.fill(LOGIN_SELECTORS.username, credentials.username, {
        timeout: ACTION_TIMEOUT_MS,
      })
      await page.fill(LOGIN_SELECTORS.password, credentials.password, {
        timeout: ACTION_TIMEOUT_MS,
      })
      await page.click(LOGIN_SELECTORS.submit, { timeout: ACTION_TIMEOUT_MS })
      await sleep(config.settleMs)
    } catch (error) {
      return {
        status: "failed",
        error: new LoginError(`Login failed: ${sanitizeForError(getErrorMessage(error))}`, {
          cause: error,
        }),
      }
    }

    handle.state = "logged-in"
    return { status: "logged-in" }
  }

  async fetch(handle: PlaywrightSession, target: string): Promise<FetchOutcome> {
    assertSessionUsable(handle, "fetch")
    const { config, page } = handle
    try {
      await page.goto(target, {
        timeout: config.navigationTimeoutMs,
        waitUntil: "domcontentloaded",
      })
      const delayMs = uniformDelay(config.delayRange, this.random)
      this.verbose?.("session", `loaded ${target}, waiting ${delayMs}ms`)
      await sleep(delayMs)
      const html = await page.content()
      return { success: true, target, html }
    } catch (error) {
      return {
        success: false,
        target,
        error: new NavigationError(getErrorMessage(error), target, { cause: error }),
      }
    }
  }

  async close(handle: PlaywrightSession): Promise<void> {
    assertSessionUsable(handle, "close")
    handle.state = "closed"
    await this.closeBrowser(handle.browser)
  }

  private async closeBrowser(browser: BrowserLike): Promise<void> {
    try {
      await browser.close()
    } catch (error) {
      this.verbose?.("session", `browser close failed: ${getErrorMessage(error)}`)
    }
  }
}
