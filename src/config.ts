import { config as loadDotEnv } from "dotenv"

import type { Credentials } from "./session/types.js"

loadDotEnv()

export interface EnvConfig {
  openaiApiKey: string | null
  scrapeUsername: string | null
  scrapePassword: string | null
  proxyServers: string[]
}

const nonEmpty = (value: string | undefined): string | null => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : null
}

/** Blank counts as missing; anything else is kept byte for byte. */
const nonBlank = (value: string | undefined): string | null =>
  value !== undefined && value.trim().length > 0 ? value : null

export const readEnvConfig = (env: NodeJS.ProcessEnv = process.env): EnvConfig => ({
  openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
  scrapeUsername: nonEmpty(env.SCRAPE_USERNAME),
  scrapePassword: nonBlank(env.SCRAPE_PASSWORD),
  proxyServers: (env.SCRAPE_PROXIES ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0),
})

/** Both halves must be present; otherwise the login step is skipped. */
export const resolveCredentials = (env: EnvConfig): Credentials | null =>
  env.scrapeUsername && env.scrapePassword
    ? { username: env.scrapeUsername, password: env.scrapePassword }
    : null
