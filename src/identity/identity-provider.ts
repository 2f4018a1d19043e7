import { readFile } from "node:fs/promises"
import { dirname, join } from "node:path"
import { fileURLToPath } from "node:url"

import { z } from "zod"

import { pickOne, type RandomSource } from "../utils/random.js"

const DEFAULT_RELATIVE_AGENTS_PATH = "../../data/user-agents.json"

const userAgentListSchema = z.array(z.string().min(1)).min(1)

export interface Identity {
  userAgent: string
  /** Proxy server URL, or null for a direct connection. */
  proxy: string | null
}

export class IdentityProvider {
  private readonly userAgents: readonly string[]
  private readonly proxies: readonly string[]

  constructor(
    userAgents: readonly string[],
    proxies: readonly string[] = [],
    private readonly random: RandomSource = Math.random,
  ) {
    if (userAgents.length === 0) {
      throw new Error("IdentityProvider needs at least one user agent")
    }
    this.userAgents = [...userAgents]
    this.proxies = [...proxies]
  }

  nextIdentity(): Identity {
    return {
      userAgent: pickOne(this.userAgents, this.random),
      proxy: this.proxies.length > 0 ? pickOne(this.proxies, this.random) : null,
    }
  }
}

export const loadUserAgents = async (path?: string): Promise<string[]> => {
  const moduleDir = dirname(fileURLToPath(import.meta.url))
  const agentsPath = path ?? join(moduleDir, DEFAULT_RELATIVE_AGENTS_PATH)
  const raw: unknown = JSON.parse(await readFile(agentsPath, "utf-8"))
  const parsed = userAgentListSchema.safeParse(raw)
  if (!parsed.success) {
    throw new Error(`Invalid user-agent list in ${agentsPath}`)
  }
  return parsed.data
}

/** Identity provider over the shipped user-agent list. */
export const loadIdentityProvider = async (
  proxies: readonly string[] = [],
  random?: RandomSource,
): Promise<IdentityProvider> => new IdentityProvider(await loadUserAgents(), proxies, random)
