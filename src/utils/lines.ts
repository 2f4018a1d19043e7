import { readFile } from "node:fs/promises"

/** One entry per line, trimmed; blank lines dropped; order kept. */
export const parseLineList = (text: string): string[] =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)

export const readLineList = async (path: string): Promise<string[]> =>
  parseLineList(await readFile(path, "utf-8"))
