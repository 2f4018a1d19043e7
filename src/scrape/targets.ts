import { parseLineList, readLineList } from "../utils/lines.js"

/** One URL per line; blank lines are ignored. */
export const parseTargets = (text: string): string[] => parseLineList(text)

export const readTargets = async (path: string): Promise<string[]> => readLineList(path)
