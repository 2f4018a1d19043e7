import { text } from "node:stream/consumers"

import { parseLineList, readLineList } from "../utils/lines.js"

export const parseTitles = (input: string): string[] => parseLineList(input)

/** Read titles from a file, or from stdin when `source` is "-". */
export const readTitles = async (
  source: string,
  stdin: NodeJS.ReadableStream = process.stdin,
): Promise<string[]> => {
  if (source === "-") {
    return parseTitles(await text(stdin))
  }
  return readLineList(source)
}
