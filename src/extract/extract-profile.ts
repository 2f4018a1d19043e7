import * as cheerio from "cheerio"

import { UNKNOWN, type ProfileFields } from "../pipeline/types.js"
import { DEFAULT_SELECTOR_TABLE, type SelectorTable } from "./selector-table.js"

export const normalizeSpaces = (text: string): string =>
  text
    .replaceAll("\n", " ")
    .replaceAll("\t", " ")
    .replaceAll("\r", " ")
    .replaceAll("\u00a0", " ")
    .split(" ")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(" ")

const firstMatchText = ($: cheerio.CheerioAPI, selector: string): string | null => {
  try {
    const node = $(selector).first()
    if (node.length === 0) {
      return null
    }
    const text = normalizeSpaces(node.text())
    return text.length > 0 ? text : null
  } catch {
    // Selector the engine cannot parse: counts as no match
    return null
  }
}

const extractField = ($: cheerio.CheerioAPI, selectors: readonly string[]): string => {
  for (const selector of selectors) {
    const text = firstMatchText($, selector)
    if (text !== null) {
      return text
    }
  }
  return UNKNOWN
}

/**
 * Pull the profile fields out of a rendered page. Each field takes the text
 * of the first selector candidate that matches with non-empty text, in table
 * order, and falls back to "unknown". Never throws on bad markup.
 */
export const extractProfileFields = (
  html: string,
  table: SelectorTable = DEFAULT_SELECTOR_TABLE,
): ProfileFields => {
  const $ = cheerio.load(html)
  return {
    display_name: extractField($, table.fields.display_name),
    headline: extractField($, table.fields.headline),
    location: extractField($, table.fields.location),
    summary: extractField($, table.fields.summary),
  }
}
