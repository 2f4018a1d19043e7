import { readFile } from "node:fs/promises"
import { dirname, join } from "node:path"
import { fileURLToPath } from "node:url"

const DEFAULT_RELATIVE_TEMPLATE_PATH = "../../prompts/article-writer.md"
const TITLE_PLACEHOLDER = "{{title}}"

export const loadArticleTemplate = async (path?: string): Promise<string> => {
  const moduleDir = dirname(fileURLToPath(import.meta.url))
  const templatePath = path ?? join(moduleDir, DEFAULT_RELATIVE_TEMPLATE_PATH)
  const template = await readFile(templatePath, "utf-8")
  if (!template.includes(TITLE_PLACEHOLDER)) {
    throw new Error(`Prompt template ${templatePath} has no ${TITLE_PLACEHOLDER} placeholder`)
  }
  return template
}

export const buildArticlePrompt = (title: string, template: string): string =>
  template.replaceAll(TITLE_PLACEHOLDER, title).trim()
