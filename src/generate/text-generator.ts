import { GenerationError, getErrorMessage, sanitizeForError } from "../pipeline/errors.js"

export const DEFAULT_MODEL = "gpt-5-nano"

export interface TextGenerator {
  /** Returns the generated text; throws `GenerationError` on failure or empty output. */
  generate(title: string, prompt: string, model: string): Promise<string>
}

/** The part of the `openai` client used here. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: {
        model: string
        messages: Array<{ role: "user"; content: string }>
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>
    }
  }
}

export const createOpenAITextGenerator = (client: ChatCompletionsClient): TextGenerator => ({
  async generate(title: string, prompt: string, model: string): Promise<string> {
    let content: string | null | undefined
    try {
      const completion = await client.chat.completions.create({
        model,
        messages: [{ role: "user", content: prompt }],
      })
      content = completion.choices[0]?.message.content
    } catch (error) {
      throw new GenerationError(`API error: ${sanitizeForError(getErrorMessage(error))}`, title, {
        cause: error,
      })
    }
    const trimmed = content?.trim() ?? ""
    if (!trimmed) {
      throw new GenerationError("API returned no content", title)
    }
    return trimmed
  },
})
