const MAX_STEM_LENGTH = 50

/** "Intro to Streams / Part 1" -> "intro_to_streams___part_1.md" */
export const articleFileName = (title: string): string => {
  const stem = title.toLowerCase().replaceAll(" ", "_").replaceAll("/", "_")
  // Code points, so an emoji is never cut in half
  return `${[...stem].slice(0, MAX_STEM_LENGTH).join("")}.md`
}

export const renderArticle = (title: string, content: string): string => `# ${title}\n\n${content}`
