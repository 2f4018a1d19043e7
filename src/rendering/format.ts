export const compactText = (text: string, maxLength: number): string => {
  const compact = text.trim().replaceAll(/\s+/g, " ")
  return compact.length > maxLength ? `${compact.slice(0, maxLength - 3)}...` : compact
}
