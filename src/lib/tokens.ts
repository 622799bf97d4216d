/**
 * Rough token estimate: about one token per four characters, never fewer
 * than the number of whitespace-separated words.
 * @param text - Text to measure.
 * @returns Estimated token count, 0 for empty text.
 */
export function estimateTokens(text: string): number {
  if (!text) return 0
  const words = text.split(/\s+/).filter(Boolean).length
  return Math.max(Math.floor(text.length / 4), words)
}
