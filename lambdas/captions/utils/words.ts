/**
 * Split text into whitespace-separated words, dropping empty tokens.
 */
export function textToWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0)
}

/**
 * Count whitespace-separated words in a text.
 */
export function countWords(text: string): number {
  return textToWords(text).length
}

/**
 * Join words back into text with single spaces.
 */
export function wordsToText(words: string[]): string {
  return words.join(' ').trim()
}
