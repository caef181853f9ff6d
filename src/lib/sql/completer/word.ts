/**
 * Word extraction around the cursor.
 */

export type WordBoundary =
  | 'alphanum_underscore'
  | 'many_punctuations'
  | 'most_punctuations'
  | 'all_punctuations'

// Which trailing run of characters counts as "the word" for each boundary rule
const TRAILING_WORD: Record<WordBoundary, RegExp> = {
  alphanum_underscore: /\w+$/,
  many_punctuations: /[^():,\s]+$/,
  most_punctuations: /[^.():,\s]+$/,
  all_punctuations: /\S+$/,
}

/**
 * Find the last word in `text`.
 *
 * Returns an empty string when the text ends in whitespace, so that
 * `SELECT ` yields no partial word.
 *
 * @example
 * lastWord('SELECT u.na', 'most_punctuations') // 'na'
 * lastWord('SELECT u.na', 'many_punctuations') // 'u.na'
 */
export function lastWord(text: string, include: WordBoundary = 'alphanum_underscore'): string {
  if (!text || /\s$/.test(text)) {
    return ''
  }
  const match = TRAILING_WORD[include].exec(text)
  return match ? match[0] : ''
}

/**
 * The run of non-whitespace characters immediately before the cursor.
 */
export function getWordBeforeCursor(textBeforeCursor: string): string {
  return lastWord(textBeforeCursor, 'all_punctuations')
}
