import vocabulary from './vocabulary.json'

/** Keyword phrases offered everywhere a keyword is expected (e.g. `GROUP BY`) */
export const BASE_KEYWORDS: readonly string[] = Object.freeze([...vocabulary.keywords])

/** Built-in function names */
export const BASE_FUNCTIONS: readonly string[] = Object.freeze([...vocabulary.functions])

/**
 * Split keyword phrases into single upper-case words.
 */
export function toReservedWords(keywords: Iterable<string>): Set<string> {
  const words = new Set<string>()
  for (const phrase of keywords) {
    for (const word of phrase.split(/\s+/)) {
      if (word) words.add(word.toUpperCase())
    }
  }
  return words
}

export const RESERVED_WORDS: ReadonlySet<string> = toReservedWords(BASE_KEYWORDS)
