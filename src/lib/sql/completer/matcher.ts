/**
 * Matcher Module
 *
 * Lexical matching only: candidates come out in ordinal (code unit) order,
 * never re-ranked. A match is either anchored at the start of the candidate
 * or anywhere inside it.
 */

import type { Completion } from './types'
import { lastWord } from './word'

/**
 * Find candidates matching the last word of `text`.
 *
 * The fragment is the trailing word under the `most_punctuations` rule,
 * lower-cased; candidates are compared lower-cased as well. Each match
 * replaces exactly the fragment, so `deleteBackCount` is its length.
 *
 * The returned generator is lazy and can be consumed once.
 */
export function* findMatches(
  text: string,
  candidates: Iterable<string>,
  startOnly: boolean = false
): Generator<Completion, void, undefined> {
  const fragment = lastWord(text, 'most_punctuations').toLowerCase()

  // Default sort compares UTF-16 code units, which is the ordinal order we want
  const sorted = Array.from(candidates).sort()

  for (const candidate of sorted) {
    if (isFragmentMatch(candidate, fragment, startOnly)) {
      yield { text: candidate, deleteBackCount: fragment.length }
    }
  }
}

/**
 * Case-insensitive containment check used by `findMatches`.
 */
export function isFragmentMatch(candidate: string, fragment: string, startOnly: boolean): boolean {
  const value = candidate.toLowerCase()
  return startOnly ? value.startsWith(fragment) : value.includes(fragment)
}
