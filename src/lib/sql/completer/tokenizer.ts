/**
 * SQL Tokenizer Module
 *
 * A small lexical scanner, good enough to find the keyword in front of the
 * cursor and the tables a query references. It never fails: unterminated
 * strings, quoted names and comments run to the end of the input.
 */

import type { Token, TokenType } from './types'
import { RESERVED_WORDS } from './vocabulary'

const WHITESPACE = /\s+/y
const NUMBER = /\d+(?:\.\d+)?/y
const WORD = /[\p{L}_][\p{L}\p{N}_$]*/uy
const OPERATOR = /[<>=!+\-*\/%^|&~@#?]+/y

/**
 * Tokenize SQL text. Whitespace is dropped; comments are kept so callers
 * can decide whether they matter.
 *
 * @param reservedWords - upper-case words classified as keywords
 */
export function tokenize(sql: string, reservedWords: ReadonlySet<string> = RESERVED_WORDS): Token[] {
  const tokens: Token[] = []
  let pos = 0

  const push = (type: TokenType, end: number) => {
    tokens.push({ type, value: sql.slice(pos, end), start: pos, end })
    pos = end
  }

  while (pos < sql.length) {
    const whitespace = matchAt(WHITESPACE, sql, pos)
    if (whitespace) {
      pos += whitespace.length
      continue
    }

    const char = sql[pos]
    const next = sql[pos + 1]

    if (char === '-' && next === '-') {
      const newline = sql.indexOf('\n', pos)
      push('comment', newline === -1 ? sql.length : newline)
      continue
    }

    if (char === '/' && next === '*') {
      const close = sql.indexOf('*/', pos + 2)
      push('comment', close === -1 ? sql.length : close + 2)
      continue
    }

    if (char === "'") {
      push('literal', findClosingQuote(sql, pos, "'"))
      continue
    }

    if (char === '"') {
      push('identifier', findClosingQuote(sql, pos, '"'))
      continue
    }

    const number = matchAt(NUMBER, sql, pos)
    if (number) {
      push('literal', pos + number.length)
      continue
    }

    const word = matchAt(WORD, sql, pos)
    if (word) {
      push(reservedWords.has(word.toUpperCase()) ? 'keyword' : 'identifier', pos + word.length)
      continue
    }

    const operator = matchAt(OPERATOR, sql, pos)
    if (operator) {
      push('operator', pos + operator.length)
      continue
    }

    // Anything else (parens, commas, backslash, ...) is a one-character token
    push('punctuation', pos + 1)
  }

  return tokens
}

/**
 * Drop comment tokens.
 */
export function significantTokens(tokens: Token[]): Token[] {
  return tokens.filter((t) => t.type !== 'comment')
}

function matchAt(pattern: RegExp, text: string, pos: number): string | null {
  pattern.lastIndex = pos
  const match = pattern.exec(text)
  return match ? match[0] : null
}

/**
 * End offset (exclusive) of a quoted run starting at `start`. A doubled
 * quote is an escaped quote.
 */
function findClosingQuote(sql: string, start: number, quote: string): number {
  let i = start + 1
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        i += 2
        continue
      }
      return i + 1
    }
    i++
  }
  return sql.length
}
