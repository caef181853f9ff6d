/**
 * Classifier Module
 *
 * Decides what kind of name is expected at the cursor by looking at the
 * last keyword-ish token before the word being typed. This is the default
 * `Classifier`; hosts with a real parser can inject their own.
 */

import { unescapeName } from './name-codec'
import { significantTokens, tokenize } from './tokenizer'
import type { ScopeEntry, SuggestionRequest, Token } from './types'
import { RESERVED_WORDS } from './vocabulary'
import { lastWord } from './word'

// A backslash command alone on the current line
const SPECIAL_COMMAND = /^\s*\\\S*$/

// Keywords after which a table reference starts
const TABLE_INTRODUCERS = new Set(['FROM', 'JOIN', 'UPDATE', 'INTO'])

// Words that end a table reference instead of aliasing it
const CLAUSE_KEYWORDS = new Set([
  'WHERE', 'GROUP', 'HAVING', 'ORDER', 'LIMIT', 'OFFSET', 'ON', 'USING',
  'JOIN', 'LEFT', 'RIGHT', 'INNER', 'OUTER', 'FULL', 'CROSS', 'NATURAL',
  'SET', 'VALUES', 'RETURNING', 'UNION', 'EXCEPT', 'INTERSECT',
])

// Keywords that close a FROM list at the same nesting level
const FROM_LIST_TERMINATORS = new Set(['WHERE', 'GROUP', 'HAVING', 'ORDER', 'LIMIT', 'SELECT'])

const COLUMN_LIST_TOKENS = new Set(['(', 'set', 'by', 'distinct'])
const EXPRESSION_TOKENS = new Set(['select', 'where', 'having', 'and', 'or'])
const RELATION_TOKENS = new Set(['from', 'update', 'into', 'copy', 'describe', 'desc', 'explain'])
const DATABASE_TOKENS = new Set(['use', 'database', 'template', 'connect'])

/**
 * Classify the cursor position.
 *
 * @param fullText - whole buffer, used to find the tables in scope
 * @param textBeforeCursor - buffer up to the cursor
 * @param reservedWords - upper-case words treated as keywords, see `Catalog.reservedWords`
 */
export function suggestType(
  fullText: string,
  textBeforeCursor: string,
  reservedWords: ReadonlySet<string> = RESERVED_WORDS
): SuggestionRequest[] {
  const currentLine = textBeforeCursor.slice(textBeforeCursor.lastIndexOf('\n') + 1)
  if (SPECIAL_COMMAND.test(currentLine)) {
    return [{ type: 'special' }]
  }

  // Drop the partially typed word; remember its qualifier (`u` in `u.na`)
  const word = lastWord(textBeforeCursor, 'many_punctuations')
  const textBeforeWord = word ? textBeforeCursor.slice(0, -word.length) : textBeforeCursor
  const parent = getParentName(word)

  const tokens = significantTokens(tokenize(textBeforeWord, reservedWords))
  const scope = () => extractTables(fullText, reservedWords)
  return suggestForToken(tokens, tokens.length - 1, scope, parent)
}

function suggestForToken(
  tokens: Token[],
  index: number,
  scope: () => ScopeEntry[],
  parent: string | null
): SuggestionRequest[] {
  const token = tokens[index]
  if (!token) {
    return [{ type: 'keyword' }, { type: 'special' }]
  }

  const value = token.value.toLowerCase()

  if (COLUMN_LIST_TOKENS.has(value)) {
    return [{ type: 'column', scope: scope() }]
  }

  if (EXPRESSION_TOKENS.has(value)) {
    if (parent) {
      return [{ type: 'column', scope: filterByParent(scope(), parent) }]
    }
    return [{ type: 'column', scope: scope() }, { type: 'function' }]
  }

  if (RELATION_TOKENS.has(value) || (token.type === 'keyword' && value.endsWith('join'))) {
    return [{ type: 'table' }, { type: 'view' }]
  }

  // Views cannot be truncated
  if (value === 'truncate' || value === 'table') {
    return [{ type: 'table' }]
  }
  if (value === 'view') {
    return [{ type: 'view' }]
  }
  if (value === 'function') {
    return [{ type: 'function' }]
  }

  if (value === 'on') {
    const entries = scope()
    if (parent) {
      return [{ type: 'column', scope: filterByParent(entries, parent) }]
    }
    return [{ type: 'alias', aliases: entries.map((entry) => entry.reference) }]
  }

  if (DATABASE_TOKENS.has(value)) {
    return [{ type: 'database' }]
  }

  // `a = ` and `a, `: decided by the keyword that opened the list
  if (value === ',' || value === '=') {
    const keywordIndex = findPreviousKeyword(tokens, index)
    if (keywordIndex < 0) {
      return []
    }
    return suggestForToken(tokens, keywordIndex, scope, parent)
  }

  return [{ type: 'keyword' }]
}

/**
 * Find table references and their aliases in a query.
 *
 * Schema-qualified names keep only the relation part. Quoted names are
 * unescaped so they can be re-escaped against the catalog.
 *
 * @example
 * extractTables('SELECT * FROM users u JOIN orders AS o ON u.id = o.user_id')
 * // [{ table: 'users', reference: 'u' }, { table: 'orders', reference: 'o' }]
 */
export function extractTables(sql: string, reservedWords: ReadonlySet<string> = RESERVED_WORDS): ScopeEntry[] {
  const tokens = significantTokens(tokenize(sql, reservedWords))
  const entries: ScopeEntry[] = []

  for (let i = 1; i < tokens.length; i++) {
    const token = tokens[i]
    const prevToken = tokens[i - 1]

    const afterIntroducer =
      prevToken.type === 'keyword' && TABLE_INTRODUCERS.has(prevToken.value.toUpperCase())
    const afterFromComma = prevToken.value === ',' && isInFromClause(tokens, i - 1)

    if (token.type !== 'identifier' || !(afterIntroducer || afterFromComma)) {
      continue
    }

    // schema.table: keep the last segment
    let nameIndex = i
    while (tokens[nameIndex + 1]?.value === '.' && tokens[nameIndex + 2]?.type === 'identifier') {
      nameIndex += 2
    }

    const table = unescapeName(tokens[nameIndex].value)
    const aliasInfo = extractAlias(tokens, nameIndex)
    entries.push({ table, reference: aliasInfo.alias ?? table })

    i = aliasInfo.endIndex - 1
  }

  return entries
}

/**
 * Extract alias for a table at a given token index.
 */
function extractAlias(tokens: Token[], tableIndex: number): { alias: string | null; endIndex: number } {
  const nextIndex = tableIndex + 1
  const nextToken = tokens[nextIndex]
  const nextNextToken = tokens[nextIndex + 1]

  if (!nextToken) {
    return { alias: null, endIndex: tableIndex + 1 }
  }

  // Pattern: table AS alias
  if (nextToken.value.toUpperCase() === 'AS' && nextNextToken?.type === 'identifier') {
    return { alias: unescapeName(nextNextToken.value), endIndex: nextIndex + 2 }
  }

  // Pattern: table alias
  if (nextToken.type === 'identifier' && !CLAUSE_KEYWORDS.has(nextToken.value.toUpperCase())) {
    return { alias: unescapeName(nextToken.value), endIndex: nextIndex + 1 }
  }

  return { alias: null, endIndex: tableIndex + 1 }
}

/**
 * Whether a comma at `index` separates FROM-list entries.
 */
function isInFromClause(tokens: Token[], index: number): boolean {
  let parenDepth = 0
  for (let i = index - 1; i >= 0; i--) {
    const token = tokens[i]
    if (token.value === ')') parenDepth++
    if (token.value === '(') parenDepth--

    if (parenDepth !== 0 || token.type !== 'keyword') continue

    const upper = token.value.toUpperCase()
    if (upper === 'FROM') return true
    if (FROM_LIST_TERMINATORS.has(upper)) return false
  }
  return false
}

function findPreviousKeyword(tokens: Token[], index: number): number {
  for (let i = index - 1; i >= 0; i--) {
    if (tokens[i].type === 'keyword') return i
  }
  return -1
}

/**
 * `u` for `u.na`, `users` for `public.users.na`, null without a dot.
 */
function getParentName(word: string): string | null {
  const dot = word.lastIndexOf('.')
  if (dot <= 0) {
    return null
  }
  const qualifier = word.slice(0, dot)
  return unescapeName(qualifier.slice(qualifier.lastIndexOf('.') + 1)) || null
}

function filterByParent(scope: ScopeEntry[], parent: string): ScopeEntry[] {
  const key = parent.toLowerCase()
  return scope.filter(
    (entry) => entry.reference.toLowerCase() === key || entry.table.toLowerCase() === key
  )
}
