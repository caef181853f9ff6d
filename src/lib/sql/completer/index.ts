/**
 * SQL Completion Core
 *
 * Completes keywords, relation/column/function/database names, aliases and
 * special commands for an interactive SQL shell:
 * - Catalog of schema names, kept escaped
 * - Classifier deciding what is expected at the cursor
 * - Scope resolution of columns across joined tables and aliases
 * - Lexical prefix/substring matching in ordinal order
 */

// Entry point
export { SqlCompleter } from './completer'
export type { CompleterOptions } from './completer'

// Catalog
export { Catalog, UNKNOWN_COLUMNS } from './catalog'
export type { NamePair } from './catalog'
export { CatalogLookupError } from './errors'
export { BASE_KEYWORDS, BASE_FUNCTIONS, RESERVED_WORDS, toReservedWords } from './vocabulary'

// Types
export type {
  RelationKind,
  RelationMap,
  FunctionMap,
  ScopeEntry,
  SuggestionRequest,
  SuggestionType,
  Classifier,
  Completion,
  Token,
  TokenType,
} from './types'

// Module functions (for unit testing and advanced usage)
export { escapeName, unescapeName, escapeNames } from './name-codec'
export { lastWord, getWordBeforeCursor } from './word'
export type { WordBoundary } from './word'
export { findMatches, isFragmentMatch } from './matcher'
export { resolveColumns, findRelationColumns } from './scope-resolver'
export { suggestType, extractTables } from './classifier'
export { tokenize, significantTokens } from './tokenizer'
