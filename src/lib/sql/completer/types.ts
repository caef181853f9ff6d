/**
 * Completer Types
 *
 * Shared shapes for the completion core:
 * Editor text → Classifier → SuggestionRequest[] → Catalog / ScopeResolver → Matcher → Completion[]
 */

// ============================================================================
// 1. CATALOG TYPES
// ============================================================================

export type RelationKind = 'table' | 'view'

/**
 * Escaped relation name → ordered column names.
 * Every list starts with the `*` sentinel.
 */
export type RelationMap = Map<string, string[]>

/**
 * Escaped schema name → escaped function name → placeholder.
 * No per-function metadata is tracked yet.
 */
export type FunctionMap = Map<string, Map<string, null>>

// ============================================================================
// 2. SCOPE TYPES
// ============================================================================

export interface ScopeEntry {
  /** Relation name as written after FROM / JOIN (unescaped) */
  table: string
  /** What the query uses to refer to it: the alias, or the table name itself */
  reference: string
}

// ============================================================================
// 3. SUGGESTION REQUESTS (classifier output)
// ============================================================================

export type SuggestionRequest =
  | { type: 'column'; scope: ScopeEntry[] }
  | { type: 'function' }
  | { type: 'table' }
  | { type: 'view' }
  | { type: 'alias'; aliases: string[] }
  | { type: 'database' }
  | { type: 'keyword' }
  | { type: 'special' }

export type SuggestionType = SuggestionRequest['type']

/**
 * Decides what kind of thing is expected at the cursor.
 */
export type Classifier = (fullText: string, textBeforeCursor: string) => SuggestionRequest[]

// ============================================================================
// 4. OUTPUT
// ============================================================================

export interface Completion {
  text: string
  /** Characters before the cursor the caller replaces with `text` */
  deleteBackCount: number
}

// ============================================================================
// 5. TOKENIZER TYPES
// ============================================================================

export type TokenType =
  | 'keyword'
  | 'identifier'
  | 'operator'
  | 'literal'
  | 'punctuation'
  | 'comment'

export interface Token {
  type: TokenType
  value: string
  start: number
  end: number
}
