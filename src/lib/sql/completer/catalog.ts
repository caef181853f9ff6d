/**
 * Catalog Module
 *
 * In-memory snapshot of everything the completer can offer: the keyword and
 * function baseline, database names, table/view columns, functions by schema
 * and special commands.
 *
 * Names are stored escaped (see name-codec). The baseline vocabulary is
 * frozen and shared; everything else belongs to one Catalog instance.
 *
 * Reload sequence: `reset()`, then `extend*` calls. Relations must be
 * registered before their columns are added.
 */

import { escapeName, escapeNames } from './name-codec'
import { CatalogLookupError } from './errors'
import { BASE_FUNCTIONS, BASE_KEYWORDS, toReservedWords } from './vocabulary'
import type { FunctionMap, RelationKind, RelationMap } from './types'

/** Column list value for a relation whose columns are not known yet */
export const UNKNOWN_COLUMNS = '*'

export type NamePair = readonly [string, string]

export class Catalog {
  private databaseList: string[] = []
  private relations: Record<RelationKind, RelationMap> = { table: new Map(), view: new Map() }
  private functionMap: FunctionMap = new Map()
  private sessionKeywords: string[] = []
  private specialCommandList: string[] = []
  private vocabulary: Set<string> = new Set([...BASE_KEYWORDS, ...BASE_FUNCTIONS])

  // ==========================================================================
  // Mutation
  // ==========================================================================

  /**
   * Drop all schema data. Session keywords and special commands survive.
   */
  reset(): void {
    this.databaseList = []
    this.relations = { table: new Map(), view: new Map() }
    this.functionMap = new Map()
    this.vocabulary = new Set([...BASE_KEYWORDS, ...BASE_FUNCTIONS, ...this.sessionKeywords])
  }

  extendDatabases(names: readonly string[]): void {
    this.databaseList.push(...escapeNames(names))
  }

  /**
   * Register relations with an unknown column list. Registering a name again
   * replaces its columns.
   */
  extendRelations(names: readonly string[], kind: RelationKind): void {
    const metadata = this.relations[kind]
    for (const name of escapeNames(names)) {
      metadata.set(name, [UNKNOWN_COLUMNS])
      this.vocabulary.add(name)
    }
  }

  /**
   * Append columns to registered relations.
   *
   * @param pairs - (relation, column) pairs
   * @throws CatalogLookupError if a relation is not registered for `kind`
   */
  extendColumns(pairs: readonly NamePair[], kind: RelationKind): void {
    const metadata = this.relations[kind]
    for (const [relation, column] of pairs) {
      const relname = escapeName(relation)
      const columns = metadata.get(relname)
      if (!columns) {
        throw new CatalogLookupError(relname, kind)
      }
      const colname = escapeName(column)
      columns.push(colname)
      this.vocabulary.add(colname)
    }
  }

  /**
   * @param pairs - (schema, function) pairs
   */
  extendFunctions(pairs: readonly NamePair[]): void {
    for (const [schema, func] of pairs) {
      const schemaName = escapeName(schema)
      const funcName = escapeName(func)
      let functions = this.functionMap.get(schemaName)
      if (!functions) {
        functions = new Map()
        this.functionMap.set(schemaName, functions)
      }
      functions.set(funcName, null)
      this.vocabulary.add(funcName)
    }
  }

  extendKeywords(words: readonly string[]): void {
    this.sessionKeywords.push(...words)
    for (const word of words) {
      this.vocabulary.add(word)
    }
  }

  /**
   * Special commands only complete at the start of a line, so they stay out
   * of the global vocabulary.
   */
  extendSpecialCommands(words: readonly string[]): void {
    this.specialCommandList.push(...words)
  }

  // ==========================================================================
  // Read access
  // ==========================================================================

  get databases(): readonly string[] {
    return this.databaseList
  }

  get tableNames(): string[] {
    return this.relationNames('table')
  }

  get viewNames(): string[] {
    return this.relationNames('view')
  }

  relationNames(kind: RelationKind): string[] {
    return Array.from(this.relations[kind].keys())
  }

  /**
   * Columns of an escaped relation name, `undefined` if it is not registered.
   */
  columnsOf(name: string, kind: RelationKind): readonly string[] | undefined {
    return this.relations[kind].get(name)
  }

  /** Function names across all schemas, first-seen order */
  get functionNames(): string[] {
    const names = new Set<string>()
    for (const functions of this.functionMap.values()) {
      for (const name of functions.keys()) {
        names.add(name)
      }
    }
    return Array.from(names)
  }

  get keywords(): string[] {
    return [...BASE_KEYWORDS, ...this.sessionKeywords]
  }

  get specialCommands(): readonly string[] {
    return this.specialCommandList
  }

  /** Every known literal, used when smart completion is off */
  get allCompletions(): ReadonlySet<string> {
    return this.vocabulary
  }

  get reservedWords(): Set<string> {
    return toReservedWords(this.keywords)
  }
}
