/**
 * SQL Completer
 *
 * Entry point for the editor: text before the cursor in, completions out.
 *
 * Smart mode asks the classifier what is expected at the cursor and matches
 * each request against the matching part of the catalog. Dumb mode matches
 * the word before the cursor against every known name.
 *
 * @example
 * ```ts
 * const completer = new SqlCompleter()
 * completer.catalog.extendRelations(['users'], 'table')
 * completer.catalog.extendColumns([['users', 'name']], 'table')
 *
 * completer.getCompletions('SELECT na FROM users', 'SELECT na')
 * // [{ text: 'name', deleteBackCount: 2 }]
 * ```
 */

import { Catalog } from './catalog'
import { suggestType } from './classifier'
import { findMatches } from './matcher'
import { resolveColumns } from './scope-resolver'
import type { Classifier, Completion, SuggestionRequest } from './types'
import { getWordBeforeCursor } from './word'

export interface CompleterOptions {
  /** Used when `getCompletions` is called without a mode (default true) */
  smartCompletion?: boolean
  /** Injectable for hosts with their own SQL analysis */
  classifier?: Classifier
  /** Start from an existing catalog instead of an empty one */
  catalog?: Catalog
  /** Log each dispatched request with console.debug */
  debug?: boolean
}

export class SqlCompleter {
  readonly smartCompletion: boolean
  private readonly classifier: Classifier | undefined
  readonly debug: boolean
  private current: Catalog

  constructor(options: CompleterOptions = {}) {
    this.smartCompletion = options.smartCompletion ?? true
    this.classifier = options.classifier
    this.debug = options.debug ?? false
    this.current = options.catalog ?? new Catalog()
  }

  get catalog(): Catalog {
    return this.current
  }

  /**
   * Replace the catalog in one step. Completions already being computed keep
   * the catalog they started with.
   */
  setCatalog(next: Catalog): void {
    this.current = next
  }

  getCompletions(
    fullText: string,
    textBeforeCursor: string,
    smartCompletion: boolean = this.smartCompletion
  ): Completion[] {
    const catalog = this.current
    const wordBeforeCursor = getWordBeforeCursor(textBeforeCursor)

    if (!smartCompletion) {
      return Array.from(findMatches(wordBeforeCursor, catalog.allCompletions, true))
    }

    // The built-in classifier also treats session keywords as keywords
    const requests = this.classifier
      ? this.classifier(fullText, textBeforeCursor)
      : suggestType(fullText, textBeforeCursor, catalog.reservedWords)

    const completions: Completion[] = []
    for (const request of requests) {
      if (this.debug) {
        console.debug('Suggestion type:', request.type)
      }
      completions.push(...this.complete(request, wordBeforeCursor, catalog))
    }
    return completions
  }

  private complete(
    request: SuggestionRequest,
    wordBeforeCursor: string,
    catalog: Catalog
  ): Iterable<Completion> {
    switch (request.type) {
      case 'column': {
        if (this.debug) {
          console.debug('Completion column scope:', request.scope)
        }
        return findMatches(wordBeforeCursor, resolveColumns(request.scope, catalog))
      }
      case 'function':
        return findMatches(wordBeforeCursor, catalog.functionNames, true)
      case 'table':
        return findMatches(wordBeforeCursor, catalog.tableNames)
      case 'view':
        return findMatches(wordBeforeCursor, catalog.viewNames)
      case 'alias':
        return findMatches(wordBeforeCursor, request.aliases)
      case 'database':
        return findMatches(wordBeforeCursor, catalog.databases)
      case 'keyword':
        return findMatches(wordBeforeCursor, catalog.keywords, true)
      case 'special':
        return findMatches(wordBeforeCursor, catalog.specialCommands, true)
      default:
        return assertNever(request)
    }
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled suggestion request: ${JSON.stringify(value)}`)
}
