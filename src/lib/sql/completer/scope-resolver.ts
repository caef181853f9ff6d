/**
 * Scope Resolver Module
 *
 * Turns the relations referenced by a query into the columns available at
 * the cursor.
 */

import type { Catalog } from './catalog'
import { escapeName } from './name-codec'
import type { RelationKind, ScopeEntry } from './types'

// Tables win over views when a name is registered as both
const LOOKUP_ORDER: RelationKind[] = ['table', 'view']

/**
 * Collect the columns of every relation in scope.
 *
 * Each entry is looked up by its reference name first, then by its table
 * name (an alias is not a relation). Entries found nowhere contribute
 * nothing. Order follows `scope`; duplicate column names are kept.
 */
export function resolveColumns(scope: readonly ScopeEntry[], catalog: Catalog): string[] {
  const columns: string[] = []

  for (const entry of scope) {
    const found =
      findRelationColumns(entry.reference, catalog) ??
      (entry.table !== entry.reference ? findRelationColumns(entry.table, catalog) : undefined)
    if (found) {
      columns.push(...found)
    }
  }

  return columns
}

/**
 * Columns of a relation by unescaped name, tables first.
 */
export function findRelationColumns(name: string, catalog: Catalog): readonly string[] | undefined {
  const relname = escapeName(name)
  for (const kind of LOOKUP_ORDER) {
    const columns = catalog.columnsOf(relname, kind)
    if (columns) return columns
  }
  return undefined
}
