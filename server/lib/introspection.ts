import type { NamePair, RelationKind } from '../../src/lib/sql/completer'
import { createClient, type ConnectionDetails } from './db'

/**
 * Raw schema rows for one database. Everything the catalog needs, nothing
 * more: names only.
 */
export interface SchemaSource {
  databases(): Promise<string[]>
  relations(kind: RelationKind): Promise<string[]>
  /** (relation, column) pairs in column order */
  columns(kind: RelationKind): Promise<NamePair[]>
  /** (schema, function) pairs */
  functions(): Promise<NamePair[]>
}

export interface PostgresSchemaSource extends SchemaSource {
  close(): Promise<void>
}

/** pg_class.relkind values per relation kind: plain and partitioned tables, plain and materialized views */
export const RELKINDS: Record<RelationKind, string[]> = {
  table: ['r', 'p'],
  view: ['v', 'm'],
}

/**
 * Schema source backed by the PostgreSQL system catalogs. Only relations
 * visible on the search path are listed, matching what unqualified names
 * in a query can refer to.
 */
export function createPostgresSchemaSource(details: ConnectionDetails): PostgresSchemaSource {
  const sql = createClient(details)

  return {
    async databases() {
      const rows = await sql<{ datname: string }[]>`
        SELECT datname
        FROM pg_database
        WHERE NOT datistemplate
        ORDER BY datname
      `
      return rows.map((r) => r.datname)
    },

    async relations(kind) {
      const rows = await sql<{ relname: string }[]>`
        SELECT c.relname
        FROM pg_class c
        WHERE c.relkind = ANY(${RELKINDS[kind]})
          AND pg_table_is_visible(c.oid)
        ORDER BY c.relname
      `
      return rows.map((r) => r.relname)
    },

    async columns(kind) {
      const rows = await sql<{ relname: string; attname: string }[]>`
        SELECT c.relname, a.attname
        FROM pg_attribute a
        JOIN pg_class c ON c.oid = a.attrelid
        WHERE c.relkind = ANY(${RELKINDS[kind]})
          AND pg_table_is_visible(c.oid)
          AND a.attnum > 0
          AND NOT a.attisdropped
        ORDER BY c.relname, a.attnum
      `
      return rows.map((r): NamePair => [r.relname, r.attname])
    },

    async functions() {
      const rows = await sql<{ nspname: string; proname: string }[]>`
        SELECT DISTINCT n.nspname, p.proname
        FROM pg_proc p
        JOIN pg_namespace n ON n.oid = p.pronamespace
        WHERE n.nspname NOT IN ('pg_catalog', 'information_schema')
        ORDER BY n.nspname, p.proname
      `
      return rows.map((r): NamePair => [r.nspname, r.proname])
    },

    async close() {
      await sql.end()
    },
  }
}
