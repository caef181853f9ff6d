// tests/server/catalog-refresher.test.ts

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { CatalogRefresher } from '../../server/lib/catalog-refresher'
import type { SchemaSource } from '../../server/lib/introspection'
import { SqlCompleter, type NamePair, type RelationKind } from '../../src/lib/sql/completer'

// ============================================================================
// IN-MEMORY SCHEMA SOURCE
// ============================================================================

interface SchemaFixture {
  databases: string[]
  relations: Record<RelationKind, string[]>
  columns: Record<RelationKind, NamePair[]>
  functions: NamePair[]
}

const SHOP: SchemaFixture = {
  databases: ['shop', 'shop_test'],
  relations: { table: ['users', 'orders'], view: ['active_users'] },
  columns: {
    table: [
      ['users', 'id'],
      ['users', 'name'],
      ['orders', 'id'],
    ],
    view: [['active_users', 'id']],
  },
  functions: [
    ['public', 'calc_total'],
    ['audit', 'calc_total'],
    ['audit', 'log_change'],
  ],
}

function memorySource(fixture: SchemaFixture): SchemaSource {
  return {
    databases: async () => fixture.databases,
    relations: async (kind) => fixture.relations[kind],
    columns: async (kind) => fixture.columns[kind],
    functions: async () => fixture.functions,
  }
}

let log: MockInstance<typeof console.log>
let error: MockInstance<typeof console.error>

beforeEach(() => {
  log = vi.spyOn(console, 'log').mockImplementation(() => {})
  error = vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

// ============================================================================
// TESTS
// ============================================================================

describe('CatalogRefresher', () => {
  it('installs a catalog built from the source', async () => {
    const completer = new SqlCompleter()
    const refresher = new CatalogRefresher(completer, memorySource(SHOP))

    await expect(refresher.refresh()).resolves.toBe(true)

    const catalog = completer.catalog
    expect(catalog.databases).toEqual(['shop', 'shop_test'])
    expect(catalog.tableNames).toEqual(['users', 'orders'])
    expect(catalog.columnsOf('users', 'table')).toEqual(['*', 'id', 'name'])
    expect(catalog.columnsOf('active_users', 'view')).toEqual(['*', 'id'])
    expect(catalog.functionNames).toEqual(['calc_total', 'log_change'])
  })

  it('logs a summary of what was loaded', async () => {
    const refresher = new CatalogRefresher(new SqlCompleter(), memorySource(SHOP))
    await refresher.refresh()

    expect(log).toHaveBeenCalledWith(
      'Refreshed completions: 2 table(s), 1 view(s), 2 function(s), 2 database(s)'
    )
  })

  it('carries session keywords and special commands into the new catalog', async () => {
    const completer = new SqlCompleter()
    const refresher = new CatalogRefresher(completer, memorySource(SHOP), {
      keywords: ['VACUUM'],
      specialCommands: ['\\dt'],
    })
    await refresher.refresh()

    expect(completer.catalog.keywords).toContain('VACUUM')
    expect(completer.catalog.specialCommands).toEqual(['\\dt'])
  })

  it('keeps the previous catalog when the source fails', async () => {
    const completer = new SqlCompleter()
    const previous = completer.catalog
    const source: SchemaSource = {
      ...memorySource(SHOP),
      functions: async () => {
        throw new Error('connection reset')
      },
    }
    const refresher = new CatalogRefresher(completer, source)

    await expect(refresher.refresh()).rejects.toThrow('connection reset')
    expect(completer.catalog).toBe(previous)
    expect(error).toHaveBeenCalledWith('Failed to refresh completions:', 'connection reset')
  })

  it('lets only the latest of overlapping refreshes install its catalog', async () => {
    let releaseFirst: () => void = () => {}
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve
    })

    let calls = 0
    const source: SchemaSource = {
      ...memorySource(SHOP),
      databases: async () => {
        calls++
        if (calls === 1) {
          await firstGate
          return ['stale']
        }
        return ['fresh']
      },
    }
    const completer = new SqlCompleter()
    const refresher = new CatalogRefresher(completer, source)

    const first = refresher.refresh()
    const second = refresher.refresh()

    await expect(second).resolves.toBe(true)
    releaseFirst()
    await expect(first).resolves.toBe(false)

    expect(completer.catalog.databases).toEqual(['fresh'])
  })
})
