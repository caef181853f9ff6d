// tests/server/completion-session.test.ts

import { describe, it, expect, vi, afterEach } from 'vitest'
import path from 'path'
import { fileURLToPath } from 'url'
import { createCompletionSession } from '../../server/lib/completion-session'
import { loadConfig, resetConfig } from '../../server/lib/config'
import type { SchemaSource } from '../../server/lib/introspection'

const fixturesDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '../fixtures/config')

const source: SchemaSource = {
  databases: async () => ['shop'],
  relations: async (kind) => (kind === 'table' ? ['users'] : []),
  columns: async (kind) => (kind === 'table' ? [['users', 'name']] : []),
  functions: async () => [],
}

afterEach(() => {
  resetConfig()
  vi.restoreAllMocks()
})

describe('createCompletionSession', () => {
  it('uses smart completion with no config loaded', async () => {
    const session = createCompletionSession()

    expect(session.completer.smartCompletion).toBe(true)
    await expect(session.refresh()).resolves.toBe(false)
    await session.close()
  })

  it('applies the completion settings from the config file', async () => {
    await loadConfig(path.join(fixturesDir, 'full.toml'))
    const session = createCompletionSession({ source })

    expect(session.completer.smartCompletion).toBe(false)
    expect(session.completer.debug).toBe(true)
    expect(session.completer.catalog.keywords).toContain('ANALYZE')
    expect(session.completer.catalog.specialCommands).toEqual(['\\dt', '\\l'])
  })

  it('loads the schema from the given source on refresh', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    const session = createCompletionSession({ source })

    await expect(session.refresh()).resolves.toBe(true)
    expect(session.completer.getCompletions('SELECT * FROM us', 'SELECT * FROM us')).toEqual([
      { text: 'users', deleteBackCount: 2 },
    ])
  })
})
