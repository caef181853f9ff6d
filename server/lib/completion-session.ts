import { SqlCompleter } from '../../src/lib/sql/completer'
import { CatalogRefresher } from './catalog-refresher'
import { getCompletionConfig, getDatabaseConfig } from './config'
import { toConnectionDetails } from './db'
import { createPostgresSchemaSource, type SchemaSource } from './introspection'

export interface CompletionSession {
  completer: SqlCompleter
  /** Reload the schema; false when there is nothing to load from or a newer reload won */
  refresh(): Promise<boolean>
  close(): Promise<void>
}

/**
 * Wire a completer from the loaded config. Without an explicit source the
 * `[database]` section, if any, is introspected.
 */
export function createCompletionSession(options: { source?: SchemaSource } = {}): CompletionSession {
  const config = getCompletionConfig()
  const completer = new SqlCompleter({
    smartCompletion: config.smart_completion,
    debug: config.debug,
  })
  completer.catalog.extendKeywords(config.keywords)
  completer.catalog.extendSpecialCommands(config.special_commands)

  let source = options.source
  let close = async () => {}
  if (!source) {
    const database = getDatabaseConfig()
    if (database) {
      const postgresSource = createPostgresSchemaSource(toConnectionDetails(database))
      source = postgresSource
      close = () => postgresSource.close()
    }
  }

  const refresher = source
    ? new CatalogRefresher(completer, source, {
        keywords: config.keywords,
        specialCommands: config.special_commands,
      })
    : null

  return {
    completer,
    refresh: async () => (refresher ? refresher.refresh() : false),
    close,
  }
}
