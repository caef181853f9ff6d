import { Catalog, type SqlCompleter } from '../../src/lib/sql/completer'
import type { SchemaSource } from './introspection'

export interface RefreshOptions {
  /** Session keywords added on top of the built-in list */
  keywords?: string[]
  /** Backslash commands offered at the start of a line */
  specialCommands?: string[]
}

/**
 * Rebuilds the completer's catalog from a schema source.
 *
 * Each refresh fills a fresh Catalog and swaps it in only when complete, so
 * completions never see a half-loaded schema. When refreshes overlap, only
 * the latest one is allowed to swap.
 */
export class CatalogRefresher {
  private generation = 0

  constructor(
    private readonly completer: SqlCompleter,
    private readonly source: SchemaSource,
    private readonly options: RefreshOptions = {}
  ) {}

  /**
   * @returns true if the new catalog was installed, false if a newer
   * refresh started in the meantime
   */
  async refresh(): Promise<boolean> {
    const generation = ++this.generation

    let catalog: Catalog
    try {
      catalog = await this.build()
    } catch (error) {
      console.error('Failed to refresh completions:', error instanceof Error ? error.message : error)
      throw error
    }

    if (generation !== this.generation) {
      return false
    }

    this.completer.setCatalog(catalog)
    console.log(
      `Refreshed completions: ${catalog.tableNames.length} table(s), ${catalog.viewNames.length} view(s), ` +
        `${catalog.functionNames.length} function(s), ${catalog.databases.length} database(s)`
    )
    return true
  }

  private async build(): Promise<Catalog> {
    const catalog = new Catalog()
    catalog.extendSpecialCommands(this.options.specialCommands ?? [])
    catalog.extendKeywords(this.options.keywords ?? [])

    catalog.extendDatabases(await this.source.databases())

    // Relations before their columns
    for (const kind of ['table', 'view'] as const) {
      catalog.extendRelations(await this.source.relations(kind), kind)
      catalog.extendColumns(await this.source.columns(kind), kind)
    }

    catalog.extendFunctions(await this.source.functions())
    return catalog
  }
}
