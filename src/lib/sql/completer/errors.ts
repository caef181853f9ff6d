import type { RelationKind } from './types'

/**
 * Thrown when columns are added for a relation that was never registered.
 * Usually means a bulk load ran `extendColumns` before `extendRelations`.
 */
export class CatalogLookupError extends Error {
  readonly relation: string
  readonly kind: RelationKind

  constructor(relation: string, kind: RelationKind) {
    super(`Unknown ${kind} ${relation}: register it with extendRelations before adding columns`)
    this.name = 'CatalogLookupError'
    this.relation = relation
    this.kind = kind
  }
}
