/**
 * Identifier quoting.
 *
 * Names that are not plain lower-case identifiers are wrapped in double
 * quotes. Both functions are total over any string.
 */

const PLAIN_NAME = /^[_a-z][_a-z0-9$]*$/

export function escapeName(name: string): string {
  if (!PLAIN_NAME.test(name)) {
    return `"${name}"`
  }
  return name
}

/**
 * Strip one pair of surrounding double quotes. Embedded `""` is left alone.
 */
export function unescapeName(name: string): string {
  if (name.startsWith('"') && name.endsWith('"')) {
    return name.slice(1, -1)
  }
  return name
}

export function escapeNames(names: readonly string[]): string[] {
  return names.map(escapeName)
}
