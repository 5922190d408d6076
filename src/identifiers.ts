import { DEFAULT_IDENTIFIER_FIELDS } from './constants.js'
import { isScalarNode } from './node.js'
import type { ScalarNode, YamlNode } from './types.js'

/**
 * Returns the value of the first identifier field present on a map entry:
 * the additional identifiers in configured order, then `name`, then `id`.
 *
 * The first present field decides even when its value turns out not to be
 * usable; there is no fallback to the next field.
 */
export function getIdentifier(
  item: YamlNode,
  additionalIdentifiers: readonly string[]
): YamlNode | undefined {
  if (item.kind !== 'map') {
    return undefined
  }
  for (const field of [...additionalIdentifiers, ...DEFAULT_IDENTIFIER_FIELDS]) {
    const value = item.entries.get(field)
    if (value !== undefined) {
      return value
    }
  }
  return undefined
}

/**
 * Only non-null scalars can serve as lookup keys.
 */
export function isUsableIdentifier(
  value: YamlNode | undefined
): value is ScalarNode {
  return value !== undefined && isScalarNode(value)
}

/**
 * Returns the usable identifier of an entry, if it has one.
 */
export function getUsableIdentifier(
  item: YamlNode,
  additionalIdentifiers: readonly string[]
): ScalarNode | undefined {
  const identifier = getIdentifier(item, additionalIdentifiers)
  return isUsableIdentifier(identifier) ? identifier : undefined
}

/**
 * Lookup key for an identifier. The scalar type is part of the key so that
 * `id: 1` and `id: "1"` are different entries.
 */
export function identifierKey(identifier: ScalarNode): string {
  return `${identifier.kind}:${String(identifier.value)}`
}

/**
 * Path segment for an identifier-matched entry.
 */
export function identifierLabel(identifier: ScalarNode): string {
  return String(identifier.value)
}

/**
 * A list can be matched by identifier when it is non-empty, every entry is
 * a map and at least one entry has a usable identifier.
 */
export function canMatchByIdentifier(
  items: readonly YamlNode[],
  additionalIdentifiers: readonly string[]
): boolean {
  if (items.length === 0) {
    return false
  }
  let hasIdentifier = false
  for (const item of items) {
    if (item.kind !== 'map') {
      return false
    }
    if (getUsableIdentifier(item, additionalIdentifiers) !== undefined) {
      hasIdentifier = true
    }
  }
  return hasIdentifier
}

/**
 * Detects lists whose entries are mutually exclusive variants, such as
 * `[{namespaceSelector: ...}, {ipBlock: ...}]`: every entry on both sides is
 * a map with exactly one key, and more than one distinct key is used.
 */
export function areListItemsHeterogeneous(
  from: readonly YamlNode[],
  to: readonly YamlNode[]
): boolean {
  const keys = new Set<string>()
  for (const item of [...from, ...to]) {
    if (item.kind !== 'map' || item.entries.size !== 1) {
      return false
    }
    for (const key of item.entries.keys()) {
      keys.add(key)
    }
  }
  return keys.size > 1
}
