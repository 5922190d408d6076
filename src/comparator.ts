import { valuesEqual } from './equality.js'
import { compareLists } from './list-comparator.js'
import { NULL_NODE, isAbsent } from './node.js'
import type { OrderedMap } from './ordered-map.js'
import { joinPath } from './path.js'
import type { CompareOptions, PathDifference, YamlNode } from './types.js'

/**
 * Recursively compares two values found at `path`.
 *
 * Absence and explicit null are treated alike: the caller only invokes this
 * for keys and positions that exist, so an absent side is a null value.
 * Removing a key altogether is reported by the map and list comparisons.
 */
export function compareNodes(
  path: string,
  from: YamlNode | undefined,
  to: YamlNode | undefined,
  options: CompareOptions
): PathDifference[] {
  if (isAbsent(from) && isAbsent(to)) {
    return []
  }

  if (isAbsent(from)) {
    return [{ path, status: 'added', to }]
  }

  if (isAbsent(to)) {
    if (options.ignoreValueChanges) {
      return []
    }
    return [{ path, status: 'modified', from, to: NULL_NODE }]
  }

  if (from.kind !== to.kind) {
    if (options.ignoreValueChanges) {
      return []
    }
    return [{ path, status: 'modified', from, to }]
  }

  if (from.kind === 'map' && to.kind === 'map') {
    return compareMaps(path, from.entries, to.entries, options)
  }

  if (from.kind === 'list' && to.kind === 'list') {
    return compareLists(path, from.items, to.items, options)
  }

  if (valuesEqual(from, to, options) || options.ignoreValueChanges) {
    return []
  }
  return [{ path, status: 'modified', from, to }]
}

/**
 * Walks `from` keys in source order, then reports keys only present in `to`
 * in their source order, so output follows the documents rather than an
 * alphabetical key order.
 */
export function compareMaps(
  path: string,
  from: OrderedMap,
  to: OrderedMap,
  options: CompareOptions
): PathDifference[] {
  const diffs: PathDifference[] = []

  for (const [key, fromValue] of from.entries()) {
    const childPath = joinPath(path, key)
    const toValue = to.get(key)
    if (toValue === undefined) {
      diffs.push({ path: childPath, status: 'removed', from: fromValue })
      continue
    }
    diffs.push(...compareNodes(childPath, fromValue, toValue, options))
  }

  for (const [key, toValue] of to.entries()) {
    if (!from.has(key)) {
      diffs.push({ path: joinPath(path, key), status: 'added', to: toValue })
    }
  }

  return diffs
}
