import { DEFAULT_IDENTIFIER_FIELDS } from './constants.js'
import { getUsableIdentifier, identifierLabel } from './identifiers.js'
import { joinPath, parentPath, pathDepth, rootSegment } from './path.js'
import type { CompareOptions, Difference, YamlNode } from './types.js'

/**
 * Position of each path in the order it first appears in the source
 * documents
 */
export type PathOrder = ReadonlyMap<string, number>

const LIST_INDEX_SUFFIX = /\.[0-9]+$/

/**
 * Walks the `from` documents and then the `to` documents depth-first,
 * recording the position at which each path is first seen. List entries
 * are keyed by their identifier when they have a usable one, as the
 * comparator does.
 */
export function extractPathOrder(
  fromDocs: readonly YamlNode[],
  toDocs: readonly YamlNode[],
  options: Pick<CompareOptions, 'additionalIdentifiers'>
): PathOrder {
  const order = new Map<string, number>()

  const visit = (path: string, node: YamlNode): void => {
    if (path !== '' && !order.has(path)) {
      order.set(path, order.size)
    }
    if (node.kind === 'map') {
      for (const [key, value] of node.entries.entries()) {
        visit(joinPath(path, key), value)
      }
    } else if (node.kind === 'list') {
      node.items.forEach((item, index) => {
        const identifier = getUsableIdentifier(item, options.additionalIdentifiers)
        const segment =
          identifier === undefined ? String(index) : identifierLabel(identifier)
        visit(joinPath(path, segment), item)
      })
    }
  }

  for (const doc of [...fromDocs, ...toDocs]) {
    visit('', doc)
  }

  return order
}

/**
 * Whether a difference describes a whole list entry rather than a value
 * inside one.
 */
export function isListEntryDifference(diff: Difference): boolean {
  const { path } = diff
  if (path.endsWith(']') || LIST_INDEX_SUFFIX.test(path)) {
    return true
  }
  const value = diff.to !== undefined && diff.to.kind !== 'null' ? diff.to : diff.from
  return (
    value?.kind === 'map' &&
    DEFAULT_IDENTIFIER_FIELDS.some((field) => value.entries.has(field))
  )
}

/**
 * Orders differences so that they read like the documents they came from.
 *
 * Root-level additions come first. The rest are grouped by their first path
 * segment in source order, then placed by their own source position, by
 * the position of their nearest known ancestor, by depth and finally
 * alphabetically. The sort is stable and returns a new array.
 */
export function sortDifferences(
  diffs: readonly Difference[],
  order: PathOrder
): Difference[] {
  return [...diffs].sort((a, b) => {
    if (precedes(a, b, order)) {
      return -1
    }
    if (precedes(b, a, order)) {
      return 1
    }
    return 0
  })
}

function precedes(a: Difference, b: Difference, order: PathOrder): boolean {
  const rootAddA = isRootAddition(a)
  const rootAddB = isRootAddition(b)
  if (rootAddA !== rootAddB) {
    return rootAddA
  }

  const rootA = rootSegment(a.path)
  const rootB = rootSegment(b.path)
  if (rootA !== rootB) {
    const orderA = order.get(rootA)
    const orderB = order.get(rootB)
    if (orderA !== undefined && orderB !== undefined) {
      return orderA < orderB
    }
    return rootA < rootB
  }

  const orderA = order.get(a.path)
  const orderB = order.get(b.path)
  if (orderA !== undefined && orderB !== undefined) {
    return orderA < orderB
  }
  if (orderA !== undefined || orderB !== undefined) {
    return orderA !== undefined
  }

  const ancestorA = nearestKnownPosition(a.path, order)
  const ancestorB = nearestKnownPosition(b.path, order)
  if (ancestorA !== undefined && ancestorB !== undefined && ancestorA !== ancestorB) {
    return ancestorA < ancestorB
  }

  const depthA = pathDepth(a.path)
  const depthB = pathDepth(b.path)
  if (depthA !== depthB) {
    return depthA < depthB
  }

  return a.path < b.path
}

function isRootAddition(diff: Difference): boolean {
  return (
    diff.status === 'added' && !diff.path.includes('.') && !isListEntryDifference(diff)
  )
}

function nearestKnownPosition(path: string, order: PathOrder): number | undefined {
  let current: string | undefined = path
  while (current !== undefined) {
    const position = order.get(current)
    if (position !== undefined) {
      return position
    }
    current = parentPath(current)
  }
  return undefined
}
