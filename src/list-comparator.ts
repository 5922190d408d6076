import { compareNodes } from './comparator.js'
import { deepEqual } from './equality.js'
import {
  areListItemsHeterogeneous,
  canMatchByIdentifier,
  getUsableIdentifier,
  identifierKey,
  identifierLabel
} from './identifiers.js'
import { joinPath } from './path.js'
import type {
  CompareOptions,
  PathDifference,
  ScalarNode,
  YamlNode
} from './types.js'

/**
 * How a pair of lists is compared
 */
export type ListStrategy = 'identifier' | 'unordered' | 'heterogeneous' | 'positional'

/**
 * An entry together with its position in the original list
 */
export interface IndexedItem {
  index: number
  node: YamlNode
}

export interface IdentifiedItem extends IndexedItem {
  identifier: ScalarNode
}

/**
 * Picks the comparison strategy for a list pair, in priority order.
 */
export function selectListStrategy(
  from: readonly YamlNode[],
  to: readonly YamlNode[],
  options: CompareOptions
): ListStrategy {
  if (
    canMatchByIdentifier(from, options.additionalIdentifiers) &&
    canMatchByIdentifier(to, options.additionalIdentifiers)
  ) {
    return 'identifier'
  }
  if (options.ignoreOrderChanges) {
    return 'unordered'
  }
  if (areListItemsHeterogeneous(from, to)) {
    return 'heterogeneous'
  }
  return 'positional'
}

export function compareLists(
  path: string,
  from: readonly YamlNode[],
  to: readonly YamlNode[],
  options: CompareOptions
): PathDifference[] {
  switch (selectListStrategy(from, to, options)) {
    case 'identifier':
      return compareListsByIdentifier(path, from, to, options)
    case 'unordered':
    case 'heterogeneous':
      return compareListsUnordered(path, indexed(from), indexed(to), options)
    case 'positional':
      return compareListsPositional(path, from, to, options)
  }
}

/**
 * Compares entries at the same position; surplus entries on either side are
 * additions or removals at their index.
 */
export function compareListsPositional(
  path: string,
  from: readonly YamlNode[],
  to: readonly YamlNode[],
  options: CompareOptions
): PathDifference[] {
  const diffs: PathDifference[] = []
  const length = Math.max(from.length, to.length)

  for (let i = 0; i < length; i++) {
    const childPath = joinPath(path, String(i))
    if (i >= from.length) {
      diffs.push({ path: childPath, status: 'added', to: to[i] })
    } else if (i >= to.length) {
      diffs.push({ path: childPath, status: 'removed', from: from[i] })
    } else {
      diffs.push(...compareNodes(childPath, from[i], to[i], options))
    }
  }

  return diffs
}

/**
 * Set-style comparison: each `from` entry claims the first unclaimed `to`
 * entry that is deep-equal to it. Unclaimed entries are reported at their
 * original index, removals first.
 */
export function compareListsUnordered(
  path: string,
  from: readonly IndexedItem[],
  to: readonly IndexedItem[],
  options: CompareOptions
): PathDifference[] {
  const diffs: PathDifference[] = []
  const claimed = new Array<boolean>(to.length).fill(false)

  for (const fromItem of from) {
    const match = to.findIndex(
      (toItem, j) => !claimed[j] && deepEqual(fromItem.node, toItem.node, options)
    )
    if (match === -1) {
      diffs.push({
        path: joinPath(path, String(fromItem.index)),
        status: 'removed',
        from: fromItem.node
      })
      continue
    }
    claimed[match] = true
  }

  to.forEach((toItem, j) => {
    if (!claimed[j]) {
      diffs.push({
        path: joinPath(path, String(toItem.index)),
        status: 'added',
        to: toItem.node
      })
    }
  })

  return diffs
}

/**
 * Matches entries by their identifier field. Matched entries are compared
 * under a path segment made of the identifier, so a change to one entry does
 * not shift the paths of the others. Unmatched entries are reported whole at
 * the list's own path. Entries without a usable identifier fall back to a
 * set-style comparison among themselves.
 *
 * Repeated identifiers pair up in order of appearance.
 */
export function compareListsByIdentifier(
  path: string,
  from: readonly YamlNode[],
  to: readonly YamlNode[],
  options: CompareOptions
): PathDifference[] {
  const diffs: PathDifference[] = []
  const fromParts = partitionByIdentifier(from, options)
  const toParts = partitionByIdentifier(to, options)

  const toByKey = new Map<string, IdentifiedItem[]>()
  for (const item of toParts.identified) {
    const key = identifierKey(item.identifier)
    const queue = toByKey.get(key) ?? []
    queue.push(item)
    toByKey.set(key, queue)
  }

  const matchedTo = new Set<number>()
  for (const fromItem of fromParts.identified) {
    const toItem = toByKey.get(identifierKey(fromItem.identifier))?.shift()
    if (toItem === undefined) {
      diffs.push({ path, status: 'removed', from: fromItem.node })
      continue
    }
    matchedTo.add(toItem.index)
    diffs.push(
      ...compareNodes(
        joinPath(path, identifierLabel(fromItem.identifier)),
        fromItem.node,
        toItem.node,
        options
      )
    )
  }

  for (const toItem of toParts.identified) {
    if (!matchedTo.has(toItem.index)) {
      diffs.push({ path, status: 'added', to: toItem.node })
    }
  }

  diffs.push(
    ...compareListsUnordered(path, fromParts.anonymous, toParts.anonymous, options)
  )

  return diffs
}

function indexed(items: readonly YamlNode[]): IndexedItem[] {
  return items.map((node, index) => ({ index, node }))
}

function partitionByIdentifier(
  items: readonly YamlNode[],
  options: CompareOptions
): { identified: IdentifiedItem[]; anonymous: IndexedItem[] } {
  const identified: IdentifiedItem[] = []
  const anonymous: IndexedItem[] = []
  items.forEach((node, index) => {
    const identifier = getUsableIdentifier(node, options.additionalIdentifiers)
    if (identifier === undefined) {
      anonymous.push({ index, node })
    } else {
      identified.push({ index, node, identifier })
    }
  })
  return { identified, anonymous }
}
