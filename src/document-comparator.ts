import { compareNodes } from './comparator.js'
import { hasKubernetesDocuments, matchKubernetesDocuments } from './kubernetes.js'
import { isAbsent } from './node.js'
import { documentPrefix } from './path.js'
import { detectRenames } from './rename-detector.js'
import type { CompareOptions, Difference, PathDifference, YamlNode } from './types.js'

/**
 * Compares two document streams. Documents pair up by position unless
 * Kubernetes detection is enabled and either stream holds a Kubernetes
 * resource, in which case they pair up by resource identity.
 */
export function compareDocuments(
  from: readonly YamlNode[],
  to: readonly YamlNode[],
  options: CompareOptions
): Difference[] {
  if (options.detectKubernetes && hasKubernetesDocuments(from, to)) {
    return compareKubernetesDocuments(from, to, options)
  }

  const diffs: Difference[] = []
  const count = Math.max(from.length, to.length)

  for (let i = 0; i < count; i++) {
    const prefix = count > 1 ? documentPrefix(i) : ''
    diffs.push(...inDocument(i, compareNodes(prefix, from[i], to[i], options)))
  }

  return diffs
}

/**
 * Compares resources matched by identifier (and, when enabled, by rename
 * similarity) wherever they sit in each stream. Matched pairs and removals
 * are attributed to the `from` document; additions to the `to` document.
 */
export function compareKubernetesDocuments(
  from: readonly YamlNode[],
  to: readonly YamlNode[],
  options: CompareOptions
): Difference[] {
  let { matched, unmatchedFrom, unmatchedTo } = matchKubernetesDocuments(from, to)

  if (options.detectRenames) {
    const renames = detectRenames(from, to, unmatchedFrom, unmatchedTo)
    matched = [...matched, ...renames.renamed]
    unmatchedFrom = renames.remainingFrom
    unmatchedTo = renames.remainingTo
  }

  const diffs: Difference[] = []
  const multiDocument = from.length > 1 || to.length > 1

  for (const [fromIndex, toIndex] of matched) {
    const prefix = multiDocument ? documentPrefix(fromIndex) : ''
    diffs.push(
      ...inDocument(fromIndex, compareNodes(prefix, from[fromIndex], to[toIndex], options))
    )
  }

  for (const fromIndex of unmatchedFrom) {
    const doc = from[fromIndex]
    if (!isAbsent(doc)) {
      diffs.push({
        path: documentPrefix(fromIndex),
        status: 'removed',
        from: doc,
        documentIndex: fromIndex
      })
    }
  }

  for (const toIndex of unmatchedTo) {
    const doc = to[toIndex]
    if (!isAbsent(doc)) {
      diffs.push({
        path: documentPrefix(toIndex),
        status: 'added',
        to: doc,
        documentIndex: toIndex
      })
    }
  }

  return diffs
}

function inDocument(documentIndex: number, diffs: PathDifference[]): Difference[] {
  return diffs.map((diff) => ({ ...diff, documentIndex }))
}
