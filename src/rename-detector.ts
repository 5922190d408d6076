import { stringify } from 'yaml'
import { KUBERNETES } from './constants.js'
import { isKubernetesResource } from './kubernetes.js'
import { toOrderedValue } from './node.js'
import type { YamlNode } from './types.js'

/**
 * Documents paired as renames, and the ones left over on each side
 */
export interface RenameMatches {
  renamed: Array<[number, number]>
  remainingFrom: number[]
  remainingTo: number[]
}

interface Candidate {
  index: number
  lines: Map<string, number>
  length: number
}

interface ScoredPair {
  fromIndex: number
  toIndex: number
  score: number
}

/**
 * Counts the non-blank lines of a document's YAML rendering.
 */
export function lineProfile(text: string): Map<string, number> {
  const lines = new Map<string, number>()
  for (const line of text.split('\n')) {
    if (line.trim() === '') {
      continue
    }
    lines.set(line, (lines.get(line) ?? 0) + 1)
  }
  return lines
}

/**
 * Share of lines two documents have in common, from 0 to 100, relative to
 * the longer of the two.
 */
export function similarityScore(
  a: Map<string, number>,
  b: Map<string, number>
): number {
  const maxLines = Math.max(countLines(a), countLines(b))
  if (maxLines === 0) {
    return 0
  }
  let shared = 0
  for (const [line, count] of b) {
    shared += Math.min(count, a.get(line) ?? 0)
  }
  return Math.floor((shared * 100) / maxLines)
}

/**
 * Pairs Kubernetes documents that did not match by identifier but whose
 * content is similar enough to be the same resource under a new name.
 * Pairs are assigned greedily, best score first. Documents that are not
 * Kubernetes resources are never paired. Remaining indexes keep their
 * original order.
 */
export function detectRenames(
  from: readonly YamlNode[],
  to: readonly YamlNode[],
  unmatchedFrom: readonly number[],
  unmatchedTo: readonly number[]
): RenameMatches {
  const fromCandidates = unmatchedFrom
    .filter((i) => isKubernetesResource(from[i]))
    .map((i) => toCandidate(i, from[i]))
  const toCandidates = unmatchedTo
    .filter((i) => isKubernetesResource(to[i]))
    .map((i) => toCandidate(i, to[i]))

  const tooMany =
    Math.max(fromCandidates.length, toCandidates.length) >
    KUBERNETES.RENAME_CANDIDATE_LIMIT
  if (tooMany || fromCandidates.length === 0 || toCandidates.length === 0) {
    return {
      renamed: [],
      remainingFrom: [...unmatchedFrom],
      remainingTo: [...unmatchedTo]
    }
  }

  const pairs: ScoredPair[] = []
  for (const source of fromCandidates) {
    for (const target of toCandidates) {
      const shorter = Math.min(source.length, target.length)
      const longer = Math.max(source.length, target.length)
      if (
        longer > 0 &&
        (shorter * 100) / longer < KUBERNETES.RENAME_SCORE_THRESHOLD
      ) {
        continue
      }
      const score = similarityScore(source.lines, target.lines)
      if (score >= KUBERNETES.RENAME_SCORE_THRESHOLD) {
        pairs.push({ fromIndex: source.index, toIndex: target.index, score })
      }
    }
  }

  pairs.sort(
    (a, b) => b.score - a.score || a.fromIndex - b.fromIndex || a.toIndex - b.toIndex
  )

  const renamed: Array<[number, number]> = []
  const assignedFrom = new Set<number>()
  const assignedTo = new Set<number>()
  for (const pair of pairs) {
    if (assignedFrom.has(pair.fromIndex) || assignedTo.has(pair.toIndex)) {
      continue
    }
    renamed.push([pair.fromIndex, pair.toIndex])
    assignedFrom.add(pair.fromIndex)
    assignedTo.add(pair.toIndex)
  }

  return {
    renamed,
    remainingFrom: unmatchedFrom.filter((i) => !assignedFrom.has(i)),
    remainingTo: unmatchedTo.filter((i) => !assignedTo.has(i))
  }
}

function toCandidate(index: number, node: YamlNode): Candidate {
  const text = stringify(toOrderedValue(node))
  return { index, lines: lineProfile(text), length: text.length }
}

function countLines(lines: Map<string, number>): number {
  let total = 0
  for (const count of lines.values()) {
    total += count
  }
  return total
}
