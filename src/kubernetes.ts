import { KUBERNETES } from './constants.js'
import { formatNode, getField, isAbsent } from './node.js'
import type { YamlNode } from './types.js'

/**
 * Result of pairing two streams of Kubernetes documents
 */
export interface DocumentMatches {
  /** `[fromIndex, toIndex]` pairs in `from` order */
  matched: Array<[number, number]>
  /** `from` documents without a counterpart, in order */
  unmatchedFrom: number[]
  /** `to` documents without a counterpart, in order */
  unmatchedTo: number[]
}

/**
 * Checks whether a document has the shape of a Kubernetes resource: string
 * `apiVersion` and `kind`, and a `metadata` map with a non-null `name` or
 * `generateName`.
 */
export function isKubernetesResource(node: YamlNode | undefined): boolean {
  if (node?.kind !== 'map') {
    return false
  }
  if (getField(node, 'apiVersion')?.kind !== 'string') {
    return false
  }
  if (getField(node, 'kind')?.kind !== 'string') {
    return false
  }
  const metadata = getField(node, 'metadata')
  if (metadata?.kind !== 'map') {
    return false
  }
  return resourceName(metadata) !== undefined
}

/**
 * Identifier of a Kubernetes resource, stable across documents:
 * `apiVersion:kind:namespace/name`, or `apiVersion:kind:name` without a
 * namespace.
 *
 * @returns The identifier, or undefined when the document is not a resource
 */
export function getKubernetesIdentifier(node: YamlNode | undefined): string | undefined {
  if (!isKubernetesResource(node)) {
    return undefined
  }
  const apiVersion = formatField(node, 'apiVersion')
  const kind = formatField(node, 'kind')
  const metadata = getField(node, 'metadata')
  const name = resourceName(metadata)
  if (name === undefined) {
    return undefined
  }
  const namespace = getField(metadata, 'namespace')
  if (!isAbsent(namespace)) {
    return `${apiVersion}:${kind}:${formatNode(namespace)}/${formatNode(name)}`
  }
  return `${apiVersion}:${kind}:${formatNode(name)}`
}

/**
 * Whether either stream contains at least one Kubernetes resource.
 */
export function hasKubernetesDocuments(
  from: readonly YamlNode[],
  to: readonly YamlNode[]
): boolean {
  return from.some(isKubernetesResource) || to.some(isKubernetesResource)
}

/**
 * Pairs documents by Kubernetes identifier regardless of their position.
 * A repeated identifier pairs with the first `to` document not yet taken.
 */
export function matchKubernetesDocuments(
  from: readonly YamlNode[],
  to: readonly YamlNode[]
): DocumentMatches {
  const toByIdentifier = new Map<string, number[]>()
  to.forEach((doc, index) => {
    const identifier = getKubernetesIdentifier(doc)
    if (identifier !== undefined) {
      const queue = toByIdentifier.get(identifier) ?? []
      queue.push(index)
      toByIdentifier.set(identifier, queue)
    }
  })

  const matched: Array<[number, number]> = []
  const unmatchedFrom: number[] = []
  const matchedTo = new Set<number>()

  from.forEach((doc, fromIndex) => {
    const identifier = getKubernetesIdentifier(doc)
    const toIndex =
      identifier === undefined ? undefined : toByIdentifier.get(identifier)?.shift()
    if (toIndex === undefined) {
      unmatchedFrom.push(fromIndex)
      return
    }
    matched.push([fromIndex, toIndex])
    matchedTo.add(toIndex)
  })

  const unmatchedTo = to.flatMap((_doc, index) => (matchedTo.has(index) ? [] : [index]))

  return { matched, unmatchedFrom, unmatchedTo }
}

function resourceName(metadata: YamlNode | undefined): YamlNode | undefined {
  for (const field of KUBERNETES.NAME_FIELDS) {
    const value = getField(metadata, field)
    if (!isAbsent(value)) {
      return value
    }
  }
  return undefined
}

function formatField(node: YamlNode | undefined, key: string): string {
  const value = getField(node, key)
  return value === undefined ? '' : formatNode(value)
}
