import type { OrderedMap } from './ordered-map.js'

/** An explicit or implicit YAML null */
export interface NullNode {
  readonly kind: 'null'
}

export interface BooleanNode {
  readonly kind: 'bool'
  readonly value: boolean
}

/**
 * A number whose source text is an integer literal. Values outside the safe
 * integer range are kept exact as a `bigint`.
 */
export interface IntegerNode {
  readonly kind: 'int'
  readonly value: number | bigint
}

export interface FloatNode {
  readonly kind: 'float'
  readonly value: number
}

export interface StringNode {
  readonly kind: 'string'
  readonly value: string
}

export interface MapNode {
  readonly kind: 'map'
  /** Entries in source document order */
  readonly entries: OrderedMap
}

export interface ListNode {
  readonly kind: 'list'
  readonly items: readonly YamlNode[]
}

export type ScalarNode = BooleanNode | IntegerNode | FloatNode | StringNode

/**
 * One parsed YAML value. Trees are built once by the parser and never
 * mutated afterwards.
 */
export type YamlNode = NullNode | ScalarNode | MapNode | ListNode

/**
 * The kind of change detected at a path
 */
export type DiffStatus = 'added' | 'removed' | 'modified' | 'order_changed'

/**
 * A difference as produced by the structural comparator, before the
 * document it belongs to is known
 */
export interface PathDifference {
  /** Dotted path to the changed value, e.g. `spec.template.containers.app.image` */
  path: string
  /** The type of change detected */
  status: DiffStatus
  /** The value before the change (absent for additions) */
  from?: YamlNode
  /** The value after the change (absent for removals) */
  to?: YamlNode
}

/**
 * A single change between two YAML streams
 */
export interface Difference extends PathDifference {
  /** Zero-based index of the document in a multi-document stream */
  documentIndex: number
}

/**
 * Options that alter comparison semantics. Built once per comparison and
 * never mutated during it.
 */
export interface CompareOptions {
  /** Compare lists without identifiers as sets */
  readonly ignoreOrderChanges: boolean
  /** Ignore leading and trailing whitespace of string values */
  readonly ignoreWhitespaceChanges: boolean
  /** Drop value modifications, keeping only additions and removals */
  readonly ignoreValueChanges: boolean
  /** Match Kubernetes documents by resource identity instead of position */
  readonly detectKubernetes: boolean
  /** Pair renamed Kubernetes documents by content similarity */
  readonly detectRenames: boolean
  /** Fields checked before `name` and `id` when matching list entries */
  readonly additionalIdentifiers: readonly string[]
  /** Exchange the from and to streams before comparing */
  readonly swap: boolean
  /** Path both streams are re-rooted at before comparing */
  readonly chroot: string
  /** Path only the from stream is re-rooted at (ignored when `chroot` is set) */
  readonly chrootFrom: string
  /** Path only the to stream is re-rooted at (ignored when `chroot` is set) */
  readonly chrootTo: string
  /** Turn a list found at the chroot path into one document per item */
  readonly chrootListToDocuments: boolean
}

/**
 * Path based selection of differences
 */
export interface FilterOptions {
  /** Keep only differences at or below one of these paths */
  includePaths?: readonly string[]
  /** Drop differences at or below one of these paths */
  excludePaths?: readonly string[]
  /** Keep only differences whose path matches one of these expressions */
  includeRegexp?: readonly string[]
  /** Drop differences whose path matches one of these expressions */
  excludeRegexp?: readonly string[]
}
