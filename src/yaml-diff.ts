import { applyChrootOptions } from './chroot.js'
import { extractPathOrder, sortDifferences } from './diff-orderer.js'
import { compareDocuments } from './document-comparator.js'
import { parseDocuments } from './parser.js'
import type { CompareOptions, Difference } from './types.js'

export { ChrootError, FilterError, ParseError } from './errors.js'
export { filterDifferences } from './filter.js'
export { getKubernetesIdentifier, isKubernetesResource } from './kubernetes.js'
export { OrderedMap } from './ordered-map.js'
export { parseDocuments } from './parser.js'
export type {
  CompareOptions,
  Difference,
  DiffStatus,
  FilterOptions,
  YamlNode
} from './types.js'

export const DEFAULT_COMPARE_OPTIONS: CompareOptions = Object.freeze({
  ignoreOrderChanges: false,
  ignoreWhitespaceChanges: false,
  ignoreValueChanges: false,
  detectKubernetes: false,
  detectRenames: false,
  additionalIdentifiers: [],
  swap: false,
  chroot: '',
  chrootFrom: '',
  chrootTo: '',
  chrootListToDocuments: false
})

/**
 * Fills in defaults and freezes the result so that one comparison sees a
 * single, unchanging set of options.
 */
export function resolveOptions(options: Partial<CompareOptions> = {}): CompareOptions {
  return Object.freeze({
    ...DEFAULT_COMPARE_OPTIONS,
    ...options,
    additionalIdentifiers: Object.freeze([
      ...(options.additionalIdentifiers ?? DEFAULT_COMPARE_OPTIONS.additionalIdentifiers)
    ])
  })
}

/**
 * Compares two YAML streams and returns their semantic differences in
 * reading order.
 *
 * @param from - The original content
 * @param to - The changed content
 * @param options - Comparison options; omitted fields take their defaults
 * @throws ParseError when either stream is not valid YAML
 * @throws ChrootError when a chroot path does not resolve
 */
export function compare(
  from: string | Uint8Array,
  to: string | Uint8Array,
  options: Partial<CompareOptions> = {}
): Difference[] {
  const resolved = resolveOptions(options)

  const parsedFrom = parseDocuments(from)
  const parsedTo = parseDocuments(to)
  const { fromDocs, toDocs } = applyChrootOptions(
    resolved.swap ? parsedTo : parsedFrom,
    resolved.swap ? parsedFrom : parsedTo,
    resolved
  )

  const order = extractPathOrder(fromDocs, toDocs, resolved)
  return sortDifferences(compareDocuments(fromDocs, toDocs, resolved), order)
}
