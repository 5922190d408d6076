import { isScalarNode } from './node.js'
import type { CompareOptions, ScalarNode, YamlNode } from './types.js'

type EqualityOptions = Pick<CompareOptions, 'ignoreWhitespaceChanges'>

/**
 * Compares two values the way the comparator reports scalar changes: with
 * `ignoreWhitespaceChanges`, strings are equal when they match after
 * trimming leading and trailing whitespace. Interior whitespace still counts.
 */
export function valuesEqual(
  a: YamlNode,
  b: YamlNode,
  options: EqualityOptions
): boolean {
  if (
    options.ignoreWhitespaceChanges &&
    a.kind === 'string' &&
    b.kind === 'string'
  ) {
    return a.value.trim() === b.value.trim()
  }
  if (isScalarNode(a) && isScalarNode(b)) {
    return scalarsEqual(a, b)
  }
  return deepEqual(a, b, options)
}

/**
 * Structural equality. Maps compare by key set and values regardless of key
 * order; lists compare position by position.
 */
export function deepEqual(
  a: YamlNode,
  b: YamlNode,
  options: EqualityOptions
): boolean {
  if (a.kind !== b.kind) {
    return false
  }

  switch (a.kind) {
    case 'null':
      return true
    case 'map': {
      if (b.kind !== 'map' || a.entries.size !== b.entries.size) {
        return false
      }
      for (const [key, value] of a.entries.entries()) {
        const other = b.entries.get(key)
        if (other === undefined || !deepEqual(value, other, options)) {
          return false
        }
      }
      return true
    }
    case 'list': {
      if (b.kind !== 'list' || a.items.length !== b.items.length) {
        return false
      }
      return a.items.every((item, index) =>
        deepEqual(item, b.items[index], options)
      )
    }
    default:
      return valuesEqual(a, b, options)
  }
}

function scalarsEqual(a: ScalarNode, b: ScalarNode): boolean {
  if (a.kind !== b.kind) {
    return false
  }
  if (a.value === b.value) {
    return true
  }
  // .nan must equal itself for a document to equal itself
  return (
    typeof a.value === 'number' &&
    typeof b.value === 'number' &&
    Number.isNaN(a.value) &&
    Number.isNaN(b.value)
  )
}
