import type { NullNode, ScalarNode, YamlNode } from './types.js'

export const NULL_NODE: NullNode = Object.freeze({ kind: 'null' })

export function isScalarNode(node: YamlNode): node is ScalarNode {
  return (
    node.kind === 'bool' ||
    node.kind === 'int' ||
    node.kind === 'float' ||
    node.kind === 'string'
  )
}

/**
 * A missing value and an explicit null are the same thing to the comparator.
 */
export function isAbsent(node: YamlNode | undefined): node is NullNode | undefined {
  return node === undefined || node.kind === 'null'
}

/**
 * Looks up a key when the node is a map.
 */
export function getField(node: YamlNode | undefined, key: string): YamlNode | undefined {
  return node?.kind === 'map' ? node.entries.get(key) : undefined
}

/**
 * Inline, single-line rendering of a value, used for identifiers and log output.
 */
export function formatNode(node: YamlNode): string {
  switch (node.kind) {
    case 'null':
      return 'null'
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return String(node.value)
    case 'map':
      return `{${node.entries
        .entries()
        .map(([key, value]) => `${key}: ${formatNode(value)}`)
        .join(', ')}}`
    case 'list':
      return `[${node.items.map(formatNode).join(', ')}]`
  }
}

/**
 * Converts a node to plain JavaScript values (objects, arrays, primitives)
 * for serializers that do not understand the node model.
 */
export function toPlainValue(node: YamlNode): unknown {
  switch (node.kind) {
    case 'null':
      return null
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return node.value
    case 'map':
      return Object.fromEntries(
        node.entries.entries().map(([key, value]) => [key, toPlainValue(value)])
      )
    case 'list':
      return node.items.map(toPlainValue)
  }
}

/**
 * Like {@link toPlainValue} but keeps mappings as `Map` instances so that
 * integer-like keys keep their source position.
 */
export function toOrderedValue(node: YamlNode): unknown {
  switch (node.kind) {
    case 'map':
      return new Map(
        node.entries.entries().map(([key, value]) => [key, toOrderedValue(value)])
      )
    case 'list':
      return node.items.map(toOrderedValue)
    default:
      return toPlainValue(node)
  }
}
