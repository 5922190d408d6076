import {
  LineCounter,
  isAlias,
  isMap,
  isScalar,
  isSeq,
  parseAllDocuments,
  type Document,
  type Scalar,
  type YAMLError
} from 'yaml'
import { ParseError } from './errors.js'
import { NULL_NODE, formatNode } from './node.js'
import { OrderedMap } from './ordered-map.js'
import type { YamlNode } from './types.js'

const MERGE_KEY = '<<'
const INT_TAG = 'tag:yaml.org,2002:int'
const FLOAT_TAG = 'tag:yaml.org,2002:float'

// Underscores are removed before matching
const INTEGER_LITERAL =
  /^([-+]?)(0[xX][0-9a-fA-F]+|0[oO][0-7]+|0[bB][01]+|0[0-7]+|[1-9][0-9]*|0)$/
const FLOAT_LITERAL = /^[-+]?(?:\.[0-9]+|[0-9]+(?:\.[0-9]*)?)(?:[eE][-+]?[0-9]+)?$/
const INT64_MIN = -(2n ** 63n)
const UINT64_MAX = 2n ** 64n - 1n

/**
 * Alias expansion limits. Decoding stops once more than `MIN_ALIASES`
 * nodes came from aliases, more than `MIN_NODES` nodes were decoded, and
 * the share of aliased nodes exceeds a ratio that shrinks from `0.99` to
 * `0.10` as the document grows.
 */
const ALIAS_LIMITS = {
  MIN_ALIASES: 100,
  MIN_NODES: 1000,
  RATIO_RANGE_LOW: 400_000,
  RATIO_RANGE_HIGH: 4_000_000
} as const

interface DecodeState {
  readonly document: Document
  /** Alias targets on the current path */
  readonly resolving: Set<unknown>
  nodeCount: number
  aliasedCount: number
  aliasDepth: number
}

/**
 * Parses a (possibly multi-document) YAML stream into one node tree per
 * document. A stream without documents yields a single null document.
 *
 * @throws ParseError on the first syntax error in any document
 */
export function parseDocuments(content: string | Uint8Array): YamlNode[] {
  const source =
    typeof content === 'string' ? content : Buffer.from(content).toString('utf8')
  const lineCounter = new LineCounter()
  const documents = parseAllDocuments(source, {
    lineCounter,
    prettyErrors: false,
    merge: false
  })

  if ('empty' in documents) {
    const [error] = documents.errors
    if (error) {
      throw toParseError(error, lineCounter)
    }
    return [NULL_NODE]
  }

  const nodes: YamlNode[] = []
  for (const document of documents) {
    const [error] = document.errors
    if (error) {
      throw toParseError(error, lineCounter)
    }
    nodes.push(
      decodeNode(document.contents, {
        document,
        resolving: new Set(),
        nodeCount: 0,
        aliasedCount: 0,
        aliasDepth: 0
      })
    )
  }

  return nodes.length > 0 ? nodes : [NULL_NODE]
}

function toParseError(error: YAMLError, lineCounter: LineCounter): ParseError {
  const { line, col } = lineCounter.linePos(error.pos[0])
  return new ParseError(error.message, line, col)
}

/**
 * Converts a node of the library's AST into the document model.
 *
 * An alias that points back into one of its own ancestors decodes to null
 * instead of recursing.
 *
 * @throws ParseError when aliases expand out of proportion to the document
 */
function decodeNode(node: unknown, state: DecodeState): YamlNode {
  state.nodeCount++
  if (state.aliasDepth > 0) {
    state.aliasedCount++
  }
  if (hasExcessiveAliasing(state)) {
    throw new ParseError('document contains excessive aliasing')
  }

  if (isMap(node)) {
    const entries = new OrderedMap()
    for (const pair of node.items) {
      const key = keyText(pair.key, state)
      const value = decodeNode(pair.value, state)
      if (key === MERGE_KEY) {
        mergeInto(entries, value)
        continue
      }
      entries.set(key, value)
    }
    return { kind: 'map', entries }
  }

  if (isSeq(node)) {
    return {
      kind: 'list',
      items: node.items.map((item) => decodeNode(item, state))
    }
  }

  if (isScalar(node)) {
    return resolveScalar(node)
  }

  if (isAlias(node)) {
    const target = node.resolve(state.document)
    if (target === undefined || state.resolving.has(target)) {
      return NULL_NODE
    }
    state.resolving.add(target)
    state.aliasDepth++
    try {
      return decodeNode(target, state)
    } finally {
      state.aliasDepth--
      state.resolving.delete(target)
    }
  }

  return NULL_NODE
}

function hasExcessiveAliasing(state: DecodeState): boolean {
  return (
    state.aliasedCount > ALIAS_LIMITS.MIN_ALIASES &&
    state.nodeCount > ALIAS_LIMITS.MIN_NODES &&
    state.aliasedCount / state.nodeCount > allowedAliasRatio(state.nodeCount)
  )
}

function allowedAliasRatio(nodeCount: number): number {
  const { RATIO_RANGE_LOW: low, RATIO_RANGE_HIGH: high } = ALIAS_LIMITS
  if (nodeCount <= low) {
    return 0.99
  }
  if (nodeCount >= high) {
    return 0.1
  }
  return 0.99 - 0.89 * ((nodeCount - low) / (high - low))
}

/**
 * Merge keys accept a single mapping or a sequence of mappings. Earlier
 * sources win over later ones and explicit keys win over all of them.
 */
function mergeInto(entries: OrderedMap, source: YamlNode): void {
  if (source.kind === 'map') {
    for (const [key, value] of source.entries.entries()) {
      entries.setIfAbsent(key, value)
    }
    return
  }
  if (source.kind === 'list') {
    for (const item of source.items) {
      if (item.kind === 'map') {
        mergeInto(entries, item)
      }
    }
  }
}

function keyText(key: unknown, state: DecodeState): string {
  if (isScalar(key)) {
    return key.source ?? String(key.value)
  }
  if (isAlias(key)) {
    return key.source
  }
  return formatNode(decodeNode(key, state))
}

/**
 * Reads an integer literal the way YAML 1.1 tools do: underscores are
 * ignored, `0x`, `0o` and `0b` select the base and a leading `0` means
 * octal. Values beyond the safe integer range stay exact as a `bigint`.
 *
 * @returns The value, or undefined when the text is not an integer within
 *   the 64-bit range
 */
export function parseIntegerLiteral(text: string): number | bigint | undefined {
  const match = INTEGER_LITERAL.exec(text.replace(/_/g, ''))
  if (match === null) {
    return undefined
  }
  const [, sign, digits] = match
  const magnitude = BigInt(
    /^0[0-7]/.test(digits) ? `0o${digits.slice(1)}` : digits.toLowerCase()
  )
  const value = sign === '-' ? -magnitude : magnitude
  if (value < INT64_MIN || value > UINT64_MAX) {
    return undefined
  }
  const approximate = Number(value)
  return Number.isSafeInteger(approximate) ? approximate : value
}

function resolveScalar(scalar: Scalar): YamlNode {
  const { value, tag } = scalar
  const untaggedPlain = tag === undefined && scalar.type === 'PLAIN'
  if (untaggedPlain || tag === INT_TAG || tag === FLOAT_TAG) {
    const number = resolveNumber(scalar.source ?? '', tag === FLOAT_TAG)
    if (number !== undefined) {
      return number
    }
  }

  if (value === null || value === undefined) {
    return NULL_NODE
  }
  switch (typeof value) {
    case 'boolean':
      return { kind: 'bool', value }
    case 'number':
      return { kind: 'float', value }
    case 'string':
      return { kind: 'string', value }
    default:
      // Tags outside the core schema keep their literal text
      return { kind: 'string', value: scalar.source ?? String(value) }
  }
}

function resolveNumber(text: string, asFloat: boolean): YamlNode | undefined {
  const integer = parseIntegerLiteral(text)
  if (integer !== undefined) {
    return asFloat ? { kind: 'float', value: Number(integer) } : { kind: 'int', value: integer }
  }
  const plain = text.replace(/_/g, '')
  if (FLOAT_LITERAL.test(plain)) {
    return { kind: 'float', value: Number(plain) }
  }
  return undefined
}
