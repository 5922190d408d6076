import { ChrootError } from './errors.js'
import type { CompareOptions, YamlNode } from './types.js'

/**
 * One step of a chroot path: a map key or a list index
 */
export type PathSegment =
  | { readonly type: 'key'; readonly key: string }
  | { readonly type: 'index'; readonly index: number }

const INDEXED_PART = /^([^[\]]*)\[([^[\]]*)\]$/

/**
 * Parses a dotted path with optional list indexes, such as
 * `spec.containers[0].image` or `items[2]`.
 *
 * @throws ChrootError for malformed brackets or indexes
 */
export function parsePath(path: string): PathSegment[] {
  const segments: PathSegment[] = []
  for (const part of splitPath(path)) {
    if (!part.includes('[') && !part.includes(']')) {
      segments.push({ type: 'key', key: part })
      continue
    }
    const match = INDEXED_PART.exec(part)
    if (match === null) {
      throw new ChrootError(path, `invalid list index syntax "${part}"`)
    }
    const [, key, indexText] = match
    if (indexText === '') {
      throw new ChrootError(path, `empty list index in "${part}"`)
    }
    if (!/^-?[0-9]+$/.test(indexText)) {
      throw new ChrootError(path, `invalid list index "${indexText}"`)
    }
    if (key !== '') {
      segments.push({ type: 'key', key })
    }
    segments.push({ type: 'index', index: Number(indexText) })
  }
  return segments
}

/**
 * Splits on dots outside brackets, dropping empty parts.
 */
function splitPath(path: string): string[] {
  const parts: string[] = []
  let current = ''
  let inBracket = false

  for (const char of path) {
    if (char === '.' && !inBracket) {
      if (current !== '') {
        parts.push(current)
      }
      current = ''
      continue
    }
    if (char === '[') {
      if (inBracket) {
        throw new ChrootError(path, `invalid path syntax "${path}"`)
      }
      inBracket = true
    } else if (char === ']') {
      if (!inBracket) {
        throw new ChrootError(path, `invalid path syntax "${path}"`)
      }
      inBracket = false
    }
    current += char
  }

  if (inBracket) {
    throw new ChrootError(path, `invalid path syntax "${path}"`)
  }
  if (current !== '') {
    parts.push(current)
  }
  return parts
}

/**
 * Returns the value found at `path` inside a document.
 *
 * @throws ChrootError when any step of the path does not exist
 */
export function navigateToPath(doc: YamlNode, path: string): YamlNode {
  let current = doc
  for (const segment of parsePath(path)) {
    if (segment.type === 'index') {
      if (current.kind !== 'list') {
        throw new ChrootError(path, `expected list at index ${segment.index}, got ${current.kind}`)
      }
      const item = current.items[segment.index]
      if (segment.index < 0 || item === undefined) {
        throw new ChrootError(
          path,
          `index ${segment.index} out of bounds (list has ${current.items.length} items)`
        )
      }
      current = item
      continue
    }
    if (current.kind !== 'map') {
      throw new ChrootError(path, `expected map at "${segment.key}", got ${current.kind}`)
    }
    const value = current.entries.get(segment.key)
    if (value === undefined) {
      throw new ChrootError(path, `key "${segment.key}" not found`)
    }
    current = value
  }
  return current
}

/**
 * Re-roots every document of a stream at `path`. With `listToDocuments`, a
 * list found at the path contributes one document per item.
 */
export function applyChroot(
  docs: readonly YamlNode[],
  path: string,
  listToDocuments: boolean
): YamlNode[] {
  if (path === '') {
    return [...docs]
  }
  return docs.flatMap((doc) => {
    const root = navigateToPath(doc, path)
    return listToDocuments && root.kind === 'list' ? [...root.items] : [root]
  })
}

/**
 * Applies the chroot options to both streams: `chroot` for both sides, or
 * else `chrootFrom` and `chrootTo` independently.
 */
export function applyChrootOptions(
  fromDocs: readonly YamlNode[],
  toDocs: readonly YamlNode[],
  options: CompareOptions
): { fromDocs: YamlNode[]; toDocs: YamlNode[] } {
  const fromPath = options.chroot !== '' ? options.chroot : options.chrootFrom
  const toPath = options.chroot !== '' ? options.chroot : options.chrootTo
  return {
    fromDocs: applyChroot(fromDocs, fromPath, options.chrootListToDocuments),
    toDocs: applyChroot(toDocs, toPath, options.chrootListToDocuments)
  }
}
