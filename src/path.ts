/**
 * Appends a segment to a dotted path.
 */
export function joinPath(base: string, segment: string): string {
  return base === '' ? segment : `${base}.${segment}`
}

/**
 * Prefix used for paths inside one document of a multi-document stream.
 */
export function documentPrefix(index: number): string {
  return `[${index}]`
}

/**
 * First segment of a dotted path.
 */
export function rootSegment(path: string): string {
  const dot = path.indexOf('.')
  return dot === -1 ? path : path.slice(0, dot)
}

/**
 * Path of the enclosing value, or undefined at the top level.
 */
export function parentPath(path: string): string | undefined {
  const dot = path.lastIndexOf('.')
  return dot === -1 ? undefined : path.slice(0, dot)
}

/**
 * Number of separators in a path; `a` is 0, `a.b` is 1.
 */
export function pathDepth(path: string): number {
  let depth = 0
  for (const char of path) {
    if (char === '.') {
      depth++
    }
  }
  return depth
}
