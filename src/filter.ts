import { FilterError } from './errors.js'
import type { Difference, FilterOptions } from './types.js'

/**
 * Checks whether `path` is `filterPath` itself or lies below it. A prefix
 * only counts at a segment boundary, so `spec.rep` does not match
 * `spec.replicas`.
 */
export function pathMatches(path: string, filterPath: string): boolean {
  if (path === filterPath) {
    return true
  }
  if (!path.startsWith(filterPath)) {
    return false
  }
  const next = path.charAt(filterPath.length)
  return next === '.' || next === '['
}

/**
 * Keeps the differences selected by the include filters (paths or
 * expressions) and not rejected by the exclude filters. Includes are
 * applied first. Without any filter the input is returned unchanged.
 *
 * @throws FilterError when an expression does not compile
 */
export function filterDifferences(
  diffs: Difference[],
  filters: FilterOptions = {}
): Difference[] {
  const includePaths = filters.includePaths ?? []
  const excludePaths = filters.excludePaths ?? []
  const includeRegexp = compilePatterns(filters.includeRegexp ?? [])
  const excludeRegexp = compilePatterns(filters.excludeRegexp ?? [])

  const hasIncludes = includePaths.length > 0 || includeRegexp.length > 0
  const hasExcludes = excludePaths.length > 0 || excludeRegexp.length > 0
  if (!hasIncludes && !hasExcludes) {
    return diffs
  }

  return diffs.filter((diff) => {
    if (hasIncludes && !selects(diff.path, includePaths, includeRegexp)) {
      return false
    }
    return !selects(diff.path, excludePaths, excludeRegexp)
  })
}

function selects(
  path: string,
  paths: readonly string[],
  patterns: readonly RegExp[]
): boolean {
  return (
    paths.some((filterPath) => pathMatches(path, filterPath)) ||
    patterns.some((pattern) => pattern.test(path))
  )
}

function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern)
    } catch (error) {
      throw new FilterError(
        pattern,
        error instanceof Error ? error.message : String(error)
      )
    }
  })
}
