import { FilterError } from '../src/errors.js'
import { filterDifferences, pathMatches } from '../src/filter.js'
import type { Difference } from '../src/types.js'

const diffs: Difference[] = [
  'spec.replicas',
  'spec.template.image',
  'metadata.name',
  '[0].spec'
].map((path): Difference => ({ path, status: 'modified', documentIndex: 0 }))

function paths(result: Difference[]): string[] {
  return result.map((diff) => diff.path)
}

describe('pathMatches', () => {
  it('matches the path itself and anything below it', () => {
    expect(pathMatches('spec', 'spec')).toBe(true)
    expect(pathMatches('spec.replicas', 'spec')).toBe(true)
    expect(pathMatches('items[2]', 'items')).toBe(true)
    expect(pathMatches('[0].spec', '[0]')).toBe(true)
  })

  it('only matches at segment boundaries', () => {
    expect(pathMatches('spec.replicas', 'spec.rep')).toBe(false)
    expect(pathMatches('specs', 'spec')).toBe(false)
  })
})

describe('filterDifferences', () => {
  it('returns the input when there are no filters', () => {
    expect(filterDifferences(diffs)).toBe(diffs)
    expect(filterDifferences(diffs, { includePaths: [], excludeRegexp: [] })).toBe(diffs)
  })

  it('keeps included paths', () => {
    expect(paths(filterDifferences(diffs, { includePaths: ['spec'] }))).toEqual([
      'spec.replicas',
      'spec.template.image'
    ])
  })

  it('drops excluded paths', () => {
    expect(paths(filterDifferences(diffs, { excludePaths: ['spec.template'] }))).toEqual([
      'spec.replicas',
      'metadata.name',
      '[0].spec'
    ])
  })

  it('applies excludes after includes', () => {
    expect(
      paths(
        filterDifferences(diffs, { includePaths: ['spec'], excludePaths: ['spec.template'] })
      )
    ).toEqual(['spec.replicas'])
  })

  it('matches expressions anywhere in the path', () => {
    expect(paths(filterDifferences(diffs, { includeRegexp: ['^metadata\\.'] }))).toEqual([
      'metadata.name'
    ])
    expect(paths(filterDifferences(diffs, { excludeRegexp: ['spec'] }))).toEqual([
      'metadata.name'
    ])
  })

  it('rejects invalid expressions', () => {
    expect(() => filterDifferences(diffs, { includeRegexp: ['('] })).toThrow(FilterError)
  })
})
