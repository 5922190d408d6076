import {
  areListItemsHeterogeneous,
  canMatchByIdentifier,
  getIdentifier,
  getUsableIdentifier,
  identifierKey,
  identifierLabel
} from '../src/identifiers.js'
import { parseDocuments } from '../src/parser.js'
import type { YamlNode } from '../src/types.js'

function items(source: string): readonly YamlNode[] {
  const [doc] = parseDocuments(source)
  return doc.kind === 'list' ? doc.items : []
}

describe('getIdentifier', () => {
  const [entry] = items('- id: 7\n  name: web\n  key: k1')

  it('prefers name over id', () => {
    expect(getIdentifier(entry, [])).toEqual({ kind: 'string', value: 'web' })
  })

  it('checks additional identifiers first', () => {
    expect(getIdentifier(entry, ['key'])).toEqual({ kind: 'string', value: 'k1' })
  })

  it('does not fall back when the first present field is not a scalar', () => {
    const [nested] = items('- name: {first: a}\n  id: 5')

    expect(getIdentifier(nested, [])?.kind).toBe('map')
    expect(getUsableIdentifier(nested, [])).toBeUndefined()
  })

  it('ignores entries that are not maps', () => {
    expect(getIdentifier({ kind: 'string', value: 'name' }, [])).toBeUndefined()
  })
})

describe('identifierKey', () => {
  it('keeps numbers and strings apart', () => {
    expect(identifierKey({ kind: 'int', value: 1 })).toBe('int:1')
    expect(identifierKey({ kind: 'string', value: '1' })).toBe('string:1')
    expect(identifierLabel({ kind: 'int', value: 1 })).toBe('1')
  })
})

describe('canMatchByIdentifier', () => {
  it('requires at least one usable identifier', () => {
    expect(canMatchByIdentifier(items('- name: a\n- value: 1'), [])).toBe(true)
    expect(canMatchByIdentifier(items('- value: 1\n- value: 2'), [])).toBe(false)
  })

  it('requires every entry to be a map', () => {
    expect(canMatchByIdentifier(items('- name: a\n- plain'), [])).toBe(false)
  })

  it('rejects empty lists', () => {
    expect(canMatchByIdentifier([], [])).toBe(false)
  })

  it('does not count null identifiers', () => {
    expect(canMatchByIdentifier(items('- name: null'), [])).toBe(false)
  })
})

describe('areListItemsHeterogeneous', () => {
  it('detects single-key variants', () => {
    expect(
      areListItemsHeterogeneous(items('- ipBlock: a\n- podSelector: b'), [])
    ).toBe(true)
  })

  it('looks at both sides together', () => {
    expect(areListItemsHeterogeneous(items('- ipBlock: a'), items('- podSelector: b'))).toBe(
      true
    )
  })

  it('needs more than one distinct key', () => {
    expect(areListItemsHeterogeneous(items('- ipBlock: a\n- ipBlock: b'), [])).toBe(false)
  })

  it('rejects entries with several keys', () => {
    expect(areListItemsHeterogeneous(items('- a: 1\n  b: 2\n- c: 3'), [])).toBe(false)
  })
})
