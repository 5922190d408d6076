import { compareDocuments } from '../src/document-comparator.js'
import { parseDocuments } from '../src/parser.js'
import { detectRenames, lineProfile, similarityScore } from '../src/rename-detector.js'
import { resolveOptions } from '../src/yaml-diff.js'

function configMap(name: string): string {
  return [
    'apiVersion: v1',
    'kind: ConfigMap',
    'metadata:',
    `  name: ${name}`,
    'data:',
    '  a: one',
    '  b: two',
    '  c: three',
    '  d: four',
    '  e: five'
  ].join('\n')
}

const deployment = [
  'apiVersion: apps/v1',
  'kind: Deployment',
  'metadata:',
  '  name: web',
  'spec:',
  '  replicas: 3'
].join('\n')

describe('similarityScore', () => {
  it('scores shared lines against the longer document', () => {
    expect(similarityScore(lineProfile('a\nb\nc\nd'), lineProfile('a\nb\nc\ne'))).toBe(75)
    expect(similarityScore(lineProfile('a\nb'), lineProfile('a\nb\nc\nd'))).toBe(50)
  })

  it('counts repeated lines only as often as both sides have them', () => {
    expect(similarityScore(lineProfile('x\nx\nx'), lineProfile('x\ny\nz'))).toBe(33)
  })

  it('ignores blank lines', () => {
    expect(lineProfile('a\n\n  \na')).toEqual(new Map([['a', 2]]))
    expect(similarityScore(lineProfile(''), lineProfile(''))).toBe(0)
  })
})

describe('detectRenames', () => {
  it('pairs similar resources', () => {
    const [from] = parseDocuments(configMap('settings-old'))
    const [to] = parseDocuments(configMap('settings-new'))

    expect(detectRenames([from], [to], [0], [0])).toEqual({
      renamed: [[0, 0]],
      remainingFrom: [],
      remainingTo: []
    })
  })

  it('leaves dissimilar resources alone', () => {
    const from = parseDocuments(`${configMap('settings')}\n---\n${deployment}`)
    const to = parseDocuments(
      'apiVersion: v1\nkind: Service\nmetadata:\n  name: api\nspec:\n  type: ClusterIP'
    )

    expect(detectRenames(from, to, [0, 1], [0])).toEqual({
      renamed: [],
      remainingFrom: [0, 1],
      remainingTo: [0]
    })
  })

  it('never pairs documents that are not resources', () => {
    const from = parseDocuments('a: 1\nb: 2')
    const to = parseDocuments('a: 1\nb: 3')

    expect(detectRenames(from, to, [0], [0]).renamed).toEqual([])
  })

  it('reports a renamed resource as a change of name', () => {
    const from = parseDocuments(configMap('settings-old'))
    const to = parseDocuments(configMap('settings-new'))

    expect(
      compareDocuments(from, to, resolveOptions({ detectKubernetes: true, detectRenames: true }))
    ).toEqual([
      {
        path: 'metadata.name',
        status: 'modified',
        from: { kind: 'string', value: 'settings-old' },
        to: { kind: 'string', value: 'settings-new' },
        documentIndex: 0
      }
    ])
  })

  it('reports removal and addition without rename detection', () => {
    const from = parseDocuments(configMap('settings-old'))
    const to = parseDocuments(configMap('settings-new'))

    expect(
      compareDocuments(from, to, resolveOptions({ detectKubernetes: true })).map(
        (d) => `${d.status} ${d.path}`
      )
    ).toEqual(['removed [0]', 'added [0]'])
  })
})
