import { compareDocuments } from '../src/document-comparator.js'
import {
  getKubernetesIdentifier,
  hasKubernetesDocuments,
  isKubernetesResource,
  matchKubernetesDocuments
} from '../src/kubernetes.js'
import { parseDocuments } from '../src/parser.js'
import { resolveOptions } from '../src/yaml-diff.js'

function deployment(name: string, replicas: number, namespace?: string): string {
  return [
    'apiVersion: apps/v1',
    'kind: Deployment',
    'metadata:',
    `  name: ${name}`,
    ...(namespace === undefined ? [] : [`  namespace: ${namespace}`]),
    'spec:',
    `  replicas: ${replicas}`
  ].join('\n')
}

function stream(...docs: string[]) {
  return parseDocuments(docs.join('\n---\n'))
}

describe('isKubernetesResource', () => {
  it('accepts a named resource', () => {
    expect(isKubernetesResource(stream(deployment('web', 1))[0])).toBe(true)
  })

  it('accepts generateName in place of name', () => {
    const [pod] = stream('apiVersion: v1\nkind: Pod\nmetadata:\n  generateName: web-')

    expect(isKubernetesResource(pod)).toBe(true)
    expect(getKubernetesIdentifier(pod)).toBe('v1:Pod:web-')
  })

  it('requires string apiVersion and kind', () => {
    const [doc] = stream('apiVersion: 1\nkind: Pod\nmetadata:\n  name: web')

    expect(isKubernetesResource(doc)).toBe(false)
  })

  it('requires a name', () => {
    const [doc] = stream('apiVersion: v1\nkind: Pod\nmetadata:\n  labels: {}')

    expect(isKubernetesResource(doc)).toBe(false)
    expect(getKubernetesIdentifier(doc)).toBeUndefined()
  })

  it('rejects non-map documents', () => {
    expect(isKubernetesResource(stream('- a')[0])).toBe(false)
  })
})

describe('getKubernetesIdentifier', () => {
  it('includes the namespace when there is one', () => {
    expect(getKubernetesIdentifier(stream(deployment('web', 1, 'prod'))[0])).toBe(
      'apps/v1:Deployment:prod/web'
    )
  })

  it('leaves out a missing namespace', () => {
    expect(getKubernetesIdentifier(stream(deployment('web', 1))[0])).toBe(
      'apps/v1:Deployment:web'
    )
  })
})

describe('matchKubernetesDocuments', () => {
  it('pairs documents by identity regardless of position', () => {
    const from = stream(deployment('a', 1), deployment('b', 1), 'plain: true')
    const to = stream(deployment('c', 1), deployment('b', 1), deployment('a', 1))

    expect(matchKubernetesDocuments(from, to)).toEqual({
      matched: [
        [0, 2],
        [1, 1]
      ],
      unmatchedFrom: [2],
      unmatchedTo: [0]
    })
  })

  it('keeps namespaces apart', () => {
    const from = stream(deployment('web', 1, 'dev'))
    const to = stream(deployment('web', 1, 'prod'))

    expect(matchKubernetesDocuments(from, to).matched).toEqual([])
  })

  it('pairs repeated identifiers in order', () => {
    const from = stream(deployment('a', 1), deployment('a', 2))
    const to = stream(deployment('a', 1), deployment('a', 2))

    expect(matchKubernetesDocuments(from, to).matched).toEqual([
      [0, 0],
      [1, 1]
    ])
  })
})

describe('hasKubernetesDocuments', () => {
  it('looks at both streams', () => {
    expect(hasKubernetesDocuments(stream('a: 1'), stream(deployment('a', 1)))).toBe(true)
    expect(hasKubernetesDocuments(stream('a: 1'), stream('b: 2'))).toBe(false)
  })
})

describe('compareDocuments', () => {
  const kubernetes = resolveOptions({ detectKubernetes: true })

  it('compares reordered resources by identity', () => {
    const from = stream(deployment('a', 1), deployment('b', 1))
    const to = stream(deployment('b', 2), deployment('a', 1))

    expect(compareDocuments(from, to, kubernetes)).toEqual([
      {
        path: '[1].spec.replicas',
        status: 'modified',
        from: { kind: 'int', value: 1 },
        to: { kind: 'int', value: 2 },
        documentIndex: 1
      }
    ])
  })

  it('reports a single changed resource without a document prefix', () => {
    expect(
      compareDocuments(stream(deployment('a', 1)), stream(deployment('a', 3)), kubernetes)
    ).toEqual([
      {
        path: 'spec.replicas',
        status: 'modified',
        from: { kind: 'int', value: 1 },
        to: { kind: 'int', value: 3 },
        documentIndex: 0
      }
    ])
  })

  it('reports whole documents that only exist on one side', () => {
    const from = stream(deployment('a', 1), deployment('b', 1))
    const to = stream(deployment('c', 1), deployment('a', 1))

    expect(compareDocuments(from, to, kubernetes)).toEqual([
      { path: '[1]', status: 'removed', from: from[1], documentIndex: 1 },
      { path: '[0]', status: 'added', to: to[0], documentIndex: 0 }
    ])
  })

  it('pairs documents by position without Kubernetes detection', () => {
    const from = stream(deployment('a', 1), deployment('b', 1))
    const to = stream(deployment('b', 1), deployment('a', 1))

    expect(compareDocuments(from, to, resolveOptions()).map((d) => d.path)).toEqual([
      '[0].metadata.name',
      '[1].metadata.name'
    ])
  })

  it('reports a trailing document by position', () => {
    const from = stream('a: 1')
    const to = stream('a: 1', 'b: 2')

    expect(compareDocuments(from, to, resolveOptions())).toEqual([
      { path: '[1]', status: 'added', to: to[1], documentIndex: 1 }
    ])
  })
})
