import { jest } from '@jest/globals'
import {
  ENVIRONMENT_NAME,
  FakeClusterClient,
  manifest
} from '../__fixtures__/cluster.js'
import { DEFAULT_CATEGORIES } from '../src/constants.js'
import { CategoryQueryError } from '../src/errors.js'
import { identify } from '../src/manifest.js'
import { OrphanDetector } from '../src/orphans.js'
import { ManifestList, ResourceIdentity } from '../src/types.js'

jest.mock('@actions/core')

function detector(client: FakeClusterClient): OrphanDetector {
  return new OrphanDetector(client, {
    namespace: 'prod',
    environment: ENVIRONMENT_NAME
  })
}

function sorted(list: ManifestList): ResourceIdentity[] {
  return list
    .map(identify)
    .sort((a, b) =>
      `${a.kind}/${a.name}`.localeCompare(`${b.kind}/${b.name}`)
    )
}

describe('orphans.ts', () => {
  const api = manifest('Deployment', 'api', { namespace: 'prod', member: true })
  const worker = manifest('Deployment', 'worker', {
    namespace: 'prod',
    member: true
  })
  const config = manifest('ConfigMap', 'config', {
    namespace: 'prod',
    member: true
  })
  const reader = manifest('ClusterRole', 'reader', { member: true })

  it('should list live objects missing from the desired state', async () => {
    const client = new FakeClusterClient([api, worker])

    const orphaned = await detector(client).list([
      manifest('Deployment', 'api', { namespace: 'prod' })
    ])

    expect(orphaned.map(identify)).toEqual([
      { kind: 'Deployment', name: 'worker', namespace: 'prod' }
    ])
  })

  it('should return nothing when desired and live state match', async () => {
    const client = new FakeClusterClient([api, worker, config, reader])

    await expect(
      detector(client).list([api, worker, config, reader])
    ).resolves.toEqual([])
  })

  it('should return every live object when nothing is desired', async () => {
    const client = new FakeClusterClient([api, worker, config, reader])

    const orphaned = await detector(client).list([])

    expect(sorted(orphaned)).toEqual([
      { kind: 'ClusterRole', name: 'reader', namespace: '' },
      { kind: 'ConfigMap', name: 'config', namespace: 'prod' },
      { kind: 'Deployment', name: 'api', namespace: 'prod' },
      { kind: 'Deployment', name: 'worker', namespace: 'prod' }
    ])
  })

  it('should return nothing for an empty cluster', async () => {
    await expect(
      detector(new FakeClusterClient()).list([api])
    ).resolves.toEqual([])
  })

  it('should only consider members of the environment', async () => {
    const client = new FakeClusterClient([
      manifest('Deployment', 'foreign', { namespace: 'prod' }),
      manifest('Deployment', 'elsewhere', { namespace: 'dev', member: true }),
      worker
    ])

    const orphaned = await detector(client).list([])

    expect(orphaned.map(identify)).toEqual([identify(worker)])
  })

  it('should match identities regardless of content', async () => {
    const client = new FakeClusterClient([
      manifest('Deployment', 'api', {
        namespace: 'prod',
        member: true,
        body: { spec: { replicas: 5 }, status: { ready: true } }
      })
    ])

    await expect(
      detector(client).list([
        manifest('Deployment', 'api', {
          namespace: 'prod',
          body: { spec: { replicas: 1 } }
        })
      ])
    ).resolves.toEqual([])
  })

  it('should tolerate duplicates in the desired state', async () => {
    const client = new FakeClusterClient([api, worker])

    const orphaned = await detector(client).list([api, api])

    expect(orphaned.map(identify)).toEqual([identify(worker)])
  })

  it('should query every category exactly once', async () => {
    const client = new FakeClusterClient()

    await detector(client).list([])

    expect([...client.queried].sort()).toEqual(
      DEFAULT_CATEGORIES.map((c) => c.kind).sort()
    )
  })

  it('should query every category even when one fails', async () => {
    const client = new FakeClusterClient([worker])
    client.failures.set('ConfigMap', new Error('forbidden'))

    await expect(detector(client).list([])).rejects.toThrow(
      "getting orphans of kind 'ConfigMap': forbidden"
    )
    expect(client.queried).toHaveLength(DEFAULT_CATEGORIES.length)
  })

  it('should discard the partial result when a category fails', async () => {
    const client = new FakeClusterClient([api, worker, config])
    client.failures.set('Secret', new Error('connection reset'))

    const result = detector(client).list([])

    await expect(result).rejects.toBeInstanceOf(CategoryQueryError)
    await expect(result).rejects.toMatchObject({
      category: 'Secret',
      code: 'CATEGORY_QUERY_FAILED'
    })
  })

  it('should surface the failure that arrived last', async () => {
    const client = new FakeClusterClient()
    client.failures.set('Pod', new Error('first'))
    client.failures.set('Secret', new Error('second'))
    client.delays.set('Secret', 20)

    await expect(detector(client).list([])).rejects.toThrow(
      "getting orphans of kind 'Secret': second"
    )
  })

  it('should only scan the configured categories', async () => {
    const client = new FakeClusterClient([api, config])

    const orphaned = await new OrphanDetector(client, {
      namespace: 'prod',
      environment: ENVIRONMENT_NAME,
      categories: [{ kind: 'ConfigMap', apiVersion: 'v1', namespaced: true }]
    }).list([])

    expect(client.queried).toEqual(['ConfigMap'])
    expect(orphaned.map(identify)).toEqual([identify(config)])
  })

  it('should give up on queries once the signal aborts', async () => {
    const client = new FakeClusterClient([worker])
    client.hanging.add('Pod')

    const result = detector(client).list([], {
      signal: AbortSignal.timeout(20)
    })

    await expect(result).rejects.toMatchObject({ category: 'Pod' })
    expect(client.queried).toHaveLength(DEFAULT_CATEGORIES.length)
  })

  it('should hand the signal to the client so it can drop its requests', async () => {
    const client = new FakeClusterClient()
    client.hanging.add('Secret')
    const signal = AbortSignal.timeout(20)

    await expect(detector(client).list([], { signal })).rejects.toMatchObject({
      category: 'Secret'
    })

    expect(client.signals.size).toBe(DEFAULT_CATEGORIES.length)
    expect([...client.signals.values()].every((s) => s === signal)).toBe(true)
    expect(client.signals.get('Secret')?.aborted).toBe(true)
  })

  it('should fail fast when the signal already aborted', async () => {
    const controller = new AbortController()
    controller.abort(new Error('cancelled'))

    await expect(
      detector(new FakeClusterClient()).list([], { signal: controller.signal })
    ).rejects.toThrow('cancelled')
  })
})
