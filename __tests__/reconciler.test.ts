import { jest } from '@jest/globals'
import * as core from '@actions/core'
import {
  environment,
  FakeClusterClient,
  manifest
} from '../__fixtures__/cluster.js'
import { renderDiff } from '../src/diff.js'
import { EnvironmentConfig } from '../src/environment.js'
import {
  CategoryQueryError,
  ClientUnavailableError,
  InfoUnavailableError,
  NotConfirmedError,
  UnknownStrategyError
} from '../src/errors.js'
import { Reconciler, ReconcilerOptions } from '../src/reconciler.js'

jest.mock('@actions/core')

function withStrategy(diffStrategy: string): EnvironmentConfig {
  return { ...environment, spec: { ...environment.spec, diffStrategy } }
}

describe('reconciler.ts', () => {
  let client: FakeClusterClient

  const create = (
    options: ReconcilerOptions = {},
    env: EnvironmentConfig = environment
  ): Promise<Reconciler> =>
    Reconciler.create(env, { connect: () => client, ...options })

  beforeEach(() => {
    client = new FakeClusterClient()
  })

  afterEach(() => {
    jest.resetAllMocks()
  })

  describe('create', () => {
    it('should connect to the environment API server', async () => {
      const connect = jest.fn(() => client)

      await Reconciler.create(environment, { connect })

      expect(connect).toHaveBeenCalledWith('https://cluster.test')
    })

    it('should fail when no client can be created', async () => {
      const result = Reconciler.create(environment, {
        connect: () => {
          throw new Error('no kubeconfig')
        }
      })

      await expect(result).rejects.toBeInstanceOf(ClientUnavailableError)
      await expect(result).rejects.toThrow(
        "creating client for 'https://cluster.test': no kubeconfig"
      )
    })

    it('should fail when the cluster does not answer', async () => {
      jest
        .spyOn(client, 'info')
        .mockRejectedValue(new Error('connection refused'))

      const result = create()

      await expect(result).rejects.toBeInstanceOf(InfoUnavailableError)
      await expect(result).rejects.toThrow(
        'obtaining cluster info: connection refused'
      )
    })

    it.each([
      ['1.12.9', 'subset'],
      ['1.13.0', 'native'],
      ['1.13.1', 'native']
    ])(
      'should default to the strategy for server version %s',
      async (version, strategy) => {
        client.version = version
        expect((await create()).diffStrategy).toBe(strategy)
      }
    )

    it('should keep the strategy named by the environment', async () => {
      client.version = '1.27.0'
      expect((await create({}, withStrategy('subset'))).diffStrategy).toBe(
        'subset'
      )
    })
  })

  describe('info', () => {
    it('should return the snapshot taken at creation', async () => {
      const reconciler = await create()

      const first = reconciler.info()
      const second = reconciler.info()

      expect(first.serverVersion.version).toBe('1.27.3')
      expect(first.cluster).toEqual({
        name: 'test-cluster',
        server: 'https://cluster.test'
      })
      expect(second).toBe(first)
      expect(client.infoCalls).toBe(1)
    })
  })

  describe('diff', () => {
    const state = [
      manifest('Deployment', 'api', {
        namespace: 'prod',
        body: { spec: { replicas: 3 } }
      })
    ]

    it('should return the diff of the default strategy', async () => {
      client.serverDiff = '--- live/a\n+++ merged/a\n'
      const reconciler = await create()

      await expect(reconciler.diff(state)).resolves.toBe(
        '--- live/a\n+++ merged/a\n'
      )
    })

    it('should tell no diff apart from an empty diff', async () => {
      const reconciler = await create()

      client.serverDiff = null
      await expect(reconciler.diff(state)).resolves.toBeNull()

      client.serverDiff = ''
      await expect(reconciler.diff(state)).resolves.toBe('')
    })

    it('should use the strategy requested by the call', async () => {
      client.serverDiff = 'native diff'
      client.live = [
        manifest('Deployment', 'api', {
          namespace: 'prod',
          body: { spec: { replicas: 3 }, status: { readyReplicas: 3 } }
        })
      ]
      const reconciler = await create()

      await expect(reconciler.diff(state, { strategy: 'subset' })).resolves.toBeNull()
      await expect(reconciler.diff(state)).resolves.toBe('native diff')
    })

    it('should reject unknown strategies', async () => {
      const reconciler = await create({}, withStrategy('three-way'))

      await expect(reconciler.diff(state)).rejects.toBeInstanceOf(
        UnknownStrategyError
      )
    })

    it('should summarize the diff when asked to', async () => {
      client.serverDiff = renderDiff([
        {
          key: 'apps.v1.Deployment.prod.api',
          live: { replicas: 2 },
          merged: { replicas: 3 }
        }
      ])
      const reconciler = await create()

      await expect(reconciler.diff(state, { summarize: true })).resolves.toBe(
        ' apps.v1.Deployment.prod.api | 2 +-\n' +
          ' 1 file changed, 1 insertion(+), 1 deletion(-)\n'
      )
    })

    it('should pass the diff to a custom summarizer', async () => {
      client.serverDiff = 'some diff'
      const summarize = jest.fn((diff: string) => `summary of ${diff}`)
      const reconciler = await create({ summarize })

      await expect(reconciler.diff(state, { summarize: true })).resolves.toBe(
        'summary of some diff'
      )
    })

    it('should not summarize when there is no diff', async () => {
      const summarize = jest.fn((diff: string) => diff)
      const reconciler = await create({ summarize })

      await expect(
        reconciler.diff(state, { summarize: true })
      ).resolves.toBeNull()
      expect(summarize).not.toHaveBeenCalled()
    })

    it('should return the same diff for the same state', async () => {
      client.live = [
        manifest('Deployment', 'api', {
          namespace: 'prod',
          body: { spec: { replicas: 1 } }
        })
      ]
      const reconciler = await create({}, withStrategy('subset'))

      const first = await reconciler.diff(state)
      const second = await reconciler.diff(state)

      expect(first).toContain('-  replicas: 1\n+  replicas: 3\n')
      expect(second).toBe(first)
    })
  })

  describe('apply', () => {
    const state = [manifest('Deployment', 'api', { namespace: 'prod' })]

    it('should ask for confirmation before applying', async () => {
      const confirm = jest.fn(async () => {})
      const reconciler = await create({ confirm })

      await reconciler.apply(state)

      expect(confirm).toHaveBeenCalledWith(
        "Applying to namespace 'prod' of cluster 'test-cluster' at 'https://cluster.test' using context 'test-context'.",
        'yes'
      )
      expect(client.applied).toEqual([
        { state, options: { force: undefined } }
      ])
    })

    it('should not touch the cluster when confirmation is declined', async () => {
      const confirm = jest.fn(async () => {
        throw new NotConfirmedError('yes')
      })
      const reconciler = await create({ confirm })

      await expect(reconciler.apply(state)).rejects.toBeInstanceOf(
        NotConfirmedError
      )
      expect(client.applied).toEqual([])
    })

    it('should skip confirmation when auto-approved', async () => {
      const confirm = jest.fn(async () => {})
      const reconciler = await create({ confirm })

      await reconciler.apply(state, { autoApprove: true, force: true })

      expect(confirm).not.toHaveBeenCalled()
      expect(client.applied).toEqual([{ state, options: { force: true } }])
    })

    it('should report orphaned objects without deleting them', async () => {
      client.live = [
        manifest('Deployment', 'worker', { namespace: 'prod', member: true })
      ]
      const reconciler = await create()

      await reconciler.apply(state, { autoApprove: true })

      expect(core.warning).toHaveBeenCalledWith(
        '1 objects of this environment are not part of the desired state and will be left in place:\n' +
          '  Deployment/prod/worker'
      )
      expect(client.applied).toHaveLength(1)
    })

    it('should abort when the orphan check fails', async () => {
      client.failures.set('Service', new Error('forbidden'))
      const reconciler = await create()

      await expect(
        reconciler.apply(state, { autoApprove: true })
      ).rejects.toBeInstanceOf(CategoryQueryError)
      expect(client.applied).toEqual([])
    })
  })

  describe('orphaned', () => {
    it('should abandon queries after the timeout', async () => {
      client.hanging.add('Ingress')
      const reconciler = await create({ timeout: 20 })

      await expect(
        reconciler.orphaned([])
      ).rejects.toMatchObject({ category: 'Ingress' })
    })
  })
})
