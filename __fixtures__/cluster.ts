import { SemVer } from 'semver'
import { ClusterClient, QueryOptions } from '../src/cluster-client.js'
import { DEFAULT_CATEGORIES, KUBERNETES } from '../src/constants.js'
import { EnvironmentConfig } from '../src/environment.js'
import { identify, sameIdentity } from '../src/manifest.js'
import {
  ApplyOptions,
  ClusterInfo,
  Manifest,
  ManifestList,
  ResourceCategory
} from '../src/types.js'

export const ENVIRONMENT_NAME = 'prod-env'

export const environment: EnvironmentConfig = {
  apiVersion: 'reconciler.dev/v1alpha1',
  kind: 'Environment',
  metadata: { name: ENVIRONMENT_NAME },
  spec: {
    apiServer: 'https://cluster.test',
    namespace: 'prod',
    injectLabels: false
  }
}

/**
 * Builds a manifest. `member` adds the label of the test environment.
 */
export function manifest(
  kind: string,
  name: string,
  options: {
    namespace?: string
    member?: boolean
    body?: Record<string, unknown>
  } = {}
): Manifest {
  const apiVersion =
    DEFAULT_CATEGORIES.find((c) => c.kind === kind)?.apiVersion ?? 'v1'
  const metadata: Manifest['metadata'] = { name }
  if (options.namespace) {
    metadata.namespace = options.namespace
  }
  if (options.member) {
    metadata.labels = { [KUBERNETES.LABEL_ENVIRONMENT]: ENVIRONMENT_NAME }
  }
  return { ...options.body, apiVersion, kind, metadata }
}

/**
 * In-process stand-in for a cluster.
 */
export class FakeClusterClient implements ClusterClient {
  /** Kinds queried through getByLabels, in call order */
  readonly queried: string[] = []
  readonly applied: { state: ManifestList; options: ApplyOptions }[] = []
  readonly failures = new Map<string, Error>()
  /** Kinds whose queries never answer */
  readonly hanging = new Set<string>()
  /** Signal each kind's query was given */
  readonly signals = new Map<string, AbortSignal | undefined>()
  /** Milliseconds a kind's query takes */
  readonly delays = new Map<string, number>()
  infoCalls = 0
  serverDiff: string | null = null

  constructor(
    public live: ManifestList = [],
    public version = '1.27.3'
  ) {}

  async info(): Promise<ClusterInfo> {
    this.infoCalls++
    return {
      serverVersion: new SemVer(this.version),
      cluster: { name: 'test-cluster', server: 'https://cluster.test' },
      context: { name: 'test-context' }
    }
  }

  async getByLabels(
    namespace: string,
    category: ResourceCategory,
    labels: Record<string, string>,
    options: QueryOptions = {}
  ): Promise<ManifestList> {
    const { signal } = options
    this.queried.push(category.kind)
    this.signals.set(category.kind, signal)
    if (this.hanging.has(category.kind)) {
      // answers only by giving up once the signal aborts
      return new Promise<ManifestList>((_, reject) => {
        if (signal) {
          signal.addEventListener('abort', () => reject(signal.reason), {
            once: true
          })
        }
      })
    }
    const delay = this.delays.get(category.kind)
    if (delay !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, delay))
    }
    const failure = this.failures.get(category.kind)
    if (failure) {
      throw failure
    }
    return this.live.filter(
      (m) =>
        m.kind === category.kind &&
        (!category.namespaced || m.metadata.namespace === namespace) &&
        Object.entries(labels).every(
          ([key, value]) => m.metadata.labels?.[key] === value
        )
    )
  }

  async get(desired: Manifest): Promise<Manifest | null> {
    return (
      this.live.find((m) => sameIdentity(identify(m), identify(desired))) ??
      null
    )
  }

  async diffServerSide(): Promise<string | null> {
    return this.serverDiff
  }

  async applyServerSide(
    state: ManifestList,
    options: ApplyOptions
  ): Promise<void> {
    this.applied.push({ state, options })
  }
}
