import * as http from 'http'
import * as https from 'https'
import * as core from '@actions/core'
import * as k8s from '@kubernetes/client-node'
import { coerce, SemVer } from 'semver'
import { KUBERNETES } from './constants.js'
import { DiffEntry, renderDiff } from './diff.js'
import {
  formatIdentity,
  identify,
  isManifest,
  isRecord,
  resourceKey
} from './manifest.js'
import {
  ApplyOptions,
  ClusterInfo,
  Manifest,
  ManifestList,
  ResourceCategory
} from './types.js'

/**
 * Read and write access to a cluster. Implementations must tolerate
 * concurrent calls.
 */
export interface ClusterClient {
  /** Version, cluster and context the client is bound to */
  info(): Promise<ClusterInfo>
  /**
   * Lists the objects of a category carrying all of the given labels. The
   * request is abandoned once `options.signal` aborts.
   */
  getByLabels(
    namespace: string,
    category: ResourceCategory,
    labels: Record<string, string>,
    options?: QueryOptions
  ): Promise<ManifestList>
  /** The live version of an object, or null when it does not exist */
  get(manifest: Manifest): Promise<Manifest | null>
  /** Diffs the state against the result of a server-side dry-run apply */
  diffServerSide(state: ManifestList): Promise<string | null>
  /** Applies the state server-side, object by object */
  applyServerSide(state: ManifestList, options: ApplyOptions): Promise<void>
}

export interface QueryOptions {
  signal?: AbortSignal
}

/**
 * Creates a client bound to the given API server.
 */
export type ClientFactory = (
  apiServer: string
) => ClusterClient | Promise<ClusterClient>

/**
 * Parses the `gitVersion` reported by a cluster, e.g. `v1.27.3-gke.100`.
 */
export function parseServerVersion(gitVersion: string): SemVer {
  const version = coerce(gitVersion)
  if (!version) {
    throw new Error(`unable to parse server version '${gitVersion}'`)
  }
  return version
}

/**
 * Finds the kubeconfig context whose cluster is served at `apiServer`.
 */
export function contextForApiServer(
  kubeConfig: k8s.KubeConfig,
  apiServer: string
): string {
  const normalize = (url: string): string => url.replace(/\/+$/, '')

  const cluster = kubeConfig
    .getClusters()
    .find((c) => normalize(c.server) === normalize(apiServer))
  if (!cluster) {
    throw new Error(`no cluster in kubeconfig is served at '${apiServer}'`)
  }

  const context = kubeConfig
    .getContexts()
    .find((c) => c.cluster === cluster.name)
  if (!context) {
    throw new Error(`no context in kubeconfig uses cluster '${cluster.name}'`)
  }
  return context.name
}

function isNotFound(error: unknown): boolean {
  return error instanceof k8s.HttpError && error.statusCode === 404
}

function withoutManagedFields(object: unknown): unknown {
  if (!isRecord(object) || !isRecord(object.metadata)) {
    return object
  }
  const metadata = { ...object.metadata }
  delete metadata.managedFields
  return { ...object, metadata }
}

/**
 * Cluster client talking to the Kubernetes API through
 * `@kubernetes/client-node`.
 */
export class KubernetesClusterClient implements ClusterClient {
  constructor(
    private readonly kubeConfig: k8s.KubeConfig,
    private readonly objects: k8s.KubernetesObjectApi = k8s.KubernetesObjectApi.makeApiClient(
      kubeConfig
    ),
    private readonly version: k8s.VersionApi = kubeConfig.makeApiClient(
      k8s.VersionApi
    )
  ) {}

  /**
   * Loads the kubeconfig and selects the context of the given API server.
   *
   * @param apiServer - URL of the API server, as listed in the kubeconfig
   * @param options.kubeconfig - Kubeconfig file to use instead of the default locations
   */
  static forApiServer(
    apiServer: string,
    options: { kubeconfig?: string } = {}
  ): KubernetesClusterClient {
    const kubeConfig = new k8s.KubeConfig()
    if (options.kubeconfig) {
      kubeConfig.loadFromFile(options.kubeconfig)
    } else {
      kubeConfig.loadFromDefault()
    }
    kubeConfig.setCurrentContext(contextForApiServer(kubeConfig, apiServer))
    return new KubernetesClusterClient(kubeConfig)
  }

  async info(): Promise<ClusterInfo> {
    const { body } = await this.version.getCode()

    const contextName = this.kubeConfig.getCurrentContext()
    const context = this.kubeConfig.getContextObject(contextName)
    const cluster = this.kubeConfig.getCurrentCluster()
    if (!context || !cluster) {
      throw new Error(`context '${contextName}' does not name a cluster`)
    }

    return {
      serverVersion: parseServerVersion(body.gitVersion),
      cluster: { name: cluster.name, server: cluster.server },
      context: { name: context.name, namespace: context.namespace }
    }
  }

  async getByLabels(
    namespace: string,
    category: ResourceCategory,
    labels: Record<string, string>,
    options: QueryOptions = {}
  ): Promise<ManifestList> {
    const { signal } = options
    signal?.throwIfAborted()

    const labelSelector = Object.entries(labels)
      .map(([key, value]) => `${key}=${value}`)
      .join(',')

    const connection = signal ? this.abortableConnection(signal) : undefined
    try {
      const { body } = await (connection?.objects ?? this.objects).list(
        category.apiVersion,
        category.kind,
        category.namespaced ? namespace : undefined,
        undefined,
        undefined,
        undefined,
        undefined,
        labelSelector
      )

      // list items usually omit apiVersion and kind
      return body.items.flatMap((item) => {
        const manifest = {
          ...item,
          apiVersion: item.apiVersion ?? category.apiVersion,
          kind: item.kind ?? category.kind
        }
        return isManifest(manifest) ? [manifest] : []
      })
    } finally {
      connection?.release()
    }
  }

  async get(manifest: Manifest): Promise<Manifest | null> {
    try {
      const { body } = await this.objects.read({
        apiVersion: manifest.apiVersion,
        kind: manifest.kind,
        metadata: {
          name: manifest.metadata.name,
          namespace: manifest.metadata.namespace ?? ''
        }
      })
      const live = {
        ...body,
        apiVersion: body.apiVersion ?? manifest.apiVersion,
        kind: body.kind ?? manifest.kind
      }
      return isManifest(live) ? live : null
    } catch (error) {
      if (isNotFound(error)) {
        return null
      }
      throw error
    }
  }

  async diffServerSide(state: ManifestList): Promise<string | null> {
    const entries: DiffEntry[] = []

    for (const manifest of state) {
      const live = await this.get(manifest)
      const { body: merged } = await this.serverSideApply(manifest, {
        dryRun: true
      })
      entries.push({
        key: resourceKey(manifest),
        live: withoutManagedFields(live),
        merged: withoutManagedFields(merged)
      })
    }

    return renderDiff(entries)
  }

  async applyServerSide(
    state: ManifestList,
    options: ApplyOptions
  ): Promise<void> {
    for (const manifest of state) {
      core.debug(`Applying ${formatIdentity(identify(manifest))}`)
      await this.serverSideApply(manifest, { force: options.force })
    }
  }

  /**
   * An object API whose requests run on their own agent. The agent, and
   * with it any request in flight, is destroyed when the signal aborts.
   */
  private abortableConnection(signal: AbortSignal): {
    objects: k8s.KubernetesObjectApi
    release: () => void
  } {
    const server = this.kubeConfig.getCurrentCluster()?.server ?? ''
    const agent = server.startsWith('http:')
      ? new http.Agent()
      : new https.Agent()

    const objects = k8s.KubernetesObjectApi.makeApiClient(this.kubeConfig)
    objects.addInterceptor(async (requestOptions) => {
      requestOptions.agent = agent
    })

    const onAbort = (): void => agent.destroy()
    signal.addEventListener('abort', onAbort, { once: true })
    return {
      objects,
      release: () => signal.removeEventListener('abort', onAbort)
    }
  }

  private serverSideApply(
    manifest: Manifest,
    options: { dryRun?: boolean; force?: boolean }
  ): Promise<{ body: Manifest }> {
    return this.objects.patch(
      manifest,
      undefined,
      options.dryRun ? 'All' : undefined,
      KUBERNETES.FIELD_MANAGER,
      options.force || undefined,
      { headers: { 'Content-Type': KUBERNETES.APPLY_PATCH_CONTENT_TYPE } }
    )
  }
}
