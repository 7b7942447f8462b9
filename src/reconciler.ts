import * as core from '@actions/core'
import {
  ClientFactory,
  ClusterClient,
  KubernetesClusterClient
} from './cluster-client.js'
import { confirm, Confirmer } from './confirm.js'
import { diffstat } from './diff.js'
import {
  builtinDiffers,
  defaultDiffStrategy,
  DiffStrategyRegistry,
  selectStrategy
} from './differs.js'
import { EnvironmentConfig, nameLabel } from './environment.js'
import { ClientUnavailableError, InfoUnavailableError } from './errors.js'
import { formatIdentity, identify } from './manifest.js'
import { OrphanDetector } from './orphans.js'
import {
  ApplyOptions,
  ClusterInfo,
  DiffOptions,
  ManifestList,
  ResourceCategory
} from './types.js'

export interface ReconcilerOptions {
  /** Creates the cluster client, defaults to the kubeconfig-backed client */
  connect?: ClientFactory
  /** Asks the operator before apply mutates the cluster */
  confirm?: Confirmer
  /** Reduces a diff to a summary when `summarize` is requested */
  summarize?: (diff: string) => string
  /** Categories scanned for orphans */
  categories?: readonly ResourceCategory[]
  /** Milliseconds after which pending orphan queries are abandoned */
  timeout?: number
}

/**
 * Reconciles the desired state of an environment with its cluster.
 */
export class Reconciler {
  private constructor(
    readonly env: EnvironmentConfig,
    private readonly client: ClusterClient,
    private readonly clusterInfo: ClusterInfo,
    private readonly differs: DiffStrategyRegistry,
    private readonly orphans: OrphanDetector,
    private readonly options: ReconcilerOptions,
    /** Strategy used when a diff does not name one */
    readonly diffStrategy: string
  ) {}

  /**
   * Connects to the environment's API server and captures the cluster info.
   *
   * @throws ClientUnavailableError when no client can be created
   * @throws InfoUnavailableError when the cluster does not answer
   */
  static async create(
    env: EnvironmentConfig,
    options: ReconcilerOptions = {}
  ): Promise<Reconciler> {
    const connect =
      options.connect ??
      ((apiServer: string) => KubernetesClusterClient.forApiServer(apiServer))

    let client: ClusterClient
    try {
      client = await connect(env.spec.apiServer)
    } catch (error) {
      throw new ClientUnavailableError(env.spec.apiServer, error)
    }

    let info: ClusterInfo
    try {
      info = await client.info()
    } catch (error) {
      throw new InfoUnavailableError(error)
    }

    const strategy =
      env.spec.diffStrategy || defaultDiffStrategy(info.serverVersion)
    core.debug(
      `Using diff strategy '${strategy}' for server version ${info.serverVersion.version}`
    )

    const orphans = new OrphanDetector(client, {
      namespace: env.spec.namespace,
      environment: nameLabel(env),
      categories: options.categories
    })

    return new Reconciler(
      env,
      client,
      info,
      new DiffStrategyRegistry(builtinDiffers(client)),
      orphans,
      options,
      strategy
    )
  }

  /**
   * The cluster info captured when the reconciler was created.
   */
  info(): ClusterInfo {
    return this.clusterInfo
  }

  /**
   * Returns the differences between the desired state and the cluster, or
   * null when there are none.
   */
  async diff(
    state: ManifestList,
    options: DiffOptions = {}
  ): Promise<string | null> {
    const differ = this.differs.resolve(
      selectStrategy(options.strategy, this.diffStrategy)
    )

    const diff = await differ(state)
    if (diff === null) {
      return null
    }

    if (options.summarize) {
      return (this.options.summarize ?? diffstat)(diff)
    }
    return diff
  }

  /**
   * Live objects of this environment that the desired state no longer
   * declares.
   */
  orphaned(state: ManifestList): Promise<ManifestList> {
    const signal =
      this.options.timeout !== undefined
        ? AbortSignal.timeout(this.options.timeout)
        : undefined
    return this.orphans.list(state, { signal })
  }

  /**
   * Applies the desired state after the operator confirmed the target.
   * Orphaned objects are reported, not deleted.
   *
   * @throws NotConfirmedError when the operator declines
   */
  async apply(state: ManifestList, options: ApplyOptions = {}): Promise<void> {
    const orphaned = await this.orphaned(state)
    if (orphaned.length > 0) {
      core.warning(
        `${orphaned.length} objects of this environment are not part of the desired state and will be left in place:\n` +
          orphaned.map((m) => `  ${formatIdentity(identify(m))}`).join('\n')
      )
    }

    if (!options.autoApprove) {
      const { cluster, context } = this.clusterInfo
      await (this.options.confirm ?? confirm)(
        `Applying to namespace '${this.env.spec.namespace}' of cluster '${cluster.name}' at '${cluster.server}' using context '${context.name}'.`,
        'yes'
      )
    }

    await this.client.applyServerSide(state, { force: options.force })
    core.info(`Applied ${state.length} objects`)
  }
}
