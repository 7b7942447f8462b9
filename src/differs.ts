import { lt, SemVer } from 'semver'
import { ClusterClient } from './cluster-client.js'
import { DIFF } from './constants.js'
import { renderDiff } from './diff.js'
import { UnknownStrategyError } from './errors.js'
import { isRecord, resourceKey } from './manifest.js'
import { Differ, ManifestList } from './types.js'

export type DiffStrategyName = 'native' | 'subset'

/**
 * Named diff strategies. The set is fixed when the registry is created.
 */
export class DiffStrategyRegistry {
  private readonly differs: ReadonlyMap<string, Differ>

  constructor(differs: Record<string, Differ>) {
    this.differs = new Map(Object.entries(differs))
  }

  /**
   * Names of the registered strategies, in registration order.
   */
  names(): string[] {
    return [...this.differs.keys()]
  }

  /**
   * Looks up a strategy by name.
   *
   * @throws UnknownStrategyError when no strategy of that name is registered
   */
  resolve(name: string): Differ {
    const differ = this.differs.get(name)
    if (!differ) {
      throw new UnknownStrategyError(name, this.names())
    }
    return differ
  }
}

/**
 * The strategy used when the environment names none. Clusters older than
 * 1.13.0 lack a usable server-side dry-run and get the subset strategy.
 */
export function defaultDiffStrategy(
  serverVersion: SemVer | string
): DiffStrategyName {
  return lt(serverVersion, DIFF.NATIVE_MIN_SERVER_VERSION) ? 'subset' : 'native'
}

/**
 * A per-call override wins over the default when it is set.
 */
export function selectStrategy(
  override: string | undefined,
  fallback: string
): string {
  return override ? override : fallback
}

/**
 * Restricts `live` to the fields that are present in `desired`. Arrays are
 * compared element-wise and keep live elements beyond the desired length.
 * Scalars, and values whose shapes disagree, take the live value.
 */
export function subset(desired: unknown, live: unknown): unknown {
  if (isRecord(desired) && isRecord(live)) {
    const result: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(desired)) {
      if (key in live) {
        result[key] = subset(value, live[key])
      }
    }
    return result
  }

  if (Array.isArray(desired) && Array.isArray(live)) {
    return live.map((element: unknown, index) =>
      index < desired.length ? subset(desired[index], element) : element
    )
  }

  return live
}

/**
 * Diffs against the live objects, limited to the fields the desired
 * objects set, so server-populated fields such as status and defaults are
 * ignored.
 */
export function subsetDiffer(client: Pick<ClusterClient, 'get'>): Differ {
  return async (state: ManifestList): Promise<string | null> => {
    const entries = await Promise.all(
      state.map(async (manifest) => {
        const live = await client.get(manifest)
        return {
          key: resourceKey(manifest),
          live: live === null ? null : subset(manifest, live),
          merged: manifest
        }
      })
    )
    return renderDiff(entries)
  }
}

/**
 * The strategies every reconciler registers for its client.
 *
 * @param client - Client the strategies read from and dry-run against
 * @returns `native`, a server-side dry-run diff, and `subset`
 */
export function builtinDiffers(
  client: ClusterClient
): Record<DiffStrategyName, Differ> {
  return {
    native: (state) => client.diffServerSide(state),
    subset: subsetDiffer(client)
  }
}
