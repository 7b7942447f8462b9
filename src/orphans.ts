import { setMaxListeners } from 'events'
import * as core from '@actions/core'
import { ClusterClient } from './cluster-client.js'
import { DEFAULT_CATEGORIES, KUBERNETES } from './constants.js'
import { CategoryQueryError } from './errors.js'
import { formatIdentity, identify, IdentitySet } from './manifest.js'
import { ManifestList, ResourceCategory } from './types.js'

export interface OrphanDetectorOptions {
  /** Namespace of the environment */
  namespace: string
  /** Value of the environment label */
  environment: string
  /** Categories to scan, defaults to DEFAULT_CATEGORIES */
  categories?: readonly ResourceCategory[]
}

/**
 * Result of querying one category, recorded in the order the queries
 * settle.
 */
type Outcome =
  | { category: ResourceCategory; list: ManifestList }
  | { category: ResourceCategory; error: CategoryQueryError }

/**
 * Settles with the query, or rejects with the signal's reason once it
 * aborts. The query itself is not cancelled here; the client is handed the
 * same signal for that.
 *
 * @param work - The pending query
 * @param signal - Aborts the wait, if given
 * @returns The query's result, unless the signal aborted first
 */
function abortable<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return work
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason)
    signal.addEventListener('abort', onAbort, { once: true })
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
    if (signal.aborted) {
      onAbort()
    }
  })
}

/**
 * Finds live objects that belong to an environment but are missing from
 * its desired state.
 */
export class OrphanDetector {
  private readonly categories: readonly ResourceCategory[]

  constructor(
    private readonly client: Pick<ClusterClient, 'getByLabels'>,
    private readonly options: OrphanDetectorOptions
  ) {
    this.categories = options.categories ?? DEFAULT_CATEGORIES
  }

  /**
   * Queries every category concurrently and subtracts the desired state.
   * All queries run to completion even when some fail. If any failed, the
   * call rejects with the failure that arrived last and no partial result
   * is returned. The signal is passed on to the client, which abandons its
   * requests once it aborts.
   *
   * The order of the result is unspecified.
   */
  async list(
    state: ManifestList,
    options: { signal?: AbortSignal } = {}
  ): Promise<ManifestList> {
    const known = new IdentitySet(state.map(identify))
    core.debug(
      `Known objects: ${known.values().map(formatIdentity).join(', ')}`
    )

    const labels = { [KUBERNETES.LABEL_ENVIRONMENT]: this.options.environment }
    if (options.signal) {
      // every query listens on the signal, twice
      setMaxListeners(0, options.signal)
    }
    const outcomes: Outcome[] = []

    await Promise.all(
      this.categories.map((category) =>
        abortable(
          Promise.resolve().then(() =>
            this.client.getByLabels(this.options.namespace, category, labels, {
              signal: options.signal
            })
          ),
          options.signal
        ).then(
          (list) => {
            outcomes.push({ category, list })
          },
          (cause: unknown) => {
            outcomes.push({
              category,
              error: new CategoryQueryError(category.kind, cause)
            })
          }
        )
      )
    )

    const orphaned: ManifestList = []
    let lastError: CategoryQueryError | undefined

    for (const outcome of outcomes) {
      if ('error' in outcome) {
        lastError = outcome.error
        continue
      }
      for (const manifest of outcome.list) {
        const identity = identify(manifest)
        core.debug(`Found ${formatIdentity(identity)}`)
        if (known.has(identity)) {
          continue
        }
        orphaned.push(manifest)
      }
    }

    if (lastError) {
      throw lastError
    }
    return orphaned
  }
}
