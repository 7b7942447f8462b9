import * as fs from 'fs'
import * as yaml from 'js-yaml'
import * as core from '@actions/core'
import { CLUSTER_SCOPED_KINDS, KUBERNETES } from './constants.js'
import { EnvironmentConfig, nameLabel } from './environment.js'
import {
  Manifest,
  ManifestList,
  ResourceCategory,
  ResourceIdentity
} from './types.js'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Checks that a value carries everything needed to identify it as a
 * Kubernetes object.
 */
export function isManifest(value: unknown): value is Manifest {
  return (
    isRecord(value) &&
    typeof value.apiVersion === 'string' &&
    typeof value.kind === 'string' &&
    isRecord(value.metadata) &&
    typeof value.metadata.name === 'string'
  )
}

export function identify(manifest: Manifest): ResourceIdentity {
  return {
    kind: manifest.kind,
    name: manifest.metadata.name,
    namespace: manifest.metadata.namespace ?? ''
  }
}

/**
 * Canonical encoding of an identity, usable as a Map or Set key.
 */
export function identityKey(identity: ResourceIdentity): string {
  return JSON.stringify([identity.kind, identity.namespace, identity.name])
}

export function sameIdentity(a: ResourceIdentity, b: ResourceIdentity): boolean {
  return (
    a.kind === b.kind && a.name === b.name && a.namespace === b.namespace
  )
}

export function formatIdentity(identity: ResourceIdentity): string {
  return identity.namespace
    ? `${identity.kind}/${identity.namespace}/${identity.name}`
    : `${identity.kind}/${identity.name}`
}

/**
 * A set of resource identities with structural equality.
 */
export class IdentitySet {
  private readonly entries = new Map<string, ResourceIdentity>()

  constructor(identities: Iterable<ResourceIdentity> = []) {
    for (const identity of identities) {
      this.add(identity)
    }
  }

  add(identity: ResourceIdentity): void {
    this.entries.set(identityKey(identity), identity)
  }

  has(identity: ResourceIdentity): boolean {
    return this.entries.has(identityKey(identity))
  }

  get size(): number {
    return this.entries.size
  }

  values(): ResourceIdentity[] {
    return [...this.entries.values()]
  }
}

/**
 * File-name style key of a manifest, e.g. `apps.v1.Deployment.prod.api`.
 */
export function resourceKey(manifest: Manifest): string {
  return [
    manifest.apiVersion.replace(/\//g, '.'),
    manifest.kind,
    manifest.metadata.namespace,
    manifest.metadata.name
  ]
    .filter((part) => part)
    .join('.')
}

/**
 * Parses a multi-document YAML stream into manifests. `List` documents are
 * unwrapped into their items.
 *
 * @param content - The YAML text
 * @param source - Where the text came from, used in error messages
 */
export function parseManifests(content: string, source: string): ManifestList {
  const manifests: ManifestList = []

  const collect = (doc: unknown, position: string): void => {
    if (doc === null || doc === undefined) {
      return
    }
    if (
      isRecord(doc) &&
      typeof doc.kind === 'string' &&
      doc.kind.endsWith('List') &&
      Array.isArray(doc.items)
    ) {
      doc.items.forEach((item, index) =>
        collect(item, `${position}, item ${index + 1}`)
      )
      return
    }
    if (!isManifest(doc)) {
      throw new Error(
        `Invalid manifest in ${source} (${position}): apiVersion, kind and metadata.name are required`
      )
    }
    manifests.push(doc)
  }

  yaml
    .loadAll(content)
    .forEach((doc, index) => collect(doc, `document ${index + 1}`))

  return manifests
}

export async function loadManifests(filePath: string): Promise<ManifestList> {
  const content = await fs.promises.readFile(filePath, 'utf8')
  const manifests = parseManifests(content, filePath)
  core.info(`Parsed ${manifests.length} objects from ${filePath}`)
  return manifests
}

/**
 * Prepares a desired state for an environment: namespaced objects without
 * a namespace are placed in the environment's namespace and, when the
 * environment asks for it, every object gets the environment label.
 * Cluster-scoped kinds are the built-in ones plus those the given
 * categories mark as such; any other kind is treated as namespaced.
 */
export function withEnvironmentDefaults(
  state: ManifestList,
  env: EnvironmentConfig,
  categories: readonly ResourceCategory[]
): ManifestList {
  const clusterScoped = new Set([
    ...CLUSTER_SCOPED_KINDS,
    ...categories.filter((c) => !c.namespaced).map((c) => c.kind)
  ])

  return state.map((manifest) => {
    const metadata = { ...manifest.metadata }
    if (!metadata.namespace && !clusterScoped.has(manifest.kind)) {
      metadata.namespace = env.spec.namespace
    }
    if (env.spec.injectLabels) {
      metadata.labels = {
        ...metadata.labels,
        [KUBERNETES.LABEL_ENVIRONMENT]: nameLabel(env)
      }
    }
    return { ...manifest, metadata }
  })
}
