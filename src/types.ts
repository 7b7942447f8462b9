import { SemVer } from 'semver'

/**
 * Metadata every manifest carries. Only the fields used for identity and
 * environment membership are typed; the rest travels untouched.
 */
export type ManifestMetadata = {
  /** The name of the Kubernetes object */
  name: string
  /** The namespace of the object; absent for cluster-scoped objects */
  namespace?: string
  /** Labels of the object */
  labels?: Record<string, string>
  /** Annotations of the object */
  annotations?: Record<string, string>
}

/**
 * A Kubernetes object as declared in the desired state or returned by the
 * cluster. Everything besides apiVersion, kind and metadata is an opaque
 * body that is carried at runtime but never interpreted.
 */
export type Manifest = {
  /** The API version of the Kubernetes object */
  apiVersion: string
  /** The kind/type of the Kubernetes object */
  kind: string
  /** Metadata containing object identification information */
  metadata: ManifestMetadata
}

/**
 * An ordered collection of manifests. Uniqueness is not enforced.
 */
export type ManifestList = Manifest[]

/**
 * Names a resource within the cluster independent of its content
 */
export interface ResourceIdentity {
  kind: string
  name: string
  /** Empty for cluster-scoped resources */
  namespace: string
}

/**
 * A kind scanned during orphan detection
 */
export interface ResourceCategory {
  kind: string
  apiVersion: string
  /** Whether objects of this kind live inside a namespace */
  namespaced: boolean
}

/**
 * Snapshot of the cluster the client is bound to
 */
export interface ClusterInfo {
  serverVersion: SemVer
  cluster: {
    name: string
    server: string
  }
  context: {
    name: string
    namespace?: string
  }
}

/**
 * Compares the given manifests to the cluster and returns the differences
 * in unified diff format, or null when there are none.
 */
export type Differ = (state: ManifestList) => Promise<string | null>

/**
 * Options of a diff operation
 */
export interface DiffOptions {
  /** Reduce the diff to a per-resource histogram of changes */
  summarize?: boolean
  /** Diff strategy to use instead of the environment's default */
  strategy?: string
}

/**
 * Options of an apply operation
 */
export interface ApplyOptions {
  /** Skip the interactive confirmation */
  autoApprove?: boolean
  /** Take ownership of fields managed by other field managers */
  force?: boolean
}

/**
 * The change recorded for a single resource of a diff
 */
export interface ResourceChange {
  /** Key of the object, as used in the diff file headers */
  objectKey: string
  /** Whether the object is new to the cluster or an existing one changes */
  status: 'created' | 'modified'
  /** Unified diff hunks of this object */
  diff: string
}
