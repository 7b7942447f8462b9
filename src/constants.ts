import { ResourceCategory } from './types.js'

/**
 * Application-wide constants used across different modules.
 */

/**
 * GitHub API and comment-related constants
 */
export const GITHUB = {
  /**
   * Maximum length for a GitHub comment before it needs to be split.
   * GitHub's actual limit is ~65536 chars, but we use a lower value for safety.
   */
  MAX_COMMENT_LENGTH: 60000,

  /**
   * Buffer space to reserve when calculating comment length limits.
   * This accounts for footers, continuation text, and formatting.
   */
  COMMENT_LENGTH_BUFFER: 100
} as const

/**
 * Kubernetes constants
 */
export const KUBERNETES = {
  /**
   * Namespace used when the environment doesn't specify one
   */
  DEFAULT_NAMESPACE: 'default',

  /**
   * Label marking a live resource as a member of an environment.
   * Its value is the environment's name label.
   */
  LABEL_ENVIRONMENT: 'reconciler.dev/environment',

  /**
   * Field manager recorded by server-side apply
   */
  FIELD_MANAGER: 'manifest-reconciler',

  /**
   * Content type of a server-side apply request
   */
  APPLY_PATCH_CONTENT_TYPE: 'application/apply-patch+yaml'
} as const

/**
 * Diff strategy constants
 */
export const DIFF = {
  /**
   * Oldest server version whose server-side dry-run is trusted by the
   * native strategy. Older clusters fall back to the subset strategy.
   */
  NATIVE_MIN_SERVER_VERSION: '1.13.0',

  /** Widest histogram bar rendered by the diff summary */
  MAX_HISTOGRAM_WIDTH: 50
} as const

/**
 * Resource categories scanned for orphans. Mirrors the kinds the
 * orchestrator itself considers when pruning; not discovered from the
 * live API.
 */
export const DEFAULT_CATEGORIES: readonly ResourceCategory[] = [
  { kind: 'ConfigMap', apiVersion: 'v1', namespaced: true },
  { kind: 'Endpoints', apiVersion: 'v1', namespaced: true },
  { kind: 'Namespace', apiVersion: 'v1', namespaced: false },
  { kind: 'PersistentVolumeClaim', apiVersion: 'v1', namespaced: true },
  { kind: 'PersistentVolume', apiVersion: 'v1', namespaced: false },
  { kind: 'Pod', apiVersion: 'v1', namespaced: true },
  { kind: 'ReplicationController', apiVersion: 'v1', namespaced: true },
  { kind: 'Secret', apiVersion: 'v1', namespaced: true },
  { kind: 'ServiceAccount', apiVersion: 'v1', namespaced: true },
  { kind: 'Service', apiVersion: 'v1', namespaced: true },

  { kind: 'DaemonSet', apiVersion: 'apps/v1', namespaced: true },
  { kind: 'Deployment', apiVersion: 'apps/v1', namespaced: true },
  { kind: 'ReplicaSet', apiVersion: 'apps/v1', namespaced: true },
  { kind: 'StatefulSet', apiVersion: 'apps/v1', namespaced: true },

  { kind: 'Job', apiVersion: 'batch/v1', namespaced: true },
  { kind: 'CronJob', apiVersion: 'batch/v1', namespaced: true },

  { kind: 'Ingress', apiVersion: 'networking.k8s.io/v1', namespaced: true },

  {
    kind: 'ClusterRole',
    apiVersion: 'rbac.authorization.k8s.io/v1',
    namespaced: false
  },
  {
    kind: 'ClusterRoleBinding',
    apiVersion: 'rbac.authorization.k8s.io/v1',
    namespaced: false
  },
  { kind: 'Role', apiVersion: 'rbac.authorization.k8s.io/v1', namespaced: true },
  {
    kind: 'RoleBinding',
    apiVersion: 'rbac.authorization.k8s.io/v1',
    namespaced: true
  }
]

/**
 * Built-in kinds that live outside any namespace. Desired objects of these
 * kinds never receive the environment namespace.
 */
export const CLUSTER_SCOPED_KINDS: readonly string[] = [
  'APIService',
  'CertificateSigningRequest',
  'ClusterRole',
  'ClusterRoleBinding',
  'ComponentStatus',
  'CSIDriver',
  'CSINode',
  'CustomResourceDefinition',
  'FlowSchema',
  'IngressClass',
  'MutatingWebhookConfiguration',
  'Namespace',
  'Node',
  'PersistentVolume',
  'PriorityClass',
  'PriorityLevelConfiguration',
  'RuntimeClass',
  'StorageClass',
  'ValidatingAdmissionPolicy',
  'ValidatingAdmissionPolicyBinding',
  'ValidatingWebhookConfiguration',
  'VolumeAttachment'
]

/**
 * Comment formatting constants
 */
export const COMMENTS = {
  /**
   * Default title of the diff comment
   */
  DEFAULT_TITLE: 'Cluster Diff',

  /**
   * Text shown when a comment is continued in the next comment
   */
  CONTINUATION_TEXT: '\n\n---\n*Continued in next comment...*',

  /**
   * Header for continuation comments
   */
  CONTINUATION_HEADER: '## 🔍 {title} (continued)\n\n',

  /**
   * Body of the comment posted when the cluster matches the desired state
   */
  NO_CHANGES_TEMPLATE:
    '## 🔍 {title}\n{subtitle}\n🎉 No differences found. The cluster matches the desired state.',

  /**
   * Header template for the comment section, with placeholders for dynamic values
   */
  HEADER_TEMPLATE: `## 🔍 {title}
{subtitle}
Found **{totalCount}** changes: {createdCount} created, {modifiedCount} modified

`,

  /**
   * Footer template for the comment section, with placeholders for dynamic values
   */
  FOOTER_TEMPLATE: `
<hr>

**Summary:** {createdCount} created, {modifiedCount} modified

<details>
<summary>ℹ️ How to read this diff</summary>

- ➕ **Created**: Objects that do not exist in the cluster yet
- 🔄 **Modified**: Live objects that will be changed

Objects are identified by: \`{apiVersion}.{kind}.{namespace}.{name}\`
</details>
`
} as const
