import * as fs from 'fs'
import * as yaml from 'js-yaml'
import { z } from 'zod'
import { KUBERNETES } from './constants.js'

export const environmentSchema = z.object({
  apiVersion: z.string().default('reconciler.dev/v1alpha1'),
  kind: z.literal('Environment').default('Environment'),
  metadata: z.object({
    name: z.string().min(1)
  }),
  spec: z.object({
    apiServer: z.string().url(),
    namespace: z.string().min(1).default(KUBERNETES.DEFAULT_NAMESPACE),
    diffStrategy: z.string().optional(),
    injectLabels: z.boolean().default(false)
  })
})

/**
 * The environment a desired state is reconciled into
 */
export type EnvironmentConfig = z.infer<typeof environmentSchema>

/**
 * Validates a parsed environment document.
 *
 * @param value - The parsed document
 * @param source - Where the document came from, used in error messages
 */
export function parseEnvironment(
  value: unknown,
  source: string
): EnvironmentConfig {
  const result = environmentSchema.safeParse(value)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid environment '${source}': ${issues}`)
  }
  return result.data
}

/**
 * Reads an environment file. YAML and JSON are both accepted.
 */
export async function loadEnvironment(
  filePath: string
): Promise<EnvironmentConfig> {
  const content = await fs.promises.readFile(filePath, 'utf8')
  return parseEnvironment(yaml.load(content), filePath)
}

/**
 * The value of the environment label. Label values may not contain `/`.
 */
export function nameLabel(env: EnvironmentConfig): string {
  return env.metadata.name.replace(/\//g, '.')
}
