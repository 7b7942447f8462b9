import * as core from '@actions/core'
import { ClientFactory, KubernetesClusterClient } from './cluster-client.js'
import { COMMENTS, DEFAULT_CATEGORIES, GITHUB } from './constants.js'
import { changesFromDiff, diffstat } from './diff.js'
import { loadEnvironment } from './environment.js'
import { NotConfirmedError } from './errors.js'
import { GitHubPRCommenter } from './github-pr-commenter.js'
import {
  formatIdentity,
  identify,
  loadManifests,
  withEnvironmentDefaults
} from './manifest.js'
import { Reconciler } from './reconciler.js'
import { ManifestList } from './types.js'

const COMMANDS = ['diff', 'apply', 'orphans'] as const
type Command = (typeof COMMANDS)[number]

function parseCommand(value: string): Command {
  const command = COMMANDS.find((c) => c === value)
  if (!command) {
    throw new Error(
      `Unknown command '${value}', expected one of: ${COMMANDS.join(', ')}`
    )
  }
  return command
}

function getBooleanInput(name: string): boolean {
  return (core.getInput(name) || 'false').toLowerCase() === 'true'
}

function getNumberInput(name: string): number | undefined {
  const value = core.getInput(name)
  if (!value) {
    return undefined
  }
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed)) {
    throw new Error(`Input '${name}' must be a number, got '${value}'`)
  }
  return parsed
}

/**
 * @param connect - Creates the cluster client; defaults to the kubeconfig-backed client
 */
export async function run(connect?: ClientFactory): Promise<void> {
  try {
    const environmentPath = core.getInput('environment_path', {
      required: true
    })
    const manifestsPath = core.getInput('manifests_path', { required: true })
    const command = parseCommand(core.getInput('command') || 'diff')
    const kubeconfig = core.getInput('kubeconfig') || undefined

    const env = await loadEnvironment(environmentPath)
    const state = withEnvironmentDefaults(
      await loadManifests(manifestsPath),
      env,
      DEFAULT_CATEGORIES
    )

    const reconciler = await Reconciler.create(env, {
      connect:
        connect ??
        ((apiServer) =>
          KubernetesClusterClient.forApiServer(apiServer, { kubeconfig })),
      timeout: getNumberInput('timeout')
    })

    const info = reconciler.info()
    core.info(
      `Environment '${env.metadata.name}' on cluster '${info.cluster.name}' (${info.serverVersion.version}) using context '${info.context.name}'`
    )

    switch (command) {
      case 'diff':
        await runDiff(reconciler, state)
        break
      case 'apply':
        await reconciler.apply(state, {
          autoApprove: getBooleanInput('auto_approve'),
          force: getBooleanInput('force')
        })
        core.setOutput('applied', true)
        break
      case 'orphans': {
        const orphaned = await reconciler.orphaned(state)
        const identities = orphaned.map(identify)
        core.info(`Found ${identities.length} orphaned objects`)
        for (const identity of identities) {
          core.info(`  ${formatIdentity(identity)}`)
        }
        core.setOutput('orphans', JSON.stringify(identities))
        break
      }
    }
  } catch (error) {
    if (error instanceof NotConfirmedError) {
      core.warning(error.message)
      core.setOutput('applied', false)
      return
    }
    core.setFailed(`Action failed with error: ${error}`)
  }
}

async function runDiff(
  reconciler: Reconciler,
  state: ManifestList
): Promise<void> {
  const strategy = core.getInput('diff_strategy') || undefined
  const diff = await reconciler.diff(state, { strategy })

  core.setOutput('has_changes', diff !== null)
  if (diff === null) {
    core.info('No differences found')
  } else {
    core.info(getBooleanInput('summarize') ? diffstat(diff) : diff)
  }

  const githubToken = core.getInput('github_token') || process.env.GITHUB_TOKEN
  if (!githubToken) {
    return
  }

  const commenter = new GitHubPRCommenter(
    githubToken,
    core.getInput('title') || COMMENTS.DEFAULT_TITLE,
    core.getInput('subtitle'),
    getNumberInput('max_comment_char_len') ?? GITHUB.MAX_COMMENT_LENGTH
  )
  await commenter.postPullRequestComments(
    diff === null ? [] : changesFromDiff(diff)
  )
}
