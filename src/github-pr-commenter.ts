import * as github from '@actions/github'
import * as core from '@actions/core'
import { ResourceChange } from './types.js'
import { GITHUB, COMMENTS } from './constants.js'

/**
 * Handles posting cluster diff comments to GitHub Pull Requests.
 * Provides functionality to format diffs as GitHub comments and manage comment lifecycle.
 */
export class GitHubPRCommenter {
  private octokit: ReturnType<typeof github.getOctokit>
  private title: string
  private subtitle: string
  private maxCommentLength: number

  /**
   * Creates a new GitHubPRCommenter instance.
   *
   * @param token - GitHub personal access token for API authentication
   * @param title - Custom title for the diff comment
   * @param subtitle - Optional subtitle for additional context
   * @param maxCommentLength - Maximum length for a comment before splitting
   */
  constructor(
    token: string,
    title: string = COMMENTS.DEFAULT_TITLE,
    subtitle: string = '',
    maxCommentLength: number = GITHUB.MAX_COMMENT_LENGTH
  ) {
    this.octokit = github.getOctokit(token)
    this.title = title
    this.subtitle = subtitle
    this.maxCommentLength = maxCommentLength
  }

  /**
   * Posts the changes a diff found as comments on the current Pull Request.
   * Falls back to console output if GitHub context is not available.
   *
   * @param changes - Per-object changes, empty when the cluster is up to date
   */
  async postPullRequestComments(changes: ResourceChange[]): Promise<void> {
    const pullRequest = github.context.payload.pull_request
    if (!pullRequest) {
      core.warning(
        'Pull request context not available, falling back to console output'
      )
      this.printChanges(changes)
      return
    }

    try {
      // Minimize existing comments from this action
      await this.minimizeExistingComments(pullRequest.number)

      if (changes.length === 0) {
        await this.postComment(
          pullRequest.number,
          this.replacePlaceholders(COMMENTS.NO_CHANGES_TEMPLATE, {
            title: this.title,
            subtitle: this.formatSubtitle()
          })
        )
        return
      }

      const comments = this.formatChangesAsComments(changes)
      for (const comment of comments) {
        await this.postComment(pullRequest.number, comment)
      }
    } catch (error) {
      core.error(`Failed to post PR comments: ${error}`)
      // Fallback to console output
      this.printChanges(changes)
    }
  }

  /**
   * Minimizes earlier comments of this action on the current Pull Request,
   * so only the latest diff stays expanded.
   *
   * @param prNumber - Number of the Pull Request to clean up
   * @returns Promise that resolves when all earlier comments have been minimized
   * @private
   */
  private async minimizeExistingComments(prNumber: number): Promise<void> {
    const { owner, repo } = github.context.repo

    try {
      const comments = await this.octokit.rest.issues.listComments({
        owner,
        repo,
        issue_number: prNumber
      })

      const botComments = comments.data.filter(
        (comment) =>
          comment.user?.type === 'Bot' &&
          comment.body?.includes(`🔍 ${this.title}`)
      )

      for (const comment of botComments) {
        await this.octokit.graphql(`
              mutation {
                minimizeComment(input: {
                  subjectId: "${comment.node_id}"
                  classifier: OUTDATED
                }) {
                  minimizedComment {
                    isMinimized
                  }
                }
              }
            `)
      }
    } catch (error) {
      core.warning(`Failed to minimize existing comments: ${error}`)
    }
  }

  /**
   * Formats per-object changes into GitHub comment strings.
   * Splits large diffs across multiple comments to respect the comment size limit.
   *
   * @param changes - Changes to format, one section per object
   * @returns Array of formatted comment strings ready for posting
   * @private
   */
  private formatChangesAsComments(changes: ResourceChange[]): string[] {
    const comments: string[] = []
    const counts = this.getChangeCounts(changes)

    let currentComment = this.replacePlaceholders(COMMENTS.HEADER_TEMPLATE, {
      ...counts,
      title: this.title,
      subtitle: this.formatSubtitle()
    })
    const footer = this.replacePlaceholders(COMMENTS.FOOTER_TEMPLATE, counts)

    for (const change of changes) {
      const section = this.formatChangeSection(change)

      // Reserve space for either the footer (if last comment) or continuation text
      const reservedSpace = footer.length + GITHUB.COMMENT_LENGTH_BUFFER
      if (
        currentComment.length + section.length + reservedSpace >
        this.maxCommentLength
      ) {
        comments.push(currentComment + COMMENTS.CONTINUATION_TEXT)
        currentComment = this.replacePlaceholders(
          COMMENTS.CONTINUATION_HEADER,
          { title: this.title }
        )
      }

      currentComment += section
    }

    currentComment += footer
    comments.push(currentComment)

    core.info(`Formatted ${comments.length} comments for PR`)

    return comments
  }

  /**
   * Returns the subtitle surrounded by blank lines, or nothing when unset.
   *
   * @private
   */
  private formatSubtitle(): string {
    return this.subtitle ? `\n${this.subtitle}\n` : ''
  }

  /**
   * Formats the diff of a single object into a collapsible comment section.
   *
   * @param change - The change of one object
   * @returns Markdown section with the diff in a fenced block
   * @private
   */
  private formatChangeSection(change: ResourceChange): string {
    return [
      `<details>\n<summary>${this.getStatusEmoji(change.status)} ${change.status.toUpperCase()}: \`${change.objectKey}\`</summary>\n`,
      '```diff',
      change.diff,
      '```\n</details>\n'
    ].join('\n')
  }

  /**
   * Returns the appropriate emoji for the given status.
   *
   * @param status - Whether the object is created or modified
   * @returns Emoji string representing the status
   * @private
   */
  private getStatusEmoji(status: ResourceChange['status']): string {
    switch (status) {
      case 'created':
        return '➕'
      case 'modified':
        return '🔄'
    }
  }

  /**
   * Calculates counts for the different kinds of changes.
   *
   * @param changes - Changes to count
   * @returns Object containing the total and the count per status
   * @private
   */
  private getChangeCounts(changes: ResourceChange[]): {
    totalCount: number
    createdCount: number
    modifiedCount: number
  } {
    return {
      totalCount: changes.length,
      createdCount: changes.filter((c) => c.status === 'created').length,
      modifiedCount: changes.filter((c) => c.status === 'modified').length
    }
  }

  /**
   * Replaces placeholders in template strings with actual values.
   * Unknown keys are left as they are.
   *
   * @param template - Template string with placeholders in {key} format
   * @param values - Values to substitute, by placeholder name
   * @returns Template with the known placeholders replaced
   * @private
   */
  private replacePlaceholders(
    template: string,
    values: Record<string, string | number>
  ): string {
    return template.replace(/{(\w+)}/g, (match, key: string) =>
      key in values ? String(values[key]) : match
    )
  }

  /**
   * Creates a comment on the Pull Request.
   *
   * @param prNumber - Number of the Pull Request
   * @param body - Markdown body of the comment
   * @returns Promise that resolves once the comment exists
   * @private
   */
  private async postComment(prNumber: number, body: string): Promise<void> {
    const { owner, repo } = github.context.repo

    await this.octokit.rest.issues.createComment({
      owner,
      repo,
      issue_number: prNumber,
      body
    })
  }

  /**
   * Lists the changed objects through the action log when no comment can be
   * posted. The diff itself has already been logged by the caller.
   *
   * @param changes - Changes to list
   * @private
   */
  private printChanges(changes: ResourceChange[]): void {
    const counts = this.getChangeCounts(changes)
    core.info(`\n🔍 Found ${counts.totalCount} changes:`)

    for (const change of changes) {
      core.info(
        `${this.getStatusEmoji(change.status)} ${change.status.toUpperCase()}: ${change.objectKey}`
      )
    }

    core.info(
      `Summary: ${counts.createdCount} created, ${counts.modifiedCount} modified`
    )
  }
}
