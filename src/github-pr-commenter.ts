import * as github from '@actions/github'
import * as core from '@actions/core'
import { COMMENTS, GITHUB } from './constants.js'
import { describeRef } from './errors.js'
import { ReconcileResult } from './types.js'

type ResultStatus = 'created' | 'updated' | 'deleted' | 'unchanged'
type Octokit = ReturnType<typeof github.getOctokit>

/**
 * Handles posting reconciliation reports to GitHub Pull Requests.
 * Provides functionality to format results as GitHub comments and manage comment lifecycle.
 */
export class GitHubPRCommenter {
  private octokit: Octokit | null
  private title: string
  private subtitle: string
  private maxCommentLength: number

  /**
   * Creates a new GitHubPRCommenter instance.
   *
   * @param token - GitHub token for API authentication; without one, reports only go to the log
   * @param title - Custom title for the report comment
   * @param subtitle - Optional subtitle for additional context
   * @param maxCommentLength - Maximum length for a comment before splitting
   */
  constructor(
    token: string | undefined,
    title: string = COMMENTS.DEFAULT_TITLE,
    subtitle: string = '',
    maxCommentLength: number = GITHUB.MAX_COMMENT_LENGTH
  ) {
    this.octokit = token ? github.getOctokit(token) : null
    this.title = title
    this.subtitle = subtitle
    this.maxCommentLength = maxCommentLength
  }

  /**
   * Posts the results on the current Pull Request when there is a token and
   * a Pull Request, and prints them to the log otherwise.
   */
  async report(results: ReconcileResult[]): Promise<void> {
    const prNumber = github.context.payload.pull_request?.number
    if (!this.octokit || prNumber === undefined) {
      if (this.octokit) {
        core.warning('Pull request context not available, falling back to console output')
      }
      this.printResults(results)
      return
    }

    await this.postPullRequestComments(this.octokit, prNumber, results)
  }

  /**
   * Posts reconciliation results as comments on a GitHub Pull Request.
   * Falls back to console output if posting fails.
   */
  private async postPullRequestComments(
    octokit: Octokit,
    prNumber: number,
    results: ReconcileResult[]
  ): Promise<void> {
    try {
      // Minimize existing comments from this action
      await this.minimizeExistingComments(octokit, prNumber)

      const comments = this.formatResultsAsComments(results)
      for (const comment of comments) {
        await this.postComment(octokit, prNumber, comment)
      }
    } catch (error) {
      core.error(`Failed to post PR comments: ${error}`)
      // Fallback to console output
      this.printResults(results)
    }
  }

  /**
   * Prints reconciliation results to the log.
   */
  printResults(results: ReconcileResult[]): void {
    const counts = this.getResultCounts(results)
    core.info(`\n🔧 Reconciled ${results.length} objects:`)

    for (const result of results) {
      const status = this.getStatus(result)
      core.info(
        `${this.getStatusEmoji(status)} ${status.toUpperCase()}: ${describeRef(result.ref)}`
      )
      if (status !== 'unchanged' && status !== 'created') {
        core.info(this.formatChanges(result))
      }
    }

    core.info(
      `Summary: ${counts.createdCount} created, ${counts.updatedCount} updated, ${counts.deletedCount} deleted, ${counts.unchangedCount} unchanged`
    )
  }

  /**
   * Minimizes previous reports of this action on the Pull Request.
   */
  private async minimizeExistingComments(
    octokit: Octokit,
    prNumber: number
  ): Promise<void> {
    const { owner, repo } = github.context.repo

    try {
      const comments = await octokit.rest.issues.listComments({
        owner,
        repo,
        issue_number: prNumber
      })

      const botComments = comments.data.filter(
        (comment) =>
          comment.user?.type === 'Bot' &&
          comment.body?.includes(`🔧 ${this.title}`)
      )

      for (const comment of botComments) {
        await octokit.graphql(`
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
   * Formats results into comment bodies, splitting them to respect the
   * comment size limit.
   */
  formatResultsAsComments(results: ReconcileResult[]): string[] {
    const comments: string[] = []

    let currentComment = this.getCommentHeader(results)
    const footer = this.getCommentFooter(results)

    for (const result of results) {
      const section = this.formatResultSection(result)

      // Reserve space for either the footer (if last comment) or continuation text
      const reservedSpace = footer.length + GITHUB.COMMENT_LENGTH_BUFFER
      if (
        currentComment.length + section.length + reservedSpace >
        this.maxCommentLength
      ) {
        comments.push(currentComment + COMMENTS.CONTINUATION_TEXT)
        currentComment = this.replacePlaceholders(COMMENTS.CONTINUATION_HEADER, {
          title: this.title
        })
      }

      currentComment += section
    }

    currentComment += footer
    comments.push(currentComment)

    core.info(`Formatted ${comments.length} comments for PR`)

    return comments
  }

  private getCommentHeader(results: ReconcileResult[]): string {
    const values = {
      ...this.getResultCounts(results),
      title: this.title,
      subtitle: this.subtitle ? `\n${this.subtitle}\n` : '',
      checkMode: results.some((result) => result.checkMode)
        ? ' (check mode, nothing was changed)'
        : ''
    }
    return this.replacePlaceholders(COMMENTS.HEADER_TEMPLATE, values)
  }

  private formatResultSection(result: ReconcileResult): string {
    const status = this.getStatus(result)
    const heading = `${this.getStatusEmoji(status)} ${status.toUpperCase()}: \`${describeRef(result.ref)}\``

    if (status === 'unchanged' || result.diff.length === 0) {
      return `### ${heading}\n`
    }

    return [
      `<details>\n<summary>${heading}</summary>\n`,
      '```diff',
      this.formatChanges(result),
      '```\n</details>\n'
    ].join('\n')
  }

  /**
   * Renders the change records of a result with diff syntax prefixes.
   */
  private formatChanges(result: ReconcileResult): string {
    const lines: string[] = []
    for (const change of result.diff) {
      if (change.before) {
        lines.push(...this.prefixLines(change.before, '-', change.path))
      }
      if (change.after) {
        lines.push(...this.prefixLines(change.after, '+', change.path))
      }
    }
    return lines.join('\n')
  }

  private prefixLines(text: string, prefix: '+' | '-', path: string): string[] {
    const label = path.startsWith('(') ? '' : `${path}: `
    return text
      .trimEnd()
      .split('\n')
      .map((line, i) => `${prefix} ${i === 0 ? label : ''}${line}`)
  }

  private getStatus(result: ReconcileResult): ResultStatus {
    switch (result.operation) {
      case 'create':
        return 'created'
      case 'apply':
        return 'updated'
      case 'delete':
        return 'deleted'
      default:
        return 'unchanged'
    }
  }

  private getStatusEmoji(status: ResultStatus): string {
    switch (status) {
      case 'created':
        return '➕'
      case 'updated':
        return '🔄'
      case 'deleted':
        return '➖'
      default:
        return '✅'
    }
  }

  private getCommentFooter(results: ReconcileResult[]): string {
    return this.replacePlaceholders(
      COMMENTS.FOOTER_TEMPLATE,
      this.getResultCounts(results)
    )
  }

  private getResultCounts(results: ReconcileResult[]): {
    totalCount: number
    createdCount: number
    updatedCount: number
    deletedCount: number
    unchangedCount: number
  } {
    const count = (status: ResultStatus): number =>
      results.filter((result) => this.getStatus(result) === status).length
    return {
      totalCount: results.length,
      createdCount: count('created'),
      updatedCount: count('updated'),
      deletedCount: count('deleted'),
      unchangedCount: count('unchanged')
    }
  }

  /**
   * Replaces `{key}` placeholders with the matching values; unknown keys are left as is.
   */
  private replacePlaceholders(
    template: string,
    values: Record<string, string | number>
  ): string {
    return template.replace(/{(\w+)}/g, (match, key: string) =>
      key in values ? String(values[key]) : match
    )
  }

  private async postComment(
    octokit: Octokit,
    prNumber: number,
    body: string
  ): Promise<void> {
    const { owner, repo } = github.context.repo

    await octokit.rest.issues.createComment({
      owner,
      repo,
      issue_number: prNumber,
      body
    })
  }
}
