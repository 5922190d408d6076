import * as github from '@actions/github'
import * as core from '@actions/core'
import * as yaml from 'js-yaml'
import { createTwoFilesPatch } from 'diff'
import { toPlainValue } from './node.js'
import type { Difference, DiffStatus, YamlNode } from './types.js'
import { GITHUB, COMMENTS } from './constants.js'

// Integers beyond the safe range are bigints and print as plain digits
const DUMP_SCHEMA = yaml.DEFAULT_SCHEMA.extend({
  implicit: [
    new yaml.Type('tag:yaml.org,2002:bigint', {
      kind: 'scalar',
      resolve: () => false,
      predicate: (data: unknown) => typeof data === 'bigint',
      represent: (data: unknown) => String(data)
    })
  ]
})

const MINIMIZE_COMMENT_MUTATION = `
  mutation($subjectId: ID!) {
    minimizeComment(input: { subjectId: $subjectId, classifier: OUTDATED }) {
      minimizedComment {
        isMinimized
      }
    }
  }
`

/**
 * Handles posting YAML differences as GitHub Pull Request comments.
 * Provides functionality to format differences as comments and manage comment lifecycle.
 */
export class GitHubPRCommenter {
  private octokit: ReturnType<typeof github.getOctokit>
  private title: string
  private subtitle: string
  private maxCommentLength: number

  /**
   * Creates a new GitHubPRCommenter instance.
   *
   * @param token - GitHub token for API authentication
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
   * Posts differences as comments on the current Pull Request.
   * Falls back to console output if there is no Pull Request or posting fails.
   *
   * @param diffs - Differences to post, in reading order
   */
  async postPullRequestComments(diffs: Difference[]): Promise<void> {
    const pullRequest = github.context.payload.pull_request
    if (!pullRequest) {
      core.warning('Pull request context not available, falling back to console output')
      this.printDiffs(diffs)
      return
    }

    try {
      await this.minimizeExistingComments(pullRequest.number)

      if (diffs.length === 0) {
        await this.postComment(
          pullRequest.number,
          this.replacePlaceholders(COMMENTS.NO_DIFFERENCES, { title: this.title })
        )
        return
      }

      for (const comment of this.formatDiffsAsComments(diffs)) {
        await this.postComment(pullRequest.number, comment)
      }
    } catch (error) {
      core.error(`Failed to post PR comments: ${error}`)
      this.printDiffs(diffs)
    }
  }

  /**
   * Collapses comments this action posted on earlier runs.
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
        await this.octokit.graphql(MINIMIZE_COMMENT_MUTATION, {
          subjectId: comment.node_id
        })
      }
    } catch (error) {
      core.warning(`Failed to minimize existing comments: ${error}`)
    }
  }

  /**
   * Formats differences into comment bodies, splitting across several
   * comments to respect the maximum comment length.
   *
   * @param diffs - Differences to format
   * @returns Comment bodies ready for posting
   */
  formatDiffsAsComments(diffs: Difference[]): string[] {
    const comments: string[] = []
    const footer = this.getCommentFooter(diffs)
    const multiDocument = diffs.some((diff) => diff.documentIndex > 0)

    let currentComment = this.getCommentHeader(diffs)
    let hasSections = false
    let currentDocument: number | undefined

    for (const diff of diffs) {
      let section = this.formatDiffSection(diff)
      if (multiDocument && diff.documentIndex !== currentDocument) {
        section = `### Document ${diff.documentIndex + 1}\n\n${section}`
        currentDocument = diff.documentIndex
      }

      // Reserve space for either the footer (if last comment) or continuation text
      const reservedSpace = footer.length + GITHUB.COMMENT_LENGTH_BUFFER
      if (
        hasSections &&
        currentComment.length + section.length + reservedSpace >
          this.maxCommentLength
      ) {
        comments.push(currentComment + COMMENTS.CONTINUATION_TEXT)
        currentComment = this.replacePlaceholders(COMMENTS.CONTINUATION_HEADER, {
          title: this.title
        })
      }

      currentComment += section
      hasSections = true
    }

    currentComment += footer
    comments.push(currentComment)

    core.info(`Formatted ${comments.length} comments for PR`)

    return comments
  }

  private getCommentHeader(diffs: Difference[]): string {
    return this.replacePlaceholders(COMMENTS.HEADER_TEMPLATE, {
      ...this.getDiffCounts(diffs),
      title: this.title,
      subtitle: this.subtitle ? `\n${this.subtitle}\n` : ''
    })
  }

  private getCommentFooter(diffs: Difference[]): string {
    return this.replacePlaceholders(COMMENTS.FOOTER_TEMPLATE, this.getDiffCounts(diffs))
  }

  /**
   * Formats a single difference as a collapsible section with a diff block.
   */
  private formatDiffSection(diff: Difference): string {
    return [
      `<details>\n<summary>${this.getStatusEmoji(diff.status)} ${diff.status.toUpperCase()}: \`${diff.path || '(root)'}\`</summary>\n`,
      '```diff',
      this.formatChange(diff),
      '```\n</details>\n'
    ].join('\n')
  }

  private formatChange(diff: Difference): string {
    const { from, to } = diff
    if (
      from?.kind === 'string' &&
      to?.kind === 'string' &&
      (from.value.includes('\n') || to.value.includes('\n'))
    ) {
      return createTwoFilesPatch(
        `from/${diff.path}`,
        `to/${diff.path}`,
        from.value,
        to.value,
        '',
        ''
      ).trimEnd()
    }

    const lines: string[] = []
    if (from !== undefined) {
      lines.push(this.formatValueWithDiffSyntax(from, '-'))
    }
    if (to !== undefined) {
      lines.push(this.formatValueWithDiffSyntax(to, '+'))
    }
    return lines.join('\n')
  }

  /**
   * Renders a value as YAML with every line prefixed for diff highlighting.
   */
  private formatValueWithDiffSyntax(node: YamlNode, prefix: '+' | '-'): string {
    return yaml
      .dump(toPlainValue(node), { lineWidth: -1, schema: DUMP_SCHEMA })
      .trimEnd()
      .split('\n')
      .map((line) => `${prefix} ${line}`)
      .join('\n')
  }

  private getStatusEmoji(status: DiffStatus): string {
    switch (status) {
      case 'added':
        return '➕'
      case 'removed':
        return '➖'
      case 'modified':
        return '🔄'
      case 'order_changed':
        return '🔀'
    }
  }

  private getDiffCounts(diffs: Difference[]): {
    totalCount: number
    addedCount: number
    removedCount: number
    modifiedCount: number
  } {
    return {
      totalCount: diffs.length,
      addedCount: diffs.filter((d) => d.status === 'added').length,
      removedCount: diffs.filter((d) => d.status === 'removed').length,
      modifiedCount: diffs.filter((d) => d.status === 'modified').length
    }
  }

  /**
   * Replaces `{key}` placeholders with the given values; unknown keys are
   * left as they are.
   */
  private replacePlaceholders(
    template: string,
    values: Record<string, string | number>
  ): string {
    return template.replace(/{(\w+)}/g, (match, key: string) =>
      key in values ? String(values[key]) : match
    )
  }

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
   * Prints differences to the log when the GitHub API is not available.
   */
  private printDiffs(diffs: Difference[]): void {
    const counts = this.getDiffCounts(diffs)
    core.info(`\n🔍 Found ${counts.totalCount} differences:`)

    for (const diff of diffs) {
      core.info(`\n${'='.repeat(80)}`)
      core.info(
        `${this.getStatusEmoji(diff.status)} ${diff.status.toUpperCase()}: ${diff.path || '(root)'}`
      )
      core.info(this.formatChange(diff))
    }

    core.info(`\n${'='.repeat(80)}`)
    core.info(
      `Summary: ${counts.addedCount} added, ${counts.removedCount} removed, ${counts.modifiedCount} modified`
    )
  }
}
