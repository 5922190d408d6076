import * as core from '@actions/core'
import { COMMENTS, GITHUB } from './constants.js'
import { ConfigError } from './errors.js'
import type { CompareOptions, FilterOptions } from './types.js'

/**
 * Everything the action needs, read from its inputs
 */
export interface ActionConfig {
  fromPath: string
  toPath: string
  githubToken: string
  title: string
  subtitle: string
  maxCommentLength: number
  failOnDifferences: boolean
  compareOptions: CompareOptions
  filters: FilterOptions
}

/**
 * Reads and validates the action inputs. Defaults live in `action.yml`.
 *
 * @throws ConfigError when an input cannot be used
 */
export function readActionConfig(): ActionConfig {
  const fromPath = core.getInput('from_path', { required: true })
  const toPath = core.getInput('to_path', { required: true })
  const githubToken = core.getInput('github_token') || process.env.GITHUB_TOKEN

  if (!githubToken) {
    throw new ConfigError('GitHub token is required but not provided.')
  }

  const maxCommentInput =
    core.getInput('max_comment_char_len') || GITHUB.MAX_COMMENT_LENGTH.toString()
  const maxCommentLength = parseInt(maxCommentInput, 10)
  if (Number.isNaN(maxCommentLength) || maxCommentLength <= GITHUB.COMMENT_LENGTH_BUFFER) {
    throw new ConfigError(
      `max_comment_char_len must be a number greater than ${GITHUB.COMMENT_LENGTH_BUFFER}, got "${maxCommentInput}"`
    )
  }

  return {
    fromPath,
    toPath,
    githubToken,
    title: core.getInput('title') || COMMENTS.DEFAULT_TITLE,
    subtitle: core.getInput('subtitle'),
    maxCommentLength,
    failOnDifferences: core.getBooleanInput('fail_on_differences'),
    compareOptions: {
      ignoreOrderChanges: core.getBooleanInput('ignore_order_changes'),
      ignoreWhitespaceChanges: core.getBooleanInput('ignore_whitespace_changes'),
      ignoreValueChanges: core.getBooleanInput('ignore_value_changes'),
      detectKubernetes: core.getBooleanInput('detect_kubernetes'),
      detectRenames: core.getBooleanInput('detect_renames'),
      additionalIdentifiers: core.getMultilineInput('additional_identifiers'),
      swap: core.getBooleanInput('swap'),
      chroot: core.getInput('chroot'),
      chrootFrom: core.getInput('chroot_from'),
      chrootTo: core.getInput('chroot_to'),
      chrootListToDocuments: core.getBooleanInput('chroot_list_to_documents')
    },
    filters: {
      includePaths: core.getMultilineInput('include_paths'),
      excludePaths: core.getMultilineInput('exclude_paths'),
      includeRegexp: core.getMultilineInput('include_regexp'),
      excludeRegexp: core.getMultilineInput('exclude_regexp')
    }
  }
}
