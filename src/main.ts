import * as core from '@actions/core'
import { readActionConfig } from './config.js'
import { filterDifferences } from './filter.js'
import { GitHubPRCommenter } from './github-pr-commenter.js'
import { YamlComparator } from './yaml-comparator.js'

export async function run(): Promise<void> {
  try {
    const config = readActionConfig()

    core.info(`Comparing YAML documents:`)
    core.info(`From: ${config.fromPath}`)
    core.info(`To: ${config.toPath}`)

    const comparator = new YamlComparator(config.compareOptions)
    const diffs = filterDifferences(
      await comparator.computeDiffs(config.fromPath, config.toPath),
      config.filters
    )

    core.setOutput('difference_count', diffs.length)
    core.setOutput('has_differences', diffs.length > 0)

    const commenter = new GitHubPRCommenter(
      config.githubToken,
      config.title,
      config.subtitle,
      config.maxCommentLength
    )
    await commenter.postPullRequestComments(diffs)

    if (config.failOnDifferences && diffs.length > 0) {
      core.setFailed(`Found ${diffs.length} differences between the YAML documents`)
    }
  } catch (error) {
    core.setFailed(`Action failed with error: ${error}`)
  }
}
