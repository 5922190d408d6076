import * as fs from 'fs'
import * as core from '@actions/core'
import { compare } from './yaml-diff.js'
import type { CompareOptions, Difference } from './types.js'

/**
 * Reads two YAML files from disk and computes their semantic differences.
 */
export class YamlComparator {
  private readonly options: Partial<CompareOptions>

  /**
   * @param options - Comparison options applied to every pair of files
   */
  constructor(options: Partial<CompareOptions> = {}) {
    this.options = options
  }

  /**
   * Compares the file at `fromPath` with the file at `toPath`.
   *
   * @returns Differences in reading order
   * @throws ParseError when either file is not valid YAML
   */
  async computeDiffs(fromPath: string, toPath: string): Promise<Difference[]> {
    const fromContent = await this.readContent(fromPath)
    const toContent = await this.readContent(toPath)

    const diffs = compare(fromContent, toContent, this.options)

    core.info(`Found ${diffs.length} differences between ${fromPath} and ${toPath}`)
    return diffs
  }

  private async readContent(filePath: string): Promise<string> {
    const content = await fs.promises.readFile(filePath, 'utf8')
    core.debug(`Read ${content.length} characters from ${filePath}`)
    return content
  }
}
