/**
 * Application-wide constants used across different modules.
 */

/**
 * Fields used to match list entries across documents, after any
 * additional identifiers configured by the user
 */
export const DEFAULT_IDENTIFIER_FIELDS = ['name', 'id'] as const

/**
 * Kubernetes resource constants
 */
export const KUBERNETES = {
  /** Metadata fields that name a resource, in order of preference */
  NAME_FIELDS: ['name', 'generateName'],

  /**
   * Minimum similarity, in percent, for two unmatched resources to be
   * considered a rename of each other
   */
  RENAME_SCORE_THRESHOLD: 60,

  /**
   * Rename detection is skipped when either side has more unmatched
   * resources than this
   */
  RENAME_CANDIDATE_LIMIT: 50
} as const

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
 * Comment formatting constants
 */
export const COMMENTS = {
  DEFAULT_TITLE: 'YAML Semantic Diff',

  /**
   * Text shown when a comment is continued in the next comment
   */
  CONTINUATION_TEXT: '\n\n---\n*Continued in next comment...*',

  /**
   * Header for continuation comments
   */
  CONTINUATION_HEADER: '## 🔍 {title} (continued)\n\n',

  /**
   * Body posted when both documents are semantically identical
   */
  NO_DIFFERENCES: `## 🔍 {title}

🎉 No differences found. Both YAML documents are semantically identical.
`,

  /**
   * Header template for the comment section, with placeholders for dynamic values
   */
  HEADER_TEMPLATE: `## 🔍 {title}
{subtitle}
Found **{totalCount}** differences: {addedCount} added, {removedCount} removed, {modifiedCount} modified

`,

  /**
   * Footer template for the comment section, with placeholders for dynamic values
   */
  FOOTER_TEMPLATE: `
<hr>

**Summary:** {addedCount} added, {removedCount} removed, {modifiedCount} modified

<details>
<summary>ℹ️ How to read this diff</summary>

- ➕ **Added**: Entries that only exist in the new document
- ➖ **Removed**: Entries that only exist in the old document
- 🔄 **Modified**: Entries whose value changed

Paths use dots between keys. List entries with a \`name\` or \`id\` are addressed by that value, other entries by their position.
</details>
`
} as const
