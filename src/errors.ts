/**
 * Malformed YAML in one of the compared streams.
 */
export class ParseError extends Error {
  /** 1-based line of the error, when known */
  readonly line?: number
  /** 1-based column of the error, when known */
  readonly column?: number
  /** The parser's message without location information */
  readonly reason: string

  constructor(reason: string, line?: number, column?: number) {
    super(line !== undefined ? `yaml: line ${line}: ${reason}` : `yaml: ${reason}`)
    this.name = 'ParseError'
    this.reason = reason
    this.line = line
    this.column = column
  }
}

/**
 * A chroot path that does not resolve in a document.
 */
export class ChrootError extends Error {
  readonly path: string

  constructor(path: string, reason: string) {
    super(`chroot path "${path}": ${reason}`)
    this.name = 'ChrootError'
    this.path = path
  }
}

/**
 * An include or exclude expression that is not a valid regular expression.
 */
export class FilterError extends Error {
  readonly pattern: string

  constructor(pattern: string, reason: string) {
    super(`invalid regex pattern "${pattern}": ${reason}`)
    this.name = 'FilterError'
    this.pattern = pattern
  }
}

/**
 * An action input with a value the action cannot use.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}
