// Error types raised or reported by the import pipeline

/**
 * Base class for every error the pipeline produces
 */
export class OutlineError extends Error {
  readonly code: string

  constructor(code: string, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * Path data that no command can consume. Only the path string it came from
 * is abandoned; other paths in the same document are unaffected.
 */
export class GrammarError extends OutlineError {
  /** The offending tokens, space separated */
  readonly fragment: string
  /** Character offset of the fragment in the path data */
  readonly position: number

  constructor(message: string, fragment: string, position: number) {
    super('GRAMMAR_ERROR', message)
    this.fragment = fragment
    this.position = position
  }
}

/**
 * The source document could not be read as SVG
 */
export class SvgReadError extends OutlineError {
  /** Parser messages collected while reading */
  readonly details: string[]

  constructor(message: string, details: string[] = []) {
    super('SVG_READ_ERROR', message)
    this.details = details
  }
}
