/**
 * Outcome codes recorded for every match call.
 *
 * `NO_MATCH` is the ordinary absence of a match, not an engine failure.
 * @public
 */
export type MatchErrorCode =
  | 'OK'
  | 'NO_MATCH' // pattern does not occur in text
  | 'PATTERN_TOO_LONG' // pattern exceeds maxPatternLength
  | 'RECURSION_DEPTH' // remainder nesting exceeded maxRecursionDepth
  | 'BACKTRACK_LIMIT' // extension/retreat attempts exceeded maxBacktrackSteps
  | 'MALFORMED_PATTERN' // missing input, bad {n}

/**
 * Stable numeric values of each outcome code.
 * @public
 */
export const MATCH_ERROR_VALUES = {
  OK: 0,
  NO_MATCH: 1,
  PATTERN_TOO_LONG: 2,
  RECURSION_DEPTH: 3,
  BACKTRACK_LIMIT: 4,
  MALFORMED_PATTERN: 5,
} as const satisfies Record<MatchErrorCode, number>

/**
 * Numeric value of an outcome code.
 * @public
 */
export function errorCodeValue(code: MatchErrorCode): number {
  return MATCH_ERROR_VALUES[code]
}

const MESSAGES: Record<MatchErrorCode, string> = {
  OK: 'Match succeeded',
  NO_MATCH: 'Pattern does not occur in text',
  PATTERN_TOO_LONG: 'Pattern is longer than the configured maximum length',
  RECURSION_DEPTH: 'Match exceeded the configured maximum recursion depth',
  BACKTRACK_LIMIT: 'Match exceeded the configured maximum backtrack steps',
  MALFORMED_PATTERN: 'Pattern is malformed',
}

/**
 * Human-readable description of an outcome code.
 * @public
 */
export function describeMatchError(code: MatchErrorCode): string {
  return MESSAGES[code]
}

/**
 * Error codes reported by static pattern validation.
 * @public
 */
export type PatternErrorCode =
  | 'PATTERN_TOO_LONG' // longer than maxPatternLength
  | 'UNCLOSED_BRACKET' // [abc without ]
  | 'INVALID_REPEAT' // {}, {0}, {3 without }

/**
 * A pattern validation error with location information.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Human-readable error description */
  readonly message: string

  /** Character position in source where error starts */
  readonly position?: number

  /** Length of the problematic section */
  readonly length?: number
}

/**
 * Error thrown by the throwing match helpers when a call ends in anything
 * other than a match or an ordinary non-match.
 *
 * @public
 */
export class RegexLimitError extends Error {
  /** Error classification code */
  readonly code: MatchErrorCode

  /** The configured ceiling that was exceeded, when one applies */
  readonly limit?: number

  /** The observed value that exceeded the ceiling, when one applies */
  readonly actual?: number

  constructor(code: MatchErrorCode, message: string, limit?: number, actual?: number) {
    super(message)
    this.name = 'RegexLimitError'
    this.code = code
    this.limit = limit
    this.actual = actual
  }
}
