import type { MatchErrorCode } from './errors'

/**
 * Safety ceilings applied to a match call. Omitted fields take their defaults.
 * @public
 */
export interface MatchLimits {
  /**
   * Patterns longer than this are rejected before any matching.
   * @defaultValue 64
   */
  maxPatternLength?: number

  /**
   * Deepest remainder-matching nesting allowed.
   * @defaultValue 128
   */
  maxRecursionDepth?: number

  /**
   * Greedy-extension and backtrack-retreat attempts allowed per call.
   * @defaultValue 1024
   */
  maxBacktrackSteps?: number
}

/**
 * Scan direction for unanchored patterns.
 *
 * `'forward'` tries offsets 0..text.length, `'backward'` tries
 * text.length..0. Ignored for patterns starting with `^`.
 *
 * @public
 */
export type SearchDirection = 'forward' | 'backward'

/**
 * Per-call matching options.
 * @public
 */
export interface MatchOptions {
  /** Fold ASCII letters before comparing literals, escapes and class members */
  ignoreCase?: boolean

  /** @defaultValue 'forward' */
  direction?: SearchDirection

  /** Safety ceilings for this call */
  limits?: MatchLimits

  /** Receives peak recursion depth and backtrack usage; never affects the outcome */
  diagnostics?: PeakRecorder
}

/**
 * Sink for peak usage observed during matching.
 * @public
 */
export interface PeakRecorder {
  recordDepth(depth: number): void
  recordSteps(steps: number): void
}

/**
 * A span of text matched by the pattern.
 * @public
 */
export interface MatchSpan {
  /** Offset of the first matched character */
  readonly start: number

  /** Number of matched characters (may be zero) */
  readonly length: number
}

/**
 * A successful match.
 * @public
 */
export interface MatchFound extends MatchSpan {
  readonly matched: true
  /** 'OK', or the first error recorded at an earlier offset or branch */
  readonly error: Exclude<MatchErrorCode, 'NO_MATCH'>
}

/**
 * An absent match and the reason for it.
 * @public
 */
export interface MatchMissing {
  readonly matched: false
  readonly error: Exclude<MatchErrorCode, 'OK'>
}

/**
 * Result of a top-level match call.
 * @public
 */
export type MatchResult = MatchFound | MatchMissing
