/**
 * Stateful engine facade: configurable ceilings, last-error state and
 * persistent peak diagnostics.
 * @packageDocumentation
 */

import type { MatchErrorCode, MatchLimits, MatchResult, SearchDirection } from '../types'
import { RegexLimitError, describeMatchError, errorCodeValue } from '../types'
import { PeakUsage, resolveLimits } from '../limits'
import { search } from '../match'

/**
 * Options for a single engine call.
 * @public
 */
export interface EngineMatchOptions {
  ignoreCase?: boolean
  direction?: SearchDirection
}

/**
 * A regex engine with its own ceilings, last error and peak usage.
 *
 * Calls on one engine must not overlap; separate engines share nothing.
 *
 * @example
 * ```ts
 * const engine = new RegexEngine({ maxBacktrackSteps: 256 })
 * const result = engine.match('^[0-9]+$', '42')
 * // result: { matched: true, start: 0, length: 2, error: 'OK' }
 * engine.lastError // 'OK'
 * ```
 *
 * @public
 */
export class RegexEngine {
  /** Ceilings applied to every call; may be changed between calls */
  readonly limits: Required<MatchLimits>

  /** Peak usage across calls until {@link RegexEngine.resetPeaks} */
  readonly peaks = new PeakUsage()

  private error: MatchErrorCode = 'OK'

  constructor(limits?: MatchLimits) {
    this.limits = resolveLimits(limits)
  }

  /** Outcome of the most recent call */
  get lastError(): MatchErrorCode {
    return this.error
  }

  /** Numeric value of {@link RegexEngine.lastError} */
  get lastErrorValue(): number {
    return errorCodeValue(this.error)
  }

  /**
   * Search for a pattern in text.
   *
   * @param pattern - The pattern to search for
   * @param text - The text to search in
   * @param options - Case folding and scan direction
   * @returns The first match, or the reason there is none
   */
  match(pattern: string | null | undefined, text: string | null | undefined, options: EngineMatchOptions = {}): MatchResult {
    const result = search(pattern, text, {
      ignoreCase: options.ignoreCase,
      direction: options.direction,
      limits: { ...this.limits },
      diagnostics: this.peaks,
    })
    this.error = result.error
    return result
  }

  /**
   * Test whether a pattern occurs in text.
   *
   * @returns true on a match, false on an ordinary non-match
   * @throws RegexLimitError if there is no match because the pattern is
   * malformed or a ceiling was hit
   */
  test(pattern: string, text: string, options: EngineMatchOptions = {}): boolean {
    const result = this.match(pattern, text, options)
    if (result.matched) {
      return true
    }
    switch (result.error) {
      case 'NO_MATCH':
        return false
      case 'PATTERN_TOO_LONG':
        throw new RegexLimitError(
          result.error,
          describeMatchError(result.error),
          this.limits.maxPatternLength,
          pattern.length,
        )
      case 'RECURSION_DEPTH':
        throw new RegexLimitError(result.error, describeMatchError(result.error), this.limits.maxRecursionDepth)
      case 'BACKTRACK_LIMIT':
        throw new RegexLimitError(result.error, describeMatchError(result.error), this.limits.maxBacktrackSteps)
      case 'MALFORMED_PATTERN':
        throw new RegexLimitError(result.error, describeMatchError(result.error))
    }
  }

  /** Clear the peak usage counters */
  resetPeaks(): void {
    this.peaks.reset()
  }
}
