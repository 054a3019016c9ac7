/**
 * Top-level search entry point.
 * @packageDocumentation
 */

import type { MatchOptions, MatchResult, MatchSpan } from '../types'
import { SafetyLimiter } from '../limits/safety-limiter'
import { createMatchState, recordError, type MatchContext, type MatchState } from './context'
import { matchHere } from './repetition'

/**
 * Search for a pattern in text.
 *
 * A pattern starting with `^` is tried once, at offset 0, whatever the
 * direction. Otherwise every offset is tried, including `text.length` so
 * that empty matches at the end are found, in the requested direction; the
 * first offset that matches wins.
 *
 * An error recorded at one offset does not stop the scan: later offsets are
 * still tried, and a match found there carries the recorded error. Never
 * throws: a missing pattern or text is MALFORMED_PATTERN, and every other
 * failure is reported through the result's `error`.
 *
 * @param pattern - The pattern to search for
 * @param text - The text to search in
 * @param options - Case folding, direction, safety ceilings and diagnostics
 * @returns The first match found, or the reason there is none
 *
 * @public
 */
export function search(
  pattern: string | null | undefined,
  text: string | null | undefined,
  options: MatchOptions = {},
): MatchResult {
  const state = createMatchState(options.ignoreCase ?? false)

  if (pattern === null || pattern === undefined || text === null || text === undefined) {
    recordError(state, 'MALFORMED_PATTERN')
    return missing(state)
  }

  const limiter = new SafetyLimiter(options.limits, options.diagnostics)
  if (!limiter.acceptsPattern(pattern, state)) {
    return missing(state)
  }

  const ctx: MatchContext = { pattern, text, state, limiter }
  if (pattern.startsWith('^')) {
    return found(matchHere(ctx, 1, 0, 0), state)
  }

  const backward = options.direction === 'backward'
  for (let i = 0; i <= text.length; i++) {
    const pos = backward ? text.length - i : i
    const span = matchHere(ctx, 0, pos, 0)
    if (span !== null) {
      return found(span, state)
    }
  }

  return missing(state)
}

function found(span: MatchSpan | null, state: MatchState): MatchResult {
  if (span === null) {
    return missing(state)
  }
  const error = state.error
  return { matched: true, start: span.start, length: span.length, error: error === 'NO_MATCH' ? 'OK' : error }
}

function missing(state: MatchState): MatchResult {
  recordError(state, 'NO_MATCH')
  const error = state.error
  if (error === 'OK') {
    return { matched: false, error: 'NO_MATCH' }
  }
  return { matched: false, error }
}
