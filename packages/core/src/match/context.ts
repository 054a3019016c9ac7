/**
 * Per-call match context, passed explicitly through every matching layer.
 * @packageDocumentation
 */

import type { MatchErrorCode } from '../types'
import type { SafetyLimiter } from '../limits/safety-limiter'

/**
 * Mutable state for one top-level match call.
 *
 * Created fresh for every call and discarded when it returns.
 */
export interface MatchState {
  ignoreCase: boolean
  /** Backtrack steps consumed so far; never decreases within a call */
  steps: number
  /** First error recorded in this call, or 'OK' */
  error: MatchErrorCode
}

/**
 * Everything the matcher layers share during one call.
 */
export interface MatchContext {
  readonly pattern: string
  readonly text: string
  readonly state: MatchState
  readonly limiter: SafetyLimiter
}

/**
 * Create the state for a new call.
 */
export function createMatchState(ignoreCase: boolean): MatchState {
  return { ignoreCase, steps: 0, error: 'OK' }
}

/**
 * Record an error unless one is already recorded for this call.
 */
export function recordError(state: MatchState, code: MatchErrorCode): void {
  if (state.error === 'OK') {
    state.error = code
  }
}

/**
 * Fold an ASCII uppercase letter to lowercase; other characters are unchanged.
 */
export function foldCase(char: string): string {
  const code = char.charCodeAt(0)
  return code >= 65 && code <= 90 ? String.fromCharCode(code + 32) : char
}

/**
 * Compare two characters, folding case when the call ignores case.
 */
export function charsEqual(a: string, b: string, ignoreCase: boolean): boolean {
  return ignoreCase ? foldCase(a) === foldCase(b) : a === b
}
