/**
 * Safety limiter consulted by the matcher at every recursive descent and
 * every repetition step.
 * @packageDocumentation
 */

import type { MatchLimits, PeakRecorder } from '../types'
import type { MatchState } from '../match/context'
import { recordError } from '../match/context'
import { resolveLimits } from './limits'

/**
 * Enforces the three safety ceilings for one match call.
 *
 * Every check that trips records its error code on the call's state
 * (first cause wins) and reports `false`; the caller unwinds.
 *
 * @public
 */
export class SafetyLimiter {
  readonly limits: Readonly<Required<MatchLimits>>

  private readonly peaks: PeakRecorder | undefined

  constructor(limits?: MatchLimits, peaks?: PeakRecorder) {
    this.limits = resolveLimits(limits)
    this.peaks = peaks
  }

  /**
   * Check the pattern length ceiling before any matching work.
   */
  acceptsPattern(pattern: string, state: MatchState): boolean {
    if (pattern.length > this.limits.maxPatternLength) {
      recordError(state, 'PATTERN_TOO_LONG')
      return false
    }
    return true
  }

  /**
   * Check a recursion level on entry. The peak is recorded even when the
   * level is over the ceiling.
   */
  enter(depth: number, state: MatchState): boolean {
    this.peaks?.recordDepth(depth)
    if (depth > this.limits.maxRecursionDepth) {
      recordError(state, 'RECURSION_DEPTH')
      return false
    }
    return true
  }

  /**
   * Consume one unit of the shared backtrack-step budget.
   */
  step(state: MatchState): boolean {
    state.steps++
    this.peaks?.recordSteps(state.steps)
    if (state.steps > this.limits.maxBacktrackSteps) {
      recordError(state, 'BACKTRACK_LIMIT')
      return false
    }
    return true
  }
}
