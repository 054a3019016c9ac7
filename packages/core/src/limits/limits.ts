/**
 * Safety ceiling configuration.
 *
 * Every ceiling bounds the work a single match call can do, so that patterns
 * and texts from untrusted sources cannot run away with CPU or stack.
 *
 * @packageDocumentation
 */

import type { MatchLimits } from '../types'

/**
 * Default maximum pattern length.
 * @public
 */
export const DEFAULT_MAX_PATTERN_LENGTH = 64

/**
 * Default maximum recursion depth.
 * @public
 */
export const DEFAULT_MAX_RECURSION_DEPTH = 128

/**
 * Default maximum backtrack steps per call.
 * @public
 */
export const DEFAULT_MAX_BACKTRACK_STEPS = 1024

/**
 * Default safety ceilings.
 * @public
 */
export const DEFAULT_LIMITS: Readonly<Required<MatchLimits>> = {
  maxPatternLength: DEFAULT_MAX_PATTERN_LENGTH,
  maxRecursionDepth: DEFAULT_MAX_RECURSION_DEPTH,
  maxBacktrackSteps: DEFAULT_MAX_BACKTRACK_STEPS,
}

/**
 * Resolve safety ceilings by merging user-provided limits with defaults.
 *
 * @public
 */
export function resolveLimits(userLimits?: MatchLimits): Required<MatchLimits> {
  if (!userLimits) {
    return { ...DEFAULT_LIMITS }
  }
  return {
    maxPatternLength: userLimits.maxPatternLength ?? DEFAULT_LIMITS.maxPatternLength,
    maxRecursionDepth: userLimits.maxRecursionDepth ?? DEFAULT_LIMITS.maxRecursionDepth,
    maxBacktrackSteps: userLimits.maxBacktrackSteps ?? DEFAULT_LIMITS.maxBacktrackSteps,
  }
}
