/**
 * Bounded Regex Library
 *
 * A small backtracking regular-expression engine for untrusted input. It
 * supports literals, `.`, `[...]` classes, the `*`, `+`, `?` and `{n}`
 * quantifiers, `^`/`$` anchors and backslash escapes, and bounds every call
 * by pattern length, recursion depth and backtrack steps.
 *
 * Character classes cannot contain `]`: there is no escaping inside a class
 * and the class ends at the first `]`.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.1.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Options and results
  MatchLimits,
  SearchDirection,
  MatchOptions,
  PeakRecorder,
  MatchSpan,
  MatchFound,
  MatchMissing,
  MatchResult,
  // Error types
  MatchErrorCode,
  PatternErrorCode,
  PatternError,
} from './types'
export { MATCH_ERROR_VALUES, errorCodeValue, describeMatchError, RegexLimitError } from './types'

// =============================================================================
// Safety Limits
// =============================================================================

export {
  DEFAULT_MAX_PATTERN_LENGTH,
  DEFAULT_MAX_RECURSION_DEPTH,
  DEFAULT_MAX_BACKTRACK_STEPS,
  DEFAULT_LIMITS,
  resolveLimits,
  PeakUsage,
  SafetyLimiter,
} from './limits'

// =============================================================================
// Matching
// =============================================================================

export { search, matchCharClass } from './match'

// =============================================================================
// Engine
// =============================================================================

export { RegexEngine, type EngineMatchOptions } from './engine'

// =============================================================================
// Validation
// =============================================================================

export { validatePattern, isValidPattern } from './parse'
