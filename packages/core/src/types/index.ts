/**
 * Type definitions for the bounded regex engine.
 * @packageDocumentation
 */

// Option and result types
export type {
  MatchLimits,
  SearchDirection,
  MatchOptions,
  PeakRecorder,
  MatchSpan,
  MatchFound,
  MatchMissing,
  MatchResult,
} from './options'

// Error types
export type { MatchErrorCode, PatternErrorCode, PatternError } from './errors'
export { MATCH_ERROR_VALUES, errorCodeValue, describeMatchError, RegexLimitError } from './errors'
