/**
 * Safety ceilings and usage diagnostics.
 * @packageDocumentation
 */

export {
  DEFAULT_MAX_PATTERN_LENGTH,
  DEFAULT_MAX_RECURSION_DEPTH,
  DEFAULT_MAX_BACKTRACK_STEPS,
  DEFAULT_LIMITS,
  resolveLimits,
} from './limits'
export { PeakUsage } from './peak-usage'
export { SafetyLimiter } from './safety-limiter'
