/**
 * Static pattern validation - reports problems without running a match.
 * @packageDocumentation
 */

import type { MatchLimits, PatternError } from '../types'
import { resolveLimits } from '../limits'

/**
 * Validate a pattern against the supported grammar.
 *
 * Returns errors for:
 * - Patterns longer than the configured maximum
 * - Character classes with no closing `]` (the matcher never matches these)
 * - `{n}` tokens with no digits, a zero count, or no closing `}`
 *
 * The matcher only reports a bad `{n}` when it reaches it, so a pattern can
 * fail validation and still produce NO_MATCH against some texts.
 *
 * @param source - The pattern to validate
 * @param limits - Ceilings to check against
 * @returns Array of validation errors (empty if valid)
 *
 * @public
 */
export function validatePattern(source: string, limits?: MatchLimits): readonly PatternError[] {
  const errors: PatternError[] = []
  const { maxPatternLength } = resolveLimits(limits)

  if (source.length > maxPatternLength) {
    errors.push({
      code: 'PATTERN_TOO_LONG',
      message: `Pattern length ${source.length} exceeds the limit of ${maxPatternLength}`,
      position: maxPatternLength,
      length: source.length - maxPatternLength,
    })
  }

  let i = source.startsWith('^') ? 1 : 0
  while (i < source.length) {
    // Trailing $ is the end anchor
    if (source[i] === '$' && i === source.length - 1) {
      break
    }

    if (source[i] === '\\' && i + 1 < source.length) {
      i += 2
    } else if (source[i] === '[') {
      const close = source.indexOf(']', i + 1)
      if (close === -1) {
        errors.push({
          code: 'UNCLOSED_BRACKET',
          message: 'Unclosed character class in pattern',
          position: i,
          length: source.length - i,
        })
        break
      }
      i = close + 1
    } else {
      i++
    }

    if (source[i] === '{') {
      i = validateRepeat(source, i, errors)
    }
  }

  return errors
}

/**
 * Validate a `{n}` token starting at `start`. Returns the position after it.
 */
function validateRepeat(source: string, start: number, errors: PatternError[]): number {
  let i = start + 1
  let digits = ''
  while (i < source.length && source[i] >= '0' && source[i] <= '9') {
    digits += source[i]
    i++
  }

  const closed = source[i] === '}'
  const end = closed ? i + 1 : i
  if (!closed) {
    errors.push({
      code: 'INVALID_REPEAT',
      message: digits === '' ? 'Repeat count must be digits followed by }' : `Unclosed repeat count {${digits}`,
      position: start,
      length: end - start,
    })
  } else if (Number(digits) === 0) {
    errors.push({
      code: 'INVALID_REPEAT',
      message: digits === '' ? 'Empty repeat count {}' : 'Repeat count must be at least 1',
      position: start,
      length: end - start,
    })
  }
  return end
}

/**
 * Check if a pattern is valid (has no errors).
 *
 * @param source - The pattern to check
 * @param limits - Ceilings to check against
 * @returns true if the pattern has no errors
 *
 * @public
 */
export function isValidPattern(source: string, limits?: MatchLimits): boolean {
  return validatePattern(source, limits).length === 0
}
