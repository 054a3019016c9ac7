/**
 * Single-atom matching.
 * @packageDocumentation
 */

import type { MatchContext } from './context'
import { charsEqual, recordError } from './context'
import { matchCharClass } from './char-class'

/**
 * A successful single-atom match.
 */
export interface AtomMatch {
  /** Pattern cursor just past the atom and any `{n}` token */
  readonly next: number

  /**
   * Exact repetition count from a `{n}` token, or 1 when none follows
   * (a bare `*`, `+` or `?` may then follow at `next`).
   */
  readonly repeat: number
}

/**
 * Match one pattern atom against one text character.
 *
 * Atoms are recognised in order: a backslash escape (matches the next
 * pattern character literally), a `[...]` class, `.`, then a plain literal.
 * An unterminated class never matches and records no error.
 *
 * A `{n}` token directly after the atom is consumed here. `{}` with no
 * digits, `{0}` and a missing `}` record MALFORMED_PATTERN and fail.
 *
 * @param ctx - Match context for the current call
 * @param cursor - Pattern position of the atom
 * @param pos - Text position to match against
 * @returns The advanced cursor and repeat count, or null if no match
 */
export function matchAtom(ctx: MatchContext, cursor: number, pos: number): AtomMatch | null {
  const { pattern, text, state } = ctx
  if (pos >= text.length) {
    return null
  }

  const char = text[pos]
  let next = cursor

  if (pattern[next] === '\\' && next + 1 < pattern.length) {
    if (!charsEqual(char, pattern[next + 1], state.ignoreCase)) {
      return null
    }
    next += 2
  } else if (pattern[next] === '[') {
    const close = pattern.indexOf(']', next + 1)
    if (close === -1 || !matchCharClass(char, pattern.slice(next + 1, close), state.ignoreCase)) {
      return null
    }
    next = close + 1
  } else if (pattern[next] === '.') {
    next++
  } else if (next < pattern.length && charsEqual(char, pattern[next], state.ignoreCase)) {
    next++
  } else {
    return null
  }

  if (pattern[next] !== '{') {
    return { next, repeat: 1 }
  }

  next++
  let count = 0
  while (next < pattern.length && isDigit(pattern[next])) {
    count = count * 10 + (pattern.charCodeAt(next) - 48)
    next++
  }
  if (count === 0 || pattern[next] !== '}') {
    recordError(state, 'MALFORMED_PATTERN')
    return null
  }

  return { next: next + 1, repeat: count }
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9'
}
