/**
 * Recursive greedy matcher with backtracking.
 * @packageDocumentation
 */

import type { MatchSpan } from '../types'
import type { MatchContext } from './context'
import { matchAtom } from './atom'

/**
 * Repetition bounds of an atom. `max` is undefined when unbounded.
 */
interface RepeatRange {
  readonly min: number
  readonly max: number | undefined
  /** Whether a symbol after the atom is consumed with it */
  readonly quantified: boolean
}

/**
 * Match the pattern from `cursor` against the text from `pos`.
 *
 * Each atom is extended greedily up to its maximum, then the remainder of the
 * pattern is tried after each count from the maximum down to the minimum.
 * Every extension and every retreat consumes one backtrack step.
 *
 * @param ctx - Match context for the current call
 * @param cursor - Pattern position to start from
 * @param pos - Text position to start from
 * @param depth - Current remainder nesting level
 * @returns The matched span starting at `pos`, or null
 */
export function matchHere(ctx: MatchContext, cursor: number, pos: number, depth: number): MatchSpan | null {
  const { pattern, text, state, limiter } = ctx

  if (!limiter.enter(depth, state)) {
    return null
  }

  // Base case: empty pattern matches the empty span
  if (cursor >= pattern.length) {
    return { start: pos, length: 0 }
  }

  // $ is end-of-text only as the last pattern character
  if (pattern[cursor] === '$' && cursor + 1 === pattern.length) {
    return pos === text.length ? { start: pos, length: 0 } : null
  }

  const first = matchAtom(ctx, cursor, pos)
  if (first === null) {
    return null
  }

  const range = repeatRange(pattern[first.next], first.repeat)
  const rest = range.quantified ? first.next + 1 : first.next

  // Greedy extension
  let end = pos + 1
  let count = 1
  while ((range.max === undefined || count < range.max) && end < text.length) {
    if (!limiter.step(state)) {
      return null
    }
    if (matchAtom(ctx, cursor, end) === null) {
      break
    }
    end++
    count++
  }

  // Backtrack from the longest run down to the minimum
  while (count >= range.min) {
    const tail = matchHere(ctx, rest, end, depth + 1)
    if (tail !== null) {
      return { start: pos, length: end - pos + tail.length }
    }
    if (!limiter.step(state)) {
      return null
    }
    if (count === range.min) {
      break
    }
    count--
    end--
  }

  return null
}

/**
 * Repetition range from the symbol following an atom.
 */
function repeatRange(symbol: string | undefined, repeat: number): RepeatRange {
  switch (symbol) {
    case '*':
      return { min: 0, max: undefined, quantified: true }
    case '+':
      return { min: 1, max: undefined, quantified: true }
    case '?':
      return { min: 0, max: 1, quantified: true }
    case '{':
      // only reachable right after a {n} token; this brace is skipped
      return { min: repeat, max: repeat, quantified: true }
    default:
      return { min: repeat, max: repeat, quantified: false }
  }
}
