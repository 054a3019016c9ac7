/**
 * Character class membership.
 * @packageDocumentation
 */

import { charsEqual, foldCase } from './context'

/**
 * Check whether a character is a member of a bracket expression.
 *
 * `body` is the text between `[` and the first `]`. A leading `^` negates
 * the class. `X-Y` is an inclusive range unless `Y` would be the closing
 * bracket, in which case `-` is a literal member. There is no escaping
 * inside a class, so `]` can never be a member.
 *
 * @param char - The text character to test
 * @param body - Bracket contents, without the brackets
 * @param ignoreCase - Fold ASCII case of the character and range endpoints
 * @returns true if the character is in the class
 *
 * @public
 */
export function matchCharClass(char: string, body: string, ignoreCase = false): boolean {
  let i = 0
  let negated = false
  if (body[0] === '^') {
    negated = true
    i = 1
  }

  let matched = false
  while (i < body.length) {
    if (body[i + 1] === '-' && i + 2 < body.length) {
      let low = body[i]
      let high = body[i + 2]
      let probe = char
      if (ignoreCase) {
        low = foldCase(low)
        high = foldCase(high)
        probe = foldCase(probe)
      }
      if (probe >= low && probe <= high) {
        matched = true
      }
      i += 3
    } else {
      if (charsEqual(char, body[i], ignoreCase)) {
        matched = true
      }
      i++
    }
  }

  return negated ? !matched : matched
}
