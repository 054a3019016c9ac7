/**
 * Matching: search driver, recursive matcher, atoms and character classes.
 * @packageDocumentation
 */

export { search } from './search'
export { matchCharClass } from './char-class'
