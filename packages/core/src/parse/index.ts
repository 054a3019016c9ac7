/**
 * Pattern validation utilities.
 * @packageDocumentation
 */

export { validatePattern, isValidPattern } from './validator'
