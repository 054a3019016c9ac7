import { describe, it, expect } from 'vitest'

import { MATCH_ERROR_VALUES, describeMatchError, errorCodeValue, RegexLimitError } from './errors'

describe('match error codes', () => {
  it('keeps stable numeric values', () => {
    expect(MATCH_ERROR_VALUES).toEqual({
      OK: 0,
      NO_MATCH: 1,
      PATTERN_TOO_LONG: 2,
      RECURSION_DEPTH: 3,
      BACKTRACK_LIMIT: 4,
      MALFORMED_PATTERN: 5,
    })
    expect(errorCodeValue('RECURSION_DEPTH')).toBe(3)
  })

  it('describes every code', () => {
    expect(describeMatchError('NO_MATCH')).toBe('Pattern does not occur in text')
    expect(describeMatchError('BACKTRACK_LIMIT')).toBe('Match exceeded the configured maximum backtrack steps')
  })
})

describe('RegexLimitError', () => {
  it('carries the code and the exceeded ceiling', () => {
    const error = new RegexLimitError('RECURSION_DEPTH', 'too deep', 128, 129)

    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('RegexLimitError')
    expect(error.message).toBe('too deep')
    expect(error.code).toBe('RECURSION_DEPTH')
    expect(error.limit).toBe(128)
    expect(error.actual).toBe(129)
  })
})
