import { describe, it, expect } from 'vitest'

import { SafetyLimiter } from '../limits'
import { createMatchState, type MatchContext } from './context'
import { matchAtom } from './atom'

function context(pattern: string, text: string, ignoreCase = false): MatchContext {
  return { pattern, text, state: createMatchState(ignoreCase), limiter: new SafetyLimiter() }
}

describe('matchAtom', () => {
  describe('literals', () => {
    it('matches a literal character', () => {
      expect(matchAtom(context('abc', 'abc'), 0, 0)).toEqual({ next: 1, repeat: 1 })
      expect(matchAtom(context('abc', 'abc'), 1, 1)).toEqual({ next: 2, repeat: 1 })
    })

    it('rejects a different character', () => {
      expect(matchAtom(context('a', 'b'), 0, 0)).toBeNull()
    })

    it('folds case when ignoring case', () => {
      expect(matchAtom(context('A', 'a', true), 0, 0)).toEqual({ next: 1, repeat: 1 })
      expect(matchAtom(context('A', 'a'), 0, 0)).toBeNull()
    })

    it('never matches past the end of text', () => {
      expect(matchAtom(context('a', 'abc'), 0, 3)).toBeNull()
      expect(matchAtom(context('.', ''), 0, 0)).toBeNull()
    })
  })

  describe('escapes', () => {
    it('matches the escaped character literally', () => {
      expect(matchAtom(context('\\.', '.'), 0, 0)).toEqual({ next: 2, repeat: 1 })
      expect(matchAtom(context('\\.', 'x'), 0, 0)).toBeNull()
      expect(matchAtom(context('\\*', '*'), 0, 0)).toEqual({ next: 2, repeat: 1 })
    })

    it('folds case on escaped characters when ignoring case', () => {
      expect(matchAtom(context('\\A', 'a', true), 0, 0)).toEqual({ next: 2, repeat: 1 })
      expect(matchAtom(context('\\A', 'a'), 0, 0)).toBeNull()
    })

    it('matches an escaped backslash', () => {
      expect(matchAtom(context('\\\\', '\\'), 0, 0)).toEqual({ next: 2, repeat: 1 })
    })

    it('treats a trailing backslash as a literal', () => {
      expect(matchAtom(context('a\\', 'a\\'), 1, 1)).toEqual({ next: 2, repeat: 1 })
    })
  })

  describe('classes and dot', () => {
    it('matches a class and skips past its closing bracket', () => {
      expect(matchAtom(context('[0-9]x', '5'), 0, 0)).toEqual({ next: 5, repeat: 1 })
      expect(matchAtom(context('[0-9]x', 'a'), 0, 0)).toBeNull()
    })

    it('never matches an unterminated class and records no error', () => {
      const ctx = context('[0-9', '5')
      expect(matchAtom(ctx, 0, 0)).toBeNull()
      expect(ctx.state.error).toBe('OK')
    })

    it('matches any character with dot', () => {
      expect(matchAtom(context('.', 'z'), 0, 0)).toEqual({ next: 1, repeat: 1 })
      expect(matchAtom(context('.', '\n'), 0, 0)).toEqual({ next: 1, repeat: 1 })
    })
  })

  describe('{n} repeat counts', () => {
    it('parses an exact count', () => {
      expect(matchAtom(context('a{3}', 'a'), 0, 0)).toEqual({ next: 4, repeat: 3 })
      expect(matchAtom(context('a{12}b', 'a'), 0, 0)).toEqual({ next: 5, repeat: 12 })
      expect(matchAtom(context('[0-9]{4}', '7'), 0, 0)).toEqual({ next: 8, repeat: 4 })
    })

    it.each(['[0-9]{abc}', '[0-9]{0}', '[0-9]{ }', '[0-9]{', 'a{}', 'a{3'])(
      'records MALFORMED_PATTERN for %s',
      (pattern) => {
        const ctx = context(pattern, pattern.startsWith('a') ? 'a' : '1')
        expect(matchAtom(ctx, 0, 0)).toBeNull()
        expect(ctx.state.error).toBe('MALFORMED_PATTERN')
      },
    )

    it('does not inspect the count when the atom does not match', () => {
      const ctx = context('a{0}', 'b')
      expect(matchAtom(ctx, 0, 0)).toBeNull()
      expect(ctx.state.error).toBe('OK')
    })

    it('keeps an earlier error', () => {
      const ctx = context('a{0}', 'a')
      ctx.state.error = 'BACKTRACK_LIMIT'
      expect(matchAtom(ctx, 0, 0)).toBeNull()
      expect(ctx.state.error).toBe('BACKTRACK_LIMIT')
    })
  })
})
