/**
 * Modifier Pipeline Tests
 */

import { describe, it, expect } from 'vitest'
import { applyModifier, isKnownModifier, MODIFIER_NAMES } from './index'
import type { ModifierDependencies } from './index'
import type { Result } from '../types'

// ============================================================================
// Helper Functions
// ============================================================================

const deps: ModifierDependencies = {
  numberToWords: (text) => `NUMBER ${text}`,
}

function apply(word: string, name: string, params: string[] = []): string {
  const result = applyModifier(word, name, params, deps)
  if (!result.ok) throw new Error(result.error.message)
  return result.value
}

function errorCode(result: Result<string>): string | undefined {
  return result.ok ? undefined : result.error.code
}

// ============================================================================
// Dispatch
// ============================================================================

describe('applyModifier dispatch', () => {
  it('should match names case-insensitively', () => {
    expect(apply('apple', 'PigLatin')).toBe('appleyay')
    expect(apply('abc', ' UPPERCASE ')).toBe('ABC')
  })

  it('should fail on an unknown modifier', () => {
    const result = applyModifier('word', 'frobnicate', [], deps)
    expect(errorCode(result)).toBe('UNKNOWN_MODIFIER')
  })

  it('should fail on an unknown modifier even for an empty word', () => {
    expect(errorCode(applyModifier('', 'frobnicate', [], deps))).toBe('UNKNOWN_MODIFIER')
  })

  it('should pass an empty word through a known modifier', () => {
    expect(applyModifier('', 'quote', [], deps)).toEqual({ ok: true, value: '' })
  })

  it('should list every name it dispatches', () => {
    expect(MODIFIER_NAMES).toContain('romannumeral')
    expect(MODIFIER_NAMES).toContain('ucase')
    expect(isKnownModifier(' Stutter ')).toBe(true)
    expect(isKnownModifier('frobnicate')).toBe(false)
  })
})

// ============================================================================
// Individual Modifiers
// ============================================================================

describe('case modifiers', () => {
  it('should transform case', () => {
    expect(apply('Hello World', 'uppercase')).toBe('HELLO WORLD')
    expect(apply('Hello World', 'lcase')).toBe('hello world')
    expect(apply('hello wORLD', 'propercase')).toBe('Hello World')
    expect(apply('hELLO wORLD', 'sentencecase')).toBe('Hello world')
  })
})

describe('article modifier', () => {
  it('should choose a or an by the first letter', () => {
    expect(apply('apple', 'a')).toBe('an apple')
    expect(apply('Orange', 'a')).toBe('an Orange')
    expect(apply('pear', 'a')).toBe('a pear')
  })
})

describe('substring modifiers', () => {
  it('should take from the left', () => {
    expect(apply('hello', 'left', ['2'])).toBe('he')
    expect(apply('hello', 'left', ['10'])).toBe('hello')
    expect(apply('hello', 'left')).toBe('hello')
  })

  it('should take from the right', () => {
    expect(apply('hello', 'right', ['3'])).toBe('llo')
    expect(apply('hello', 'right', ['10'])).toBe('hello')
    expect(apply('hello', 'right', ['0'])).toBe('')
  })

  it('should take from the middle with a 1-based start', () => {
    expect(apply('hello', 'mid', ['2', '3'])).toBe('ell')
    expect(apply('hello', 'mid', ['4', '10'])).toBe('lo')
    expect(apply('hello', 'mid')).toBe('h')
  })

  it('should fall back to defaults for malformed numbers', () => {
    expect(apply('hello', 'left', ['two'])).toBe('hello')
    expect(apply('ab', 'repeat', ['x'])).toBe('abab')
  })
})

describe('text modifiers', () => {
  it('should reverse', () => {
    expect(apply('abc', 'reverse')).toBe('cba')
  })

  it('should replace every occurrence', () => {
    expect(apply('banana', 'replace', ['a', '4'])).toBe('b4n4n4')
    expect(apply('banana', 'replace', [])).toBe('banana')
  })

  it('should repeat n extra times', () => {
    expect(apply('ab', 'repeat', ['2'])).toBe('ababab')
    expect(apply('ab', 'repeat')).toBe('abab')
  })

  it('should trim', () => {
    expect(apply('  hi ', 'trim')).toBe('hi')
  })

  it('should quote and hide', () => {
    expect(apply('x', 'quote')).toBe('"x"')
    expect(apply('x', 'hide')).toBe('')
  })

  it('should swap initials', () => {
    expect(apply('blue moon', 'swap')).toBe('mlue boon')
  })

  it('should bracket with supplied pairs', () => {
    expect(apply('x', 'bracket', ['< >'])).toBe('<x>')
  })
})

describe('number modifiers', () => {
  it('should convert to roman numerals', () => {
    expect(apply('4', 'romannumeral')).toBe('IV')
    expect(apply('9', 'romannumeral')).toBe('IX')
    expect(apply('1994', 'romannumeral')).toBe('MCMXCIV')
  })

  it('should pass non-numeric input through romannumeral', () => {
    expect(apply('abc', 'romannumeral')).toBe('abc')
  })

  it('should sentence-case the number words', () => {
    expect(apply('5', 'num2words')).toBe('Number 5')
    expect(apply('5', 'num2word')).toBe('Number 5')
  })

  it('should zero-pad to the mask width', () => {
    expect(apply('7', 'format', ['000'])).toBe('007')
    expect(apply('7', 'format', ['#'])).toBe('7')
    expect(apply('7', 'format')).toBe('7')
  })
})

describe('random modifier', () => {
  it('should apply one of the random set', () => {
    for (let i = 0; i < 30; i++) {
      const result = applyModifier('abc', 'random', [], deps)
      expect(result.ok).toBe(true)
    }
  })
})
