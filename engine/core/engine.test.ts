/**
 * Password Generator Tests
 *
 * Session behavior: retries, fresh backreferences per attempt, the
 * failsafe password and tracing.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { PasswordGenerator, generatePassword } from './index'
import { ok, err } from '../types'
import type { Collaborators } from '../types'

// ============================================================================
// Helper Functions
// ============================================================================

const lists = new Map<string, string[]>([
  ['4-letter', ['bark']],
  ['animal', ['otter']],
])

function createCollaborators(overrides: Partial<Collaborators> = {}): Collaborators {
  return {
    lookupWord: (name) => lists.get(name)?.[0],
    randomPattern: () => ok('{word}-{word(animal)}'),
    numberToWords: (text) => `number ${text}`,
    pronounceableWord: () => 'zoberat',
    ...overrides,
  }
}

function createGenerator(overrides: Partial<Collaborators> = {}, maxAttempts?: number): PasswordGenerator {
  return new PasswordGenerator({
    collaborators: createCollaborators(overrides),
    config: { maxAttempts },
  })
}

// ============================================================================
// Tests
// ============================================================================

describe('PasswordGenerator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('configuration', () => {
    it('should apply defaults', () => {
      const generator = new PasswordGenerator({ collaborators: createCollaborators() })
      expect(generator.getConfig()).toEqual({ maxAttempts: 10, maxNestingDepth: 50, wordlistDir: undefined })
    })

    it('should reject a non-positive attempt budget', () => {
      expect(() => createGenerator({}, 0)).toThrow('maxAttempts must be a positive integer, got 0')
    })
  })

  describe('generate', () => {
    it('should resolve a given pattern', () => {
      const generator = createGenerator()
      expect(generator.generate('{word}.{word(animal)}')).toBe('bark.otter')
      expect(generator.getLastPattern()).toBe('{word}.{word(animal)}')
      expect(generator.getLastPassword()).toBe('bark.otter')
    })

    it('should always drop a 0% placeholder', () => {
      const generator = createGenerator()
      for (let i = 0; i < 20; i++) {
        expect(generator.generate('A{symbol[0]}B')).toBe('AB')
      }
    })

    it('should join word placeholders without a separator', () => {
      expect(createGenerator().generate('{word(4-letter)}{word(4-letter)}')).toBe('barkbark')
    })

    it('should repeat a value through a backreference', () => {
      expect(createGenerator().generate('{word(animal)}{$W1}')).toBe('otterotter')
    })

    it('should collapse repeated spaces and trim', () => {
      expect(createGenerator().generate('  {word}   {word}  ')).toBe('bark bark')
    })

    it('should draw a pattern when none is given', () => {
      const generator = createGenerator()
      expect(generator.generate()).toBe('bark-otter')
      expect(generator.generate('')).toBe('bark-otter')
      expect(generator.getLastPattern()).toBe('{word}-{word(animal)}')
    })

    it('should work through the convenience function', () => {
      expect(generatePassword('{word}!', { collaborators: createCollaborators() })).toBe('bark!')
    })
  })

  describe('retries', () => {
    it('should report a first-attempt success', () => {
      const result = createGenerator().generateDetailed('{word}')
      expect(result).toEqual({
        text: 'bark',
        pattern: '{word}',
        attempts: 1,
        failsafe: false,
        failures: [],
        trace: undefined,
      })
    })

    it('should retry after a collaborator throws', () => {
      let calls = 0
      const generator = createGenerator({
        lookupWord: (name) => {
          calls++
          if (calls === 1) throw new Error('disk unavailable')
          return lists.get(name)?.[0]
        },
      })

      const result = generator.generateDetailed('{word}')
      expect(result.text).toBe('bark')
      expect(result.attempts).toBe(2)
      expect(result.failures).toEqual([{ code: 'COLLABORATOR_ERROR', message: 'disk unavailable' }])
      expect(console.warn).toHaveBeenCalledWith('Generation attempt 1 failed: disk unavailable')
    })

    it('should start every attempt with a fresh backreference store', () => {
      let counter = 0
      let flakyCalls = 0
      const generator = createGenerator({
        lookupWord: (name) => {
          if (name === 'seq') return `w${++counter}`
          if (name === 'flaky') {
            flakyCalls++
            if (flakyCalls === 1) throw new Error('flaky')
            return 'ok'
          }
          return undefined
        },
      })

      expect(generator.generate('{word(seq)}{word(flaky)}{$W1}')).toBe('w2okw2')
    })

    it('should fall back to the failsafe when every attempt fails', () => {
      const result = createGenerator({}, 3).generateDetailed('{word+frobnicate}')

      expect(result.failsafe).toBe(true)
      expect(result.attempts).toBe(3)
      expect(result.failures.map((f) => f.code)).toEqual([
        'UNKNOWN_MODIFIER',
        'UNKNOWN_MODIFIER',
        'UNKNOWN_MODIFIER',
      ])
      expect(result.text).toMatch(/^\S+$/)
      expect(console.warn).toHaveBeenCalledWith('All 3 generation attempts failed, using failsafe password')
    })

    it('should use the failsafe when no pattern can be drawn', () => {
      const generator = createGenerator({ randomPattern: () => err('NO_PATTERNS', 'no patterns') }, 2)
      const result = generator.generateDetailed()

      expect(result.failsafe).toBe(true)
      expect(result.pattern).toBe('')
      expect(result.failures).toEqual([
        { code: 'NO_PATTERNS', message: 'no patterns' },
        { code: 'NO_PATTERNS', message: 'no patterns' },
      ])
      expect(generator.getLastPassword()).toBe(result.text)
    })

    it('should fail a missing word list and retry', () => {
      const result = createGenerator({}, 2).generateDetailed('{word(missing)}')
      expect(result.failures.map((f) => f.code)).toEqual(['UNKNOWN_WORDLIST', 'UNKNOWN_WORDLIST'])
    })
  })

  describe('trace', () => {
    it('should nest attempts under the root node', () => {
      const result = createGenerator().generateDetailed('{word}', { enableTrace: true })

      const root = result.trace?.root
      expect(root?.type).toBe('root')
      expect(root?.output.value).toBe('bark')
      expect(root?.children.map((child) => child.type)).toEqual(['attempt'])
      expect(root?.children[0].children.map((child) => child.type)).toEqual(['placeholder'])
    })

    it('should mark failed attempts with their error', () => {
      const result = createGenerator({}, 2).generateDetailed('{word+frobnicate}', { enableTrace: true })

      const attempts = result.trace?.root.children ?? []
      expect(attempts).toHaveLength(2)
      expect(attempts[0].output.error).toBe('Unknown modifier: frobnicate')
      expect(attempts[0].children[0].type).toBe('placeholder')
      expect(attempts[0].children[0].output.error).toBe('Unknown modifier: frobnicate')
      expect(result.trace?.root.output.error).toBe('failsafe')
    })
  })
})
