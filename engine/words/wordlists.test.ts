/**
 * Word List Store Tests
 *
 * Each test gets its own temporary directory of lists.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { WordlistStore, createDefaultCollaborators, defaultWordlistDir } from './wordlists'
import { pronounceableWord } from './pronounceable'

let dir: string

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'wordlists-'))
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
})

describe('WordlistStore', () => {
  describe('lookupWord', () => {
    it('should pick from the non-blank lines of a list', () => {
      writeFileSync(join(dir, 'color.txt'), 'red\n\n  green  \r\nblue\n')
      const store = new WordlistStore(dir)

      expect(store.loadList('color')).toEqual(['red', 'green', 'blue'])
      for (let i = 0; i < 20; i++) {
        expect(['red', 'green', 'blue']).toContain(store.lookupWord('color'))
      }
    })

    it('should return the only entry of a one-line list', () => {
      writeFileSync(join(dir, 'single.txt'), 'lonely\n')
      expect(new WordlistStore(dir).lookupWord('single')).toBe('lonely')
    })

    it('should match list names case-insensitively', () => {
      writeFileSync(join(dir, 'verb.txt'), 'run\n')
      expect(new WordlistStore(dir).lookupWord('Verb')).toBe('run')
    })

    it('should return an empty string for an empty list', () => {
      writeFileSync(join(dir, 'empty.txt'), '\n\n')
      expect(new WordlistStore(dir).lookupWord('empty')).toBe('')
    })

    it('should return undefined for a missing list', () => {
      expect(new WordlistStore(dir).lookupWord('missing')).toBeUndefined()
    })

    it('should refuse names outside the directory', () => {
      const store = new WordlistStore(dir)
      expect(store.listPath('../secret')).toBeUndefined()
      expect(store.lookupWord('a/b')).toBeUndefined()
    })

    it('should sample complete lines from large files', () => {
      const words = Array.from({ length: 20_000 }, (_, i) => `word${i}`)
      writeFileSync(join(dir, 'big.txt'), words.join('\n') + '\n')
      const store = new WordlistStore(dir)

      for (let i = 0; i < 20; i++) {
        expect(store.lookupWord('big')).toMatch(/^word\d+$/)
      }
    })

    it('should keep serving cached lists until cleared', () => {
      writeFileSync(join(dir, 'fruit.txt'), 'apple\n')
      const store = new WordlistStore(dir)
      expect(store.lookupWord('fruit')).toBe('apple')

      writeFileSync(join(dir, 'fruit.txt'), 'pear\n')
      expect(store.lookupWord('fruit')).toBe('apple')

      store.clear()
      expect(store.lookupWord('fruit')).toBe('pear')
    })
  })

  describe('listNames', () => {
    it('should list the available lists', () => {
      writeFileSync(join(dir, 'b.txt'), 'x\n')
      writeFileSync(join(dir, 'a.txt'), 'x\n')
      writeFileSync(join(dir, 'patterns.cfg'), '{word}\n')

      expect(new WordlistStore(dir).listNames()).toEqual(['a', 'b'])
    })

    it('should return nothing for a missing directory', () => {
      expect(new WordlistStore(join(dir, 'nope')).listNames()).toEqual([])
    })
  })

  describe('patterns', () => {
    it('should parse named, bare and comment lines', () => {
      writeFileSync(
        join(dir, 'patterns.cfg'),
        '# comment\n\nclassic: {word}.{word}\n{number}{symbol}\ntime: {number(23)}:{number(59)}\n'
      )

      expect(new WordlistStore(dir).loadPatterns()).toEqual([
        { name: 'classic', pattern: '{word}.{word}' },
        { name: '', pattern: '{number}{symbol}' },
        { name: 'time', pattern: '{number(23)}:{number(59)}' },
      ])
    })

    it('should draw one of the patterns', () => {
      writeFileSync(join(dir, 'patterns.cfg'), 'only: {word}\n')
      expect(new WordlistStore(dir).randomPattern()).toEqual({ ok: true, value: '{word}' })
    })

    it('should fail without a patterns file', () => {
      const result = new WordlistStore(dir).randomPattern()
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.code).toBe('NO_PATTERNS')
      }
    })

    it('should fail with an empty patterns file', () => {
      writeFileSync(join(dir, 'patterns.cfg'), '# nothing yet\n')
      const result = new WordlistStore(dir).randomPattern()
      expect(result.ok ? undefined : result.error.code).toBe('NO_PATTERNS')
    })
  })
})

describe('createDefaultCollaborators', () => {
  it('should read lists through the store', () => {
    writeFileSync(join(dir, 'animal.txt'), 'otter\n')
    const collaborators = createDefaultCollaborators(new WordlistStore(dir))

    expect(collaborators.lookupWord('animal')).toBe('otter')
    expect(collaborators.numberToWords('12')).toBe('Twelve')
  })

  it('should find the bundled lists', () => {
    const store = new WordlistStore(defaultWordlistDir())
    expect(store.listNames()).toContain('4-letter')
    expect(store.loadPatterns().length).toBeGreaterThan(0)
  })
})

describe('pronounceableWord', () => {
  it('should produce lowercase letters without a doubled start', () => {
    for (let i = 0; i < 100; i++) {
      const word = pronounceableWord()
      expect(word).toMatch(/^[a-z]+$/)
      if (word.length >= 2) {
        expect(word[0]).not.toBe(word[1])
      }
      expect(word).not.toContain('cie')
    }
  })
})
