/**
 * Word Lists & Patterns
 *
 * File-backed word lists (`<name>.txt`, one entry per line) and the
 * `patterns.cfg` pattern source, with an explicit per-store cache.
 */

import { closeSync, existsSync, openSync, readFileSync, readSync, readdirSync, statSync } from 'node:fs'
import { join, resolve } from 'node:path'
import { ok, err } from '../types'
import type { Collaborators, Result } from '../types'
import { rand, randomIndex } from '../random'
import { numberToWords } from './number-text'
import { pronounceableWord } from './pronounceable'

// ============================================================================
// Types
// ============================================================================

export interface PatternEntry {
  /** Label before the first colon; empty for bare lines */
  name: string
  pattern: string
}

/** Files at or above this size are sampled instead of loaded */
const LARGE_FILE_BYTES = 100_000
const SAMPLE_BYTES = 128
const SAMPLE_TRIES = 5

export const PATTERNS_FILE = 'patterns.cfg'

/**
 * The bundled word-list directory, found from the source tree or from the
 * compiled output under dist/
 */
export function defaultWordlistDir(): string {
  const candidates = [
    resolve(__dirname, '../../data/wordlists'),
    resolve(__dirname, '../../../data/wordlists'),
  ]
  return candidates.find((dir) => existsSync(dir)) ?? candidates[0]
}

function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '')
}

// ============================================================================
// Store
// ============================================================================

export class WordlistStore {
  readonly directory: string
  private cache: Map<string, string[]> = new Map()
  private patterns?: PatternEntry[]

  constructor(directory: string = defaultWordlistDir()) {
    this.directory = directory
  }

  /**
   * Path of a list's file, or undefined for names that would leave the
   * directory. Names are case-insensitive; files are stored lowercase.
   */
  listPath(name: string): string | undefined {
    const key = name.trim().toLowerCase()
    if (!key || /[\\/]/.test(key) || key.includes('..')) return undefined
    return join(this.directory, key.endsWith('.txt') ? key : `${key}.txt`)
  }

  /**
   * All entries of a list, cached after the first read.
   * Undefined when the list does not exist.
   */
  loadList(name: string): string[] | undefined {
    const key = name.trim().toLowerCase()
    const cached = this.cache.get(key)
    if (cached) return cached

    const path = this.listPath(name)
    if (path === undefined || !existsSync(path)) return undefined

    const words = splitLines(readFileSync(path, 'utf8'))
    this.cache.set(key, words)
    return words
  }

  /**
   * One uniformly chosen entry of a list; an empty list yields ''.
   * Undefined when the list does not exist.
   */
  lookupWord(name: string): string | undefined {
    const path = this.listPath(name)
    if (path === undefined || !existsSync(path)) return undefined

    if (!this.cache.has(name.trim().toLowerCase())) {
      const size = statSync(path).size
      if (size >= LARGE_FILE_BYTES) {
        const sampled = this.sampleLargeFile(path, size)
        if (sampled !== undefined) return sampled
      }
    }

    const words = this.loadList(name) ?? []
    if (words.length === 0) return ''
    return words[randomIndex(words.length)]
  }

  /**
   * Read a small window at a random offset and take the first complete
   * line in it
   */
  private sampleLargeFile(path: string, size: number): string | undefined {
    const fd = openSync(path, 'r')
    try {
      const buffer = Buffer.alloc(SAMPLE_BYTES)
      for (let i = 0; i < SAMPLE_TRIES; i++) {
        const position = rand(size - SAMPLE_BYTES, 1)
        const bytesRead = readSync(fd, buffer, 0, SAMPLE_BYTES, position)
        const lines = buffer.toString('utf8', 0, bytesRead).split('\n')
        if (lines.length >= 3) {
          const word = lines[1].trim()
          if (word) return word
        }
      }
      return undefined
    } finally {
      closeSync(fd)
    }
  }

  /**
   * Names of the available lists, sorted
   */
  listNames(): string[] {
    if (!existsSync(this.directory)) return []
    return readdirSync(this.directory)
      .filter((file) => file.endsWith('.txt'))
      .map((file) => file.slice(0, -'.txt'.length))
      .sort()
  }

  // ==========================================================================
  // Patterns
  // ==========================================================================

  /**
   * Parse `patterns.cfg`: blank lines and `#` comments are skipped,
   * `name: pattern` splits on the first colon, other lines are unnamed
   */
  loadPatterns(): PatternEntry[] {
    if (this.patterns) return this.patterns

    const path = join(this.directory, PATTERNS_FILE)
    if (!existsSync(path)) return []

    this.patterns = splitLines(readFileSync(path, 'utf8'))
      .filter((line) => !line.startsWith('#'))
      .map((line) => {
        const colon = line.indexOf(':')
        return colon === -1
          ? { name: '', pattern: line }
          : { name: line.slice(0, colon).trim(), pattern: line.slice(colon + 1).trim() }
      })

    return this.patterns
  }

  randomPattern(): Result<string> {
    const patterns = this.loadPatterns()
    if (patterns.length === 0) {
      return err('NO_PATTERNS', `No patterns found in ${join(this.directory, PATTERNS_FILE)}`)
    }
    return ok(patterns[randomIndex(patterns.length)].pattern)
  }

  clear(): void {
    this.cache.clear()
    this.patterns = undefined
  }
}

// ============================================================================
// Default Collaborators
// ============================================================================

/**
 * The file-backed collaborators a generator uses when none are given
 */
export function createDefaultCollaborators(store: WordlistStore = new WordlistStore()): Collaborators {
  return {
    lookupWord: (name) => store.lookupWord(name),
    randomPattern: () => store.randomPattern(),
    numberToWords,
    pronounceableWord,
  }
}
