/**
 * Password Generator
 *
 * Main entry point: turns a pattern (given, or drawn from the pattern
 * source) into a password. Every attempt resolves with a fresh
 * backreference store; a failed attempt is discarded and retried, and
 * when the retry budget runs out a failsafe password is returned instead.
 */

import { DEFAULT_GENERATOR_CONFIG, ok, err } from '../types'
import type { Collaborators, GenerationResult, GeneratorConfig, ResolutionError, Result } from '../types'
import { escapePattern, unescape } from './escaper'
import { createContext, type ResolutionContext } from './context'
import { PatternResolver } from './resolver'
import { beginTraceNode, endTraceNode, unwindTraceTo, createTraceContext, extractTrace } from './trace'
import { pickOne } from '../random'
import { VOWEL_CLUSTERS, CONSONANT_CLUSTERS, THREE_LETTER_WORDS } from '../builtins/alphabets'
import { WordlistStore, createDefaultCollaborators } from '../words/wordlists'

// ============================================================================
// Types
// ============================================================================

export interface GeneratorOptions {
  config?: Partial<GeneratorConfig>
  /** Word lists, pattern source and text helpers; file-backed by default */
  collaborators?: Collaborators
}

export interface GenerateOptions {
  /** Enable trace mode to capture how the password was built */
  enableTrace?: boolean
}

interface AttemptOutcome {
  pattern: string
  text: string
}

const FAILSAFE_PARTS = 7
const FAILSAFE_ALPHABET =
  VOWEL_CLUSTERS +
  " ! @ # % $ ^ & * : ' / ` ~ * - < > + = . . , , ; ; ? ? " +
  CONSONANT_CLUSTERS +
  ' ' +
  THREE_LETTER_WORDS +
  ' 1 2 3 4 5 6 7 8 9 0'

// ============================================================================
// Generator Class
// ============================================================================

export class PasswordGenerator {
  private config: GeneratorConfig
  private collaborators: Collaborators
  private resolver: PatternResolver
  private lastPattern = ''
  private lastPassword = ''

  constructor(options: GeneratorOptions = {}) {
    this.config = {
      maxAttempts: options.config?.maxAttempts ?? DEFAULT_GENERATOR_CONFIG.maxAttempts,
      maxNestingDepth: options.config?.maxNestingDepth ?? DEFAULT_GENERATOR_CONFIG.maxNestingDepth,
      wordlistDir: options.config?.wordlistDir,
    }

    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${this.config.maxAttempts}`)
    }
    if (!Number.isInteger(this.config.maxNestingDepth) || this.config.maxNestingDepth < 1) {
      throw new Error(`maxNestingDepth must be a positive integer, got ${this.config.maxNestingDepth}`)
    }

    this.collaborators =
      options.collaborators ?? createDefaultCollaborators(new WordlistStore(this.config.wordlistDir))
    this.resolver = new PatternResolver(this.collaborators)
  }

  // ==========================================================================
  // Generation
  // ==========================================================================

  /**
   * Generate a password. Without a pattern (or with an empty one) a pattern
   * is drawn from the pattern source on every attempt.
   *
   * @example
   * generator.generate('{word}.{word}.{number(99)}')  // e.g. 'bone.lark.42'
   */
  generate(pattern?: string): string {
    return this.generateDetailed(pattern).text
  }

  /**
   * Generate a password and report how it was produced
   */
  generateDetailed(pattern?: string, options: GenerateOptions = {}): GenerationResult {
    const trace = options.enableTrace ? createTraceContext() : undefined
    const sessionCtx = createContext(this.config, trace)
    beginTraceNode(sessionCtx, 'root', 'generate', { raw: pattern ?? '' })

    const failures: ResolutionError[] = []

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      const ctx = createContext(this.config, trace)
      const node = beginTraceNode(ctx, 'attempt', `Attempt ${attempt}`, { raw: pattern ?? '' })

      const outcome = this.runAttempt(pattern, ctx)

      if (outcome.ok) {
        endTraceNode(ctx, { value: outcome.value.text })
        endTraceNode(sessionCtx, { value: outcome.value.text })

        this.lastPattern = outcome.value.pattern
        this.lastPassword = outcome.value.text

        return {
          text: outcome.value.text,
          pattern: outcome.value.pattern,
          attempts: attempt,
          failsafe: false,
          failures,
          trace: extractTrace(trace),
        }
      }

      failures.push(outcome.error)
      console.warn(`Generation attempt ${attempt} failed: ${outcome.error.message}`)
      unwindTraceTo(ctx, node, outcome.error.message)
      endTraceNode(ctx, { value: '', error: outcome.error.message })
    }

    const text = this.failsafe()
    console.warn(`All ${this.config.maxAttempts} generation attempts failed, using failsafe password`)
    endTraceNode(sessionCtx, { value: text, error: 'failsafe' })

    this.lastPassword = text

    return {
      text,
      pattern: pattern ?? '',
      attempts: this.config.maxAttempts,
      failsafe: true,
      failures,
      trace: extractTrace(trace),
    }
  }

  /**
   * One attempt: escape, resolve, unescape, collapse repeated spaces, trim.
   * Exceptions thrown by collaborators count as a failed attempt.
   */
  private runAttempt(pattern: string | undefined, ctx: ResolutionContext): Result<AttemptOutcome> {
    try {
      const source = pattern ? ok(pattern) : this.collaborators.randomPattern()
      if (!source.ok) return source

      const resolved = this.resolver.resolvePattern(escapePattern(source.value), ctx)
      if (!resolved.ok) return resolved

      const text = unescape(resolved.value).replace(/ {2,}/g, ' ').trim()
      return ok({ pattern: source.value, text })
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return err('COLLABORATOR_ERROR', message)
    }
  }

  private failsafe(): string {
    let text = ''
    for (let i = 0; i < FAILSAFE_PARTS; i++) {
      text += pickOne(FAILSAFE_ALPHABET)
    }
    return text
  }

  // ==========================================================================
  // Session State
  // ==========================================================================

  /** The pattern of the last successful generation */
  getLastPattern(): string {
    return this.lastPattern
  }

  /** The last password returned, failsafe included */
  getLastPassword(): string {
    return this.lastPassword
  }

  getConfig(): GeneratorConfig {
    return { ...this.config }
  }
}

// ============================================================================
// Convenience
// ============================================================================

/**
 * Generate one password with a throwaway generator
 *
 * @example
 * generatePassword('{word+uppercase}{number(99)}')  // e.g. 'DRAGON42'
 */
export function generatePassword(pattern?: string, options: GeneratorOptions = {}): string {
  return new PasswordGenerator(options).generate(pattern)
}

// ============================================================================
// Exports
// ============================================================================

export * from '../types'
export { PatternResolver } from './resolver'
export { validatePattern, type ValidationResult, type ValidationIssue } from './validator'
export { formatTrace, type GenerationTrace, type TraceNode, type TraceStats } from './trace'
export { escapePattern, escapeValue, unescape } from './escaper'
export { applyModifier, isKnownModifier, MODIFIER_NAMES } from '../modifiers'
export { resolveBuiltin, BUILTIN_NAMES } from '../builtins'
export { rand, chance, pickOne, pickCharacter } from '../random'
export { WordlistStore, createDefaultCollaborators, defaultWordlistDir, type PatternEntry } from '../words/wordlists'
export { numberToWords } from '../words/number-text'
export { pronounceableWord } from '../words/pronounceable'
