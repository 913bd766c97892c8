/**
 * Passforge Type Definitions
 *
 * Shared types for the pattern resolution engine: parsed placeholder
 * content, generator configuration, collaborator interfaces and the
 * result/error values that flow between the resolver and the session.
 */

import type { GenerationTrace } from '../core/trace'

// ============================================================================
// Placeholder Content
// ============================================================================

/**
 * A modifier attached to a placeholder: `+name(params)[qualifier]`
 */
export interface ModifierSpec {
  name: string
  params: string[]
  /** Percentage (0-100) chance that the modifier is applied */
  qualifier?: number
}

/**
 * Parsed form of the text inside one `{...}` pair.
 *
 * When `alternatives` is present every other field is left at its empty
 * default: the placeholder is a `a|b|c` choice and nothing else is parsed.
 */
export interface PlaceholderContent {
  /** Placeholder name; empty for a literal grouping */
  name: string
  /** True when the content is a literal grouping: empty name or leading whitespace */
  literal: boolean
  /** Quote-stripped parameters in declaration order */
  params: string[]
  /** Percentage (0-100) chance that the placeholder produces a value */
  qualifier?: number
  modifiers: ModifierSpec[]
  /** Raw sub-patterns of a `|` choice */
  alternatives?: string[]
}

// ============================================================================
// Results & Errors
// ============================================================================

export type ResolutionErrorCode =
  | 'UNKNOWN_MODIFIER'
  | 'UNKNOWN_WORDLIST'
  | 'TOO_DEEPLY_NESTED'
  | 'NO_PATTERNS'
  | 'COLLABORATOR_ERROR'

export interface ResolutionError {
  code: ResolutionErrorCode
  message: string
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ResolutionError }

export function ok<T>(value: T): Result<T> {
  return { ok: true, value }
}

export function err<T = never>(code: ResolutionErrorCode, message: string): Result<T> {
  return { ok: false, error: { code, message } }
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * The services the core consumes but does not implement.
 * Default implementations live in `engine/words`.
 */
export interface Collaborators {
  /** One entry from the named word list, or undefined when no such list exists */
  lookupWord(listName: string): string | undefined
  /** A pattern from the configured pattern source */
  randomPattern(): Result<string>
  /** English words for a numeric string */
  numberToWords(text: string): string
  /** A made-up word that can be read aloud */
  pronounceableWord(): string
}

// ============================================================================
// Configuration
// ============================================================================

export interface GeneratorConfig {
  /** Attempts per generate() call before the failsafe string is returned */
  maxAttempts: number
  /** Deepest allowed placeholder nesting */
  maxNestingDepth: number
  /** Directory holding `<name>.txt` word lists and `patterns.cfg` */
  wordlistDir?: string
}

/** Default generator configuration */
export const DEFAULT_GENERATOR_CONFIG: GeneratorConfig = {
  maxAttempts: 10,
  maxNestingDepth: 50,
}

// ============================================================================
// Generation Results
// ============================================================================

export interface GenerationResult {
  /** The generated password */
  text: string
  /** The pattern that was resolved (empty when no pattern could be obtained) */
  pattern: string
  /** Number of attempts made, including the successful one */
  attempts: number
  /** True when every attempt failed and the failsafe string was returned */
  failsafe: boolean
  /** Errors of the attempts that failed, in order */
  failures: ResolutionError[]
  /** Resolution trace - only present when tracing was enabled */
  trace?: GenerationTrace
}
