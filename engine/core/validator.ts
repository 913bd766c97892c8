/**
 * Pattern Validator
 *
 * Structural checks for patterns before they are accepted. The resolver
 * itself is lenient (an unmatched `{` is printed literally); this is the
 * strict check callers run up front.
 */

import { DEFAULT_GENERATOR_CONFIG } from '../types'
import { escapePattern } from './escaper'
import {
  findClosingBrace,
  scanModifierEnd,
  parseModifierSpec,
  parsePlaceholderContent,
} from './parser'
import { isKnownModifier } from '../modifiers'

// ============================================================================
// Types
// ============================================================================

export type ValidationSeverity = 'error' | 'warning' | 'info'

export interface ValidationIssue {
  severity: ValidationSeverity
  code: string
  message: string
  /** Offset in the escaped pattern, where the issue has one */
  position?: number
  suggestion?: string
}

export interface ValidationResult {
  valid: boolean
  issues: ValidationIssue[]
  errors: ValidationIssue[]
  warnings: ValidationIssue[]
}

export interface ValidateOptions {
  /** Deepest allowed placeholder nesting (default 50) */
  maxNestingDepth?: number
}

interface Span {
  open: number
  close: number
  /** Modifier specs written after the closing brace */
  suffixModifiers: string[]
  /** Index just past the span and its suffixes */
  end: number
}

// ============================================================================
// Main Validator
// ============================================================================

/**
 * Validate a pattern
 *
 * @example
 * validatePattern('{word}.{number')
 * // { valid: false, errors: [{ code: 'UNMATCHED_BRACES', ... }], ... }
 */
export function validatePattern(pattern: string, options: ValidateOptions = {}): ValidationResult {
  const issues: ValidationIssue[] = []

  if (pattern.trim() === '') {
    issues.push({
      severity: 'error',
      code: 'EMPTY_PATTERN',
      message: 'Pattern is empty',
    })
    return summarize(issues)
  }

  const escaped = escapePattern(pattern)

  validateStructure(escaped, issues)

  // Placeholder contents are only meaningful once the braces line up
  if (!issues.some((issue) => issue.severity === 'error')) {
    const maxDepth = options.maxNestingDepth ?? DEFAULT_GENERATOR_CONFIG.maxNestingDepth
    const state = { maxDepth, depthReported: false, spanCount: 0 }
    validatePlaceholders(escaped, 0, 0, state, issues)

    if (state.spanCount === 0) {
      issues.push({
        severity: 'info',
        code: 'NO_PLACEHOLDERS',
        message: 'Pattern has no placeholders and will always produce the same text',
      })
    }
  }

  return summarize(issues)
}

function summarize(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter((i) => i.severity === 'error')
  const warnings = issues.filter((i) => i.severity === 'warning')

  return {
    valid: errors.length === 0,
    issues,
    errors,
    warnings,
  }
}

// ============================================================================
// Structure
// ============================================================================

function countOf(text: string, char: string): number {
  return text.split(char).length - 1
}

function validateStructure(escaped: string, issues: ValidationIssue[]): void {
  let depth = 0
  for (let i = 0; i < escaped.length; i++) {
    if (escaped[i] === '{') {
      depth++
    } else if (escaped[i] === '}') {
      if (depth === 0) {
        issues.push({
          severity: 'error',
          code: 'UNEXPECTED_CLOSING_BRACE',
          message: `Closing brace at position ${i} has no opening brace`,
          position: i,
          suggestion: 'Escape a literal brace as \\}',
        })
        break
      }
      depth--
    }
  }

  if (countOf(escaped, '{') !== countOf(escaped, '}')) {
    issues.push({
      severity: 'error',
      code: 'UNMATCHED_BRACES',
      message: 'Unmatched braces in pattern',
      suggestion: 'Escape a literal brace as \\{ or \\}',
    })
  }

  if (countOf(escaped, '[') !== countOf(escaped, ']')) {
    issues.push({
      severity: 'error',
      code: 'UNMATCHED_BRACKETS',
      message: 'Unmatched brackets in pattern',
      suggestion: 'Escape a literal bracket as \\[ or \\]',
    })
  }

  if (countOf(escaped, '(') !== countOf(escaped, ')')) {
    issues.push({
      severity: 'error',
      code: 'UNMATCHED_PARENTHESES',
      message: 'Unmatched parentheses in pattern',
      suggestion: 'Escape a literal parenthesis as \\( or \\)',
    })
  }
}

// ============================================================================
// Placeholders
// ============================================================================

/**
 * Top-level spans of a text, scanned the way the resolver scans them
 */
function findSpans(text: string): Span[] {
  const spans: Span[] = []
  let i = 0

  while (i < text.length) {
    const open = text.indexOf('{', i)
    if (open === -1) break

    const close = findClosingBrace(text, open)
    if (close === -1) {
      i = open + 1
      continue
    }

    let end = close + 1
    if (text[end] === '[') {
      const qualifierEnd = text.indexOf(']', end)
      if (qualifierEnd !== -1) end = qualifierEnd + 1
    }

    const suffixModifiers: string[] = []
    while (text[end] === '+') {
      const modifierEnd = scanModifierEnd(text, end + 1)
      const spec = text.slice(end + 1, modifierEnd)
      if (spec) suffixModifiers.push(spec)
      end = modifierEnd
    }

    spans.push({ open, close, suffixModifiers, end })
    i = end
  }

  return spans
}

function withoutSpans(text: string, spans: Span[]): string {
  let result = ''
  let last = 0
  for (const span of spans) {
    result += text.slice(last, span.open) + 'x'
    last = span.end
  }
  return result + text.slice(last)
}

function checkModifier(spec: string, position: number, issues: ValidationIssue[]): void {
  const { name } = parseModifierSpec(spec)
  if (!isKnownModifier(name)) {
    issues.push({
      severity: 'warning',
      code: 'UNKNOWN_MODIFIER',
      message: `Unknown modifier "${name}" will make generation fail`,
      position,
      suggestion: 'Escape a literal plus sign as \\+',
    })
  }
}

function validatePlaceholders(
  text: string,
  offset: number,
  level: number,
  state: { maxDepth: number; depthReported: boolean; spanCount: number },
  issues: ValidationIssue[]
): void {
  const spans = findSpans(text)

  for (const span of spans) {
    state.spanCount++
    const position = offset + span.open

    const content = text.slice(span.open + 1, span.close)

    // Nothing below the limit is inspected
    if (level + 1 > state.maxDepth) {
      if (!state.depthReported) {
        state.depthReported = true
        issues.push({
          severity: 'warning',
          code: 'TOO_DEEPLY_NESTED',
          message: `Placeholders are nested deeper than ${state.maxDepth} levels`,
          position,
        })
      }
    } else {
      validatePlaceholders(content, position + 1, level + 1, state, issues)
    }

    const parsed = parsePlaceholderContent(withoutSpans(content, findSpans(content)))
    if (!parsed.alternatives && !parsed.literal) {
      for (const modifier of parsed.modifiers) {
        checkModifier(modifier.name, position, issues)
      }
    }

    for (const spec of span.suffixModifiers) {
      checkModifier(spec, position, issues)
    }
  }
}
