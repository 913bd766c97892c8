/**
 * Placeholder Parser
 *
 * Splits the text between a matched `{`...`}` pair into its parts:
 *
 *   alternatives := part ('|' part)+
 *   base         := name ('(' paramlist ')')? ('[' INT ']')?
 *   modifier     := name ('(' paramlist ')')? ('[' INT ']')?
 *
 * Separators nested inside `(...)` are never split on. Only the first
 * `[...]` and the first `(...)` of a base or modifier are honoured.
 */

import type { ModifierSpec, PlaceholderContent } from '../types'

// ============================================================================
// Brace Matching
// ============================================================================

/**
 * Find the `}` matching the `{` at `openIndex`.
 * Returns -1 when the pattern ends before the braces balance.
 */
export function findClosingBrace(text: string, openIndex: number): number {
  let depth = 0

  for (let i = openIndex; i < text.length; i++) {
    if (text[i] === '{') {
      depth++
    } else if (text[i] === '}') {
      depth--
      if (depth === 0) return i
    }
  }

  return -1
}

/**
 * Find where a post-brace modifier that starts at `start` ends: the next
 * `+`, `{`, whitespace or `.` outside parentheses, or the end of the text.
 *
 * @example
 * scanModifierEnd('+uppercase.{word}', 1)   // 10
 * scanModifierEnd('+replace(a, b)+a', 1)     // 14
 */
export function scanModifierEnd(text: string, start: number): number {
  let parenDepth = 0
  let i = start

  while (i < text.length) {
    const c = text[i]
    if (c === '(') {
      parenDepth++
    } else if (c === ')') {
      parenDepth--
    } else if (parenDepth === 0 && (c === '+' || c === '{' || c === '.' || /\s/.test(c))) {
      break
    }
    i++
  }

  return i
}

// ============================================================================
// Splitting
// ============================================================================

/**
 * Split on a separator character that is not nested inside parentheses
 */
export function splitTopLevel(content: string, separator: string): string[] {
  const parts: string[] = []
  let current = ''
  let depth = 0

  for (const char of content) {
    if (char === '(') {
      depth++
    } else if (char === ')') {
      depth--
    } else if (char === separator && depth === 0) {
      parts.push(current)
      current = ''
      continue
    }
    current += char
  }

  parts.push(current)
  return parts
}

/**
 * Split a parameter list on commas that are not nested inside parentheses
 * or braces, trimming each value and unwrapping quotes
 *
 * @example
 * parseParamList('" ", "-"')              // [' ', '-']
 * parseParamList('a,{number(1,2)}')       // ['a', '{number(1,2)}']
 */
export function parseParamList(paramList: string): string[] {
  const params: string[] = []
  let current = ''
  let depth = 0

  for (const char of paramList) {
    if (char === '(' || char === '{') {
      depth++
    } else if (char === ')' || char === '}') {
      depth--
    } else if (char === ',' && depth === 0) {
      params.push(current)
      current = ''
      continue
    }
    current += char
  }
  params.push(current)

  return params.map((param) => param.trim().replace(/^"+|"+$/g, ''))
}

/**
 * Parse an integer the way parameters and qualifiers are written: optional
 * sign, digits, surrounding whitespace. Anything else is undefined.
 */
export function parseInteger(text: string | undefined): number | undefined {
  if (text === undefined || !/^\s*[+-]?\d+\s*$/.test(text)) return undefined
  return parseInt(text, 10)
}

// ============================================================================
// Name / Params / Qualifier
// ============================================================================

interface NamedPart {
  name: string
  params: string[]
  qualifier?: number
}

/**
 * Index of the first `target` outside nested parentheses and braces, or -1
 */
function findTopLevel(text: string, target: string): number {
  let depth = 0
  for (let i = 0; i < text.length; i++) {
    const c = text[i]
    if (depth === 0 && c === target) return i
    if (c === '(' || c === '{') depth++
    else if (c === ')' || c === '}') depth--
  }
  return -1
}

/**
 * Index of the `)` closing the `(` at `open`, counting nested parentheses
 * and braces, or -1
 */
function findClosingParen(text: string, open: number): number {
  let depth = 0
  for (let i = open; i < text.length; i++) {
    const c = text[i]
    if (c === '(' || c === '{') {
      depth++
    } else if (c === ')' || c === '}') {
      depth--
      if (depth === 0) return c === ')' ? i : -1
    }
  }
  return -1
}

/**
 * Parse `name(params)[qualifier]`: the qualifier is taken out first, then the
 * parameter list; what remains is the name. Placeholders left in parameters
 * stay whole.
 */
function parseNamedPart(part: string): NamedPart {
  let text = part
  let qualifier: number | undefined

  const qualifierStart = findTopLevel(text, '[')
  if (qualifierStart !== -1) {
    const qualifierEnd = text.indexOf(']', qualifierStart)
    if (qualifierEnd !== -1) {
      qualifier = parseInteger(text.slice(qualifierStart + 1, qualifierEnd))
      text = text.slice(0, qualifierStart) + text.slice(qualifierEnd + 1)
    }
  }

  const paramStart = text.indexOf('(')
  if (paramStart !== -1) {
    const paramEnd = findClosingParen(text, paramStart)
    if (paramEnd !== -1) {
      return {
        name: text.slice(0, paramStart).trim(),
        params: parseParamList(text.slice(paramStart + 1, paramEnd)),
        qualifier,
      }
    }
  }

  return { name: text.trim(), params: [], qualifier }
}

/**
 * Parse a single modifier, e.g. `replace(" ", "-")[50]`
 */
export function parseModifierSpec(spec: string): ModifierSpec {
  const { name, params, qualifier } = parseNamedPart(spec)
  return { name, params, qualifier }
}

// ============================================================================
// Placeholder Content
// ============================================================================

/**
 * Parse the content of one placeholder.
 *
 * @example
 * parsePlaceholderContent('word(animal)[50]+uppercase')
 * // { name: 'word', params: ['animal'], qualifier: 50,
 * //   modifiers: [{ name: 'uppercase', params: [] }], literal: false }
 *
 * parsePlaceholderContent('red|green|blue')
 * // { alternatives: ['red', 'green', 'blue'], name: '', ... }
 */
export function parsePlaceholderContent(content: string): PlaceholderContent {
  const alternatives = splitTopLevel(content, '|')
  if (alternatives.length > 1) {
    return { name: '', literal: false, params: [], modifiers: [], alternatives }
  }

  const [base, ...modifierParts] = splitTopLevel(content, '+')
  const modifiers = modifierParts
    .filter((part) => part.trim() !== '')
    .map(parseModifierSpec)

  const { name, params, qualifier } = parseNamedPart(base)

  return {
    name,
    literal: name === '' || /^\s/.test(content),
    params,
    qualifier,
    modifiers,
  }
}

/**
 * Parse a backreference placeholder (`$W<n>`).
 * Returns the key, or undefined when the content is not a backreference.
 * A malformed key yields NaN so that it resolves to nothing.
 */
export function parseBackreference(content: string): number | undefined {
  if (!content.startsWith('$W')) return undefined
  return parseInteger(content.slice(2)) ?? NaN
}
