/**
 * Modifier Pipeline
 *
 * Named text transforms chained onto a placeholder with `+name(params)`.
 * Each entry parses its raw string parameters into a typed struct with
 * documented defaults, then applies itself to the word.
 */

import { ok, err } from '../types'
import type { Result } from '../types'
import { parseInteger } from '../core/parser'
import { pickOne } from '../random'
import {
  bracket,
  fakeword,
  obscure,
  pigLatin,
  randomCase,
  scrambleWord,
  sentenceCase,
  stutter,
  swapInitials,
  titleCase,
  toRoman,
  zeroFill,
} from './transforms'

// ============================================================================
// Types
// ============================================================================

export interface ModifierDependencies {
  numberToWords: (text: string) => string
}

type ModifierHandler = (word: string, params: readonly string[], deps: ModifierDependencies) => string

interface ModifierDefinition<P> {
  /** Turn raw parameters into the modifier's parameter struct */
  params: (raw: readonly string[]) => P
  apply: (word: string, params: P, deps: ModifierDependencies) => string
}

function defineModifier<P>(definition: ModifierDefinition<P>): ModifierHandler {
  return (word, raw, deps) => definition.apply(word, definition.params(raw), deps)
}

/** For modifiers that take no parameters */
function simple(apply: (word: string, deps: ModifierDependencies) => string): ModifierHandler {
  return (word, _raw, deps) => apply(word, deps)
}

const RANDOM_MODIFIERS = 'bracket num2words randomcase reverse obscure piglatin scramble swap'

// ============================================================================
// Modifier Table
// ============================================================================

const uppercase = simple((word) => word.toUpperCase())
const lowercase = simple((word) => word.toLowerCase())
const numberToText = simple((word, deps) => sentenceCase(deps.numberToWords(word)))

const MODIFIERS: Map<string, ModifierHandler> = new Map<string, ModifierHandler>([
  ['a', simple((word) => ('aeiou'.includes(word[0].toLowerCase()) ? `an ${word}` : `a ${word}`))],

  ['bracket', defineModifier<{ pairs: string }>({
    params: (raw) => ({ pairs: raw[0] ?? '' }),
    apply: (word, { pairs }) => bracket(word, pairs),
  })],

  ['num2words', numberToText],
  ['num2word', numberToText],
  ['reverse', simple((word) => [...word].reverse().join(''))],
  ['uppercase', uppercase],
  ['ucase', uppercase],
  ['lowercase', lowercase],
  ['lcase', lowercase],
  ['propercase', simple(titleCase)],
  ['sentencecase', simple(sentenceCase)],
  ['obscure', simple(obscure)],

  ['replace', defineModifier<{ search: string; replacement: string }>({
    params: (raw) => ({ search: raw[0] ?? '', replacement: raw[1] ?? '' }),
    apply: (word, { search, replacement }) => (search ? word.split(search).join(replacement) : word),
  })],

  ['randomcase', simple(randomCase)],

  ['scramble', defineModifier<{ times: number }>({
    params: (raw) => ({ times: parseInteger(raw[0]) ?? 1 }),
    apply: (word, { times }) => scrambleWord(word, times),
  })],

  ['piglatin', simple(pigLatin)],

  ['repeat', defineModifier<{ times: number }>({
    params: (raw) => ({ times: Math.max(0, parseInteger(raw[0]) ?? 1) }),
    apply: (word, { times }) => word.repeat(times + 1),
  })],

  ['left', defineModifier<{ length?: number }>({
    params: (raw) => ({ length: parseInteger(raw[0]) }),
    apply: (word, { length = word.length }) => word.slice(0, Math.max(0, length)),
  })],

  ['right', defineModifier<{ length?: number }>({
    params: (raw) => ({ length: parseInteger(raw[0]) }),
    apply: (word, { length = word.length }) => word.slice(Math.max(0, word.length - Math.max(0, length))),
  })],

  ['mid', defineModifier<{ start: number; length: number }>({
    params: (raw) => ({ start: Math.max(1, parseInteger(raw[0]) ?? 1), length: parseInteger(raw[1]) ?? 1 }),
    apply: (word, { start, length }) => word.slice(start - 1, start - 1 + Math.max(0, length)),
  })],

  ['trim', simple((word) => word.trim())],

  ['format', defineModifier<{ width: number }>({
    params: (raw) => ({ width: [...(raw[0] || '0')].filter((c) => c === '0').length }),
    apply: (word, { width }) => (width > 0 ? zeroFill(word, width) : word),
  })],

  ['swap', simple(swapInitials)],

  ['romannumeral', simple((word) => {
    const value = parseInteger(word)
    return value === undefined ? word : toRoman(value)
  })],

  ['hide', simple(() => '')],
  ['quote', simple((word) => `"${word}"`)],
  ['stutter', simple(stutter)],
  ['fakeword', simple(fakeword)],

  ['random', (word, raw, deps) => {
    const handler = MODIFIERS.get(pickOne(RANDOM_MODIFIERS))
    return handler ? handler(word, raw, deps) : word
  }],
])

export const MODIFIER_NAMES: readonly string[] = [...MODIFIERS.keys()]

export function isKnownModifier(name: string): boolean {
  return MODIFIERS.has(name.trim().toLowerCase())
}

// ============================================================================
// Application
// ============================================================================

/**
 * Apply a named modifier to a word
 *
 * The name is matched case-insensitively. An unknown name is an
 * UNKNOWN_MODIFIER error even when the word is empty; a known modifier
 * leaves an empty word untouched.
 *
 * @example
 * applyModifier('apple', 'PigLatin', [], deps)  // { ok: true, value: 'appleyay' }
 * applyModifier('x', 'nope', [], deps)          // { ok: false, error: { code: 'UNKNOWN_MODIFIER', ... } }
 */
export function applyModifier(
  word: string,
  name: string,
  params: readonly string[],
  deps: ModifierDependencies
): Result<string> {
  const key = name.trim().toLowerCase()
  const handler = MODIFIERS.get(key)

  if (!handler) {
    return err('UNKNOWN_MODIFIER', `Unknown modifier: ${key}`)
  }

  if (!word) return ok(word)

  return ok(handler(word, params, deps))
}
