/**
 * Builtin Value Dispatch
 *
 * Resolves a placeholder name such as `word`, `number` or `symbol` to a
 * generated value. Names are matched case-insensitively; a name that is
 * not in the table is looked up as a word list, and failing that the
 * name itself is the value.
 */

import { ok, err } from '../types'
import type { Result } from '../types'
import { parseInteger } from '../core/parser'
import { rand, pickOne, pickCharacter } from '../random'
import {
  VOWELS,
  CONSONANTS,
  LETTERS,
  SYMBOLS,
  SENTENCE_PUNCTUATION,
  END_PUNCTUATION,
  SMILEYS,
  KEYBOARD,
  KEYBOARD_ROWS,
  LONG_MONTHS,
  SHORT_MONTHS,
  LONG_DAYS,
  SHORT_DAYS,
} from './alphabets'
import { keyboardSequence, numberPattern, numberCode, ordinal, phonetic } from './sequences'

// ============================================================================
// Types
// ============================================================================

export interface BuiltinDependencies {
  /** One entry of the named list, or undefined when the list does not exist */
  lookupWord: (listName: string) => string | undefined
  pronounceableWord: () => string
}

type BuiltinHandler = (params: readonly string[], deps: BuiltinDependencies) => Result<string>

interface BuiltinDefinition<P> {
  params: (raw: readonly string[]) => P
  resolve: (params: P, deps: BuiltinDependencies) => Result<string>
}

function defineBuiltin<P>(definition: BuiltinDefinition<P>): BuiltinHandler {
  return (raw, deps) => definition.resolve(definition.params(raw), deps)
}

/** A parameterless builtin that cannot fail */
function constant(produce: (deps: BuiltinDependencies) => string): BuiltinHandler {
  return (_raw, deps) => ok(produce(deps))
}

function repeatPick(characters: string, count: number): string {
  let result = ''
  for (let i = 0; i < count; i++) {
    result += pickCharacter(characters)
  }
  return result
}

/** `vowel(n)`, `consonant(n)` and `letter(n)` share one parameter struct */
function characterRun(characters: string, normalize: (count: number) => number): BuiltinHandler {
  return defineBuiltin<{ count: number }>({
    params: (raw) => ({ count: normalize(parseInteger(raw[0]) ?? 1) }),
    resolve: ({ count }) => ok(repeatPick(characters, count)),
  })
}

const DEFAULT_WORDLIST = '4-letter'

/** Whole numbers print every digit, even past 1e21 */
function formatNumber(value: number, decimals: number): string {
  return decimals === 0 && Number.isFinite(value) ? BigInt(value).toString() : String(value)
}

// ============================================================================
// Builtin Table
// ============================================================================

const space = constant(() => ' ')

const BUILTINS = new Map<string, BuiltinHandler>([
  ['word', defineBuiltin<{ list: string }>({
    params: (raw) => ({ list: raw[0] || DEFAULT_WORDLIST }),
    resolve: ({ list }, deps) => {
      const name = list.includes('|') ? pickOne(list, 1, '|') : list
      const word = deps.lookupWord(name)
      return word === undefined ? err('UNKNOWN_WORDLIST', `Unknown word list: ${name}`) : ok(word)
    },
  })],

  ['sp', space],
  ['space', space],

  ['vowel', characterRun(VOWELS, (count) => count)],
  ['consonant', characterRun(CONSONANTS, (count) => count)],
  ['letter', characterRun(LETTERS, Math.abs)],

  ['symbol', constant(() => pickOne(SYMBOLS))],
  ['endpunctuation', constant(() => pickOne(END_PUNCTUATION))],
  ['sentencepunctuation', constant(() => pickCharacter(SENTENCE_PUNCTUATION))],
  ['smiley', constant(() => pickOne(SMILEYS))],

  ['number', defineBuiltin<{ max: number; min: number; weight: number; decimals: number }>({
    params: (raw) => ({
      max: parseInteger(raw[0]) ?? 9,
      min: parseInteger(raw[1]) ?? 0,
      weight: parseInteger(raw[2]) ?? 1,
      decimals: parseInteger(raw[3]) ?? 0,
    }),
    resolve: ({ max, min, weight, decimals }) => ok(formatNumber(rand(max, min, weight, decimals), decimals)),
  })],

  ['keyboard', constant(() => pickCharacter(KEYBOARD))],
  ...Object.entries(KEYBOARD_ROWS).map(
    ([name, row]): [string, BuiltinHandler] => [name, constant(() => pickCharacter(row))]
  ),

  ['sequence', defineBuiltin<{ length: number }>({
    params: (raw) => ({ length: parseInteger(raw[0]) ?? 3 }),
    resolve: ({ length }) => ok(keyboardSequence(length)),
  })],

  ['numberpattern', defineBuiltin<{ length: number }>({
    params: (raw) => ({ length: parseInteger(raw[0]) ?? 3 }),
    resolve: ({ length }) => ok(numberPattern(length)),
  })],

  ['numbercode', constant(() => numberCode())],

  ['ordinal', defineBuiltin<{ n?: number }>({
    params: (raw) => ({ n: parseInteger(raw[0]) }),
    resolve: ({ n = rand(99, 1) }) => ok(ordinal(n)),
  })],

  ['phonetic', defineBuiltin<{ word: string; style: number }>({
    params: (raw) => ({ word: raw[0] || pickCharacter(LETTERS), style: parseInteger(raw[1]) ?? 1 }),
    resolve: ({ word, style }) => ok(phonetic(word, style)),
  })],

  ['pronounceable', constant((deps) => deps.pronounceableWord())],

  ['asc', defineBuiltin<{ char: string }>({
    params: (raw) => ({ char: raw[0] ?? '' }),
    resolve: ({ char }) => ok(char ? String(char.charCodeAt(0)) : String(rand(255, 32))),
  })],

  ['chr', defineBuiltin<{ code?: number }>({
    params: (raw) => ({ code: parseInteger(raw[0]) }),
    resolve: ({ code }) => ok(code !== undefined && code >= 32 && code <= 126 ? String.fromCharCode(code) : ''),
  })],

  ['longmonth', constant(() => pickOne(LONG_MONTHS))],
  ['shortmonth', constant(() => pickOne(SHORT_MONTHS))],
  ['longday', constant(() => pickOne(LONG_DAYS))],
  ['shortday', constant(() => pickOne(SHORT_DAYS))],
])

export const BUILTIN_NAMES: readonly string[] = [...BUILTINS.keys()]

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve a placeholder name and its parameters to a value
 *
 * @example
 * resolveBuiltin('number', ['5', '5'], deps)  // { ok: true, value: '5' }
 * resolveBuiltin('animal', [], deps)          // a word from the "animal" list
 * resolveBuiltin('Nowhere', [], deps)         // { ok: true, value: 'Nowhere' }
 */
export function resolveBuiltin(
  name: string,
  params: readonly string[],
  deps: BuiltinDependencies
): Result<string> {
  const key = name.trim().toLowerCase()
  const handler = BUILTINS.get(key)

  if (handler) {
    return handler(params, deps)
  }

  return ok(deps.lookupWord(key) ?? name)
}
