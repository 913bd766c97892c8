/**
 * Text Transforms
 *
 * The stochastic and structural transforms behind the modifier table.
 */

import { rand, chance, pickOne, randomIndex } from '../random'
import { VOWELS, CONSONANTS } from '../builtins/alphabets'
import obscureRules from './obscure-rules.json'
import fakewordAffixes from './fakeword-affixes.json'

// ============================================================================
// Case
// ============================================================================

/**
 * @example
 * sentenceCase('hELLO WORLD')  // 'Hello world'
 */
export function sentenceCase(text: string): string {
  if (!text) return text
  return text[0].toUpperCase() + text.slice(1).toLowerCase()
}

/**
 * Capitalize every run of letters
 *
 * @example
 * titleCase('hello wORLD')  // 'Hello World'
 */
export function titleCase(text: string): string {
  return text.replace(/[A-Za-z]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase())
}

function upperAt(word: string, index: number, count = 1): string {
  return word.slice(0, index) + word.slice(index, index + count).toUpperCase() + word.slice(index + count)
}

type CaseStrategy = (word: string) => string

/** Indexed by rand(14, 0); single-position uppercasing takes two slots */
const CASE_STRATEGIES: CaseStrategy[] = [
  (word) => word,
  (word) => word.toUpperCase(),
  (word) => word.toLowerCase(),
  titleCase,
  (word) => {
    const letter = word[randomIndex(word.length)]
    return word.split(letter).join(letter.toUpperCase())
  },
  (word) => [...word].map((c) => (rand(1) ? c.toUpperCase() : c)).join(''),
  (word) => upperAt(word, randomIndex(word.length)),
  (word) => upperAt(word, randomIndex(word.length)),
  (word) => [...word].map((c) => (VOWELS.includes(c.toLowerCase()) ? c.toUpperCase() : c)).join(''),
  (word) => [...word].map((c) => (CONSONANTS.includes(c.toLowerCase()) ? c.toUpperCase() : c)).join(''),
  (word) => upperAt(word, randomIndex(word.length - 1), 2),
  (word) => upperAt(word, word.length - 1),
  (word) => (word.length >= 2 ? upperAt(upperAt(word, 0), word.length - 1) : word.toUpperCase()),
  (word) => upperAt(word, 0, rand(word.length, 1, 2)),
  (word) => [...word].map((c, i) => (i % 2 === 0 ? c.toUpperCase() : c)).join(''),
]

export function randomCase(word: string): string {
  if (!word) return word
  return CASE_STRATEGIES[rand(14, 0)](word)
}

// ============================================================================
// Obscure
// ============================================================================

const OBSCURE_RULES: ReadonlyArray<readonly [string, string]> = obscureRules.map(
  ([pattern, replacement]) => [pattern, replacement] as const
)

/**
 * Leet-speak style substitutions: 2-20 tries (weighted toward more), each
 * picking a rule at random and replacing the first occurrence of its
 * pattern. A rule is used at most once; after the third change every
 * further change has a 75% chance of ending the run.
 */
export function obscure(word: string): string {
  let result = word
  let changes = 0
  const used = new Set<number>()
  const attempts = rand(20, 2, 2)

  for (let i = 0; i < attempts; i++) {
    const ruleIndex = randomIndex(OBSCURE_RULES.length)
    const [pattern, replacement] = OBSCURE_RULES[ruleIndex]

    if (used.has(ruleIndex) || !result.includes(pattern)) continue

    result = result.replace(pattern, () => replacement)
    used.add(ruleIndex)
    changes++

    if (changes >= 3 && chance(75)) break
  }

  return result
}

// ============================================================================
// Structure
// ============================================================================

/**
 * Swap characters at random positions `times` times
 */
export function scrambleWord(word: string, times = 1): string {
  const chars = [...word]
  if (chars.length < 2) return word

  for (let i = 0; i < times; i++) {
    const a = randomIndex(chars.length)
    const b = randomIndex(chars.length)
    ;[chars[a], chars[b]] = [chars[b], chars[a]]
  }

  return chars.join('')
}

/**
 * @example
 * pigLatin('hello')        // 'ellohay'
 * pigLatin('apple')        // 'appleyay'
 * pigLatin('Hello there')  // 'Ellohay heretay'
 */
export function pigLatin(text: string): string {
  return text
    .split(' ')
    .map((word) => {
      if (!word) return word

      const converted = 'aeiou'.includes(word[0].toLowerCase())
        ? `${word}yay`
        : `${word.slice(1)}${word[0]}ay`

      return word[0] !== word[0].toLowerCase() ? sentenceCase(converted) : converted
    })
    .join(' ')
}

/**
 * Swap the first letters of the first two words
 *
 * @example
 * swapInitials('blue moon')  // 'mlue boon'
 */
export function swapInitials(text: string): string {
  const words = text.split(' ')
  if (words.length < 2 || !words[0] || !words[1]) return text

  const [first, second] = words
  words[0] = second[0] + first.slice(1)
  words[1] = first[0] + second.slice(1)
  return words.join(' ')
}

/**
 * Repeat the start of the word up to its first vowel, e.g. `b-b-bottle`
 * without the dashes: `bobobottle`. One time in five a wider letter set
 * marks the syllable.
 */
export function stutter(word: string): string {
  const syllableMarkers = rand(100) > 20 ? 'aeiou' : 'hywrtnaeiou'

  for (let i = 0; i < word.length; i++) {
    if (!syllableMarkers.includes(word[i].toLowerCase())) continue

    let prefix = word.slice(0, i + 1)
    if (rand(100) < 5) prefix += '...'
    if (rand(100) < 10) prefix += ' '

    return prefix.repeat(rand(4, 1, -2)) + word
  }

  return word
}

const DEFAULT_BRACKETS =
  '[ ] < > ( ) ( ) ( ) ( ) ( ) ( ) ( ) ( ) [ ] [ ] | | \\ / * * [ ] { } / / \\ / / \\ \\ \\ <- -> -> <-'

/**
 * Wrap a word in one randomly chosen pair from a space-separated list of
 * opening/closing tokens
 *
 * @example
 * bracket('word')           // e.g. '(word)', '<-word->'
 * bracket('word', '< > « »') // '<word>' or '«word»'
 */
export function bracket(word: string, pairs = ''): string {
  const tokens = (pairs || DEFAULT_BRACKETS).split(' ')
  if (tokens.length < 2) return word

  const x = randomIndex(Math.floor(tokens.length / 2)) * 2
  return tokens[x] + word + tokens[x + 1]
}

// ============================================================================
// Numbers
// ============================================================================

const ROMAN_NUMERALS: Array<[number, string]> = [
  [1000, 'M'], [900, 'CM'], [500, 'D'], [400, 'CD'],
  [100, 'C'], [90, 'XC'], [50, 'L'], [40, 'XL'],
  [10, 'X'], [9, 'IX'], [5, 'V'], [4, 'IV'], [1, 'I'],
]

/**
 * @example
 * toRoman(1994)  // 'MCMXCIV'
 */
export function toRoman(value: number): string {
  let remaining = Math.trunc(value)
  let result = ''

  for (const [amount, numeral] of ROMAN_NUMERALS) {
    while (remaining >= amount) {
      result += numeral
      remaining -= amount
    }
  }

  return result
}

/**
 * Left-pad with zeros to `width`, keeping a leading sign in front
 */
export function zeroFill(text: string, width: number): string {
  const sign = /^[+-]/.test(text) ? text[0] : ''
  return sign + text.slice(sign.length).padStart(width - sign.length, '0')
}

// ============================================================================
// Fake Words
// ============================================================================

const FAKEWORD_CLEANUP: Array<[string, string]> = [
  ['aa', 'a'], ['ii', 'i'], ['hh', 'h'], ['jj', 'j'], ['kk', 'k'], ['qq', 'q'],
  ['uu', 'u'], ['ww', 'w'], ['xx', 'x'], ['yy', 'y'], ['zz', 'z'], ['eae', 'ae'],
]

/**
 * Decorate a base word with a made-up prefix, suffix, or both
 *
 * @example
 * fakeword('bone')  // e.g. 'cyberbone', 'boneology', 'anti-boneize'
 */
export function fakeword(base: string): string {
  let prefix = pickOne(fakewordAffixes.prefixes)
  const suffix = pickOne(fakewordAffixes.suffixes)

  if (rand(100) <= 20 && !prefix.includes('-')) {
    prefix += '-'
  }

  let word: string
  switch (rand(5, 1)) {
    case 1:
      word = prefix + base + suffix
      break
    case 2:
      word = base + suffix
      break
    default:
      word = prefix + base
  }

  for (const [doubled, single] of FAKEWORD_CLEANUP) {
    word = word.split(doubled).join(single)
  }

  return word
}
