/**
 * Generated Sequences
 *
 * Keyboard walks, patterned digit strings, number codes, ordinals and
 * phonetic spellings.
 */

import { rand, chance, pickOne } from '../random'
import { bracket } from '../modifiers/transforms'
import { NATO_ALPHABET, ALTERNATE_PHONETIC_ALPHABET } from './alphabets'

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz'
const DIGITS = '1234567890'
const KEY_ROW_1 = 'qwertyuiop'
const KEY_ROW_2 = 'asdfghjkl'
const KEY_ROW_3 = 'zxcvbnm'
const KEY_ROW_1_REVERSED = 'poiuytrewq'
const KEY_ROW_2_REVERSED = 'lkjhgfdsa'
const KEY_ROW_3_REVERSED = 'mnbvcxz'

// ============================================================================
// Keyboard Sequences
// ============================================================================

type SequenceStrategy = (length: number) => string

/** A run of `length` characters starting at a random offset */
function slidingWindow(source: string): SequenceStrategy {
  return (length) => {
    const start = rand(source.length - length, 0)
    return source.slice(start, start + length)
  }
}

/** One column of keys read down (or up) the three letter rows */
function columns(rows: [string, string, string]): SequenceStrategy {
  return (length) => {
    const i = rand(7, 1)
    const n = Math.floor(length / 3)
    return rows.map((row) => row.slice(i, i + n)).join('')
  }
}

/** Alternate between two rows, wrapping around at the shorter one */
function interleave(first: string, second: string, maxStart: number): SequenceStrategy {
  return (length) => {
    const size = Math.min(first.length, second.length)
    let i = rand(maxStart, 1)
    let sequence = ''
    while (sequence.length < length) {
      sequence += first[i] + second[i]
      i = (i + 1) % size
    }
    return sequence
  }
}

/** Walk a row inward from both ends at once */
function zigzag(row: string, maxStart: number): SequenceStrategy {
  return (length) => {
    let i = rand(maxStart, 1)
    let sequence = ''
    while (sequence.length < length && i < row.length) {
      sequence += row[i] + row[row.length - i - 1]
      i++
    }
    return sequence
  }
}

/**
 * Indexed by rand(19): 0 and 19 share the last strategy, some strategies
 * occupy several slots.
 */
const SEQUENCE_STRATEGIES: SequenceStrategy[] = [
  zigzag(KEY_ROW_3, 6),
  slidingWindow(ALPHABET),
  slidingWindow(DIGITS),
  slidingWindow(KEY_ROW_1),
  slidingWindow(KEY_ROW_2),
  slidingWindow(KEY_ROW_3),
  slidingWindow(KEY_ROW_1_REVERSED),
  slidingWindow(KEY_ROW_2_REVERSED),
  slidingWindow(KEY_ROW_3_REVERSED),
  columns([KEY_ROW_1, KEY_ROW_2, KEY_ROW_3]),
  columns([KEY_ROW_3, KEY_ROW_2, KEY_ROW_1]),
  interleave(KEY_ROW_1, KEY_ROW_2, 8),
  interleave(KEY_ROW_1, KEY_ROW_2, 8),
  interleave(KEY_ROW_1, KEY_ROW_2, 8),
  interleave(KEY_ROW_1, DIGITS, 9),
  interleave(KEY_ROW_1_REVERSED, KEY_ROW_2_REVERSED, 8),
  interleave(KEY_ROW_1_REVERSED, KEY_ROW_2_REVERSED, 8),
  zigzag(KEY_ROW_1, 9),
  zigzag(KEY_ROW_2, 8),
  zigzag(KEY_ROW_3, 6),
]

/**
 * A keyboard, alphabet or digit sequence of at most `length` characters.
 * Strategies that run out of keys return a shorter sequence.
 *
 * @example
 * keyboardSequence(4)  // e.g. 'wert', 'qaws', '6789', 'ophi'
 */
export function keyboardSequence(length = 3): string {
  if (length <= 0) length = 3
  const strategy = SEQUENCE_STRATEGIES[rand(19)]
  return strategy(length).slice(0, length)
}

// ============================================================================
// Number Patterns
// ============================================================================

/**
 * Digits built one at a time: a fresh digit, a copy of an earlier digit,
 * one less than the previous digit, or one more.
 */
export function numberPattern(length = 3): string {
  if (length <= 0) length = 3

  const digits: number[] = [rand(9)]

  for (let i = 1; i < length; i++) {
    const previous = digits[i - 1]

    switch (rand(3, 0)) {
      case 0:
        digits.push(rand(9))
        break
      case 1:
        digits.push(digits[rand(i, 1) - 1])
        break
      case 2:
        digits.push(previous > 1 ? previous - 1 : rand(9))
        break
      default:
        digits.push(previous < 9 ? previous + 1 : rand(9))
    }
  }

  return digits.join('')
}

// ============================================================================
// Number Codes
// ============================================================================

const CODE_DELIMITERS = '- - - - - - - - . . . , / \\ :'

/**
 * Digits with a repeated digit or a delimiter mixed in, sometimes
 * bracketed, e.g. `7-77-3` or `(4.1)5`
 */
export function numberCode(): string {
  const repeatDigit = String(rand(9, 0))
  const delimiter = pickOne(CODE_DELIMITERS)

  let code = ''
  for (;;) {
    const digit = String(rand(9, 0))

    for (;;) {
      code += digit

      if (chance(30)) {
        code += repeatDigit
      } else if (chance(40)) {
        code += delimiter
      }

      if (code.length > 2 || !chance(30)) break
    }

    if (code.length > rand(4, 3)) break

    if (chance(10)) {
      code = bracket(code)
    }

    if (chance(15) && code.length > 2) break
  }

  if (code && !/\d$/.test(code)) {
    code = code.slice(0, -1)
  }

  return code
}

// ============================================================================
// Ordinals & Phonetics
// ============================================================================

/**
 * @example
 * ordinal(1)   // '1st'
 * ordinal(12)  // '12th'
 * ordinal(23)  // '23rd'
 */
export function ordinal(n: number): string {
  const text = String(n)

  if (['11', '12', '13'].includes(text.slice(-2))) {
    return `${text}th`
  }

  switch (text.slice(-1)) {
    case '1':
      return `${text}st`
    case '2':
      return `${text}nd`
    case '3':
      return `${text}rd`
    default:
      return `${text}th`
  }
}

/**
 * Spell a word with a phonetic alphabet; characters other than A-Z are skipped.
 * Style 0 or 1 is NATO, anything else the older Adam/Baker/Charles table.
 *
 * @example
 * phonetic('abc')     // 'Alpha Bravo Charlie'
 * phonetic('abc', 2)  // 'Adam Baker Charles'
 */
export function phonetic(word: string, style = 1): string {
  const alphabet = style === 0 || style === 1 ? NATO_ALPHABET : ALTERNATE_PHONETIC_ALPHABET
  const words: string[] = []

  for (const char of word.toUpperCase()) {
    const index = char.charCodeAt(0) - 65
    if (index >= 0 && index < 26) {
      words.push(alphabet[index])
    }
  }

  return words.join(' ')
}
