/**
 * Number Text
 *
 * English cardinal text for numeric strings, e.g.
 * `-1,234.5` -> `Minus One Thousand Two Hundred and Thirty Four Point Five`.
 */

const NUMBER_WORDS = [
  'Zero', 'One', 'Two', 'Three', 'Four', 'Five', 'Six', 'Seven', 'Eight', 'Nine',
  'Ten', 'Eleven', 'Twelve', 'Thirteen', 'Fourteen', 'Fifteen', 'Sixteen',
  'Seventeen', 'Eighteen', 'Nineteen',
]

const TENS_WORDS = ['', '', 'Twenty', 'Thirty', 'Forty', 'Fifty', 'Sixty', 'Seventy', 'Eighty', 'Ninety']

/** Scales of the three-digit groups above the last nine digits */
const LARGE_SCALES: Array<[number, string]> = [
  [1_000_000, 'Quadrillion'],
  [1_000, 'Trillion'],
  [1, 'Billion'],
]

const SMALL_SCALES: Array<[number, string]> = [
  [1_000_000, 'Million'],
  [1_000, 'Thousand'],
]

export const IMPROPER_NUMBER = 'Error - Number improperly formed'
export const NUMBER_TOO_LARGE = 'Error - Number too large'

const NUMBER_FORMAT = /^[+-]?(?=[\d,]*\.?\d)[\d,]*(\.\d*)?$/

// ============================================================================
// Helpers
// ============================================================================

/**
 * Words for 0-999. With `withAnd`, "and" goes in front of a non-zero
 * tens/units part.
 */
function hundredsTensUnits(value: number, withAnd = false): string[] {
  const words: string[] = []
  let rest = value

  if (rest > 99) {
    const hundreds = Math.floor(rest / 100)
    words.push(NUMBER_WORDS[hundreds], 'Hundred')
    rest -= hundreds * 100
  }

  if (withAnd && rest > 0) {
    words.push('and')
  }

  if (rest >= 20) {
    const tens = Math.floor(rest / 10)
    words.push(TENS_WORDS[tens])
    rest -= tens * 10
  }

  if (rest > 0) {
    words.push(NUMBER_WORDS[rest])
  }

  return words
}

function scaleWords(value: number, scales: Array<[number, string]>): { words: string[]; rest: number } {
  const words: string[] = []
  let rest = value

  for (const [size, name] of scales) {
    const count = Math.floor(rest / size)
    if (count > 0) {
      words.push(...hundredsTensUnits(count), name)
      rest -= count * size
    }
  }

  return { words, rest }
}

// ============================================================================
// Conversion
// ============================================================================

/**
 * Convert a numeric string to English words
 *
 * @example
 * numberToWords('123')    // 'One Hundred and Twenty Three'
 * numberToWords('-42')    // 'Minus Forty Two'
 * numberToWords('3.14')   // 'Three Point One Four'
 * numberToWords('banana') // 'Error - Number improperly formed'
 */
export function numberToWords(input: string): string {
  let text = input.trim()

  if (!NUMBER_FORMAT.test(text)) {
    return IMPROPER_NUMBER
  }

  let sign = ''
  if (text.startsWith('-')) {
    sign = 'Minus'
    text = text.slice(1)
  } else if (text.startsWith('+')) {
    sign = 'Plus'
    text = text.slice(1)
  }

  const [wholeText, decimals = ''] = text.split('.')
  let whole = wholeText.replace(/,/g, '')

  let big = ''
  if (whole.length > 9) {
    big = whole.slice(0, -9)
    whole = whole.slice(-9)
  }

  if (big.length > 9) {
    return NUMBER_TOO_LARGE
  }

  const words: string[] = []

  if (big) {
    words.push(...scaleWords(parseInt(big, 10), LARGE_SCALES).words)
  }

  const wholeValue = whole ? parseInt(whole, 10) : 0
  if (wholeValue === 0 && !big) {
    words.push('Zero')
  }

  const small = scaleWords(wholeValue, SMALL_SCALES)
  words.push(...small.words)

  if (small.rest > 0) {
    words.push(...hundredsTensUnits(small.rest, wholeValue >= 100 || big !== ''))
  }

  if (decimals) {
    words.push('Point', ...[...decimals].map((digit) => NUMBER_WORDS[Number(digit)]))
  }

  return [sign, ...words].filter(Boolean).join(' ')
}
