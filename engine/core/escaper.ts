/**
 * Pattern Escaping
 *
 * Backslash escapes (\{ \} \[ \] \( \) \+ \| \\) are swapped for sentinel
 * tokens before any structural parsing and swapped back as the last step.
 * Freshly generated values are escaped the same way so a `+` or `|` inside
 * a word can never be read as pattern syntax further along.
 */

const SENTINELS: Record<string, string> = {
  '\\': '#sla#',
  '+': '#pls#',
  '{': '#lbr#',
  '}': '#rbr#',
  '[': '#lba#',
  ']': '#rba#',
  '(': '#lpa#',
  ')': '#rpa#',
  '|': '#pip#',
}

const CHARACTERS: Record<string, string> = Object.fromEntries(
  Object.entries(SENTINELS).map(([character, sentinel]) => [sentinel, character])
)

const ESCAPE_SEQUENCE_REGEX = /\\([\\+{}[\]()|])/g
const RESERVED_CHARACTER_REGEX = /[\\+{}[\]()|]/g
const SENTINEL_REGEX = /#(?:sla|pls|lbr|rbr|lba|rba|lpa|rpa|pip)#/g

/**
 * Replace backslash escape sequences in a raw pattern with sentinels
 *
 * @example
 * escapePattern('{word}\\+{number}')  // '{word}#pls#{number}'
 */
export function escapePattern(pattern: string): string {
  return pattern.replace(ESCAPE_SEQUENCE_REGEX, (_, character: string) => SENTINELS[character])
}

/**
 * Replace every reserved character in a generated value with its sentinel
 */
export function escapeValue(value: string): string {
  return value.replace(RESERVED_CHARACTER_REGEX, (character) => SENTINELS[character])
}

/**
 * Turn sentinels back into the characters they stand for
 */
export function unescape(text: string): string {
  return text.replace(SENTINEL_REGEX, (sentinel) => CHARACTERS[sentinel])
}
