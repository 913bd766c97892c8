/**
 * Weighted Random Module
 *
 * Every random decision the generator makes goes through `rand`:
 * - rand(max, min, weight, decimals): a value in [min, max]
 * - weight > 0 biases toward max, weight < 0 toward min
 * - |weight| is the number of narrowing draws (0 counts as 1)
 * - max = 0 means 9, the legacy default range
 *
 * Draws come from node:crypto, so the module holds no state of its own.
 */

import { randomBytes } from 'node:crypto'

/** A source of uniform reals in [0, 1) */
export type Draw = () => number

const DRAW_BYTES = 6
const DRAW_SCALE = 2 ** (DRAW_BYTES * 8)

/**
 * Uniform real in [0, 1) from 48 bits of secure entropy
 */
export const secureDraw: Draw = () => randomBytes(DRAW_BYTES).readUIntBE(0, DRAW_BYTES) / DRAW_SCALE

/**
 * Weighted random value computed from an explicit draw source.
 *
 * Each of the |weight| draws narrows the ceiling toward `min`; a positive
 * weight then reflects the result so it leans toward `max` instead.
 *
 * @example
 * randFrom(() => 0.5, 100, 0, 1)   // 50
 * randFrom(() => 0.5, 100, 0, 2)   // 75
 * randFrom(() => 0.5, 100, 0, -2)  // 25
 */
export function randFrom(draw: Draw, max = 9, min = 0, weight = 1, decimals = 0): number {
  if (max === 0) max = 9
  if (weight === 0) weight = 1

  let ceiling = max
  for (let i = 0; i < Math.abs(weight); i++) {
    ceiling = draw() * (ceiling - min) + min
  }

  if (weight > 0) {
    ceiling = max - (ceiling - min)
  }

  if (decimals > 0) {
    const factor = 10 ** decimals
    return Math.round(ceiling * factor) / factor
  }
  return Math.round(ceiling)
}

/**
 * Weighted random value from the secure source
 *
 * @example
 * rand(100)         // 0-100
 * rand(100, 50)     // 50-100
 * rand(100, 0, 3)   // leans toward 100
 * rand(100, 0, -3)  // leans toward 0
 */
export function rand(max = 9, min = 0, weight = 1, decimals = 0): number {
  return randFrom(secureDraw, max, min, weight, decimals)
}

/**
 * True when a percentage roll comes up: rand(100, 1, weight) <= percent
 */
export function chance(percent: number, weight = 1): boolean {
  return rand(100, 1, weight) <= percent
}

/**
 * Random index into a sequence of `length` items, 0 for anything shorter than 2.
 * Keeps rand()'s max = 0 rule from widening a one-item range to 0-9.
 */
export function randomIndex(length: number, weight = 1): number {
  if (length < 2) return 0
  return rand(length - 1, 0, weight)
}

/**
 * Pick one item from a delimited string or a list.
 * Items are trimmed; the index is rand(count - 1, 0, weight).
 *
 * @example
 * pickOne('apple banana cherry')
 * pickOne('a|b|c', 1, '|')
 */
export function pickOne(items: string | readonly string[], weight = 1, delimiter = ' '): string {
  const list = typeof items === 'string' ? items.split(delimiter) : items

  if (list.length === 0) return ''
  if (list.length === 1) return list[0].trim()

  return list[rand(list.length - 1, 0, weight)].trim()
}

/**
 * Pick one character; the index is rand(length, 1, weight) - 1.
 * Alphabets are stored most-frequent first, so positive weights favour rare letters.
 */
export function pickCharacter(characters: string, weight = 0): string {
  if (!characters) return ''
  return characters[rand(characters.length, 1, weight) - 1]
}
