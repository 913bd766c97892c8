/**
 * Pronounceable Words
 *
 * Made-up words that alternate vowel and consonant clusters and often end
 * on a familiar English suffix.
 */

import { rand, pickOne } from '../random'
import { VOWEL_CLUSTERS, CONSONANT_CLUSTERS, TRAILING_CONSONANT_CLUSTERS } from '../builtins/alphabets'

const VOWEL_SUFFIXES =
  'ing ers ance ence le ness ings ment ize ate ive ute acy ous ify ought some edness ed es ly less ment ' +
  'able ible les led ious ant ary iety ist ism ial ate act ure iac ice aint ent ant ure ide ify les'

const CONSONANT_SUFFIXES =
  'cked cker tor ter ly rer tic nst lyst onic ght nge nce zer cy ly ny lic dged red ate ndle ching ' +
  'tching lent ged zen ted nnial lic rly stic se les'

const T_SUFFIXES = 'ion ity ient ment ance ly less ter tor'

const CLEANUP: Array<[string, string]> = [
  ['aa', 'a'], ['hh', 'h'], ['ii', 'i'], ['jj', 'j'], ['kk', 'k'], ['qq', 'qu'],
  ['uu', 'u'], ['vv', 'v'], ['ww', 'w'], ['xx', 'x'], ['yy', 'y'],
]

/**
 * @example
 * pronounceableWord()  // e.g. 'lorinment', 'stabecker', 'ouvoly'
 */
export function pronounceableWord(): string {
  let word = ''
  let vowelNext = rand(1) === 1
  const parts = rand(5, 4)

  for (let i = 0; i < parts; i++) {
    const length = word.length

    if (vowelNext) {
      if (rand(3) === 0 && length > 1) {
        word += pickOne(VOWEL_SUFFIXES)
        break
      }
      word += pickOne(VOWEL_CLUSTERS, 2)
    } else {
      if (rand(3) === 0 && length > 0) {
        word += pickOne(CONSONANT_SUFFIXES)
        break
      }

      word += rand(3) === 0 && length > 0
        ? pickOne(TRAILING_CONSONANT_CLUSTERS)
        : pickOne(CONSONANT_CLUSTERS, 2)

      if (word.endsWith('t') && rand(2) === 0 && length > 1) {
        word += pickOne(T_SUFFIXES)
        break
      }
    }

    vowelNext = !vowelNext
  }

  for (const [doubled, single] of CLEANUP) {
    word = word.split(doubled).join(single)
  }

  word = word.split('cie').join('cei')

  if (word.length >= 2 && word[0] === word[1]) {
    word = word.slice(1)
  }

  return word
}
