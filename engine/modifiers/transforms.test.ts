import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
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

describe('case transforms', () => {
  it('should sentence-case text', () => {
    expect(sentenceCase('hELLO WORLD')).toBe('Hello world')
    expect(sentenceCase('')).toBe('')
  })

  it('should title-case every run of letters', () => {
    expect(titleCase('hello wORLD')).toBe('Hello World')
    expect(titleCase('up-to-date')).toBe('Up-To-Date')
  })

  it('should only change the case in randomCase', () => {
    fc.assert(
      fc.property(fc.stringMatching(/^[a-z]{1,12}$/), (word) => {
        expect(randomCase(word).toLowerCase()).toBe(word)
      })
    )
  })
})

describe('pigLatin', () => {
  it('should append yay to vowel-led words', () => {
    expect(pigLatin('apple')).toBe('appleyay')
  })

  it('should rotate the first consonant to the end', () => {
    expect(pigLatin('hello')).toBe('ellohay')
  })

  it('should carry a leading capital over to the result', () => {
    expect(pigLatin('Hello there')).toBe('Ellohay heretay')
    expect(pigLatin('Apple')).toBe('Appleyay')
  })
})

describe('toRoman', () => {
  it('should use subtractive notation', () => {
    expect(toRoman(4)).toBe('IV')
    expect(toRoman(9)).toBe('IX')
    expect(toRoman(1994)).toBe('MCMXCIV')
  })

  it('should return an empty string for zero', () => {
    expect(toRoman(0)).toBe('')
  })
})

describe('scrambleWord', () => {
  it('should preserve length and characters', () => {
    fc.assert(
      fc.property(fc.string({ minLength: 2 }), fc.integer({ min: 1, max: 10 }), (word, times) => {
        const scrambled = scrambleWord(word, times)
        expect(scrambled).toHaveLength(word.length)
        expect([...scrambled].sort()).toEqual([...word].sort())
      })
    )
  })

  it('should leave single characters alone', () => {
    expect(scrambleWord('x', 5)).toBe('x')
  })
})

describe('swapInitials', () => {
  it('should swap the first letters of the first two words', () => {
    expect(swapInitials('blue moon')).toBe('mlue boon')
    expect(swapInitials('red hot chili')).toBe('hed rot chili')
  })

  it('should leave a single word unchanged', () => {
    expect(swapInitials('single')).toBe('single')
  })
})

describe('bracket', () => {
  it('should use the only supplied pair', () => {
    expect(bracket('word', '< >')).toBe('<word>')
  })

  it('should pick from the supplied pairs', () => {
    for (let i = 0; i < 50; i++) {
      expect(['<word>', '«word»']).toContain(bracket('word', '< > « »'))
    }
  })

  it('should ignore a list without a full pair', () => {
    expect(bracket('word', 'x')).toBe('word')
  })
})

describe('zeroFill', () => {
  it('should pad to the width', () => {
    expect(zeroFill('42', 5)).toBe('00042')
    expect(zeroFill('12345', 3)).toBe('12345')
  })

  it('should keep the sign in front', () => {
    expect(zeroFill('-5', 4)).toBe('-005')
  })
})

describe('stochastic transforms', () => {
  it('should leave words without matching rules unobscured', () => {
    expect(obscure('789')).toBe('789')
  })

  it('should leave words without syllable markers unstuttered', () => {
    expect(stutter('bcd')).toBe('bcd')
  })

  it('should end a stutter with the full word', () => {
    for (let i = 0; i < 50; i++) {
      expect(stutter('bottle').endsWith('bottle')).toBe(true)
    }
  })

  it('should keep the base word inside a fake word', () => {
    for (let i = 0; i < 50; i++) {
      expect(fakeword('tom')).toContain('tom')
    }
  })
})
