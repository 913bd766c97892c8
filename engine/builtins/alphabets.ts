/**
 * Character sets and short word tables used by the builtins.
 * Space-separated tables are read with pickOne(); repeated entries are weights.
 * Letter alphabets are ordered most frequent first.
 */

export const VOWELS = 'eaoiu'
export const CONSONANTS = 'tnshrdlcmfgypwbvkxjqz'
export const LETTERS = 'etaoinshrdlucmfgypwbvkxjqz'

export const SYMBOLS = "! @ # % $ ^ & * ( ) { } : ' / ` ~ * - < > + = _ | \\ \\ . . , , ; ; ? ? [ ]"
export const SENTENCE_PUNCTUATION = '!;:?.,'
export const END_PUNCTUATION = '! ! ! ! . . . . . . . . . . . . . . . ... ... ? ? ? ? ? ? ?'
export const SMILEYS = ':) :( :-) :-( :D :0 ;-) ;) :/ 8-) 8-( :-D :-0 :-p :^)'

export const VOWEL_CLUSTERS =
  'a a a a a a a a a e e e e e e e e e e e i i i u u o o ay ea ee ia io oa oi oo er on re he ha in es io ou'
export const CONSONANT_CLUSTERS =
  'b b c d d d f g j k m m m n n p p qu r r r s s s s t t t t v w x z z th st sh ph ch th sh for has tis men'
/** Consonant clusters that never start a word */
export const TRAILING_CONSONANT_CLUSTERS = 'nd rt dd zz rg ng tt ss mm nn pp nt nc nl ft'

export const THREE_LETTER_WORDS =
  'the and for are but not you all any can had her was one our out day get has him his how man new now old see two way who boy did its let put say she too use'

// ============================================================================
// Keyboard Layout
// ============================================================================

export const KEYBOARD =
  '1234567890`~!@#$%^&*()-_=+]}[{\\|\'";:/?.>,<abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ'

export const KEYBOARD_ROWS = {
  numrow: '1234567890',
  numrowfull: '1234567890`~!@#$%^&*()_-+=',
  row1: 'QWERTYUIOP',
  row1full: 'QWERTYUIOP{[}]|\\',
  row2: 'ASDFGHJKL',
  row2full: 'ASDFGHJKL;:\'"',
  row3: 'ZXCVBNM',
  row3full: 'ZXCVBNM,<.>/?',
  lefthand: 'qwertasdfgzxcvb',
  righthand: 'yuiophjknm',
} as const

// ============================================================================
// Calendar
// ============================================================================

export const LONG_MONTHS =
  'January February March April May June July August September October November December'
export const SHORT_MONTHS = 'Jan Feb Mar Apr May Jun Jul Aug Sep Oct Nov Dec'
export const LONG_DAYS = 'Monday Tuesday Wednesday Thursday Friday Saturday Sunday'
export const SHORT_DAYS = 'Mon Tue Wed Thu Fri Sat Sun'

// ============================================================================
// Phonetic Alphabets
// ============================================================================

export const NATO_ALPHABET = [
  'Alpha', 'Bravo', 'Charlie', 'Delta', 'Echo', 'Foxtrot', 'Golf', 'Hotel', 'India',
  'Juliet', 'Kilo', 'Lima', 'Mike', 'November', 'Oscar', 'Papa', 'Quebec', 'Romeo',
  'Sierra', 'Tango', 'Uniform', 'Victor', 'Whiskey', 'X-Ray', 'Yankee', 'Zulu',
]

export const ALTERNATE_PHONETIC_ALPHABET = [
  'Adam', 'Baker', 'Charles', 'David', 'Edward', 'Frank', 'George', 'Henry', 'Ida',
  'John', 'King', 'Lincoln', 'Mary', 'Nora', 'Ocean', 'Paul', 'Queen', 'Robert',
  'Sam', 'Tom', 'Union', 'Victor', 'William', 'X-Ray', 'Young', 'Zebra',
]
