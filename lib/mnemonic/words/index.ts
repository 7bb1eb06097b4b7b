/**
 * Word lists for BIP39 mnemonic generation
 *
 * The set of languages is closed and known at build time. It only holds
 * lists that share no word with each other, which is what makes language
 * detection from a single word possible.
 */

import { wordlist as english } from '@scure/bip39/wordlists/english'
import { wordlist as japanese } from '@scure/bip39/wordlists/japanese'
import { wordlist as korean } from '@scure/bip39/wordlists/korean'
import { wordlist as chineseSimplified } from '@scure/bip39/wordlists/simplified-chinese'
import { wordlist as czech } from '@scure/bip39/wordlists/czech'
import { wordlist as italian } from '@scure/bip39/wordlists/italian'
import { wordlist as portuguese } from '@scure/bip39/wordlists/portuguese'
import { wordlist as spanish } from '@scure/bip39/wordlists/spanish'

export const LANGUAGES = [
  'english',
  'japanese',
  'korean',
  'chinese_simplified',
  'czech',
  'italian',
  'portuguese',
  'spanish',
] as const

export type Language = (typeof LANGUAGES)[number]

export function isLanguage(value: string): value is Language {
  return (LANGUAGES as readonly string[]).includes(value)
}

/**
 * Where the entries of a list come from: the entries themselves, or the
 * text of a word list file.
 */
export type WordlistSource =
  | readonly string[]
  | { text: string }
  | { path: string }

export const Words: Readonly<Record<Language, readonly string[]>> = {
  english,
  japanese,
  korean,
  chinese_simplified: chineseSimplified,
  czech,
  italian,
  portuguese,
  spanish,
}

/**
 * Shape every entry of a list must have. Only some languages are checked.
 */
export interface WordRules {
  /** Inclusive range of code points per entry */
  codepoints: readonly [number, number]
  /** Inclusive range of NFKC glyphs per entry */
  glyphs: readonly [number, number]
  /** Every character an entry may contain */
  alphabet: string
}

export const WORD_RULES: Partial<Record<Language, WordRules>> = {
  english: {
    codepoints: [3, 8],
    glyphs: [3, 8],
    alphabet: 'abcdefghijklmnopqrstuvwxyz',
  },
}

/**
 * Letters easily mistaken for one another in handwriting. Each key is paired
 * with every letter of its value; every pair is in alphabetical order.
 */
export const SIMILAR_LETTER_GROUPS: Readonly<Record<string, string>> = {
  a: 'ceo',
  b: 'dhpqr',
  c: 'egnoqu',
  d: 'ghopq',
  e: 'fo',
  f: 'ijlpt',
  g: 'jopqy',
  h: 'klmnr',
  i: 'jlty',
  j: 'lpqy',
  k: 'x',
  l: 't',
  m: 'nw',
  n: 'uz',
  o: 'pquv',
  p: 'qr',
  q: 'y',
  s: 'z',
  u: 'vwy',
  v: 'wy',
}
