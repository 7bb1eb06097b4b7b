/**
 * Quality checks for word lists
 *
 * None of these are needed to encode or decode mnemonics. They measure the
 * properties a well-formed list is expected to have: no two words sharing
 * their first four letters, no pair of words a single misread letter apart,
 * no word shared between languages.
 */

import type { WordlistStore } from './store.js'
import type { Wordlist } from './wordlist.js'
import {
  SIMILAR_LETTER_GROUPS,
  WORD_RULES,
  type Language,
} from './words/index.js'

/** Letters easily mistaken for one another, each pair in alphabetical order */
export const SIMILAR_LETTERS: readonly (readonly [string, string])[] =
  Object.entries(SIMILAR_LETTER_GROUPS).flatMap(([letter, similar]) =>
    [...similar].map(other => [letter, other] as const),
  )

export interface PrefixGroup {
  prefix: string
  words: string[]
}

export interface SimilarPair {
  first: string
  second: string
  /** The two letters that differ */
  letters: readonly [string, string]
}

export interface Collision {
  word: string
  languages: Language[]
}

/**
 * Groups of words sharing the same first `length` characters (in NFKC).
 * A well-formed standard list has none for the default length of 4.
 */
export function findDuplicatePrefixes(
  wordlist: Wordlist,
  length = 4,
): PrefixGroup[] {
  const groups = new Map<string, string[]>()
  for (const word of wordlist.words) {
    const prefix = [...word.normalize('NFKC')].slice(0, length).join('')
    const group = groups.get(prefix)
    if (group) {
      group.push(word)
    } else {
      groups.set(prefix, [word])
    }
  }
  return [...groups]
    .filter(([, words]) => words.length > 1)
    .map(([prefix, words]) => ({ prefix, words }))
}

/**
 * Pairs of equally long words that differ in exactly one position, where
 * the two letters at that position are listed in `pairs`.
 */
export function findSimilarWords(
  wordlist: Wordlist,
  pairs: readonly (readonly [string, string])[] = SIMILAR_LETTERS,
): SimilarPair[] {
  const similar = new Set(pairs.map(([a, b]) => a + '\u0000' + b))
  const byLength = new Map<number, string[][]>()
  for (const word of wordlist.words) {
    const chars = [...word]
    const bucket = byLength.get(chars.length)
    if (bucket) {
      bucket.push(chars)
    } else {
      byLength.set(chars.length, [chars])
    }
  }

  const found: SimilarPair[] = []
  for (const bucket of byLength.values()) {
    for (let i = 0; i < bucket.length; i++) {
      for (let j = i + 1; j < bucket.length; j++) {
        const letters = singleDifference(bucket[i], bucket[j])
        if (letters && similar.has(letters[0] + '\u0000' + letters[1])) {
          found.push({
            first: bucket[i].join(''),
            second: bucket[j].join(''),
            letters,
          })
        }
      }
    }
  }
  return found
}

/**
 * Words listed more than once across the languages of `store`
 */
export function findCollisions(store: WordlistStore): Collision[] {
  const owners = new Map<string, Language[]>()
  for (const language of store.listLanguages()) {
    for (const word of store.load(language).words) {
      const languages = owners.get(word)
      if (languages) {
        languages.push(language)
      } else {
        owners.set(word, [language])
      }
    }
  }
  return [...owners]
    .filter(([, languages]) => languages.length > 1)
    .map(([word, languages]) => ({ word, languages }))
}

/**
 * Words outside the code point or NFKC glyph range of their language.
 * Languages without rules always pass.
 */
export function checkLengthRules(wordlist: Wordlist): string[] {
  const rules = WORD_RULES[wordlist.language]
  if (!rules) {
    return []
  }
  const [minCodepoints, maxCodepoints] = rules.codepoints
  const [minGlyphs, maxGlyphs] = rules.glyphs
  return wordlist.words.filter(word => {
    const codepoints = [...word].length
    const glyphs = [...word.normalize('NFKC')].length
    return (
      codepoints < minCodepoints ||
      codepoints > maxCodepoints ||
      glyphs < minGlyphs ||
      glyphs > maxGlyphs
    )
  })
}

function singleDifference(
  a: readonly string[],
  b: readonly string[],
): readonly [string, string] | undefined {
  let letters: readonly [string, string] | undefined
  for (let k = 0; k < a.length; k++) {
    if (a[k] === b[k]) continue
    if (letters) return undefined
    letters = a[k] < b[k] ? [a[k], b[k]] : [b[k], a[k]]
  }
  return letters
}
