/**
 * Immutable word list for one language
 */

import { readFileSync } from 'node:fs'
import { WORDLIST_SIZE } from '../../utils/constants.js'
import { Preconditions } from '../util/preconditions.js'
import { WordlistLoadError } from './errors.js'
import { normalizeString } from './normalize.js'
import { WORD_RULES, type Language } from './words/index.js'

const BYTE_ORDER_MARK = '\uFEFF'

/**
 * An ordered list of exactly 2048 unique words.
 *
 * Entries are stored in NFKD. Positions are looked up through a map built
 * once at construction, so lookups do not depend on the list being sorted:
 * several standard lists are not in code point order.
 */
export class Wordlist {
  readonly language: Language
  readonly words: readonly string[]
  private readonly positions: ReadonlyMap<string, number>

  private constructor(language: Language, words: readonly string[]) {
    this.language = language
    this.words = Object.freeze([...words])
    this.positions = new Map(words.map((word, i) => [word, i]))
    Object.freeze(this)
  }

  /**
   * Build a list from its entries, in order.
   *
   * @throws {WordlistLoadError} on a wrong count, an empty or duplicate
   * entry, an entry carrying whitespace, or an entry breaking the
   * language's length or alphabet rules
   */
  static fromWords(language: Language, words: readonly string[]): Wordlist {
    const normalized = words.map(word => normalizeString(word))
    validateEntries(language, normalized)
    return new Wordlist(language, normalized)
  }

  /**
   * Build a list from the contents of a word list file: UTF-8, one word
   * per line, no byte-order mark. A single trailing newline is allowed.
   */
  static fromText(language: Language, text: string): Wordlist {
    if (text.startsWith(BYTE_ORDER_MARK)) {
      throw new WordlistLoadError(language, 'text starts with a byte-order mark')
    }
    const lines = text.split('\n')
    if (lines[lines.length - 1] === '') {
      lines.pop()
    }
    return Wordlist.fromWords(language, lines)
  }

  get size(): number {
    return this.words.length
  }

  /**
   * Position of `word` in the list, or -1. The word is normalized first.
   */
  indexOf(word: string): number {
    return this.positions.get(normalizeString(word)) ?? -1
  }

  has(word: string): boolean {
    return this.indexOf(word) !== -1
  }

  wordAt(index: number): string {
    Preconditions.checkArgument(
      Number.isInteger(index) && index >= 0 && index < this.words.length,
      'index',
      `must be an integer between 0 and ${this.words.length - 1}, got ${index}`,
    )
    return this.words[index]
  }

  /**
   * Every entry beginning with `prefix`, in list order. No normalization is
   * applied to `prefix`.
   */
  startingWith(prefix: string): string[] {
    return this.words.filter(word => word.startsWith(prefix))
  }
}

/**
 * Read a word list file from disk
 *
 * @throws {WordlistLoadError} when the file cannot be read or is malformed
 */
export function loadWordlistFile(language: Language, path: string): Wordlist {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (e) {
    throw new WordlistLoadError(language, `cannot read ${path}`, { cause: e })
  }
  return Wordlist.fromText(language, text)
}

function validateEntries(language: Language, words: readonly string[]): void {
  if (words.length !== WORDLIST_SIZE) {
    throw new WordlistLoadError(
      language,
      `expected ${WORDLIST_SIZE} words, got ${words.length}`,
    )
  }

  const seen = new Set<string>()
  words.forEach((word, i) => {
    if (word.length === 0) {
      throw new WordlistLoadError(language, `entry ${i} is empty`)
    }
    if (/\s/u.test(word)) {
      throw new WordlistLoadError(language, `entry ${i} contains whitespace`)
    }
    if (seen.has(word)) {
      throw new WordlistLoadError(language, `duplicate entry "${word}"`)
    }
    seen.add(word)
  })

  const rules = WORD_RULES[language]
  if (!rules) {
    return
  }
  const [min, max] = rules.codepoints
  for (const word of words) {
    const length = [...word].length
    if (length < min || length > max) {
      throw new WordlistLoadError(
        language,
        `"${word}" has ${length} characters, expected ${min} to ${max}`,
      )
    }
    for (const char of word) {
      if (!rules.alphabet.includes(char)) {
        throw new WordlistLoadError(
          language,
          `"${word}" contains "${char}", which is not in the alphabet`,
        )
      }
    }
  }
}
