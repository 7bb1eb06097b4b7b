/**
 * Registry of the word lists of every supported language, and language
 * detection over them
 */

import { join } from 'node:path'
import { getWordlistDir } from '../../utils/env.js'
import { createLogger } from '../../utils/logger.js'
import { AmbiguousOrUnknownWord, WordlistLoadError } from './errors.js'
import { normalizeString, splitWords } from './normalize.js'
import { Wordlist, loadWordlistFile } from './wordlist.js'
import {
  LANGUAGES,
  Words,
  isLanguage,
  type Language,
  type WordlistSource,
} from './words/index.js'

const log = createLogger('wordlist')

/**
 * Loads each language's list on first use and hands out the same frozen
 * Wordlist from then on.
 *
 * Languages without an override use the bundled BIP39 lists.
 *
 * @example
 * const store = new WordlistStore({ english: { path: './english.txt' } })
 * store.load('english').indexOf('zoo') // 2047
 */
export class WordlistStore {
  private readonly overrides: Partial<Record<Language, WordlistSource>>
  private readonly loaded = new Map<Language, Wordlist>()

  constructor(overrides: Partial<Record<Language, WordlistSource>> = {}) {
    this.overrides = { ...overrides }
  }

  /**
   * @throws {WordlistLoadError} for an unsupported language or a source
   * that cannot be read or validated
   */
  load(language: string): Wordlist {
    if (!isLanguage(language)) {
      throw new WordlistLoadError(
        language,
        `unsupported language, expected one of ${LANGUAGES.join(', ')}`,
      )
    }
    const cached = this.loaded.get(language)
    if (cached) {
      return cached
    }
    const wordlist = this.read(language)
    this.loaded.set(language, wordlist)
    return wordlist
  }

  listLanguages(): readonly Language[] {
    return LANGUAGES
  }

  /**
   * Language whose list contains `word`.
   *
   * @throws {AmbiguousOrUnknownWord} when no list, or more than one list,
   * contains the word
   */
  detectLanguage(word: string): Language {
    const normalized = normalizeString(word)
    const candidates = LANGUAGES.filter(language =>
      this.load(language).has(normalized),
    )
    if (candidates.length !== 1) {
      throw new AmbiguousOrUnknownWord(word, candidates)
    }
    return candidates[0]
  }

  /**
   * Language every word of `sentence` belongs to.
   *
   * @throws {AmbiguousOrUnknownWord} naming the first word no remaining
   * language contains, or the whole sentence when several languages remain
   */
  detectMnemonicLanguage(sentence: string): Language {
    let candidates: Language[] = [...LANGUAGES]
    const words = splitWords(sentence)
    if (words.length === 0) {
      throw new AmbiguousOrUnknownWord(sentence, [])
    }
    for (const word of words) {
      candidates = candidates.filter(language => this.load(language).has(word))
      if (candidates.length === 0) {
        throw new AmbiguousOrUnknownWord(word, [])
      }
    }
    if (candidates.length !== 1) {
      throw new AmbiguousOrUnknownWord(sentence, candidates)
    }
    return candidates[0]
  }

  private read(language: Language): Wordlist {
    const source = this.overrides[language] ?? Words[language]
    let wordlist: Wordlist
    if ('path' in source) {
      log.debug(`loading ${language} from ${source.path}`)
      wordlist = loadWordlistFile(language, source.path)
    } else if ('text' in source) {
      wordlist = Wordlist.fromText(language, source.text)
    } else {
      wordlist = Wordlist.fromWords(language, source)
    }
    log.debug(`loaded ${language} (${wordlist.size} words)`)
    return wordlist
  }
}

function environmentOverrides(): Partial<Record<Language, WordlistSource>> {
  const dir = getWordlistDir()
  const overrides: Partial<Record<Language, WordlistSource>> = {}
  if (dir) {
    for (const language of LANGUAGES) {
      overrides[language] = { path: join(dir, `${language}.txt`) }
    }
  }
  return overrides
}

/** Store used when no other is given; honours SEEDWORDS_WORDLIST_DIR */
export const defaultStore = new WordlistStore(environmentOverrides())

export function listLanguages(): readonly Language[] {
  return defaultStore.listLanguages()
}

export function detectLanguage(
  word: string,
  store: WordlistStore = defaultStore,
): Language {
  return store.detectLanguage(word)
}

export function detectMnemonicLanguage(
  sentence: string,
  store: WordlistStore = defaultStore,
): Language {
  return store.detectMnemonicLanguage(sentence)
}
