/**
 * BIP39 Mnemonic implementation
 */

import {
  entropyToMnemonic,
  mnemonicToEntropy,
  type DecodeOptions,
} from './codec.js'
import { MnemonicError } from './errors.js'
import { expand, expandWord } from './expand.js'
import { IDEOGRAPHIC_SPACE, normalizeString } from './normalize.js'
import { toSeed } from './seed.js'
import {
  defaultStore,
  detectLanguage,
  listLanguages,
  type WordlistStore,
} from './store.js'
import type { Wordlist } from './wordlist.js'
import type { Language } from './words/index.js'

export type ValidationResult =
  | { valid: true; entropy: Buffer }
  | { valid: false; error: MnemonicError }

/**
 * A handle bound to the word list of one language.
 * See BIP39 specification for more info: https://github.com/bitcoin/bips/blob/master/bip-0039.mediawiki
 *
 * The handle keeps no state besides its word list, so one instance can be
 * shared freely.
 *
 * @example
 * const mnemo = new Mnemonic('english')
 * const phrase = mnemo.toMnemonic(Buffer.alloc(16))
 * // 'abandon abandon ... about'
 * mnemo.check(phrase) // true
 * const seed = Mnemonic.toSeed(phrase, 'TREZOR')
 */
export class Mnemonic {
  static readonly IDEOGRAPHIC_SPACE = IDEOGRAPHIC_SPACE
  static readonly normalizeString = normalizeString
  static readonly toSeed = toSeed
  static readonly listLanguages = listLanguages
  static readonly detectLanguage = detectLanguage

  readonly wordlist: Wordlist

  /**
   * @throws {WordlistLoadError} when the language is not supported or its
   * list cannot be loaded
   */
  constructor(language: Language | string, store: WordlistStore = defaultStore) {
    this.wordlist = store.load(language)
  }

  get language(): Language {
    return this.wordlist.language
  }

  /**
   * Encode entropy as a sentence of words separated by single spaces
   *
   * @throws {InvalidEntropyLength}
   */
  toMnemonic(entropy: Uint8Array | string): string {
    return entropyToMnemonic(entropy, this.wordlist)
  }

  /**
   * Recover the entropy a mnemonic encodes
   *
   * @throws {InvalidMnemonicLength}
   * @throws {UnknownWord}
   * @throws {ChecksumMismatch}
   */
  toEntropy(words: readonly string[] | string, options?: DecodeOptions): Buffer {
    return mnemonicToEntropy(words, this.wordlist, options)
  }

  /**
   * Whether `mnemonic` decodes with a matching checksum. Never throws.
   *
   * Any positive multiple of three words is accepted, not only the lengths
   * produced by toMnemonic.
   */
  check(mnemonic: string): boolean {
    try {
      mnemonicToEntropy(mnemonic, this.wordlist, {
        allowNonStandardLength: true,
      })
      return true
    } catch {
      return false
    }
  }

  /**
   * Like check, but reports why a mnemonic was rejected
   */
  validate(mnemonic: string): ValidationResult {
    try {
      const entropy = mnemonicToEntropy(mnemonic, this.wordlist, {
        allowNonStandardLength: true,
      })
      return { valid: true, entropy }
    } catch (e) {
      if (e instanceof MnemonicError) {
        return { valid: false, error: e }
      }
      throw e
    }
  }

  expandWord(prefix: string): string {
    return expandWord(prefix, this.wordlist)
  }

  expand(sentence: string): string {
    return expand(sentence, this.wordlist)
  }

  /**
   * Same as Mnemonic.toSeed; the word list plays no part in the seed
   */
  toSeed(mnemonic: string, passphrase?: string): Buffer {
    return toSeed(mnemonic, passphrase)
  }

  /**
   * Will return a string formatted for the console
   */
  inspect(): string {
    return '<Mnemonic: ' + this.language + ' >'
  }
}

export default Mnemonic
