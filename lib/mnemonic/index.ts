/**
 * Mnemonic module exports
 */

export { Mnemonic, default, type ValidationResult } from './mnemonic.js'
export {
  entropyChecksum,
  entropyToMnemonic,
  mnemonicToEntropy,
  type DecodeOptions,
} from './codec.js'
export {
  MnemonicError,
  InvalidEntropyLength,
  InvalidMnemonicLength,
  UnknownWord,
  ChecksumMismatch,
  AmbiguousOrUnknownWord,
  WordlistLoadError,
  type MnemonicErrorCode,
} from './errors.js'
export { expand, expandWord } from './expand.js'
export { IDEOGRAPHIC_SPACE, normalizeString, splitWords } from './normalize.js'
export { pbkdf2 } from './pbkdf2.js'
export { toSeed } from './seed.js'
export {
  WordlistStore,
  defaultStore,
  listLanguages,
  detectLanguage,
  detectMnemonicLanguage,
} from './store.js'
export { Wordlist, loadWordlistFile } from './wordlist.js'
export {
  findDuplicatePrefixes,
  findSimilarWords,
  findCollisions,
  checkLengthRules,
  SIMILAR_LETTERS,
  type PrefixGroup,
  type SimilarPair,
  type Collision,
} from './diagnostics.js'
export {
  LANGUAGES,
  Words,
  WORD_RULES,
  SIMILAR_LETTER_GROUPS,
  isLanguage,
  type Language,
  type WordlistSource,
  type WordRules,
} from './words/index.js'
