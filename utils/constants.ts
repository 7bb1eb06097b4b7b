/**
 * Copyright 2025 The Lotusia Stewardship
 * Github: https://github.com/LotusiaStewardship
 * License: MIT
 */

/**
 * Mnemonic constants
 */
/** Number of entries in every word list */
export const WORDLIST_SIZE = 2048
/** Bits encoded by a single word (log2 of WORDLIST_SIZE) */
export const BITS_PER_WORD = 11
/** Entropy sizes, in bits, that may be turned into a mnemonic */
export const VALID_ENTROPY_BITS = [128, 160, 192, 224, 256] as const
/** Word counts produced by the valid entropy sizes */
export const VALID_WORD_COUNTS = [12, 15, 18, 21, 24] as const

/**
 * Seed derivation
 */
/** PBKDF2 iteration count */
export const PBKDF2_ROUNDS = 2048
/** Length of the derived seed, in bytes */
export const SEED_BYTES = 64
/** Literal prepended to the passphrase to form the PBKDF2 salt */
export const SALT_PREFIX = 'mnemonic'

/**
 * Environment variables
 */
/** Minimum level written by the library logger */
export const ENV_LOG_LEVEL = 'SEEDWORDS_LOG_LEVEL'
/** Directory holding `<language>.txt` word lists that replace the bundled ones */
export const ENV_WORDLIST_DIR = 'SEEDWORDS_WORDLIST_DIR'
