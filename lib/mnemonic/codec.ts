/**
 * Conversion between entropy and mnemonic sentences
 *
 * Bits are handled as strings of '0' and '1': entropy bits, then the
 * checksum bits, cut into 11-bit big-endian groups that index the word list.
 */

import { Hash } from '../crypto/hash.js'
import { Preconditions } from '../util/preconditions.js'
import {
  BITS_PER_WORD,
  VALID_ENTROPY_BITS,
  VALID_WORD_COUNTS,
} from '../../utils/constants.js'
import { fromHex, isHex, toBinary } from '../../utils/string.js'
import {
  ChecksumMismatch,
  InvalidEntropyLength,
  InvalidMnemonicLength,
  UnknownWord,
} from './errors.js'
import { normalizeString, splitWords } from './normalize.js'
import type { Wordlist } from './wordlist.js'

export interface DecodeOptions {
  /**
   * Accept any positive multiple of three words instead of only the
   * 12, 15, 18, 21 and 24 word sentences produced from valid entropy.
   */
  allowNonStandardLength?: boolean
}

/**
 * Checksum of `entropy`: the first `bits / 32` bits of its SHA-256 digest
 *
 * @returns The checksum bits as a binary string
 */
export function entropyChecksum(entropy: Uint8Array): string {
  const cs = (entropy.length * 8) / 32
  return bytesToBinary(Hash.sha256(entropy)).slice(0, cs)
}

/**
 * Encode entropy (bytes or a hex string) as a mnemonic sentence
 *
 * @throws {InvalidEntropyLength} unless the entropy is 128, 160, 192, 224
 * or 256 bits long
 */
export function entropyToMnemonic(
  entropy: Uint8Array | string,
  wordlist: Wordlist,
): string {
  const bytes = toEntropyBytes(entropy)
  const bits = bytes.length * 8
  if (!(VALID_ENTROPY_BITS as readonly number[]).includes(bits)) {
    throw new InvalidEntropyLength(bits)
  }

  const bin = bytesToBinary(bytes) + entropyChecksum(bytes)
  Preconditions.checkState(
    bin.length % BITS_PER_WORD === 0,
    'entropy and checksum must fill whole words',
  )
  const words: string[] = []
  for (let i = 0; i < bin.length / BITS_PER_WORD; i++) {
    const index = parseInt(
      bin.slice(i * BITS_PER_WORD, (i + 1) * BITS_PER_WORD),
      2,
    )
    words.push(wordlist.wordAt(index))
  }
  return words.join(' ')
}

/**
 * Decode a mnemonic back into the entropy it was made from
 *
 * @param words - The words, or a whole sentence to be split on whitespace
 * @throws {InvalidMnemonicLength} for an unsupported number of words
 * @throws {UnknownWord} for a word that is not in the list
 * @throws {ChecksumMismatch} when the checksum bits do not match
 */
export function mnemonicToEntropy(
  words: readonly string[] | string,
  wordlist: Wordlist,
  options: DecodeOptions = {},
): Buffer {
  const list =
    typeof words === 'string'
      ? splitWords(words)
      : words.map(word => normalizeString(word))
  checkWordCount(list.length, options)

  let bin = ''
  list.forEach((word, position) => {
    const index = wordlist.indexOf(word)
    if (index < 0) {
      throw new UnknownWord(word, position, wordlist.language)
    }
    bin += toBinary(index, BITS_PER_WORD)
  })

  const cs = bin.length / 33
  const entropyBits = bin.slice(0, bin.length - cs)
  const checksum = bin.slice(bin.length - cs)
  const entropy = Buffer.alloc(entropyBits.length / 8)
  for (let i = 0; i < entropy.length; i++) {
    entropy[i] = parseInt(entropyBits.slice(i * 8, (i + 1) * 8), 2)
  }

  const expected = entropyChecksum(entropy)
  if (expected !== checksum) {
    throw new ChecksumMismatch(expected, checksum)
  }
  return entropy
}

function checkWordCount(count: number, options: DecodeOptions): void {
  if (options.allowNonStandardLength) {
    if (count === 0 || count % 3 !== 0) {
      throw new InvalidMnemonicLength(count, 'the positive multiples of 3')
    }
    return
  }
  if (!(VALID_WORD_COUNTS as readonly number[]).includes(count)) {
    throw new InvalidMnemonicLength(count, VALID_WORD_COUNTS.join(', '))
  }
}

function toEntropyBytes(entropy: Uint8Array | string): Uint8Array {
  if (typeof entropy === 'string') {
    Preconditions.checkArgument(
      entropy.length % 2 === 0 && (entropy.length === 0 || isHex(entropy)),
      'entropy',
      'must be bytes or an even-length hex string',
    )
    return fromHex(entropy)
  }
  Preconditions.checkArgumentType(entropy, 'bytes', 'entropy')
  return entropy
}

function bytesToBinary(bytes: Uint8Array): string {
  let bin = ''
  for (const byte of bytes) {
    bin += toBinary(byte, 8)
  }
  return bin
}
