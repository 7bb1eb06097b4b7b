/**
 * Mnemonic-specific error definitions
 *
 * Each failure of the codec, the detector or the wordlist loader has its own
 * class and `code`, so that callers can tell a mistyped word (retype) from a
 * checksum failure or a wrong word count (regenerate).
 */

import { BaseError, format, type ErrorOptions } from '../errors.js'

export type MnemonicErrorCode =
  | 'InvalidEntropyLength'
  | 'InvalidMnemonicLength'
  | 'UnknownWord'
  | 'ChecksumMismatch'
  | 'AmbiguousOrUnknownWord'
  | 'WordlistLoadError'

const messages: Record<MnemonicErrorCode, string> = {
  InvalidEntropyLength:
    'Entropy must be 128, 160, 192, 224 or 256 bits long, got {0} bits',
  InvalidMnemonicLength:
    'Number of words must be one of {1}, but it is {0}',
  UnknownWord: 'Word "{0}" at position {1} is not in the {2} word list',
  ChecksumMismatch: 'Mnemonic checksum is invalid: expected {0}, got {1}',
  AmbiguousOrUnknownWord: 'Language {1} for "{0}"',
  WordlistLoadError: 'Could not load the {0} word list: {1}',
}

export abstract class MnemonicError extends BaseError {
  abstract readonly code: MnemonicErrorCode

  protected constructor(
    code: MnemonicErrorCode,
    args: readonly unknown[],
    options?: ErrorOptions,
  ) {
    super(format(messages[code], args), options)
  }
}

export class InvalidEntropyLength extends MnemonicError {
  readonly code = 'InvalidEntropyLength'

  constructor(readonly bits: number) {
    super('InvalidEntropyLength', [bits])
  }
}

export class InvalidMnemonicLength extends MnemonicError {
  readonly code = 'InvalidMnemonicLength'

  constructor(
    readonly wordCount: number,
    readonly allowed: string,
  ) {
    super('InvalidMnemonicLength', [wordCount, allowed])
  }
}

export class UnknownWord extends MnemonicError {
  readonly code = 'UnknownWord'

  constructor(
    readonly word: string,
    readonly position: number,
    readonly language: string,
  ) {
    super('UnknownWord', [word, position, language])
  }
}

export class ChecksumMismatch extends MnemonicError {
  readonly code = 'ChecksumMismatch'

  constructor(
    readonly expected: string,
    readonly actual: string,
  ) {
    super('ChecksumMismatch', [expected, actual])
  }
}

export class AmbiguousOrUnknownWord extends MnemonicError {
  readonly code = 'AmbiguousOrUnknownWord'

  /** Languages whose list contains the word; empty when it is unknown. */
  readonly candidates: readonly string[]

  constructor(
    readonly word: string,
    candidates: readonly string[],
  ) {
    super('AmbiguousOrUnknownWord', [
      word,
      candidates.length === 0
        ? 'unrecognized'
        : 'ambiguous between ' + candidates.join(', '),
    ])
    this.candidates = candidates
  }
}

export class WordlistLoadError extends MnemonicError {
  readonly code = 'WordlistLoadError'

  constructor(
    readonly language: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super('WordlistLoadError', [language, reason], options)
  }
}
