/**
 * Seed derivation from a mnemonic sentence and passphrase
 */

import {
  PBKDF2_ROUNDS,
  SALT_PREFIX,
  SEED_BYTES,
} from '../../utils/constants.js'
import { normalizeString } from './normalize.js'
import { pbkdf2 } from './pbkdf2.js'

/**
 * Derive the 64-byte seed of a mnemonic.
 *
 * The sentence is not checked against any word list, so any string yields a
 * seed. Both inputs are normalized, then encoded as UTF-8.
 *
 * @example
 * const seed = toSeed('abandon abandon ... about', 'TREZOR')
 * seed.toString('hex') // 'c55257c360c0...'
 */
export function toSeed(mnemonic: string, passphrase = ''): Buffer {
  return pbkdf2(
    Buffer.from(normalizeString(mnemonic), 'utf8'),
    Buffer.from(SALT_PREFIX + normalizeString(passphrase), 'utf8'),
    PBKDF2_ROUNDS,
    SEED_BYTES,
  )
}
