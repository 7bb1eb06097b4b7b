/**
 * Key stretching for seed derivation
 */

import { pbkdf2 as noblePbkdf2 } from '@noble/hashes/pbkdf2'
import { sha512 } from '@noble/hashes/sha512'
import { Preconditions } from '../util/preconditions.js'

/**
 * PBKDF2 with HMAC-SHA512 over raw bytes. Text is encoded by the caller.
 */
export function pbkdf2(
  password: Uint8Array,
  salt: Uint8Array,
  iterations: number,
  keyLength: number,
): Buffer {
  Preconditions.checkArgumentType(password, 'bytes', 'password')
  Preconditions.checkArgumentType(salt, 'bytes', 'salt')
  Preconditions.checkArgument(
    Number.isInteger(iterations) && iterations > 0,
    'iterations',
    'must be a positive integer',
  )
  Preconditions.checkArgument(
    Number.isInteger(keyLength) && keyLength > 0,
    'keyLength',
    'must be a positive integer',
  )
  return Buffer.from(
    noblePbkdf2(sha512, password, salt, { c: iterations, dkLen: keyLength }),
  )
}
