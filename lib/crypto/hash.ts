/**
 * Cryptographic hash functions
 *
 * Uses @noble/hashes for browser compatibility
 */

import { sha256 } from '@noble/hashes/sha256'
import { Preconditions } from '../util/preconditions.js'

function sha256Func(buf: Uint8Array): Buffer {
  Preconditions.checkArgumentType(buf, 'bytes', 'buf')
  return Buffer.from(sha256(buf))
}

export class Hash {
  static sha256 = sha256Func
}
