import { describe, it } from 'node:test'
import assert from 'node:assert'
import { InvalidArgument } from '../../lib/errors.js'
import { Hash } from '../../lib/crypto/hash.js'

describe('Hash', () => {
  describe('sha256', () => {
    it('should hash bytes into a 32 byte Buffer', () => {
      const digest = Hash.sha256(new Uint8Array(0))
      assert.ok(Buffer.isBuffer(digest))
      assert.strictEqual(
        digest.toString('hex'),
        'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
      )
    })

    it('should be a plain function', () => {
      assert.strictEqual(typeof Hash.sha256, 'function')
      assert.deepStrictEqual(Object.keys(Hash.sha256), [])
    })

    it('should reject input that is not bytes', () => {
      assert.throws(
        () => Reflect.apply(Hash.sha256, undefined, ['abc']),
        InvalidArgument,
      )
    })
  })
})
