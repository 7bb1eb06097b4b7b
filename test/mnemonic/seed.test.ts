import { describe, it } from 'node:test'
import assert from 'node:assert'
import { pbkdf2 } from '../../lib/mnemonic/pbkdf2.js'
import { toSeed } from '../../lib/mnemonic/seed.js'
import { InvalidArgument } from '../../lib/errors.js'

const vectors = [
  {
    mnemonic:
      'abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon about',
    seed: 'c55257c360c07c72029aebc1b53c05ed0362ada38ead3e3e9efa3708e53495531f09a6987599d18264c1e1c92f2cf141630c7a3c4ab7c81b2f001698e7463b04',
  },
  {
    mnemonic:
      'legal winner thank year wave sausage worth useful legal winner thank yellow',
    seed: '2e8905819b8723fe2c1d161860e5ee1830318dbf49a83bd451cfb8440c28bd6fa457fe1296106559a3c80937a1c1069be3a3a5bd381ee6260e8d9739fce1f607',
  },
  {
    mnemonic: 'zoo zoo zoo zoo zoo zoo zoo zoo zoo zoo zoo wrong',
    seed: 'ac27495480225222079d7be181583751e86f571027b0497b5b5d11218e0a8a13332572917f0f8e5a589620c6f15b11c61dee327651a14c34e18231052e48c069',
  },
  {
    mnemonic:
      'ozone drill grab fiber curtain grace pudding thank cruise elder eight picnic',
    seed: '274ddc525802f7c828d8ef7ddbcdc5304e87ac3535913611fbbfa986d0c9e5476c91689f9c8a54fd55bd38606aa6a8595ad213d4c9c9f9aca3fb217069a41028',
  },
]

describe('SeedDeriver', () => {
  describe('toSeed', () => {
    for (const vector of vectors) {
      it(`should derive the seed of "${vector.mnemonic.slice(0, 24)}..."`, () => {
        const seed = toSeed(vector.mnemonic, 'TREZOR')
        assert.strictEqual(seed.length, 64)
        assert.strictEqual(seed.toString('hex'), vector.seed)
      })
    }

    it('should default to an empty passphrase', () => {
      assert.strictEqual(
        toSeed(vectors[0].mnemonic).toString('hex'),
        '5eb00bbddcf069084889a8ab9155568165f5c453ccb85e70811aaed6f6da5fc19a5ac40b389cd370d086206dec8aa6c43daea6690f20ad3d8d48b2d2ce9e38e4',
      )
      assert.ok(toSeed(vectors[0].mnemonic).equals(toSeed(vectors[0].mnemonic, '')))
    })

    it('should not validate the mnemonic', () => {
      const seed = toSeed('not a mnemonic at all', 'test-secret')
      assert.strictEqual(seed.length, 64)
    })

    it('should not depend on the normalization form of its inputs', () => {
      const mnemonic = 'příliš žluťoučký kůň ﬁord'
      const passphrase = 'velmi tajné školácké heslo'
      const expected = toSeed(mnemonic, passphrase)
      for (const form of ['NFC', 'NFD', 'NFKC', 'NFKD'] as const) {
        assert.ok(
          toSeed(mnemonic.normalize(form), passphrase.normalize(form)).equals(
            expected,
          ),
          `${form} differs`,
        )
      }
    })

    it('should treat ideographic spaces as ASCII spaces', () => {
      assert.ok(
        toSeed('a\u3000b', 'c\u3000d').equals(toSeed('a b', 'c d')),
      )
    })

    it('should salt with the passphrase', () => {
      assert.ok(!toSeed(vectors[0].mnemonic, 'a').equals(toSeed(vectors[0].mnemonic, 'b')))
    })
  })

  describe('pbkdf2', () => {
    it('should match the seed derivation for the same bytes', () => {
      const key = pbkdf2(
        Buffer.from(vectors[0].mnemonic, 'utf8'),
        Buffer.from('mnemonicTREZOR', 'utf8'),
        2048,
        64,
      )
      assert.strictEqual(key.toString('hex'), vectors[0].seed)
    })

    it('should derive keys of the requested length', () => {
      const salt = new Uint8Array([1, 2, 3])
      const short = pbkdf2(new Uint8Array([4, 5]), salt, 1, 16)
      const long = pbkdf2(new Uint8Array([4, 5]), salt, 1, 64)
      assert.strictEqual(short.length, 16)
      assert.ok(long.subarray(0, 16).equals(short))
    })

    it('should only take bytes', () => {
      assert.throws(
        () => Reflect.apply(pbkdf2, undefined, ['test-secret', new Uint8Array(4), 1, 64]),
        (e: unknown) =>
          e instanceof InvalidArgument && e.argumentName === 'password',
      )
    })

    it('should reject non-positive counts and lengths', () => {
      const bytes = new Uint8Array(4)
      assert.throws(() => pbkdf2(bytes, bytes, 0, 64), InvalidArgument)
      assert.throws(() => pbkdf2(bytes, bytes, 1, 0), InvalidArgument)
    })
  })
})
