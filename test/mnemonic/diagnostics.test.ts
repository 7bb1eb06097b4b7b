import { describe, it } from 'node:test'
import assert from 'node:assert'
import {
  SIMILAR_LETTERS,
  checkLengthRules,
  findCollisions,
  findDuplicatePrefixes,
  findSimilarWords,
} from '../../lib/mnemonic/diagnostics.js'
import { WordlistStore, defaultStore } from '../../lib/mnemonic/store.js'
import { SIMILAR_LETTER_GROUPS } from '../../lib/mnemonic/words/index.js'
import { Wordlist } from '../../lib/mnemonic/wordlist.js'
import { syntheticWords } from './helpers.js'

describe('Diagnostics', () => {
  describe('SIMILAR_LETTERS', () => {
    it('should list the letter pairs in alphabetical order', () => {
      assert.strictEqual(SIMILAR_LETTERS.length, 63)
      assert.deepStrictEqual(SIMILAR_LETTERS[0], ['a', 'c'])
      assert.deepStrictEqual(SIMILAR_LETTERS[SIMILAR_LETTERS.length - 1], ['v', 'y'])
      for (const [a, b] of SIMILAR_LETTERS) {
        assert.ok(a < b, `${a} should sort before ${b}`)
      }
    })

    it('should pair each grouped letter with every letter of its group', () => {
      assert.deepStrictEqual(
        SIMILAR_LETTERS.filter(([a]) => a === 'b'),
        [['b', 'd'], ['b', 'h'], ['b', 'p'], ['b', 'q'], ['b', 'r']],
      )
      assert.strictEqual(
        SIMILAR_LETTERS.length,
        Object.values(SIMILAR_LETTER_GROUPS).join('').length,
      )
    })
  })

  describe('findDuplicatePrefixes', () => {
    it('should find no shared four letter prefix in English', () => {
      assert.deepStrictEqual(
        findDuplicatePrefixes(defaultStore.load('english')),
        [],
      )
    })

    it('should group words that share a prefix', () => {
      const wordlist = Wordlist.fromWords(
        'japanese',
        syntheticWords(['abcdx', 'abcdy', 'abcex']),
      )
      assert.deepStrictEqual(findDuplicatePrefixes(wordlist), [
        { prefix: 'abcd', words: ['abcdx', 'abcdy'] },
      ])
      assert.deepStrictEqual(findDuplicatePrefixes(wordlist, 5), [])
    })
  })

  describe('findSimilarWords', () => {
    it('should report words one similar letter apart', () => {
      const wordlist = Wordlist.fromWords(
        'japanese',
        syntheticWords(['bad', 'bed', 'box', 'bix']),
      )
      assert.deepStrictEqual(findSimilarWords(wordlist), [
        { first: 'bad', second: 'bed', letters: ['a', 'e'] },
      ])
    })

    it('should use the given letter pairs', () => {
      const wordlist = Wordlist.fromWords(
        'japanese',
        syntheticWords(['bad', 'bed', 'box', 'bix']),
      )
      assert.deepStrictEqual(findSimilarWords(wordlist, [['i', 'o']]), [
        { first: 'box', second: 'bix', letters: ['i', 'o'] },
      ])
    })
  })

  describe('findCollisions', () => {
    it('should find no word shared between the bundled languages', () => {
      assert.strictEqual(defaultStore.listLanguages().length, 8)
      assert.deepStrictEqual(findCollisions(defaultStore), [])
    })

    it('should report words shared between languages', () => {
      const store = new WordlistStore({
        japanese: syntheticWords(['security', 'zoo']),
      })
      assert.deepStrictEqual(findCollisions(store), [
        { word: 'security', languages: ['english', 'japanese'] },
        { word: 'zoo', languages: ['english', 'japanese'] },
      ])
    })
  })

  describe('checkLengthRules', () => {
    it('should pass every bundled list', () => {
      for (const language of defaultStore.listLanguages()) {
        assert.deepStrictEqual(checkLengthRules(defaultStore.load(language)), [])
      }
    })
  })
})
