/**
 * Completion of abbreviated mnemonic words
 */

import { normalizeString } from './normalize.js'
import type { Wordlist } from './wordlist.js'

/**
 * Complete `prefix` to the single word of the list it starts.
 *
 * Words of the list come back as given. A prefix shared by several words,
 * one matching nothing, and blank input are returned unchanged.
 */
export function expandWord(prefix: string, wordlist: Wordlist): string {
  if (/^\s*$/u.test(prefix) || wordlist.has(prefix)) {
    return prefix
  }
  const matches = wordlist.startingWith(normalizeString(prefix))
  return matches.length === 1 ? matches[0] : prefix
}

/**
 * Expand every whitespace-separated token of `sentence` and join the
 * results with single spaces.
 */
export function expand(sentence: string, wordlist: Wordlist): string {
  return sentence
    .split(/\s+/u)
    .filter(token => token.length > 0)
    .map(token => expandWord(token, wordlist))
    .join(' ')
}
