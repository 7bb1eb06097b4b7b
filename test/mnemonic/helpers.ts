import { WORDLIST_SIZE } from '../../utils/constants.js'

/**
 * Placeholder entries '0000x', '0001x', ... with distinct four character
 * prefixes, followed by `extra`, 2048 entries in total
 */
export function syntheticWords(extra: readonly string[] = []): string[] {
  const words: string[] = []
  for (let i = 0; words.length < WORDLIST_SIZE - extra.length; i++) {
    words.push(String(i).padStart(4, '0') + 'x')
  }
  return [...words, ...extra]
}

/** 2048 distinct lowercase words of three letters: 'aaa', 'aab', ... */
export function letterWords(): string[] {
  const alphabet = 'abcdefghijklmnopqrstuvwxyz'
  const words: string[] = []
  for (let i = 0; i < WORDLIST_SIZE; i++) {
    words.push(
      alphabet[Math.floor(i / 676) % 26] +
        alphabet[Math.floor(i / 26) % 26] +
        alphabet[i % 26],
    )
  }
  return words
}
