/**
 * Unicode normalization shared by every mnemonic operation
 */

/**
 * U+3000 IDEOGRAPHIC SPACE. Japanese mnemonics are written with it between
 * words; it compatibility-decomposes to an ASCII space.
 */
export const IDEOGRAPHIC_SPACE = '\u3000'

/**
 * Bring `text` into NFKD and turn ideographic spaces into ASCII spaces.
 *
 * Text written in NFC, NFD, NFKC or NFKD normalizes to the same string, so
 * the UTF-8 bytes fed to the hash functions do not depend on how the caller
 * happened to encode it.
 */
export function normalizeString(text: string): string {
  return text.normalize('NFKD').replaceAll(IDEOGRAPHIC_SPACE, ' ')
}

/**
 * Normalize, then split on runs of whitespace.
 *
 * Splitting always happens after normalization: the ideographic space is
 * already an ASCII space by then, and `\s` covers it either way.
 */
export function splitWords(text: string): string[] {
  return normalizeString(text)
    .split(/\s+/u)
    .filter(word => word.length > 0)
}
