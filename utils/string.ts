/**
 * Copyright 2025 The Lotusia Stewardship
 * Github: https://github.com/LotusiaStewardship
 * License: MIT
 */
/**
 * Check if a string is hex-encoded, with optional `length` limit
 * @param str The string to check
 * @param length The length of the hex string to check. If not defined, checks the full string
 * @returns `true` if the string is hex-encoded, `false` otherwise
 */
export function isHex(str: string, length?: number): boolean {
  const regexStr = length ? `^[a-fA-F0-9]{${length}}$` : '^[a-fA-F0-9]+$'
  return new RegExp(regexStr).test(str)
}

/**
 * Convert bytes or a UTF-8 string to a lowercase hex string
 * @param data - The data to convert
 * @returns The hex string
 */
export function toHex(data: Uint8Array | string): string {
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf8').toString('hex')
  }
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString(
    'hex',
  )
}

/**
 * Decode a hex string of even length into a Buffer
 * @param str - The hex string
 * @returns The decoded bytes
 */
export function fromHex(str: string): Buffer {
  if (str.length % 2 !== 0 || (str.length > 0 && !isHex(str))) {
    throw new Error('Invalid hex string')
  }
  return Buffer.from(str, 'hex')
}

/**
 * Left-pad a binary string with zeros to `width` characters
 * @param value - Number to render in base 2
 * @param width - Total number of digits
 */
export function toBinary(value: number, width: number): string {
  return value.toString(2).padStart(width, '0')
}
