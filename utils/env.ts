/**
 * Copyright 2025 The Lotusia Stewardship
 * Github: https://github.com/LotusiaStewardship
 * License: MIT
 */
import { ENV_LOG_LEVEL, ENV_WORDLIST_DIR } from './constants.js'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug']

/**
 * Check if running in Node.js environment
 *
 * @returns true if running in Node.js, false if running in browser
 */
export function isNode(): boolean {
  return !!(
    typeof process !== 'undefined' &&
    process.versions &&
    process.versions.node
  )
}

/**
 * Read an environment variable, treating empty strings as unset
 *
 * @param name - The variable name
 * @returns The value, or `undefined` outside Node.js or when unset
 */
export function getEnv(name: string): string | undefined {
  if (!isNode()) {
    return undefined
  }
  const value = process.env[name]
  return value ? value : undefined
}

/**
 * Check if a string names a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

/**
 * Log level configured through the environment, `warn` when unset or invalid
 */
export function getLogLevel(): LogLevel {
  const value = getEnv(ENV_LOG_LEVEL)?.toLowerCase()
  return value && isLogLevel(value) ? value : 'warn'
}

/**
 * Directory to load word list files from instead of the bundled lists
 */
export function getWordlistDir(): string | undefined {
  return getEnv(ENV_WORDLIST_DIR)
}
