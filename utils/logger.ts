/**
 * Copyright 2025 The Lotusia Stewardship
 * Github: https://github.com/LotusiaStewardship
 * License: MIT
 */
import { getLogLevel, type LogLevel } from './env.js'

/** Log level hierarchy for filtering */
const LOG_LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
}

/** Anything with a `write` method, such as `process.stderr` */
export interface LogOutput {
  write(chunk: string): unknown
}

export interface LoggerConfig {
  /** Current log level */
  level: LogLevel
  /** Whether to include timestamps */
  timestamps: boolean
  /** Prefix for all messages */
  prefix?: string
  /** Output stream for logs */
  output: LogOutput
}

/**
 * Level-filtered logger writing one line per message.
 *
 * Callers must never pass mnemonics, passphrases, entropy or seeds.
 */
export class Logger {
  private config: LoggerConfig

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: getLogLevel(),
      timestamps: true,
      output: process.stderr,
      ...config,
    }
  }

  get level(): LogLevel {
    return this.config.level
  }

  setLevel(level: LogLevel): void {
    this.config.level = level
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args)
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args)
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args)
  }

  /**
   * Create a child logger with additional prefix
   */
  child(prefix: string): Logger {
    const childPrefix = this.config.prefix
      ? `${this.config.prefix}:${prefix}`
      : prefix
    return new Logger({ ...this.config, prefix: childPrefix })
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[level] > LOG_LEVELS[this.config.level]) {
      return
    }

    const timestamp = this.config.timestamps
      ? `[${new Date().toISOString()}] `
      : ''
    const prefix = this.config.prefix ? `[${this.config.prefix}] ` : ''
    let line = `${timestamp}${prefix}${level.toUpperCase().padEnd(5)} ${message}`

    if (args.length > 0) {
      line +=
        ' ' +
        args
          .map(arg =>
            typeof arg === 'object' && arg !== null
              ? JSON.stringify(arg)
              : String(arg),
          )
          .join(' ')
    }

    this.config.output.write(line + '\n')
  }
}

/** Root logger instance */
export const logger = new Logger()

/**
 * Create a scoped logger for a specific module
 */
export function createLogger(scope: string): Logger {
  return logger.child(scope)
}
