/**
 * Copyright 2025 The Lotusia Stewardship
 * Github: https://github.com/LotusiaStewardship
 * License: MIT
 */
export * from './lib/mnemonic/index.js'
export { default } from './lib/mnemonic/index.js'
export { BaseError, InvalidArgument, InvalidState } from './lib/errors.js'
export { Hash } from './lib/crypto/hash.js'
export * from './utils/constants.js'
export { getLogLevel, getWordlistDir, isNode, type LogLevel } from './utils/env.js'
export { Logger, createLogger, logger, type LoggerConfig } from './utils/logger.js'
export { fromHex, isHex, toHex } from './utils/string.js'
