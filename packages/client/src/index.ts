// Protocol layer exports
export * from '@/protocol/index.js'

// Network boundary
export * from '@/network/index.js'

// Errors
export { EncodingError, InvalidConfigError, ProtocolVersionError, QipcError, UnsupportedTypeError } from '@/errors.js'

// Logger
export { createLogger, noopLogger, resolveLogLevel, type Logger, type LogLevel } from '@/logger.js'
