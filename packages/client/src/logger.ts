/**
 * Structured JSON logging for qipc
 */

/**
 * Log levels supported by the logger
 * 'silent' disables all logging
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	silent: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
}

/** Environment variable read by `resolveLogLevel` */
export const LOG_LEVEL_ENV = 'QIPC_LOG_LEVEL'

export type LogContext = Record<string, unknown>

/**
 * Logger interface for structured logging
 */
export interface Logger {
	error(message: string, context?: LogContext): void
	warn(message: string, context?: LogContext): void
	info(message: string, context?: LogContext): void
	debug(message: string, context?: LogContext): void

	/**
	 * Create a child logger with additional default context
	 */
	child(defaultContext: LogContext): Logger
}

function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LOG_LEVEL_VALUES, value)
}

/**
 * Read a log level from a string such as an environment variable, case-insensitively
 *
 * @param value - Raw level, e.g. `process.env.QIPC_LOG_LEVEL`
 * @param fallback - Level used when `value` is missing or unknown
 */
export function resolveLogLevel(
	value: string | undefined = process.env[LOG_LEVEL_ENV],
	fallback: LogLevel = 'info'
): LogLevel {
	const normalized = value?.trim().toLowerCase()
	return normalized && isLogLevel(normalized) ? normalized : fallback
}

class JsonLogger implements Logger {
	constructor(
		private readonly level: LogLevel,
		private readonly defaultContext: LogContext
	) {}

	private log(level: LogLevel, message: string, context?: LogContext): void {
		if (LOG_LEVEL_VALUES[level] > LOG_LEVEL_VALUES[this.level]) {
			return
		}

		const output = JSON.stringify({
			level,
			message,
			timestamp: new Date().toISOString(),
			...this.defaultContext,
			...context,
		})

		if (level === 'error') {
			console.error(output)
		} else {
			console.log(output)
		}
	}

	error(message: string, context?: LogContext): void {
		this.log('error', message, context)
	}

	warn(message: string, context?: LogContext): void {
		this.log('warn', message, context)
	}

	info(message: string, context?: LogContext): void {
		this.log('info', message, context)
	}

	debug(message: string, context?: LogContext): void {
		this.log('debug', message, context)
	}

	child(defaultContext: LogContext): Logger {
		return new JsonLogger(this.level, { ...this.defaultContext, ...defaultContext })
	}
}

class NoopLogger implements Logger {
	error(): void {}
	warn(): void {}
	info(): void {}
	debug(): void {}

	child(): Logger {
		return this
	}
}

/**
 * Create a JSON console logger
 *
 * @param level - Minimum log level to output; defaults to `QIPC_LOG_LEVEL` or 'info'
 * @param defaultContext - Default context to include in all log entries
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug')
 * logger.debug('message encoded', { size: 42 })
 * // Output: {"level":"debug","message":"message encoded","timestamp":"...","size":42}
 * ```
 */
export function createLogger(level: LogLevel = resolveLogLevel(), defaultContext: LogContext = {}): Logger {
	return new JsonLogger(level, defaultContext)
}

/**
 * No-op logger instance for when logging is disabled
 */
export const noopLogger: Logger = new NoopLogger()
