/**
 * qipc error hierarchy
 *
 * Every failure raised while encoding is synchronous and aborts the whole message.
 */

/**
 * Base class for all qipc errors
 */
export class QipcError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'QipcError'

		// Maintains proper stack trace for where error was thrown (V8 only)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * No encoder or tag exists for a runtime kind, or a value does not fit its tag's layout
 */
export class UnsupportedTypeError extends QipcError {
	/** Name of the offending runtime kind or tag */
	readonly kind: string

	constructor(kind: string, detail?: string) {
		const detailStr = detail ? `: ${detail}` : ''
		super(`Unable to serialize type: ${kind}${detailStr}`)
		this.name = 'UnsupportedTypeError'
		this.kind = kind
	}
}

/**
 * A kind requires a newer protocol version than the one negotiated
 */
export class ProtocolVersionError extends QipcError {
	readonly feature: string
	readonly requiredVersion: number
	readonly protocolVersion: number

	constructor(feature: string, requiredVersion: number, protocolVersion: number) {
		super(
			`Protocol version violation: ${feature} requires protocol version ${requiredVersion}, connection uses ${protocolVersion}`
		)
		this.name = 'ProtocolVersionError'
		this.feature = feature
		this.requiredVersion = requiredVersion
		this.protocolVersion = protocolVersion
	}
}

/**
 * Text cannot be represented in the configured character encoding
 */
export class EncodingError extends QipcError {
	readonly encoding: string

	constructor(encoding: string, message: string) {
		super(`${message} (encoding: ${encoding})`)
		this.name = 'EncodingError'
		this.encoding = encoding
	}
}

/**
 * Writer configuration or per-call options failed validation
 */
export class InvalidConfigError extends QipcError {
	readonly issues: string[]

	constructor(issues: string[]) {
		super(`Invalid writer configuration: ${issues.join('; ')}`)
		this.name = 'InvalidConfigError'
		this.issues = issues
	}
}
