/**
 * Network layer error types
 */

/**
 * Base class for all network-related errors
 */
export class NetworkError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'NetworkError'
		// Maintains proper stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * Thrown when writing to a connection that is already closed
 */
export class ConnectionClosedError extends NetworkError {
	constructor(message: string = 'Connection closed') {
		super(message)
		this.name = 'ConnectionClosedError'
	}
}
