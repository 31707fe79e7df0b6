/**
 * Error signals: `[-128][message][0x00]`
 */

import { TypeTag } from '@/protocol/types/type-tags.js'
import { encodeText, type WriteContext } from '@/protocol/writer/context.js'

export type ErrorCategory = abstract new (...args: never[]) => Error

/**
 * An error instance carries its own message; a bare category is named by its class
 */
export type ErrorSignal = { type: 'instance'; error: Error } | { type: 'category'; category: ErrorCategory }

function isErrorCategory(value: unknown): value is ErrorCategory {
	return typeof value === 'function' && (value === Error || value.prototype instanceof Error)
}

/**
 * Classify errors by category rather than exact kind, so every subclass matches
 */
export function toErrorSignal(value: unknown): ErrorSignal | undefined {
	if (value instanceof Error) {
		return { type: 'instance', error: value }
	}
	if (isErrorCategory(value)) {
		return { type: 'category', category: value }
	}
	return undefined
}

export function signalMessage(signal: ErrorSignal): string {
	if (signal.type === 'category') {
		return signal.category.name
	}
	return signal.error.message !== '' ? signal.error.message : signal.error.constructor.name
}

export function writeError(ctx: WriteContext, signal: ErrorSignal): void {
	const message = encodeText(ctx, signalMessage(signal))
	ctx.encoder.writeInt8(TypeTag.Error).writeCString(message)
}
