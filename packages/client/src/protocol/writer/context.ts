/**
 * Shared state of one write call and the registration shape value writers declare
 */

import { EncodingError, UnsupportedTypeError } from '@/errors.js'
import type { IEncoder } from '@/protocol/primitives/types.js'
import type { ResolvedWriteOptions, TextEncoding } from '@/protocol/writer/options.js'

export interface WriteContext {
	readonly encoder: IEncoder
	readonly options: Readonly<ResolvedWriteOptions>
	readonly protocolVersion: number
	readonly encoding: TextEncoding
	/** Encode a nested value through the dispatcher */
	write(value: unknown): void
}

export type ValueWriter<T = unknown> = (ctx: WriteContext, value: T) => void

/**
 * A primitive's `typeof` name, or an object's exact constructor
 */
export type ValueKind = string | object

export interface WriterRegistration {
	readonly kind: ValueKind
	readonly write: ValueWriter
}

type Constructor<T> = abstract new (...args: never[]) => T

interface PrimitiveKinds {
	string: string
	number: number
	bigint: bigint
	boolean: boolean
}

function isPrimitive<K extends keyof PrimitiveKinds>(value: unknown, kind: K): value is PrimitiveKinds[K] {
	return typeof value === kind
}

/**
 * Declare the writer for one kind; `guard` narrows values dispatched to it
 */
export function serializeWith<T>(
	kind: ValueKind,
	guard: (value: unknown) => value is T,
	write: ValueWriter<T>
): WriterRegistration {
	return {
		kind,
		write: (ctx, value) => {
			if (!guard(value)) {
				throw new UnsupportedTypeError(describeKind(value))
			}
			write(ctx, value)
		},
	}
}

/**
 * Declare the writer for instances of exactly `kind` (subclasses register separately)
 */
export function serialize<T>(kind: Constructor<T>, write: ValueWriter<T>): WriterRegistration {
	return serializeWith(kind, (value): value is T => value instanceof kind, write)
}

/**
 * Declare the writer for a primitive kind
 */
export function serializePrimitive<K extends keyof PrimitiveKinds>(
	kind: K,
	write: ValueWriter<PrimitiveKinds[K]>
): WriterRegistration {
	return serializeWith(kind, (value): value is PrimitiveKinds[K] => isPrimitive(value, kind), write)
}

export function kindOf(value: unknown): ValueKind {
	if (typeof value !== 'object' || value === null) {
		return typeof value
	}
	const proto: unknown = Object.getPrototypeOf(value)
	if (typeof proto !== 'object' || proto === null || !('constructor' in proto)) {
		return 'object'
	}
	return typeof proto.constructor === 'function' ? proto.constructor : 'object'
}

/**
 * Human-readable runtime kind for error messages
 */
export function describeKind(value: unknown): string {
	const kind = kindOf(value)
	if (typeof kind === 'string') {
		return kind
	}
	return typeof kind === 'function' && kind.name ? kind.name : 'object'
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/

const MAX_CODE_UNIT: Record<TextEncoding, number> = {
	latin1: 0xff,
	ascii: 0x7f,
	utf8: 0xffff,
}

/**
 * Encode text in the configured encoding, rejecting characters it cannot carry
 */
export function encodeText(ctx: WriteContext, text: string): Buffer {
	const max = MAX_CODE_UNIT[ctx.encoding]
	for (let i = 0; i < text.length; i++) {
		const code = text.charCodeAt(i)
		if (code > max) {
			const codePoint = code.toString(16).padStart(4, '0')
			throw new EncodingError(ctx.encoding, `Cannot encode character U+${codePoint} at index ${i}`)
		}
	}
	if (ctx.encoding === 'utf8' && LONE_SURROGATE.test(text)) {
		throw new EncodingError(ctx.encoding, 'Cannot encode unpaired surrogate')
	}
	return Buffer.from(text, ctx.encoding)
}
