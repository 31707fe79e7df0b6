/**
 * Fixed-width scalars: `[tag][payload]`
 */

import { UnsupportedTypeError } from '@/errors.js'
import type { IEncoder } from '@/protocol/primitives/types.js'
import { Temporal, toRaw } from '@/protocol/types/temporal.js'
import { atomTagOf, describeTag, layoutFor, TypeTag, type FixedWidthLayout } from '@/protocol/types/type-tags.js'
import { Atom, Guid } from '@/protocol/types/values.js'
import { describeKind, serialize, type WriteContext, type WriterRegistration } from '@/protocol/writer/context.js'
import { requireGuidSupport, requireTemporalSupport } from '@/protocol/writer/version-gate.js'

const INTEGER_RANGES = {
	uint8: [0, 0xff],
	char: [0, 0xff],
	int16: [-0x8000, 0x7fff],
	int32: [-0x80000000, 0x7fffffff],
} as const

const INT64_MIN = -0x8000000000000000n
const INT64_MAX = 0x7fffffffffffffffn

export type PackedScalar = number | bigint

function doesNotFit(value: unknown, layout: FixedWidthLayout): UnsupportedTypeError {
	return new UnsupportedTypeError(describeKind(value), `${String(value)} does not fit ${layout.format}`)
}

/**
 * Validate a scalar against a layout and normalise it for writing
 */
export function packScalar(value: unknown, layout: FixedWidthLayout): PackedScalar {
	const scalar = typeof value === 'boolean' ? Number(value) : value

	switch (layout.format) {
		case 'bool':
			if (scalar === 0 || scalar === 1 || scalar === 0n || scalar === 1n) {
				return Number(scalar)
			}
			throw doesNotFit(value, layout)
		case 'float32':
		case 'float64':
			if (typeof scalar === 'number' || typeof scalar === 'bigint') {
				return Number(scalar)
			}
			throw doesNotFit(value, layout)
		case 'int64': {
			if (typeof scalar === 'bigint' && scalar >= INT64_MIN && scalar <= INT64_MAX) {
				return scalar
			}
			if (typeof scalar === 'number' && Number.isSafeInteger(scalar)) {
				return BigInt(scalar)
			}
			throw doesNotFit(value, layout)
		}
		default: {
			const [min, max] = INTEGER_RANGES[layout.format]
			const num = typeof scalar === 'bigint' ? Number(scalar) : scalar
			if (typeof num === 'number' && Number.isInteger(num) && num >= min && num <= max) {
				return num
			}
			throw doesNotFit(value, layout)
		}
	}
}

/**
 * Write a value already normalised by `packScalar`
 */
export function putScalar(encoder: IEncoder, layout: FixedWidthLayout, value: PackedScalar): void {
	switch (layout.format) {
		case 'bool':
		case 'uint8':
		case 'char':
			encoder.writeUInt8(Number(value))
			break
		case 'int16':
			encoder.writeInt16(Number(value))
			break
		case 'int32':
			encoder.writeInt32(Number(value))
			break
		case 'int64':
			encoder.writeInt64(typeof value === 'bigint' ? value : BigInt(value))
			break
		case 'float32':
			encoder.writeFloat32(Number(value))
			break
		case 'float64':
			encoder.writeFloat64(Number(value))
			break
	}
}

export function requireLayout(tag: number): FixedWidthLayout {
	const layout = layoutFor(tag)
	if (!layout) {
		throw new UnsupportedTypeError(describeTag(tag), 'no fixed-width layout')
	}
	return layout
}

export function writeNull(ctx: WriteContext): void {
	ctx.encoder.writeInt8(TypeTag.Null).writeUInt8(0)
}

/**
 * Write one scalar with its atom tag
 */
export function writeAtom(ctx: WriteContext, value: unknown, tag: number): void {
	const atomTag = atomTagOf(tag)
	requireTemporalSupport(atomTag, ctx.protocolVersion)
	const layout = requireLayout(atomTag)
	const packed = packScalar(value, layout)

	ctx.encoder.writeInt8(atomTag)
	putScalar(ctx.encoder, layout, packed)
}

export function writeGuid(ctx: WriteContext, guid: Guid): void {
	requireGuidSupport(ctx.protocolVersion)
	ctx.encoder.writeInt8(TypeTag.Guid).writeRaw(guid.bytes)
}

export function writeTemporal(ctx: WriteContext, temporal: Temporal): void {
	writeAtom(ctx, toRaw(temporal.value, temporal.tag), temporal.tag)
}

export const atomWriters: readonly WriterRegistration[] = [
	serialize(Atom, (ctx, atom) => writeAtom(ctx, atom.value, atom.tag)),
	serialize(Guid, writeGuid),
	serialize(Temporal, writeTemporal),
	// Host dates travel as timestamps
	serialize(Date, (ctx, date) => writeTemporal(ctx, new Temporal(date, TypeTag.Timestamp))),
]
