/**
 * Lists
 *
 * Typed list:   `[-tag][attr][count:int32][elements]`
 * General list: `[0][attr][count:int32][value]...`
 */

import { UnsupportedTypeError } from '@/errors.js'
import { arrayToRaw, NULL_INT, NULL_LONG, TemporalList, type TemporalValue } from '@/protocol/types/temporal.js'
import {
	atomTagOf,
	isNumericArray,
	isTemporalTag,
	listTagFor,
	matchesLayout,
	TypeTag,
	type FixedWidthLayout,
	type NumericArray,
} from '@/protocol/types/type-tags.js'
import { Guid, Sym, TypedList, type ListData, type ListElement } from '@/protocol/types/values.js'
import { packScalar, putScalar, requireLayout, type PackedScalar } from '@/protocol/writer/atoms.js'
import {
	describeKind,
	serialize,
	serializeWith,
	type WriteContext,
	type WriterRegistration,
} from '@/protocol/writer/context.js'
import { symbolBytes, writeString } from '@/protocol/writer/strings.js'
import { requireGuidSupport, requireTemporalSupport } from '@/protocol/writer/version-gate.js'

const NULL_GUID = Buffer.alloc(16)

/**
 * Value written for a `null` element of a fixed-width list
 */
function nullScalar(layout: FixedWidthLayout): PackedScalar {
	switch (layout.format) {
		case 'int16':
			return -0x8000
		case 'int32':
			return NULL_INT
		case 'int64':
			return NULL_LONG
		case 'float32':
		case 'float64':
			return Number.NaN
		case 'char':
			return 0x20
		default:
			return 0
	}
}

function writeListHeader(ctx: WriteContext, atomTag: number, count: number): void {
	ctx.encoder.writeInt8(-atomTag).writeUInt8(0).writeInt32(count)
}

/**
 * Heterogeneous list; every element goes back through the dispatcher
 */
export function writeGeneralList(ctx: WriteContext, items: readonly unknown[] | NumericArray): void {
	ctx.encoder.writeInt8(TypeTag.GeneralList).writeUInt8(0).writeInt32(items.length)
	for (const item of items) {
		ctx.write(item)
	}
}

function charData(data: ListData): string | Uint8Array {
	if (data instanceof Uint8Array) {
		return data
	}
	let text = ''
	for (const element of data) {
		if (typeof element === 'string') {
			text += element
		} else if (typeof element === 'number') {
			text += String.fromCharCode(element)
		} else {
			throw new UnsupportedTypeError(describeKind(element), 'not a char list element')
		}
	}
	return text
}

function writeSymbolList(ctx: WriteContext, data: ListData): void {
	const names: Buffer[] = []
	for (const element of data) {
		if (typeof element === 'string' || element instanceof Sym || element === null) {
			names.push(symbolBytes(ctx, element))
		} else {
			throw new UnsupportedTypeError(describeKind(element), 'not a symbol list element')
		}
	}

	writeListHeader(ctx, TypeTag.Symbol, names.length)
	for (const name of names) {
		ctx.encoder.writeCString(name)
	}
}

function writeGuidList(ctx: WriteContext, data: ListData): void {
	requireGuidSupport(ctx.protocolVersion)

	const guids: Buffer[] = []
	for (const element of data) {
		if (element instanceof Guid) {
			guids.push(element.bytes)
		} else if (element === null) {
			guids.push(NULL_GUID)
		} else {
			throw new UnsupportedTypeError(describeKind(element), 'not a guid list element')
		}
	}

	writeListHeader(ctx, TypeTag.Guid, guids.length)
	for (const guid of guids) {
		ctx.encoder.writeRaw(guid)
	}
}

function writeFixedWidthList(ctx: WriteContext, data: ListData, atomTag: number): void {
	const layout = requireLayout(atomTag)

	if (isNumericArray(data) && matchesLayout(data, atomTag)) {
		// Same element layout and host byte order as the wire
		writeListHeader(ctx, atomTag, data.length)
		ctx.encoder.writeRaw(new Uint8Array(data.buffer, data.byteOffset, data.byteLength))
		return
	}

	const packed: PackedScalar[] = []
	for (const element of data) {
		packed.push(element === null ? nullScalar(layout) : packScalar(element, layout))
	}

	writeListHeader(ctx, atomTag, packed.length)
	for (const value of packed) {
		putScalar(ctx.encoder, layout, value)
	}
}

function isTemporalValue(element: ListElement): element is TemporalValue {
	return element === null || element instanceof Date || typeof element === 'number'
}

/**
 * Convert a temporal list holding host dates as a whole; raw counts pass through.
 * Once a `Date` is present, numbers are read as host milliseconds too.
 */
function temporalData(data: ListData, atomTag: number): ListData {
	if (!isTemporalTag(atomTag) || isNumericArray(data) || !data.some(element => element instanceof Date)) {
		return data
	}

	const values: TemporalValue[] = []
	for (const element of data) {
		if (!isTemporalValue(element)) {
			throw new UnsupportedTypeError(describeKind(element), 'not a temporal list element')
		}
		values.push(element)
	}
	return arrayToRaw(values, atomTag)
}

/**
 * Write an array as a list of `tag` elements, inferring the tag from the array when omitted
 */
export function writeList(ctx: WriteContext, data: ListData, tag: number = listTagFor(data)): void {
	const atomTag = atomTagOf(tag)
	requireTemporalSupport(atomTag, ctx.protocolVersion)

	switch (atomTag) {
		case TypeTag.GeneralList:
			writeGeneralList(ctx, data)
			return
		case TypeTag.Char:
			writeString(ctx, charData(data))
			return
		case TypeTag.Symbol:
			writeSymbolList(ctx, data)
			return
		case TypeTag.Guid:
			writeGuidList(ctx, data)
			return
		default:
			writeFixedWidthList(ctx, temporalData(data, atomTag), atomTag)
	}
}

/**
 * Convert host dates or durations as a whole, then write them as a typed list
 */
export function writeTemporalList(ctx: WriteContext, list: TemporalList): void {
	writeList(ctx, arrayToRaw(list.data, list.tag), list.tag)
}

export const listWriters: readonly WriterRegistration[] = [
	serializeWith(Array, (value): value is unknown[] => Array.isArray(value), writeGeneralList),
	serialize(TypedList, (ctx, list) => writeList(ctx, list.data, list.tag)),
	serialize(TemporalList, writeTemporalList),
	serialize(Int16Array, writeList),
	serialize(Int32Array, writeList),
	serialize(BigInt64Array, writeList),
	serialize(Float32Array, writeList),
	serialize(Float64Array, writeList),
	serialize(Uint8Array, writeList),
]
