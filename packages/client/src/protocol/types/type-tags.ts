/**
 * kdb+ IPC type tags and fixed-width layouts
 *
 * Atom tags are negative; the tag of a list of those atoms is the negation.
 * The general list (mixed elements) uses its own tag, 0.
 */

/**
 * Signed wire tags
 */
export enum TypeTag {
	GeneralList = 0,

	Bool = -1,
	Guid = -2,
	Byte = -4,
	Short = -5,
	Int = -6,
	Long = -7,
	Real = -8,
	Float = -9,
	Char = -10,
	Symbol = -11,
	Timestamp = -12,
	Month = -13,
	Date = -14,
	Datetime = -15,
	Timespan = -16,
	Minute = -17,
	Second = -18,
	Time = -19,

	/** Char list */
	String = 10,
	Table = 98,
	Dictionary = 99,
	Lambda = 100,
	/** Generic null, the unary identity primitive */
	Null = 101,
	Projection = 104,
	Error = -128,
}

/**
 * Message type byte of the header
 */
export enum MessageType {
	Async = 0,
	Sync = 1,
	Response = 2,
}

export type LayoutFormat = 'bool' | 'uint8' | 'char' | 'int16' | 'int32' | 'int64' | 'float32' | 'float64'

/**
 * Binary layout of a fixed-width atom
 */
export interface FixedWidthLayout {
	readonly size: 1 | 2 | 4 | 8
	readonly format: LayoutFormat
}

const BOOL: FixedWidthLayout = { size: 1, format: 'bool' }
const UINT8: FixedWidthLayout = { size: 1, format: 'uint8' }
const CHAR: FixedWidthLayout = { size: 1, format: 'char' }
const INT16: FixedWidthLayout = { size: 2, format: 'int16' }
const INT32: FixedWidthLayout = { size: 4, format: 'int32' }
const INT64: FixedWidthLayout = { size: 8, format: 'int64' }
const FLOAT32: FixedWidthLayout = { size: 4, format: 'float32' }
const FLOAT64: FixedWidthLayout = { size: 8, format: 'float64' }

/**
 * Layouts by atom tag. Guid and symbol are not fixed-width and have dedicated writers.
 */
const LAYOUTS: ReadonlyMap<number, FixedWidthLayout> = new Map<number, FixedWidthLayout>([
	[TypeTag.Bool, BOOL],
	[TypeTag.Byte, UINT8],
	[TypeTag.Short, INT16],
	[TypeTag.Int, INT32],
	[TypeTag.Long, INT64],
	[TypeTag.Real, FLOAT32],
	[TypeTag.Float, FLOAT64],
	[TypeTag.Char, CHAR],
	[TypeTag.Timestamp, INT64],
	[TypeTag.Month, INT32],
	[TypeTag.Date, INT32],
	[TypeTag.Datetime, FLOAT64],
	[TypeTag.Timespan, INT64],
	[TypeTag.Minute, INT32],
	[TypeTag.Second, INT32],
	[TypeTag.Time, INT32],
])

const TEMPORAL_TAGS: ReadonlySet<number> = new Set<number>([
	TypeTag.Timestamp,
	TypeTag.Month,
	TypeTag.Date,
	TypeTag.Datetime,
	TypeTag.Timespan,
	TypeTag.Minute,
	TypeTag.Second,
	TypeTag.Time,
])

/**
 * Atom tags of host primitives that have no dedicated writer
 */
const PRIMITIVE_TAGS: ReadonlyMap<string, TypeTag> = new Map([
	['boolean', TypeTag.Bool],
	['number', TypeTag.Float],
	['bigint', TypeTag.Long],
])

type TypedArrayConstructor =
	| Int16ArrayConstructor
	| Int32ArrayConstructor
	| BigInt64ArrayConstructor
	| Float32ArrayConstructor
	| Float64ArrayConstructor
	| Uint8ArrayConstructor

/**
 * Element tags of typed arrays whose memory layout matches the wire layout
 */
const TYPED_ARRAY_TAGS: ReadonlyMap<TypedArrayConstructor, TypeTag> = new Map<TypedArrayConstructor, TypeTag>([
	[Int16Array, TypeTag.Short],
	[Int32Array, TypeTag.Int],
	[BigInt64Array, TypeTag.Long],
	[Float32Array, TypeTag.Real],
	[Float64Array, TypeTag.Float],
	[Uint8Array, TypeTag.Byte],
])

export type NumericArray = Int16Array | Int32Array | BigInt64Array | Float32Array | Float64Array | Uint8Array

/**
 * Normalise an atom or list tag to its atom form
 */
export function atomTagOf(tag: number): number {
	return tag === TypeTag.GeneralList ? tag : -Math.abs(tag)
}

/**
 * Layout for an atom tag, or for the atom of a list tag
 */
export function layoutFor(tag: number): FixedWidthLayout | undefined {
	return LAYOUTS.get(atomTagOf(tag))
}

/**
 * Atom tag for a primitive kind, as reported by `typeof`
 */
export function tagFor(kind: string): TypeTag | undefined {
	return PRIMITIVE_TAGS.get(kind)
}

/**
 * Element tag inferred from an array's runtime kind
 */
export function listTagFor(data: readonly unknown[] | NumericArray): TypeTag {
	if (isNumericArray(data)) {
		return typedArrayTag(data) ?? TypeTag.GeneralList
	}
	return TypeTag.GeneralList
}

export function isNumericArray(data: unknown): data is NumericArray {
	return typedArrayTag(data) !== undefined
}

function typedArrayTag(data: unknown): TypeTag | undefined {
	for (const [ctor, tag] of TYPED_ARRAY_TAGS) {
		if (data instanceof ctor) {
			return tag
		}
	}
	return undefined
}

/**
 * Whether a typed array stores its elements exactly as the layout of `tag` does
 */
export function matchesLayout(data: NumericArray, tag: number): boolean {
	return typedArrayTag(data) === atomTagOf(tag)
}

export function isTemporalTag(tag: number): boolean {
	return TEMPORAL_TAGS.has(atomTagOf(tag))
}

/**
 * Hexadecimal form of the tag's wire byte, e.g. `0xf4` for a timestamp atom
 */
export function describeTag(tag: number): string {
	return `0x${(tag & 0xff).toString(16).padStart(2, '0')}`
}
