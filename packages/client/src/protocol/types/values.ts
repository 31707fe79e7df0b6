/**
 * Value classes for kdb+ kinds that have no direct host representation
 */

import { atomTagOf, listTagFor, type NumericArray } from '@/protocol/types/type-tags.js'

/**
 * Interned name, written zero-terminated
 */
export class Sym {
	constructor(readonly name: string) {}

	toString(): string {
		return this.name
	}
}

const GUID_PATTERN = /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i

/**
 * 16-byte globally unique identifier (bytes in RFC 4122 order)
 */
export class Guid {
	readonly bytes: Buffer

	constructor(value: string | Uint8Array) {
		if (typeof value === 'string') {
			if (!GUID_PATTERN.test(value)) {
				throw new TypeError(`Invalid GUID format: ${value}`)
			}
			this.bytes = Buffer.from(value.replace(/-/g, ''), 'hex')
		} else {
			if (value.length !== 16) {
				throw new TypeError(`GUID must be 16 bytes, got ${value.length}`)
			}
			this.bytes = Buffer.from(value)
		}
	}

	toString(): string {
		const hex = this.bytes.toString('hex')
		return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`
	}
}

export type Scalar = number | bigint | boolean

/**
 * Scalar with an explicit atom tag, for widths the host primitives do not carry
 */
export class Atom {
	readonly tag: number

	constructor(
		readonly value: Scalar,
		tag: number
	) {
		this.tag = atomTagOf(tag)
	}
}

/** `Date` elements are accepted in temporal lists only */
export type ListElement = Scalar | string | Sym | Guid | Date | null
export type ListData = readonly ListElement[] | NumericArray

/**
 * Homogeneous list carrying its element tag
 */
export class TypedList<T extends ListData = ListData> {
	/** Atom form of the element tag */
	readonly tag: number

	constructor(
		readonly data: T,
		tag: number = listTagFor(data)
	) {
		this.tag = atomTagOf(tag)
	}

	get length(): number {
		return this.data.length
	}
}

/**
 * Keys and values of equal cardinality
 */
export class Dictionary<K = unknown, V = unknown> {
	constructor(
		readonly keys: K,
		readonly values: V
	) {}
}

export interface TableColumn {
	name: string
	data: ListData
	/** Element tag; inferred from `data` when omitted */
	tag?: number
}

/**
 * Column-oriented table
 */
export class Table {
	readonly names: readonly string[]
	readonly columns: readonly ListData[]
	/** Element tag per column, atom form */
	readonly meta: readonly number[]

	constructor(columns: readonly TableColumn[]) {
		this.names = columns.map(column => column.name)
		this.columns = columns.map(column => column.data)
		this.meta = columns.map(column => atomTagOf(column.tag ?? listTagFor(column.data)))
	}

	get rowCount(): number {
		return this.columns[0]?.length ?? 0
	}
}

/**
 * Table split into key columns and value columns
 */
export class KeyedTable {
	constructor(
		readonly keys: Table,
		readonly values: Table
	) {}
}

/**
 * Function given as q source text
 */
export class Lambda {
	constructor(readonly expression: string) {}
}

/**
 * Partially applied function; the first parameter is the function itself
 */
export class Projection {
	constructor(readonly parameters: readonly unknown[]) {}
}
