/**
 * Conversion of host dates and durations to kdb+ raw temporal values
 *
 * kdb+ counts every temporal kind from 2000-01-01T00:00:00Z. Dates, months,
 * datetimes and timestamps take a `Date` (or Unix milliseconds); timespans,
 * minutes, seconds and times take a duration in milliseconds (or a `Date`,
 * read as its UTC time of day).
 */

import { UnsupportedTypeError } from '@/errors.js'
import { atomTagOf, describeTag, isTemporalTag, TypeTag } from '@/protocol/types/type-tags.js'

/** 2000-01-01T00:00:00Z in Unix milliseconds */
export const KDB_EPOCH_MS = Date.UTC(2000, 0, 1)

const MS_PER_DAY = 86_400_000
const NS_PER_MS = 1_000_000n

export const NULL_INT = -0x80000000
export const NULL_LONG = -0x8000000000000000n

export type TemporalValue = Date | number | null
export type RawTemporal = number | bigint

/**
 * Host temporal value paired with the kdb+ kind it is sent as
 */
export class Temporal {
	readonly tag: number

	constructor(
		readonly value: TemporalValue,
		tag: number
	) {
		this.tag = atomTagOf(tag)
	}
}

/**
 * List of host temporal values, converted as a whole when written
 */
export class TemporalList {
	readonly tag: number

	constructor(
		readonly data: readonly TemporalValue[],
		tag: number
	) {
		this.tag = atomTagOf(tag)
	}

	get length(): number {
		return this.data.length
	}
}

function isInvalid(value: Date | number): boolean {
	return Number.isNaN(typeof value === 'number' ? value : value.getTime())
}

function epochMillis(value: Date | number): number {
	return (typeof value === 'number' ? value : value.getTime()) - KDB_EPOCH_MS
}

function durationMillis(value: Date | number): number {
	if (typeof value === 'number') return value
	const ms = value.getTime() % MS_PER_DAY
	return ms < 0 ? ms + MS_PER_DAY : ms
}

function nullFor(tag: number): RawTemporal {
	switch (tag) {
		case TypeTag.Timestamp:
		case TypeTag.Timespan:
			return NULL_LONG
		case TypeTag.Datetime:
			return Number.NaN
		default:
			return NULL_INT
	}
}

/**
 * Convert one host value to the raw count for `tag`
 */
export function toRaw(value: TemporalValue, tag: number): RawTemporal {
	const atomTag = atomTagOf(tag)

	if (!isTemporalTag(atomTag)) {
		throw new UnsupportedTypeError(describeTag(tag), 'not a temporal type')
	}

	if (value === null || isInvalid(value)) {
		return nullFor(atomTag)
	}

	switch (atomTag) {
		case TypeTag.Timestamp:
			return BigInt(Math.round(epochMillis(value))) * NS_PER_MS
		case TypeTag.Month: {
			const date = typeof value === 'number' ? new Date(value) : value
			return (date.getUTCFullYear() - 2000) * 12 + date.getUTCMonth()
		}
		case TypeTag.Date:
			return Math.floor(epochMillis(value) / MS_PER_DAY)
		case TypeTag.Datetime:
			return epochMillis(value) / MS_PER_DAY
		case TypeTag.Timespan:
			return BigInt(Math.round(durationMillis(value))) * NS_PER_MS
		case TypeTag.Minute:
			return Math.floor(durationMillis(value) / 60_000)
		case TypeTag.Second:
			return Math.floor(durationMillis(value) / 1_000)
		default:
			return Math.floor(durationMillis(value))
	}
}

/**
 * Convert a whole array of host values for a list of `tag`
 */
export function arrayToRaw(values: readonly TemporalValue[], tag: number): RawTemporal[] {
	return values.map(value => toRaw(value, tag))
}
