import { describe, expect, it } from 'vitest'

import { ProtocolVersionError, UnsupportedTypeError } from '@/errors.js'
import { KDB_EPOCH_MS, NULL_INT, NULL_LONG, Temporal } from '@/protocol/types/temporal.js'
import { TypeTag } from '@/protocol/types/type-tags.js'
import { Atom, Guid } from '@/protocol/types/values.js'

import { float64, int16, int32, int64, payload } from '../../helpers/bytes.js'

describe('atoms', () => {
	describe('host primitives', () => {
		it('writes booleans as bool atoms', () => {
			expect(payload(true)).toEqual([0xff, 0x01])
			expect(payload(false)).toEqual([0xff, 0x00])
		})

		it('writes numbers as float atoms', () => {
			expect(payload(1.5)).toEqual([0xf7, ...float64(1.5)])
			expect(payload(-2)).toEqual([0xf7, ...float64(-2)])
		})

		it('writes bigints as long atoms', () => {
			expect(payload(42n)).toEqual([0xf9, ...int64(42n)])
		})

		it('rejects bigints outside the long range', () => {
			expect(() => payload(2n ** 63n)).toThrow(UnsupportedTypeError)
		})

		it('writes null and undefined as the generic null', () => {
			expect(payload(null)).toEqual([0x65, 0x00])
			expect(payload(undefined)).toEqual([0x65, 0x00])
		})
	})

	describe('explicit atoms', () => {
		it('writes each fixed-width layout', () => {
			expect(payload(new Atom(true, TypeTag.Bool))).toEqual([0xff, 0x01])
			expect(payload(new Atom(255, TypeTag.Byte))).toEqual([0xfc, 0xff])
			expect(payload(new Atom(300, TypeTag.Short))).toEqual([0xfb, ...int16(300)])
			expect(payload(new Atom(7, TypeTag.Int))).toEqual([0xfa, ...int32(7)])
			expect(payload(new Atom(7, TypeTag.Long))).toEqual([0xf9, ...int64(7n)])
			expect(payload(new Atom(2.5, TypeTag.Real))).toEqual([0xf8, 0x00, 0x00, 0x20, 0x40])
			expect(payload(new Atom(0.5, TypeTag.Float))).toEqual([0xf7, ...float64(0.5)])
			expect(payload(new Atom(65, TypeTag.Char))).toEqual([0xf6, 0x41])
		})

		it('accepts list tags and writes the atom tag', () => {
			expect(new Atom(7, 6).tag).toBe(TypeTag.Int)
			expect(payload(new Atom(7, 6))).toEqual([0xfa, ...int32(7)])
		})

		it('writes bigints into narrower integer layouts', () => {
			expect(payload(new Atom(5n, TypeTag.Int))).toEqual([0xfa, ...int32(5)])
		})

		it('rejects values that do not fit the layout', () => {
			expect(() => payload(new Atom(256, TypeTag.Byte))).toThrow(
				'Unable to serialize type: number: 256 does not fit uint8'
			)
			expect(() => payload(new Atom(1.5, TypeTag.Int))).toThrow(UnsupportedTypeError)
			expect(() => payload(new Atom(0x8000, TypeTag.Short))).toThrow(UnsupportedTypeError)
			expect(() => payload(new Atom(2, TypeTag.Bool))).toThrow(UnsupportedTypeError)
			expect(() => payload(new Atom(2 ** 53, TypeTag.Long))).toThrow(UnsupportedTypeError)
		})

		it('rejects tags without a fixed-width layout', () => {
			expect(() => payload(new Atom(1, TypeTag.Symbol))).toThrow(
				'Unable to serialize type: 0xf5: no fixed-width layout'
			)
		})
	})

	describe('guid', () => {
		const guid = new Guid('00112233-4455-6677-8899-aabbccddeeff')

		it('writes the 16 bytes after the tag', () => {
			expect(payload(guid)).toEqual([
				0xfe, 0x00, 0x11, 0x22, 0x33, 0x44, 0x55, 0x66, 0x77, 0x88, 0x99, 0xaa, 0xbb, 0xcc, 0xdd, 0xee, 0xff,
			])
		})

		it('requires protocol version 3', () => {
			expect(() => payload(guid, { protocolVersion: 2 })).toThrow(ProtocolVersionError)
			expect(() => payload(guid, { protocolVersion: 2 })).toThrow(
				'Protocol version violation: Guid requires protocol version 3, connection uses 2'
			)
		})

		it('parses both text forms', () => {
			expect(new Guid('00112233445566778899aabbccddeeff').toString()).toBe(guid.toString())
			expect(guid.toString()).toBe('00112233-4455-6677-8899-aabbccddeeff')
		})

		it('rejects malformed input', () => {
			expect(() => new Guid('not-a-guid')).toThrow(TypeError)
			expect(() => new Guid(new Uint8Array(15))).toThrow('GUID must be 16 bytes, got 15')
		})
	})

	describe('temporal', () => {
		it('writes host dates as timestamps', () => {
			expect(payload(new Date(KDB_EPOCH_MS + 1000))).toEqual([0xf4, ...int64(1_000_000_000n)])
		})

		it('writes each temporal kind', () => {
			expect(payload(new Temporal(new Date(Date.UTC(2001, 1, 15)), TypeTag.Month))).toEqual([
				0xf3,
				...int32(13),
			])
			expect(payload(new Temporal(Date.UTC(2000, 0, 3), TypeTag.Date))).toEqual([0xf2, ...int32(2)])
			expect(payload(new Temporal(Date.UTC(2000, 0, 1, 12), TypeTag.Datetime))).toEqual([
				0xf1,
				...float64(0.5),
			])
			expect(payload(new Temporal(90_000, TypeTag.Timespan))).toEqual([0xf0, ...int64(90_000_000_000n)])
			expect(payload(new Temporal(90_000, TypeTag.Minute))).toEqual([0xef, ...int32(1)])
			expect(payload(new Temporal(90_000, TypeTag.Second))).toEqual([0xee, ...int32(90)])
			expect(payload(new Temporal(90_000, TypeTag.Time))).toEqual([0xed, ...int32(90_000)])
		})

		it('writes temporal nulls', () => {
			expect(payload(new Temporal(null, TypeTag.Date))).toEqual([0xf2, ...int32(NULL_INT)])
			expect(payload(new Temporal(null, TypeTag.Timestamp))).toEqual([0xf4, ...int64(NULL_LONG)])
			expect(payload(new Temporal(new Date(Number.NaN), TypeTag.Datetime))).toEqual([
				0xf1,
				...float64(Number.NaN),
			])
		})

		it('requires protocol version 1 for timestamps and timespans', () => {
			expect(() => payload(new Date(KDB_EPOCH_MS), { protocolVersion: 0 })).toThrow(
				'Protocol version violation: 0xf4 requires protocol version 1, connection uses 0'
			)
			expect(() => payload(new Temporal(1, TypeTag.Timespan), { protocolVersion: 0 })).toThrow(
				ProtocolVersionError
			)
			expect(payload(new Date(KDB_EPOCH_MS + 1000), { protocolVersion: 1 })).toEqual([
				0xf4,
				...int64(1_000_000_000n),
			])
			expect(payload(new Temporal(90_000, TypeTag.Timespan), { protocolVersion: 1 })).toEqual([
				0xf0,
				...int64(90_000_000_000n),
			])
			expect(payload(new Temporal(Date.UTC(2000, 0, 3), TypeTag.Date), { protocolVersion: 0 })).toEqual([
				0xf2,
				...int32(2),
			])
		})
	})
})
