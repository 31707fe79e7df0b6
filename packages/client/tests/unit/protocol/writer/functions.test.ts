import { describe, expect, it } from 'vitest'

import { Lambda, Projection, Sym } from '@/protocol/types/values.js'

import { int32, int64, payload, text } from '../../helpers/bytes.js'

describe('functions', () => {
	it('writes a lambda as its source text', () => {
		expect(payload(new Lambda('{x+1}'))).toEqual([0x64, 0x00, 0x0a, 0x00, ...int32(5), ...text('{x+1}')])
	})

	it('writes a projection with the function first', () => {
		const projection = new Projection([new Lambda('{x+y}'), 1n])
		expect(payload(projection)).toEqual([
			0x68,
			...int32(2),
			...[0x64, 0x00, 0x0a, 0x00, ...int32(5), ...text('{x+y}')],
			...[0xf9, ...int64(1n)],
		])
	})

	it('writes missing projection parameters as nulls', () => {
		const projection = new Projection([new Sym('f'), null, 2n])
		expect(payload(projection)).toEqual([
			0x68,
			...int32(3),
			...[0xf5, 0x66, 0x00],
			...[0x65, 0x00],
			...[0xf9, ...int64(2n)],
		])
	})
})
