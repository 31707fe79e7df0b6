/**
 * Char lists and symbols
 *
 * String: `[10][attr][count:int32][bytes]`, or a char atom `[-10][byte]` for one character
 * Symbol: `[-11][bytes][0x00]`
 */

import { EncodingError } from '@/errors.js'
import { TypeTag } from '@/protocol/types/type-tags.js'
import { Sym } from '@/protocol/types/values.js'
import {
	encodeText,
	serialize,
	serializePrimitive,
	serializeWith,
	type WriteContext,
	type WriterRegistration,
} from '@/protocol/writer/context.js'

/**
 * Write text (or already encoded bytes) as a char list
 */
export function writeString(ctx: WriteContext, data: string | Uint8Array): void {
	const bytes = typeof data === 'string' ? encodeText(ctx, data) : data

	if (!ctx.options.singleCharStrings && data.length === 1) {
		const [code] = bytes
		if (bytes.length !== 1 || code === undefined) {
			throw new EncodingError(ctx.encoding, `Cannot encode ${JSON.stringify(data)} as a single char`)
		}
		ctx.encoder.writeInt8(TypeTag.Char).writeUInt8(code)
		return
	}

	ctx.encoder.writeInt8(TypeTag.String).writeUInt8(0).writeInt32(bytes.length).writeRaw(bytes)
}

/**
 * Encoded symbol name; `null` is the empty symbol
 */
export function symbolBytes(ctx: WriteContext, name: string | Sym | null): Buffer {
	return encodeText(ctx, name === null ? '' : name.toString())
}

export function writeSymbol(ctx: WriteContext, symbol: Sym): void {
	const bytes = symbolBytes(ctx, symbol)
	ctx.encoder.writeInt8(TypeTag.Symbol).writeCString(bytes)
}

export const stringWriters: readonly WriterRegistration[] = [
	serializePrimitive('string', writeString),
	serializeWith(Buffer, Buffer.isBuffer, writeString),
	serialize(Sym, writeSymbol),
]
