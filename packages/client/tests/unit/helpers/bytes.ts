import { Encoder } from '@/protocol/primitives/index.js'
import { MessageType } from '@/protocol/types/type-tags.js'
import type { WriteContext } from '@/protocol/writer/context.js'
import { dispatch } from '@/protocol/writer/dispatch.js'
import { HEADER_SIZE } from '@/protocol/writer/header.js'
import { MessageWriter, type WriterConfig } from '@/protocol/writer/message-writer.js'
import { DEFAULT_WRITE_OPTIONS, type ResolvedWriteOptions, type TextEncoding, type WriteOptions } from '@/protocol/writer/options.js'

// Expected values below assume a little-endian host

export function int16(value: number): number[] {
	const buf = Buffer.alloc(2)
	buf.writeInt16LE(value)
	return [...buf]
}

export function int32(value: number): number[] {
	const buf = Buffer.alloc(4)
	buf.writeInt32LE(value)
	return [...buf]
}

export function int64(value: bigint): number[] {
	const buf = Buffer.alloc(8)
	buf.writeBigInt64LE(value)
	return [...buf]
}

export function float64(value: number): number[] {
	const buf = Buffer.alloc(8)
	buf.writeDoubleLE(value)
	return [...buf]
}

export function text(value: string): number[] {
	return [...Buffer.from(value, 'latin1')]
}

/**
 * Encoded payload of `value`, header stripped
 */
export function payload(value: unknown, config?: WriterConfig, options?: WriteOptions): number[] {
	return [...new MessageWriter(config).encode(value, MessageType.Async, options).subarray(HEADER_SIZE)]
}

export interface ContextOverrides {
	protocolVersion?: number
	encoding?: TextEncoding
	options?: ResolvedWriteOptions
}

/**
 * A bare write context over a fresh encoder, for inspecting partial output
 */
export function createContext(overrides: ContextOverrides = {}): { ctx: WriteContext; encoder: Encoder } {
	const encoder = new Encoder()
	const ctx: WriteContext = {
		encoder,
		options: overrides.options ?? DEFAULT_WRITE_OPTIONS,
		protocolVersion: overrides.protocolVersion ?? 3,
		encoding: overrides.encoding ?? 'latin1',
		write: value => dispatch(ctx, value),
	}
	return { ctx, encoder }
}
