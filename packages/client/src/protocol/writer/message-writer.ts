/**
 * Frames values into complete kdb+ IPC messages
 */

import { z } from 'zod'
import { InvalidConfigError } from '@/errors.js'
import { noopLogger, type Logger } from '@/logger.js'
import type { MessageSink } from '@/network/types.js'
import { Encoder } from '@/protocol/primitives/index.js'
import { MessageType } from '@/protocol/types/type-tags.js'
import type { WriteContext } from '@/protocol/writer/context.js'
import { dispatch } from '@/protocol/writer/dispatch.js'
import { encodeMessageHeader, patchMessageLength } from '@/protocol/writer/header.js'
import {
	DEFAULT_WRITE_OPTIONS,
	parseWriterSettings,
	resolveWriteOptions,
	type ResolvedWriteOptions,
	type TextEncoding,
	type WriteOptions,
} from '@/protocol/writer/options.js'

export interface WriterConfig {
	/** Negotiated protocol version (default: 3) */
	protocolVersion?: number
	/** Character encoding of strings and symbols (default: 'latin1') */
	encoding?: TextEncoding
	/** Per-writer overrides of the process-wide conversion defaults */
	defaults?: WriteOptions
	/** Where `write` sends finished messages; without one `write` returns them */
	sink?: MessageSink
	/** Logger instance */
	logger?: Logger
}

const messageTypeSchema = z.nativeEnum(MessageType)

/**
 * Serialises values into kdb+ IPC messages
 *
 * Each call encodes into a fresh buffer, so one writer can serve any number of
 * messages. Calls that share a sink must not interleave; the writer does not
 * lock.
 *
 * @example
 * ```typescript
 * const writer = new MessageWriter({ protocolVersion: 3 })
 * const message = writer.encode([new Sym('upd'), new Sym('trade'), table], MessageType.Async)
 * ```
 */
export class MessageWriter {
	readonly protocolVersion: number
	readonly encoding: TextEncoding

	private readonly defaults: Readonly<ResolvedWriteOptions>
	private readonly sink: MessageSink | undefined
	private readonly logger: Logger

	constructor(config: WriterConfig = {}) {
		const { sink, logger, ...settings } = config
		const parsed = parseWriterSettings(settings)

		this.protocolVersion = parsed.protocolVersion
		this.encoding = parsed.encoding
		this.defaults = Object.freeze(resolveWriteOptions(DEFAULT_WRITE_OPTIONS, parsed.defaults))
		this.sink = sink
		this.logger =
			logger?.child({ component: 'message-writer', protocolVersion: this.protocolVersion }) ?? noopLogger
	}

	/**
	 * Encode a value into a complete message, header included
	 *
	 * @param options - Per-call overrides of the writer's conversion defaults
	 */
	encode(value: unknown, messageType: MessageType = MessageType.Async, options?: WriteOptions): Buffer {
		const type = messageTypeSchema.safeParse(messageType)
		if (!type.success) {
			throw new InvalidConfigError([`messageType: ${type.error.issues[0]?.message ?? 'invalid'}`])
		}

		const encoder = new Encoder()
		const ctx: WriteContext = {
			encoder,
			options: resolveWriteOptions(this.defaults, options),
			protocolVersion: this.protocolVersion,
			encoding: this.encoding,
			write: nested => dispatch(ctx, nested),
		}

		encodeMessageHeader(encoder, { messageType: type.data, totalLength: 0 })
		dispatch(ctx, value)
		patchMessageLength(encoder)

		const message = encoder.toBuffer()
		this.logger.debug('message encoded', { messageType: MessageType[type.data], size: message.length })
		return message
	}

	/**
	 * Encode a value and send it to the sink, or return it when no sink is configured
	 *
	 * Nothing reaches the sink unless the whole message encoded.
	 */
	write(value: unknown, messageType: MessageType = MessageType.Async, options?: WriteOptions): Buffer | undefined {
		let message: Buffer
		try {
			message = this.encode(value, messageType, options)
		} catch (error) {
			this.logger.debug('message encoding failed', {
				messageType,
				error: error instanceof Error ? error.message : String(error),
			})
			throw error
		}

		if (!this.sink) {
			return message
		}

		this.sink.sendAll(message)
		this.logger.debug('message sent', { messageType: MessageType[messageType], size: message.length })
		return undefined
	}
}
