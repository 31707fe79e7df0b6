/**
 * Adapts a TCP (or TLS) socket to a message sink
 */

import { ConnectionClosedError } from '@/network/errors.js'
import type { MessageSink, SocketLike } from '@/network/types.js'
import { noopLogger, type Logger } from '@/logger.js'

export interface SocketSinkOptions {
	logger?: Logger
}

/**
 * Create a sink that hands each message to `socket.write`
 *
 * Write failures surface through the socket's own `error` event; the connection
 * owner handles them.
 */
export function createSocketSink(socket: SocketLike, options: SocketSinkOptions = {}): MessageSink {
	const logger = options.logger?.child({ component: 'socket-sink' }) ?? noopLogger

	return {
		sendAll(data: Buffer): void {
			if (socket.destroyed || !socket.writable) {
				throw new ConnectionClosedError('Cannot send message: socket is not writable')
			}
			const flushed = socket.write(data)
			if (!flushed) {
				logger.debug('socket buffer full', { size: data.length })
			}
		},
	}
}
