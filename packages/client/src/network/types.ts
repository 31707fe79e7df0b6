/**
 * Shared types for the network boundary
 */

/**
 * Destination of fully framed messages
 *
 * `sendAll` receives one complete message per call. It must either accept every
 * byte or throw; callers serialise writes that share a sink.
 */
export interface MessageSink {
	sendAll(data: Buffer): void
}

/**
 * The part of `net.Socket` a socket sink needs
 */
export interface SocketLike {
	readonly destroyed: boolean
	readonly writable: boolean
	write(data: Uint8Array): boolean
}
