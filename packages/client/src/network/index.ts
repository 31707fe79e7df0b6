export { createSocketSink, type SocketSinkOptions } from '@/network/socket-sink.js'
export { ConnectionClosedError, NetworkError } from '@/network/errors.js'
export type { MessageSink, SocketLike } from '@/network/types.js'
