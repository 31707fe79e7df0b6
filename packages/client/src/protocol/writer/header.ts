/**
 * kdb+ IPC message header
 *
 * - endianness(uint8): 1 little-endian, 0 big-endian
 * - messageType(uint8): async / sync / response
 * - two reserved bytes (compression flag and padding, always 0 here)
 * - totalLength(int32, host order): whole message including these 8 bytes
 */

import type { IEncoder } from '@/protocol/primitives/index.js'
import { HOST_LITTLE_ENDIAN } from '@/protocol/primitives/index.js'
import type { MessageType } from '@/protocol/types/type-tags.js'

export const HEADER_SIZE = 8
export const LENGTH_OFFSET = 4

export interface MessageHeader {
	messageType: MessageType
	/** Placeholder until the payload is known */
	totalLength: number
}

/**
 * Encode a header at the encoder's current position
 */
export function encodeMessageHeader(encoder: IEncoder, header: MessageHeader): void {
	encoder.writeUInt8(HOST_LITTLE_ENDIAN ? 1 : 0)
	encoder.writeUInt8(header.messageType)
	encoder.writeUInt8(0)
	encoder.writeUInt8(0)
	encoder.writeInt32(header.totalLength)
}

/**
 * Overwrite the length field once the payload has been written
 */
export function patchMessageLength(encoder: IEncoder): void {
	encoder.patchInt32(LENGTH_OFFSET, encoder.size())
}
