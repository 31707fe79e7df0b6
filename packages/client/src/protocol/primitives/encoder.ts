import { endianness } from 'node:os'
import type { IEncoder } from '@/protocol/primitives/types.js'

/** Byte order of every multi-byte value this process writes */
export const HOST_LITTLE_ENDIAN = endianness() === 'LE'

/**
 * Return the next power of 2 >= value
 */
function nextPowerOfTwo(value: number): number {
	if (value <= 0) return 1
	value--
	value |= value >> 1
	value |= value >> 2
	value |= value >> 4
	value |= value >> 8
	value |= value >> 16
	return value + 1
}

/**
 * Binary encoder for kdb+ IPC messages
 * Uses dynamic buffer expansion with power-of-2 growth
 */
export class Encoder implements IEncoder {
	private buffer: Buffer
	private position: number

	constructor(initialSize: number = 256) {
		this.buffer = Buffer.allocUnsafe(nextPowerOfTwo(initialSize))
		this.position = 0
	}

	/**
	 * Ensure the buffer has space for the specified number of bytes
	 */
	private ensureCapacity(bytes: number): void {
		const required = this.position + bytes
		if (required > this.buffer.length) {
			const newSize = nextPowerOfTwo(required)
			const newBuffer = Buffer.allocUnsafe(newSize)
			this.buffer.copy(newBuffer, 0, 0, this.position)
			this.buffer = newBuffer
		}
	}

	writeInt8(value: number): this {
		this.ensureCapacity(1)
		this.buffer.writeInt8(value, this.position)
		this.position += 1
		return this
	}

	writeUInt8(value: number): this {
		this.ensureCapacity(1)
		this.buffer.writeUInt8(value, this.position)
		this.position += 1
		return this
	}

	writeInt16(value: number): this {
		this.ensureCapacity(2)
		if (HOST_LITTLE_ENDIAN) {
			this.buffer.writeInt16LE(value, this.position)
		} else {
			this.buffer.writeInt16BE(value, this.position)
		}
		this.position += 2
		return this
	}

	writeInt32(value: number): this {
		this.ensureCapacity(4)
		this.putInt32(value, this.position)
		this.position += 4
		return this
	}

	writeInt64(value: bigint): this {
		this.ensureCapacity(8)
		if (HOST_LITTLE_ENDIAN) {
			this.buffer.writeBigInt64LE(value, this.position)
		} else {
			this.buffer.writeBigInt64BE(value, this.position)
		}
		this.position += 8
		return this
	}

	writeFloat32(value: number): this {
		this.ensureCapacity(4)
		if (HOST_LITTLE_ENDIAN) {
			this.buffer.writeFloatLE(value, this.position)
		} else {
			this.buffer.writeFloatBE(value, this.position)
		}
		this.position += 4
		return this
	}

	writeFloat64(value: number): this {
		this.ensureCapacity(8)
		if (HOST_LITTLE_ENDIAN) {
			this.buffer.writeDoubleLE(value, this.position)
		} else {
			this.buffer.writeDoubleBE(value, this.position)
		}
		this.position += 8
		return this
	}

	writeCString(value: Buffer): this {
		this.writeRaw(value)
		return this.writeUInt8(0)
	}

	patchInt32(offset: number, value: number): this {
		if (offset < 0 || offset + 4 > this.position) {
			throw new RangeError(`Cannot patch INT32 at ${offset}: only ${this.position} bytes written`)
		}
		this.putInt32(value, offset)
		return this
	}

	private putInt32(value: number, offset: number): void {
		if (HOST_LITTLE_ENDIAN) {
			this.buffer.writeInt32LE(value, offset)
		} else {
			this.buffer.writeInt32BE(value, offset)
		}
	}

	writeRaw(data: Uint8Array): this {
		this.ensureCapacity(data.length)
		this.buffer.set(data, this.position)
		this.position += data.length
		return this
	}

	toBuffer(): Buffer {
		return this.buffer.subarray(0, this.position)
	}

	size(): number {
		return this.position
	}
}
