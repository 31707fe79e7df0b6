/**
 * Binary encoder interface for kdb+ IPC serialization
 * Multi-byte values are written in host byte order; the message header announces it.
 * All write methods return `this` for fluent chaining
 */
export interface IEncoder {
	// Fixed-width integers
	writeInt8(value: number): this
	writeUInt8(value: number): this
	writeInt16(value: number): this
	writeInt32(value: number): this
	writeInt64(value: bigint): this

	// IEEE 754
	writeFloat32(value: number): this
	writeFloat64(value: number): this

	// Bytes followed by a single 0x00
	writeCString(value: Buffer): this

	// Overwrite an INT32 already written at `offset`
	patchInt32(offset: number, value: number): this

	// Raw bytes and buffer management
	writeRaw(data: Uint8Array): this
	toBuffer(): Buffer
	size(): number
}
