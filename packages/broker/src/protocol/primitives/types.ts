/**
 * Binary encoder interface for protocol serialization
 * All methods return `this` for fluent chaining
 */
export interface IEncoder {
	// Fixed-width integers (big-endian)
	writeInt32(value: number): this
	writeUInt16(value: number): this

	toBuffer(): Buffer
	size(): number
}

/**
 * Binary decoder interface for protocol deserialization
 */
export interface IDecoder {
	// Fixed-width integers (big-endian)
	readInt32(): number
	readUInt16(): number

	remaining(): number
	offset(): number
}
