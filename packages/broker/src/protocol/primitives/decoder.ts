import type { IDecoder } from '@/protocol/primitives/types.js'

/**
 * Big-endian binary decoder
 * Reads sequentially from a buffer with position tracking
 */
export class Decoder implements IDecoder {
	private readonly buffer: Buffer
	private position: number

	constructor(buffer: Buffer, initialOffset: number = 0) {
		this.buffer = buffer
		this.position = initialOffset
	}

	private ensureAvailable(bytes: number): void {
		if (this.position + bytes > this.buffer.length) {
			throw new Error(
				`Buffer underflow: need ${bytes} bytes but only ${this.buffer.length - this.position} remaining`
			)
		}
	}

	readInt32(): number {
		this.ensureAvailable(4)
		const value = this.buffer.readInt32BE(this.position)
		this.position += 4
		return value
	}

	readUInt16(): number {
		this.ensureAvailable(2)
		const value = this.buffer.readUInt16BE(this.position)
		this.position += 2
		return value
	}

	remaining(): number {
		return this.buffer.length - this.position
	}

	offset(): number {
		return this.position
	}
}
