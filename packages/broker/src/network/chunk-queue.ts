/**
 * Queue of received socket chunks.
 *
 * Avoids Buffer.concat() on every incoming chunk by keeping the chunks as they
 * arrived and only copying when a read spans more than one of them.
 */

export class ChunkQueue {
	private readonly buffers: Buffer[] = []
	private bufferOffset = 0 // Offset within buffers[0]
	private availableBytes = 0 // Total bytes available across buffers (from bufferOffset)

	get available(): number {
		return this.availableBytes
	}

	push(chunk: Buffer): void {
		if (chunk.length === 0) return

		this.buffers.push(chunk)
		this.availableBytes += chunk.length
	}

	/**
	 * Remove and return exactly `length` bytes from the front of the queue
	 */
	take(length: number): Buffer {
		if (length > this.availableBytes) {
			throw new RangeError(`Cannot take ${length} bytes, only ${this.availableBytes} available`)
		}

		if (length === 0) {
			return Buffer.alloc(0)
		}

		const first = this.buffers[0]!
		const availableInFirst = first.length - this.bufferOffset

		if (length <= availableInFirst) {
			const start = this.bufferOffset
			const end = start + length
			const slice = first.subarray(start, end)

			this.bufferOffset = end
			this.availableBytes -= length

			if (this.bufferOffset === first.length) {
				this.buffers.shift()
				this.bufferOffset = 0
			}

			return slice
		}

		const out = Buffer.allocUnsafe(length)
		let copied = 0

		while (copied < length) {
			const buf = this.buffers[0]!
			const start = this.bufferOffset
			const toCopy = Math.min(length - copied, buf.length - start)
			buf.copy(out, copied, start, start + toCopy)
			copied += toCopy

			this.bufferOffset += toCopy
			this.availableBytes -= toCopy

			if (this.bufferOffset === buf.length) {
				this.buffers.shift()
				this.bufferOffset = 0
			}
		}

		return out
	}

	reset(): void {
		this.buffers.length = 0
		this.bufferOffset = 0
		this.availableBytes = 0
	}
}
