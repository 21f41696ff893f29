/**
 * ByteStream adapter over a Node.js duplex stream (a net.Socket in production)
 */

import type { Duplex } from 'node:stream'
import type { ByteStream } from '@/network/types.js'
import { ChunkQueue } from '@/network/chunk-queue.js'
import {
	ConnectionClosedError,
	ReadFailureError,
	WriteFailureError,
	type ReadFailureReason,
} from '@/network/errors.js'

interface PendingRead {
	length: number
	resolve: (data: Buffer) => void
	reject: (error: Error) => void
}

/**
 * Exposes exact-length reads over a chunked duplex stream
 *
 * Incoming data is buffered as it arrives; a read resolves as soon as enough
 * bytes are queued. Once the stream ends, errors or closes, reads that cannot
 * be satisfied from the queue fail with ReadFailureError.
 */
export class SocketStream implements ByteStream {
	private readonly chunks = new ChunkQueue()
	private pendingRead: PendingRead | null = null
	private endReason: ReadFailureReason | null = null
	private failure: Error | null = null

	constructor(private readonly socket: Duplex) {
		socket.on('data', this.handleData.bind(this))
		socket.on('end', this.handleEnd.bind(this))
		socket.on('error', this.handleError.bind(this))
		socket.on('close', this.handleClose.bind(this))
	}

	readExact(length: number): Promise<Buffer> {
		if (this.pendingRead) {
			return Promise.reject(new Error('A read is already pending on this stream'))
		}

		if (this.chunks.available >= length) {
			return Promise.resolve(this.chunks.take(length))
		}

		if (this.endReason) {
			return Promise.reject(this.readFailure(length, this.endReason))
		}

		return new Promise((resolve, reject) => {
			this.pendingRead = { length, resolve, reject }
		})
	}

	writeAll(data: Buffer): Promise<void> {
		return new Promise((resolve, reject) => {
			if (this.socket.destroyed || !this.socket.writable) {
				reject(new WriteFailureError(data.length, new ConnectionClosedError('Stream is no longer writable')))
				return
			}

			this.socket.write(data, error => {
				if (error) {
					reject(new WriteFailureError(data.length, error))
				} else {
					resolve()
				}
			})
		})
	}

	flush(): Promise<void> {
		if (!this.socket.writableNeedDrain) {
			return Promise.resolve()
		}

		return new Promise((resolve, reject) => {
			const pendingBytes = this.socket.writableLength

			const cleanup = (): void => {
				this.socket.removeListener('drain', onDrain)
				this.socket.removeListener('close', onClose)
			}

			const onDrain = (): void => {
				cleanup()
				resolve()
			}

			const onClose = (): void => {
				cleanup()
				reject(
					new WriteFailureError(
						pendingBytes,
						this.failure ?? new ConnectionClosedError('Stream closed before buffered data was flushed')
					)
				)
			}

			this.socket.on('drain', onDrain)
			this.socket.on('close', onClose)
		})
	}

	destroy(): void {
		this.socket.destroy()
		this.chunks.reset()
	}

	private handleData(chunk: Buffer | string): void {
		if (this.endReason) return

		this.chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
		this.settlePendingRead()
	}

	private handleEnd(): void {
		this.endReason ??= 'end-of-stream'
		this.settlePendingRead()
	}

	private handleError(error: Error): void {
		this.failure ??= error
		this.endReason ??= 'stream-error'
		this.settlePendingRead()
	}

	private handleClose(): void {
		this.endReason ??= 'stream-closed'
		this.settlePendingRead()
	}

	private settlePendingRead(): void {
		const read = this.pendingRead
		if (!read) return

		if (this.chunks.available >= read.length) {
			this.pendingRead = null
			read.resolve(this.chunks.take(read.length))
			return
		}

		if (this.endReason) {
			this.pendingRead = null
			read.reject(this.readFailure(read.length, this.endReason))
		}
	}

	private readFailure(length: number, reason: ReadFailureReason): ReadFailureError {
		return new ReadFailureError(length, this.chunks.available, reason, this.failure ?? undefined)
	}
}
