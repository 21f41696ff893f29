/**
 * Network layer error types for broker connections
 */

/**
 * Why a read could not be satisfied
 * - end-of-stream: the peer ended the stream
 * - stream-error: the transport reported an I/O fault
 * - stream-closed: the stream was destroyed without an orderly end
 */
export type ReadFailureReason = 'end-of-stream' | 'stream-error' | 'stream-closed'

/**
 * Base class for all network-related errors
 */
export class NetworkError extends Error {
	override readonly cause?: Error

	constructor(message: string, cause?: Error) {
		super(message)
		this.name = 'NetworkError'
		this.cause = cause
		// Maintains proper stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * Thrown when a stream cannot supply the requested number of bytes
 */
export class ReadFailureError extends NetworkError {
	constructor(
		public readonly expectedBytes: number,
		public readonly receivedBytes: number,
		public readonly reason: ReadFailureReason,
		cause?: Error
	) {
		super(
			`Failed to read ${expectedBytes} bytes from stream, received ${receivedBytes} (${reason}${cause ? `: ${cause.message}` : ''})`,
			cause
		)
		this.name = 'ReadFailureError'
	}

	/**
	 * True when the peer ended the stream between two requests
	 */
	get isCleanEnd(): boolean {
		return this.reason === 'end-of-stream' && this.receivedBytes === 0
	}
}

/**
 * Thrown when a stream rejects a write or a flush
 */
export class WriteFailureError extends NetworkError {
	constructor(
		public readonly byteCount: number,
		cause?: Error
	) {
		super(`Failed to write ${byteCount} bytes to stream${cause ? `: ${cause.message}` : ''}`, cause)
		this.name = 'WriteFailureError'
	}
}

/**
 * Thrown when a stream is used after it was closed
 */
export class ConnectionClosedError extends NetworkError {
	constructor(message: string = 'Connection closed unexpectedly') {
		super(message)
		this.name = 'ConnectionClosedError'
	}
}

/**
 * Thrown when the listener cannot bind its address
 */
export class ListenError extends NetworkError {
	constructor(
		public readonly host: string,
		public readonly port: number,
		message: string,
		cause?: Error
	) {
		super(`Listening on ${host}:${port} failed: ${message}`, cause)
		this.name = 'ListenError'
	}
}
