/**
 * Request/response loop for a single accepted connection
 */

import { EventEmitter } from 'node:events'
import type { ByteStream, ConnectionHandlerState } from '@/network/types.js'
import { NetworkError, ReadFailureError, WriteFailureError } from '@/network/errors.js'
import {
	createResponseHeader,
	readRequestHeader,
	writeResponseHeader,
	type RequestHeader,
	type ResponseHeader,
} from '@/protocol/headers.js'
import { noopLogger, type Logger } from '@/logger.js'

export interface ConnectionHandlerOptions {
	logger?: Logger
}

export interface ConnectionHandlerEvents {
	request: [header: RequestHeader]
	response: [header: ResponseHeader]
	close: [error?: NetworkError]
}

/**
 * Serves one connection until the stream ends or an I/O failure occurs
 *
 * Each iteration reads one request header, answers it with a response header
 * carrying the same correlation ID, and waits for the next request. Any read
 * or write failure ends this connection only: `run()` logs it and resolves.
 * No state is shared between handlers, so each connection can run in its own
 * task.
 */
export class ConnectionHandler extends EventEmitter<ConnectionHandlerEvents> {
	private readonly stream: ByteStream
	private readonly logger: Logger

	private _state: ConnectionHandlerState = 'awaiting-request'
	private _requestsHandled = 0
	private started = false
	private closing = false

	constructor(stream: ByteStream, options: ConnectionHandlerOptions = {}) {
		super()
		this.stream = stream
		this.logger = options.logger?.child({ component: 'connection-handler' }) ?? noopLogger
	}

	get state(): ConnectionHandlerState {
		return this._state
	}

	get requestsHandled(): number {
		return this._requestsHandled
	}

	/**
	 * Run the request loop; resolves once the connection is closed
	 */
	async run(): Promise<void> {
		if (this.started) {
			throw new Error('Connection handler has already been started')
		}
		this.started = true

		let closeError: NetworkError | undefined

		try {
			while (!this.closing) {
				this._state = 'awaiting-request'
				const request = await readRequestHeader(this.stream)

				this._state = 'processing'
				await this.handleRequest(request)
			}
		} catch (error) {
			closeError = this.handleFailure(error)
		} finally {
			this._state = 'closed'
			this.stream.destroy()
		}

		try {
			this.emit('close', closeError)
		} catch (error) {
			this.logger.error('close listener failed', {
				error: error instanceof Error ? error.message : String(error),
			})
		}
	}

	/**
	 * Stop serving; a pending read fails and the loop exits
	 */
	close(): void {
		if (this._state === 'closed' || this.closing) {
			return
		}

		this.closing = true
		this.stream.destroy()
	}

	private async handleRequest(request: RequestHeader): Promise<void> {
		this.logger.info('received request', {
			correlationId: request.correlationId,
			apiKey: request.apiKey,
			apiVersion: request.apiVersion,
			messageSize: request.messageSize,
		})
		this.emit('request', request)

		const response = createResponseHeader(request)
		await writeResponseHeader(this.stream, response)

		this._requestsHandled++
		this.logger.debug('sent response', { correlationId: response.correlationId })
		this.emit('response', response)
	}

	/**
	 * Log a failure and decide what the close event reports
	 */
	private handleFailure(error: unknown): NetworkError | undefined {
		if (this.closing) {
			this.logger.debug('connection closed by server', { requestsHandled: this._requestsHandled })
			return undefined
		}

		if (error instanceof ReadFailureError) {
			if (error.isCleanEnd) {
				this.logger.debug('peer closed connection', { requestsHandled: this._requestsHandled })
				return undefined
			}
			this.logger.error('could not parse request', {
				error: error.message,
				receivedBytes: error.receivedBytes,
			})
			return error
		}

		if (error instanceof WriteFailureError) {
			this.logger.error('could not write response', { error: error.message })
			return error
		}

		const cause = error instanceof Error ? error : new Error(String(error))
		this.logger.error('connection handler failed', { error: cause.message })
		return new NetworkError(`Connection handler failed: ${cause.message}`, cause)
	}
}
