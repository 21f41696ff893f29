/**
 * TCP listener that serves every accepted connection concurrently
 */

import * as net from 'node:net'
import { EventEmitter } from 'node:events'
import type { ListenerConfig } from '@/network/types.js'
import { ConnectionHandler } from '@/network/connection-handler.js'
import { SocketStream } from '@/network/socket-stream.js'
import { ListenError } from '@/network/errors.js'
import { noopLogger, type Logger } from '@/logger.js'

export type BrokerServerOptions = ListenerConfig

export interface BrokerServerEvents {
	listening: [address: net.AddressInfo]
	connection: [handler: ConnectionHandler]
}

/**
 * Accepts connections and runs one ConnectionHandler per socket
 *
 * Handlers run as independent tasks, so a client that stops sending never
 * delays the others.
 */
export class BrokerServer extends EventEmitter<BrokerServerEvents> {
	private server: net.Server | null = null
	private readonly handlers = new Map<ConnectionHandler, Promise<void>>()
	private readonly logger: Logger
	private connectionCounter = 0

	readonly host: string
	readonly port: number

	constructor(options: BrokerServerOptions) {
		super()
		this.host = options.host
		this.port = options.port
		this.logger = options.logger?.child({ component: 'server' }) ?? noopLogger
	}

	/**
	 * Bound address, or null when not listening
	 */
	get address(): net.AddressInfo | null {
		const address = this.server?.address()
		return address && typeof address === 'object' ? address : null
	}

	get activeConnections(): number {
		return this.handlers.size
	}

	/**
	 * Bind the listener
	 *
	 * @throws ListenError if the address cannot be bound
	 */
	async listen(): Promise<net.AddressInfo> {
		if (this.server) {
			throw new Error('Server is already listening')
		}

		const server = net.createServer(socket => this.handleConnection(socket))

		await new Promise<void>((resolve, reject) => {
			const onError = (error: Error): void => {
				server.removeListener('listening', onListening)
				reject(new ListenError(this.host, this.port, error.message, error))
			}

			const onListening = (): void => {
				server.removeListener('error', onError)
				resolve()
			}

			server.once('error', onError)
			server.once('listening', onListening)
			server.listen(this.port, this.host)
		})

		server.on('error', error => {
			this.logger.error('server error', { error: error.message })
		})
		this.server = server

		const address = this.address
		if (!address) {
			throw new ListenError(this.host, this.port, 'listener has no network address')
		}

		this.logger.info('listening', { host: address.address, port: address.port })
		this.emit('listening', address)
		return address
	}

	/**
	 * Stop accepting, close every active connection and wait for their handlers
	 */
	async close(): Promise<void> {
		const server = this.server
		if (!server) {
			return
		}
		this.server = null

		const closed = new Promise<void>((resolve, reject) => {
			server.close(error => (error ? reject(error) : resolve()))
		})

		this.logger.debug('closing server', { activeConnections: this.handlers.size })

		const running = [...this.handlers.values()]
		for (const handler of this.handlers.keys()) {
			handler.close()
		}

		await Promise.all(running)
		await closed

		this.logger.info('server closed')
	}

	private handleConnection(socket: net.Socket): void {
		const connectionId = ++this.connectionCounter
		const logger = this.logger.child({
			connectionId,
			remoteAddress: socket.remoteAddress,
			remotePort: socket.remotePort,
		})

		logger.info('accepted new connection')

		const handler = new ConnectionHandler(new SocketStream(socket), { logger })
		this.emit('connection', handler)

		const running = handler
			.run()
			.catch(error => {
				const message = error instanceof Error ? error.message : String(error)
				logger.error('connection handler failed', { error: message })
			})
			.finally(() => {
				this.handlers.delete(handler)
			})
		this.handlers.set(handler, running)
	}
}
