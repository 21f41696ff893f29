/**
 * Shared types and interfaces for the network layer
 */

import type { Logger } from '@/logger.js'

/**
 * Bidirectional byte stream handed to a connection handler
 *
 * Reads and writes are sequential: callers await each operation before
 * starting the next one.
 */
export interface ByteStream {
	/**
	 * Resolve with exactly `length` bytes, or reject with ReadFailureError
	 */
	readExact(length: number): Promise<Buffer>

	/**
	 * Resolve once `data` has been handed to the transport, or reject with WriteFailureError
	 */
	writeAll(data: Buffer): Promise<void>

	/**
	 * Resolve once no written bytes remain buffered, or reject with WriteFailureError
	 */
	flush(): Promise<void>

	/**
	 * Release the underlying transport
	 */
	destroy(): void
}

/**
 * Listener configuration
 */
export interface ListenerConfig {
	/** Address to bind (default: 127.0.0.1) */
	host: string
	/** Port to bind, 0 picks a free port (default: 9092) */
	port: number
	/** Logger instance */
	logger?: Logger
}

/**
 * Connection handler state
 */
export type ConnectionHandlerState = 'awaiting-request' | 'processing' | 'closed'
