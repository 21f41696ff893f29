/**
 * Network layer for broker connections
 *
 * Provides the byte stream contract, its socket adapter, the per-connection
 * request loop and the TCP listener.
 */

// Types
export type { ByteStream, ListenerConfig, ConnectionHandlerState } from '@/network/types.js'

// Errors
export {
	NetworkError,
	ReadFailureError,
	WriteFailureError,
	ConnectionClosedError,
	ListenError,
	type ReadFailureReason,
} from '@/network/errors.js'

// Streams
export { ChunkQueue } from '@/network/chunk-queue.js'
export { SocketStream } from '@/network/socket-stream.js'

// Connection handling
export {
	ConnectionHandler,
	type ConnectionHandlerOptions,
	type ConnectionHandlerEvents,
} from '@/network/connection-handler.js'

// Server
export { BrokerServer, type BrokerServerOptions, type BrokerServerEvents } from '@/network/server.js'
