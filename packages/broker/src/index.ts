// Network layer exports
export * from '@/network/index.js'

// Protocol layer exports
export * from '@/protocol/index.js'

// Broker
export { startBroker, logStartupFailure, type StartBrokerOptions } from '@/broker.js'
export { loadConfig, ConfigError, DEFAULT_CONFIG, type BrokerConfig } from '@/config.js'

// Logger
export {
	createLogger,
	consoleSink,
	noopLogger,
	LOG_LEVELS,
	type Logger,
	type LogLevel,
	type LogEntry,
	type LogSink,
} from '@/logger.js'
