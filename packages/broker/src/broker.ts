import { ConfigError, type BrokerConfig } from '@/config.js'
import { BrokerServer } from '@/network/server.js'
import { ListenError } from '@/network/errors.js'
import { noopLogger, type Logger } from '@/logger.js'

export interface StartBrokerOptions {
	config: Pick<BrokerConfig, 'host' | 'port'>
	logger?: Logger
}

/**
 * Create a broker server and start listening
 *
 * @throws ListenError if the configured address cannot be bound
 */
export async function startBroker({ config, logger = noopLogger }: StartBrokerOptions): Promise<BrokerServer> {
	const server = new BrokerServer({ host: config.host, port: config.port, logger })
	await server.listen()
	return server
}

/**
 * Log why the broker could not start
 */
export function logStartupFailure(logger: Logger, error: unknown): void {
	if (error instanceof ConfigError) {
		logger.error('invalid configuration', { issues: error.issues })
		return
	}

	if (error instanceof ListenError) {
		logger.error('could not start broker', { error: error.message, host: error.host, port: error.port })
		return
	}

	logger.error('could not start broker', { error: error instanceof Error ? error.message : String(error) })
}
