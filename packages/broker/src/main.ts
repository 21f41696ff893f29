import { loadConfig } from '@/config.js'
import { logStartupFailure, startBroker } from '@/broker.js'
import { createLogger, type Logger } from '@/logger.js'
import type { BrokerServer } from '@/network/server.js'

async function shutdown(server: BrokerServer, logger: Logger, signal: NodeJS.Signals): Promise<void> {
	logger.info('shutting down', { signal })
	await server.close()
	process.exit(0)
}

async function main(): Promise<void> {
	const config = loadConfig()
	const logger = createLogger(config.logLevel, { service: 'broker' })

	const server = await startBroker({ config, logger })

	for (const signal of ['SIGINT', 'SIGTERM'] as const) {
		process.once(signal, () => {
			shutdown(server, logger, signal).catch(error => {
				logger.error('shutdown failed', { error: error instanceof Error ? error.message : String(error) })
				process.exit(1)
			})
		})
	}
}

// Startup failures are logged before a configured level is known
main().catch(error => {
	logStartupFailure(createLogger('error', { service: 'broker' }), error)
	process.exit(1)
})
