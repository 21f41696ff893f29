/**
 * Broker configuration loaded from environment variables
 */

import { z } from 'zod'
import { LOG_LEVELS, type LogLevel } from '@/logger.js'

export interface BrokerConfig {
	/** Address to bind (BROKER_HOST, default: 127.0.0.1) */
	host: string
	/** Port to bind (BROKER_PORT, default: 9092) */
	port: number
	/** Minimum log level (BROKER_LOG_LEVEL, default: info) */
	logLevel: LogLevel
}

export const DEFAULT_CONFIG: BrokerConfig = {
	host: '127.0.0.1',
	port: 9092,
	logLevel: 'info',
}

// A blank port falls back to the default like an unset one
const blankToUndefined = (value: unknown): unknown =>
	typeof value === 'string' && value.trim() === '' ? undefined : value

const envSchema = z.object({
	BROKER_HOST: z.string().trim().min(1).default(DEFAULT_CONFIG.host),
	BROKER_PORT: z.preprocess(
		blankToUndefined,
		z.coerce.number().int().min(0).max(65535).default(DEFAULT_CONFIG.port)
	),
	BROKER_LOG_LEVEL: z.enum(LOG_LEVELS).default(DEFAULT_CONFIG.logLevel),
})

/**
 * Thrown when one or more environment variables are invalid
 */
export class ConfigError extends Error {
	constructor(public readonly issues: string[]) {
		super(`Invalid configuration: ${issues.join('; ')}`)
		this.name = 'ConfigError'
	}
}

/**
 * Read the broker configuration from an environment
 *
 * @param env - Variables to read (default: process.env)
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BrokerConfig {
	const result = envSchema.safeParse(env)
	if (!result.success) {
		throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`))
	}

	return {
		host: result.data.BROKER_HOST,
		port: result.data.BROKER_PORT,
		logLevel: result.data.BROKER_LOG_LEVEL,
	}
}
