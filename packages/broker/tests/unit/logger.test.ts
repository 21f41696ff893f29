import { describe, expect, it, vi } from 'vitest'

import { createLogger, noopLogger, type LogEntry } from '@/logger.js'

describe('logger', () => {
	it('writes info logs to the console as JSON', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
		const logger = createLogger('info', { service: 'test' })
		logger.info('hello', { value: 1 })
		expect(spy).toHaveBeenCalledTimes(1)
		const payload = JSON.parse(spy.mock.calls[0]![0] as string)
		expect(payload.level).toBe('info')
		expect(payload.message).toBe('hello')
		expect(payload.service).toBe('test')
		expect(payload.value).toBe(1)
		spy.mockRestore()
	})

	it('routes error logs to console.error', () => {
		const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
		const logger = createLogger('error')
		logger.error('boom')
		expect(spy).toHaveBeenCalledTimes(1)
		spy.mockRestore()
	})

	it('writes entries to an injected sink', () => {
		const entries: LogEntry[] = []
		const logger = createLogger('debug', { service: 'broker' }, entry => entries.push(entry))

		logger.debug('received request', { correlationId: 7 })

		expect(entries).toHaveLength(1)
		expect(entries[0]).toMatchObject({
			level: 'debug',
			message: 'received request',
			service: 'broker',
			correlationId: 7,
		})
		expect(typeof entries[0]!.timestamp).toBe('string')
	})

	it('filters debug logs when level is info', () => {
		const entries: LogEntry[] = []
		const logger = createLogger('info', {}, entry => entries.push(entry))
		logger.debug('hidden')
		logger.warn('shown')
		expect(entries.map(entry => entry.message)).toEqual(['shown'])
	})

	it('silent level drops everything', () => {
		const entries: LogEntry[] = []
		const logger = createLogger('silent', {}, entry => entries.push(entry))
		logger.error('hidden')
		expect(entries).toEqual([])
	})

	it('child logger merges context and keeps the sink', () => {
		const entries: LogEntry[] = []
		const logger = createLogger('info', { a: 1 }, entry => entries.push(entry))
		const child = logger.child({ b: 2 })
		child.info('child')
		expect(entries[0]!.a).toBe(1)
		expect(entries[0]!.b).toBe(2)
	})

	it('noopLogger never logs', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
		noopLogger.info('nope')
		noopLogger.child({ a: 1 }).debug('nope')
		expect(spy).not.toHaveBeenCalled()
		spy.mockRestore()
	})
})
