import { describe, expect, it } from 'vitest'

import { ChunkQueue } from '@/network/chunk-queue.js'

describe('ChunkQueue', () => {
	it('takes bytes from within a single chunk', () => {
		const queue = new ChunkQueue()
		queue.push(Buffer.from('hello world'))

		expect(queue.take(5).toString('utf8')).toBe('hello')
		expect(queue.available).toBe(6)
		expect(queue.take(6).toString('utf8')).toBe(' world')
		expect(queue.available).toBe(0)
	})

	it('takes bytes spanning multiple chunks', () => {
		const queue = new ChunkQueue()
		queue.push(Buffer.from('012'))
		queue.push(Buffer.from('345'))
		queue.push(Buffer.from('6789'))

		expect(queue.take(8).toString('utf8')).toBe('01234567')
		expect(queue.take(2).toString('utf8')).toBe('89')
	})

	it('keeps leftover bytes for the next take', () => {
		const queue = new ChunkQueue()
		queue.push(Buffer.from('first'))
		queue.push(Buffer.from('second'))

		expect(queue.take(7).toString('utf8')).toBe('firstse')
		expect(queue.available).toBe(4)
		expect(queue.take(4).toString('utf8')).toBe('cond')
	})

	it('ignores empty chunks', () => {
		const queue = new ChunkQueue()
		queue.push(Buffer.alloc(0))

		expect(queue.available).toBe(0)
		expect(queue.take(0)).toHaveLength(0)
	})

	it('refuses to take more than is available', () => {
		const queue = new ChunkQueue()
		queue.push(Buffer.from('abc'))

		expect(() => queue.take(4)).toThrow(RangeError)
		expect(queue.available).toBe(3)
	})

	it('reset drops everything', () => {
		const queue = new ChunkQueue()
		queue.push(Buffer.from('abc'))
		queue.reset()

		expect(queue.available).toBe(0)
	})
})
