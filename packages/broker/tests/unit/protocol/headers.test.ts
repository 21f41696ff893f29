import { describe, expect, it } from 'vitest'

import {
	REQUEST_HEADER_SIZE,
	RESPONSE_HEADER_SIZE,
	createResponseHeader,
	decodeRequestHeader,
	decodeResponseHeader,
	encodeRequestHeader,
	encodeResponseHeader,
	readRequestHeader,
	writeResponseHeader,
	type RequestHeader,
} from '@/protocol/headers.js'
import { Decoder, Encoder } from '@/protocol/primitives/index.js'
import { ReadFailureError, WriteFailureError } from '@/network/errors.js'
import { MemoryStream } from '../helpers/memory-stream.js'

const INT32_MIN = -2147483648
const INT32_MAX = 2147483647

function requestBytes(correlationId: number, apiKey = 18, apiVersion = 4, messageSize = 8): Buffer {
	const encoder = new Encoder(REQUEST_HEADER_SIZE)
	encodeRequestHeader(encoder, { messageSize, apiKey, apiVersion, correlationId })
	return encoder.toBuffer()
}

describe('request header', () => {
	it('decodes the fixed 12-byte prefix', () => {
		const bytes = Buffer.from([0x00, 0x00, 0x00, 0x08, 0x00, 0x12, 0x00, 0x04, 0x00, 0x00, 0x00, 0x07])

		expect(decodeRequestHeader(new Decoder(bytes))).toEqual({
			messageSize: 8,
			apiKey: 18,
			apiVersion: 4,
			correlationId: 7,
			clientId: null,
			taggedFields: [],
		})
	})

	it('reads the correlation id big-endian', () => {
		const bytes = Buffer.from([0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x0a])
		expect(decodeRequestHeader(new Decoder(bytes)).correlationId).toBe(10)
	})

	it('keeps signed and unsigned fields apart', () => {
		const bytes = Buffer.from([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x80, 0x00, 0xff, 0xff, 0xff, 0xfe])
		const header = decodeRequestHeader(new Decoder(bytes))

		expect(header.messageSize).toBe(-1)
		expect(header.apiKey).toBe(65535)
		expect(header.apiVersion).toBe(32768)
		expect(header.correlationId).toBe(-2)
	})

	it('encodes the request prefix in field order', () => {
		expect([...requestBytes(7)]).toEqual([0x00, 0x00, 0x00, 0x08, 0x00, 0x12, 0x00, 0x04, 0x00, 0x00, 0x00, 0x07])
	})
})

describe('response header', () => {
	it('copies the correlation id and reports no body', () => {
		const request: RequestHeader = {
			messageSize: 42,
			apiKey: 3,
			apiVersion: 12,
			correlationId: -99,
			clientId: null,
			taggedFields: [],
		}

		expect(createResponseHeader(request)).toEqual({ messageSize: 0, correlationId: -99 })
	})

	it('encodes 10 as 00 00 00 0A', () => {
		const encoder = new Encoder()
		encodeResponseHeader(encoder, { messageSize: 0, correlationId: 10 })

		expect([...encoder.toBuffer()]).toEqual([0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x0a])
	})

	it('decodes what it encodes', () => {
		const encoder = new Encoder()
		encodeResponseHeader(encoder, { messageSize: 0, correlationId: INT32_MIN })

		expect(decodeResponseHeader(new Decoder(encoder.toBuffer()))).toEqual({
			messageSize: 0,
			correlationId: INT32_MIN,
		})
	})
})

describe('readRequestHeader', () => {
	it.each([0, 1, -1, 7, INT32_MIN, INT32_MAX])('preserves correlation id %i', async correlationId => {
		const header = await readRequestHeader(new MemoryStream(requestBytes(correlationId)))
		expect(header.correlationId).toBe(correlationId)
	})

	it('consumes only the header prefix', async () => {
		const stream = new MemoryStream(Buffer.concat([requestBytes(1), Buffer.from([0xde, 0xad])]))

		await readRequestHeader(stream)

		expect(stream.unread).toBe(2)
	})

	it('fails on a short read without producing a header', async () => {
		const stream = new MemoryStream(requestBytes(5).subarray(0, 6))

		const error = await readRequestHeader(stream).catch((err: unknown) => err)

		expect(error).toBeInstanceOf(ReadFailureError)
		expect(error).toMatchObject({ expectedBytes: 12, receivedBytes: 6, reason: 'end-of-stream' })
	})
})

describe('writeResponseHeader', () => {
	it('writes 8 bytes then flushes', async () => {
		const stream = new MemoryStream(Buffer.alloc(0))

		await writeResponseHeader(stream, { messageSize: 0, correlationId: 7 })

		expect(stream.output).toHaveLength(RESPONSE_HEADER_SIZE)
		expect([...stream.output]).toEqual([0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x07])
		expect(stream.flushCount).toBe(1)
	})

	it('returns the same bytes on every call', async () => {
		const first = new MemoryStream(Buffer.alloc(0))
		const second = new MemoryStream(Buffer.alloc(0))

		await writeResponseHeader(first, { messageSize: 0, correlationId: INT32_MAX })
		await writeResponseHeader(second, { messageSize: 0, correlationId: INT32_MAX })

		expect(first.output.equals(second.output)).toBe(true)
		expect(first.output.readInt32BE(4)).toBe(INT32_MAX)
	})

	it('surfaces a rejected write', async () => {
		const stream = new MemoryStream(Buffer.alloc(0), { writeError: new Error('EPIPE') })

		await expect(writeResponseHeader(stream, { messageSize: 0, correlationId: 1 })).rejects.toBeInstanceOf(
			WriteFailureError
		)
		expect(stream.flushCount).toBe(0)
	})

	it('surfaces a rejected flush', async () => {
		const stream = new MemoryStream(Buffer.alloc(0), { flushError: new Error('reset') })

		await expect(writeResponseHeader(stream, { messageSize: 0, correlationId: 1 })).rejects.toThrow(
			'Failed to write 0 bytes to stream: reset'
		)
	})
})
