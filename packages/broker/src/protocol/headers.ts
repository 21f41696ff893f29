/**
 * Request/response header encoding and decoding
 *
 * Request header (12 bytes read):
 *   messageSize(int32) + apiKey(uint16) + apiVersion(uint16) + correlationId(int32)
 *
 * Response header (8 bytes written):
 *   messageSize(int32) + correlationId(int32)
 *
 * All integers are big-endian. The clientId string and tagged fields of the
 * full request header are not read; bytes after the 12-byte prefix stay on
 * the stream.
 */

import { Decoder, Encoder, type IDecoder, type IEncoder } from '@/protocol/primitives/index.js'
import type { ByteStream } from '@/network/types.js'

export const REQUEST_HEADER_SIZE = 12
export const RESPONSE_HEADER_SIZE = 8

/**
 * Request header structure
 */
export interface RequestHeader {
	/** Declared size of header and body, as sent by the client */
	messageSize: number
	apiKey: number
	apiVersion: number
	/** Client-chosen token echoed in the response */
	correlationId: number
	/** Never populated by this decoder */
	clientId: string | null
	/** Never populated by this decoder */
	taggedFields: string[]
}

/**
 * Response header structure
 */
export interface ResponseHeader {
	messageSize: number
	correlationId: number
}

/**
 * Decode the fixed request header prefix
 */
export function decodeRequestHeader(decoder: IDecoder): RequestHeader {
	const messageSize = decoder.readInt32()
	const apiKey = decoder.readUInt16()
	const apiVersion = decoder.readUInt16()
	const correlationId = decoder.readInt32()

	return {
		messageSize,
		apiKey,
		apiVersion,
		correlationId,
		clientId: null,
		taggedFields: [],
	}
}

/**
 * Encode the fixed request header prefix (client side)
 */
export function encodeRequestHeader(
	encoder: IEncoder,
	header: Pick<RequestHeader, 'messageSize' | 'apiKey' | 'apiVersion' | 'correlationId'>
): void {
	encoder.writeInt32(header.messageSize)
	encoder.writeUInt16(header.apiKey)
	encoder.writeUInt16(header.apiVersion)
	encoder.writeInt32(header.correlationId)
}

/**
 * Build the response header for a request
 *
 * messageSize is always 0: no response body is produced.
 */
export function createResponseHeader(request: RequestHeader): ResponseHeader {
	return {
		messageSize: 0,
		correlationId: request.correlationId,
	}
}

export function encodeResponseHeader(encoder: IEncoder, header: ResponseHeader): void {
	encoder.writeInt32(header.messageSize)
	encoder.writeInt32(header.correlationId)
}

/**
 * Decode a response header (client side)
 */
export function decodeResponseHeader(decoder: IDecoder): ResponseHeader {
	const messageSize = decoder.readInt32()
	const correlationId = decoder.readInt32()
	return { messageSize, correlationId }
}

/**
 * Read exactly one request header from a stream
 *
 * @throws ReadFailureError if the stream cannot supply REQUEST_HEADER_SIZE bytes
 */
export async function readRequestHeader(stream: ByteStream): Promise<RequestHeader> {
	const bytes = await stream.readExact(REQUEST_HEADER_SIZE)
	return decodeRequestHeader(new Decoder(bytes))
}

/**
 * Write a response header to a stream and flush it
 *
 * @throws WriteFailureError if the stream rejects the write or the flush
 */
export async function writeResponseHeader(stream: ByteStream, header: ResponseHeader): Promise<void> {
	const encoder = new Encoder(RESPONSE_HEADER_SIZE)
	encodeResponseHeader(encoder, header)

	await stream.writeAll(encoder.toBuffer())
	await stream.flush()
}
