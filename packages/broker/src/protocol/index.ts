// Primitives
export { Encoder, Decoder, type IEncoder, type IDecoder } from '@/protocol/primitives/index.js'

// Headers
export {
	REQUEST_HEADER_SIZE,
	RESPONSE_HEADER_SIZE,
	decodeRequestHeader,
	encodeRequestHeader,
	createResponseHeader,
	encodeResponseHeader,
	decodeResponseHeader,
	readRequestHeader,
	writeResponseHeader,
	type RequestHeader,
	type ResponseHeader,
} from '@/protocol/headers.js'
