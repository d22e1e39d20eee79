// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { Encoder, Decoder } from 'cbor-x'
import type { RpcCodec, RpcRequest } from './codec.js'
import { CodecError } from './errors.js'
import {
	type RpcFault,
	type RpcStruct,
	type RpcValue,
	RpcBinary,
	RpcDateTime,
	isFault,
	isPlainObject,
	normalizeValue,
} from './values.js'

// Wire envelopes. A request is { methodName, params }; a response carries exactly one of
// `result` or `fault`.
type CborRequest = { methodName: string; params: unknown[] }
type CborResponse = { result: unknown } | { fault: RpcFault }

function toWire(value: RpcValue): unknown {
	if (value instanceof RpcBinary) {
		return value.bytes
	}
	if (value instanceof RpcDateTime) {
		return value.toDate()
	}
	if (Array.isArray(value)) {
		return value.map(toWire)
	}
	if (value !== null && typeof value === 'object') {
		const struct: Record<string, unknown> = {}
		for (const [key, member] of Object.entries(value)) {
			struct[key] = toWire(member)
		}
		return struct
	}
	return value
}

function fromWire(value: unknown): RpcValue {
	if (value === null || value === undefined) {
		return null
	}
	if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
		return value
	}
	if (typeof value === 'bigint') {
		if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
			throw new CodecError(`Integer out of range: ${value}`)
		}
		return Number(value)
	}
	if (value instanceof Uint8Array) {
		// cbor-x hands out Buffers that may share memory with the message.
		return new RpcBinary(new Uint8Array(value))
	}
	if (value instanceof Date) {
		return RpcDateTime.fromDate(value)
	}
	if (Array.isArray(value)) {
		return value.map(fromWire)
	}
	if (value instanceof Map) {
		const struct: RpcStruct = {}
		for (const [key, member] of value) {
			struct[String(key)] = fromWire(member)
		}
		return struct
	}
	if (isPlainObject(value)) {
		const struct: RpcStruct = {}
		for (const [key, member] of Object.entries(value)) {
			struct[key] = fromWire(member)
		}
		return struct
	}
	throw new CodecError(`Unsupported CBOR value: ${Object.prototype.toString.call(value)}`)
}

/**
 * Binary dialect using CBOR via cbor-x.
 *
 * Unlike a long-lived session, every HTTP body is decoded by itself, so record structures are
 * turned off: a message never refers to structure definitions from an earlier one.
 */
export class CborRpcCodec implements RpcCodec {
	readonly version = 'cbor'
	readonly contentType = 'application/cbor'

	private encoder: Encoder
	private decoder: Decoder

	constructor() {
		this.encoder = new Encoder({
			useRecords: false,
			mapsAsObjects: true,
			encodeUndefinedAsNil: true,
		})

		this.decoder = new Decoder({
			useRecords: false,
			mapsAsObjects: true,
		})
	}

	encodeRequest(methodName: string, params: readonly unknown[]): Uint8Array {
		const request: CborRequest = {
			methodName,
			params: params.map(param => toWire(normalizeValue(param))),
		}
		return this.encoder.encode(request)
	}

	decodeRequest(body: Uint8Array): RpcRequest {
		const decoded = this.decode(body)
		if (!isPlainObject(decoded) || typeof decoded.methodName !== 'string') {
			throw new CodecError('Request is missing its methodName.')
		}
		const params = decoded.params ?? []
		if (!Array.isArray(params)) {
			throw new CodecError('Request params must be an array.')
		}
		return { methodName: decoded.methodName, params: params.map(fromWire) }
	}

	encodeResponse(value: unknown): Uint8Array {
		const response: CborResponse = isFault(value)
			? { fault: { faultCode: value.faultCode, faultString: value.faultString } }
			: { result: toWire(normalizeValue(value)) }
		return this.encoder.encode(response)
	}

	decodeResponse(body: Uint8Array): RpcValue | RpcFault {
		const decoded = this.decode(body)
		if (!isPlainObject(decoded)) {
			throw new CodecError('Response is not a map.')
		}
		if ('fault' in decoded) {
			const fault = fromWire(decoded.fault)
			if (!isFault(fault)) {
				throw new CodecError('Fault response does not carry a faultCode and faultString.')
			}
			return { faultCode: fault.faultCode, faultString: fault.faultString }
		}
		if (!('result' in decoded)) {
			throw new CodecError('Response carries neither a result nor a fault.')
		}
		return fromWire(decoded.result)
	}

	private decode(body: Uint8Array): unknown {
		try {
			return this.decoder.decode(body)
		} catch (err) {
			throw new CodecError('Body is not valid CBOR.', { cause: err })
		}
	}
}
