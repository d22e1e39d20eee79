// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

/**
 * Numeric codes carried by every `RpcError` and by the faults the server emits. Small negative
 * codes are the library's own; -32700, -32602 and -32500 follow the XML-RPC fault code
 * interoperability list.
 */
export const ErrorCode = {
  MethodNotFound: -1,
  InvalidBatchArgument: -2,
  RecursiveBatch: -3,
  TransportUnreachable: -4,
  CodecUnavailable: -5,
  NotATimestamp: -6,
  UnknownServiceType: -7,
  NoRequestPayload: -8,
  IllegalBatchParams: -9,
  NotABinary: -10,
  InvalidParams: -32602,
  ParseError: -32700,
  ApplicationError: -32500,
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class RpcError extends Error {
  constructor(message: string, readonly code: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// The codec or protocol dialect requested at construction isn't available.
export class ConfigurationError extends RpcError {
  constructor(message: string, code: number = ErrorCode.CodecUnavailable) {
    super(message, code);
  }
}

export class InvalidArgumentError extends RpcError {}

export class ProcedureNotFoundError extends RpcError {
  constructor(readonly methodName: string) {
    super(`Procedure ${methodName} not found.`, ErrorCode.MethodNotFound);
  }
}

export class RecursiveBatchError extends RpcError {
  constructor() {
    super("Cannot recurse system.multiCall", ErrorCode.RecursiveBatch);
  }
}

export class TransportError extends RpcError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ErrorCode.TransportUnreachable, options);
  }
}

/**
 * A fault returned by the remote server, raised locally only when the client was created with
 * `throwExceptions: true`. `code` is the remote `faultCode`.
 */
export class RemoteProcedureFault extends RpcError {}

// A request or response body that the codec could not make sense of.
export class CodecError extends RpcError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ErrorCode.ParseError, options);
  }
}
