// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

export {
  ErrorCode, RpcError, ConfigurationError, InvalidArgumentError, ProcedureNotFoundError,
  RecursiveBatchError, TransportError, RemoteProcedureFault, CodecError,
} from "./errors.js";
export {
  type RpcValue, type RpcStruct, type RpcFault,
  RpcBinary, RpcDateTime, datetime, timestamp, base64, binary, fault, isFault, normalizeValue,
} from "./values.js";
export {
  type ProtocolVersion, type Verbosity, type Escaping, type OutputOptions, type RpcRequest,
  type RpcCodec, createCodec, detectVersion,
} from "./codec.js";
export { XmlRpcCodec } from "./xmlrpc-codec.js";
export { CborRpcCodec } from "./cbor-codec.js";
export {
  type RpcTransport, type FetchTransportOptions,
  FetchTransport, newHttpRpcResponse, nodeHttpRpcResponse,
} from "./http.js";
export { type CallShape, CallDescriptor, encodeCall } from "./call.js";
export {
  type ClientOptions, type CallResult, type RemoteProxy,
  ClientSession, Namespace, RpcClient, createClient, xmlrpcClient, cborClient, namespaceOf,
} from "./client.js";
export {
  type Procedure, type ProcedureDefinition, type MethodEntry, type Service,
  type ServiceCollection, MethodRegistry, defineProcedure,
} from "./registry.js";
export { type Result, type DispatcherHooks, Dispatcher } from "./dispatcher.js";
export { type ServerOptions, type RpcReply, RpcServer } from "./server.js";
export {
  type MethodDescription, type IntrospectionManifest, type Documentor,
  type HtmlDocumentorOptions, HtmlDocumentor, buildManifest, renderIntrospectionXml,
} from "./introspection.js";
export { MULTICALL } from "./builtins.js";
