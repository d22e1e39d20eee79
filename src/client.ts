// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { MULTICALL } from "./builtins.js";
import { type BatchToken, CallDescriptor, isCallShape } from "./call.js";
import { type OutputOptions, type RpcCodec, createCodec } from "./codec.js";
import { CodecError, ErrorCode, InvalidArgumentError, RemoteProcedureFault } from "./errors.js";
import { FetchTransport, type RpcTransport } from "./http.js";
import { RpcBinary, RpcDateTime, isFault } from "./values.js";

export interface ClientOptions extends OutputOptions {
  // How requests reach the server. Defaults to a `FetchTransport` with no extra options.
  transport?: RpcTransport;

  /**
   * When true, a fault response rejects the call with `RemoteProcedureFault`. When false (the
   * default) the fault record `{faultCode, faultString}` is returned as the result.
   */
  throwExceptions?: boolean;

  /**
   * When true (the default), binary and dateTime results of a batch are handed back as
   * `Uint8Array` and unix timestamps instead of `RpcBinary` and `RpcDateTime`.
   */
  autoDecode?: boolean;
}

/**
 * What calling a remote method returns: a promise for its result, or a `CallDescriptor` when the
 * call is made while building a `system.multiCall` batch.
 */
export type CallResult = Promise<unknown> | CallDescriptor;

/**
 * State shared by every namespace of one client: where to send requests, how to encode them,
 * the batch-scope depth and the last request and response.
 */
export class ClientSession {
  readonly codec: RpcCodec;
  readonly transport: RpcTransport;
  readonly throwExceptions: boolean;
  readonly autoDecode: boolean;

  #batchDepth = 0;
  #lastRequest?: Uint8Array;
  #lastResponse?: Uint8Array;

  constructor(readonly url: string, options: ClientOptions = {}) {
    let { transport, throwExceptions, autoDecode, ...output } = options;
    this.codec = createCodec({ ...output, version: output.version ?? "xmlrpc" });
    this.transport = transport ?? new FetchTransport();
    this.throwExceptions = throwExceptions ?? false;
    this.autoDecode = autoDecode ?? true;
  }

  // Non-zero while the arguments of a `system.multiCall` are being evaluated.
  get batchDepth(): number {
    return this.#batchDepth;
  }

  get lastRequest(): Uint8Array | undefined {
    return this.#lastRequest;
  }

  get lastResponse(): Uint8Array | undefined {
    return this.#lastResponse;
  }

  enterBatchScope(): void {
    ++this.#batchDepth;
  }

  leaveBatchScope(): void {
    if (this.#batchDepth > 0) --this.#batchDepth;
  }

  resetBatchScope(): void {
    this.#batchDepth = 0;
  }

  /**
   * Performs one round trip. Resolves with the decoded result, or with the fault record when the
   * server answers with a fault and `throwExceptions` is off.
   */
  async execute(methodName: string, params: readonly unknown[]): Promise<unknown> {
    let request = this.codec.encodeRequest(methodName, params);
    this.#lastRequest = request;
    this.#lastResponse = undefined;

    let response = await this.transport.post(this.url, request, this.codec.contentType);
    this.#lastResponse = response;

    let result = this.codec.decodeResponse(response);
    if (isFault(result) && this.throwExceptions) {
      throw new RemoteProcedureFault(result.faultString, result.faultCode);
    }
    return result;
  }
}

function decodeBatchValue(session: ClientSession, value: unknown): unknown {
  // Successful calls come back wrapped in a one-element array.
  if (Array.isArray(value) && value.length === 1) {
    value = value[0];
  }
  if (session.autoDecode) {
    if (value instanceof RpcBinary) {
      return value.bytes;
    } else if (value instanceof RpcDateTime) {
      return value.timestamp;
    }
  }
  return value;
}

/**
 * Sends one `system.multiCall`. Every argument must be a `CallDescriptor` or a
 * `{methodName, params}` mapping; this is checked before anything is sent. Resolves with one
 * result per argument, in argument order, and binds each descriptor's result.
 */
function runBatch(session: ClientSession, args: readonly unknown[]): Promise<unknown> {
  let [first] = args;
  let calls: readonly unknown[] = args.length === 1 && Array.isArray(first) ? first : args;
  let batch: BatchToken = {};

  for (let [key, call] of calls.entries()) {
    if (call instanceof CallDescriptor) {
      call.checkEnrollable(batch);
    } else if (!isCallShape(call)) {
      throw new InvalidArgumentError(
          `Argument ${key} is not a valid call`, ErrorCode.InvalidBatchArgument);
    }
  }

  let requests: { methodName: string; params: unknown[] }[] = [];
  let positions: number[] = [];
  for (let call of calls) {
    if (call instanceof CallDescriptor) {
      if (call.enroll(batch, requests.length)) {
        requests.push(call.encode());
      }
      positions.push(call.batchIndex ?? requests.length - 1);
    } else if (isCallShape(call)) {
      positions.push(requests.length);
      requests.push({ methodName: call.methodName, params: [...call.params ?? []] });
    }
  }

  return (async () => {
    let result = await session.execute(MULTICALL, [requests]);
    if (isFault(result)) {
      // The batch failed as a whole, so no descriptor gets a result.
      return result;
    }
    if (!Array.isArray(result) || result.length !== requests.length) {
      throw new CodecError(
          `Expected ${requests.length} results from ${MULTICALL}, got ` +
          `${Array.isArray(result) ? result.length : "a non-array"}.`);
    }

    let results: unknown[] = result;
    return calls.map((call, key) => {
      let value = decodeBatchValue(session, results[positions[key]]);
      if (call instanceof CallDescriptor && !call.isBound) {
        call.resolve(value);
      }
      return value;
    });
  })();
}

/**
 * One node of a client's namespace tree. The root node has an empty path; `child("a")` of the
 * root has path "a", and its `child("b")` has path "a.b". Children are created on first use and
 * cached, so the same name always yields the same node.
 */
export class Namespace {
  readonly path: string;
  #session: ClientSession;
  #parent?: Namespace;
  #name?: string;
  #children = new Map<string, Namespace>();

  constructor(session: ClientSession, parent?: Namespace, name?: string) {
    this.#session = session;
    this.#parent = parent;
    this.#name = name;
    this.path = parent === undefined || name === undefined ? ""
        : parent.path === "" ? name : `${parent.path}.${name}`;
  }

  get session(): ClientSession {
    return this.#session;
  }

  /**
   * Returns the child namespace `name`. Reaching the top-level `system` namespace opens a batch
   * scope: until a method of `system` is called, calls made elsewhere on this client return
   * `CallDescriptor`s instead of being sent. This is what makes
   * `client.system.multiCall(client.a(), client.b())` work.
   */
  child(name: string): Namespace {
    let node = this.#children.get(name);
    if (node === undefined) {
      node = new Namespace(this.#session, this, name);
      this.#children.set(name, node);
    }
    if (node.path === "system") {
      this.#session.enterBatchScope();
    }
    return node;
  }

  /**
   * Calls the method `name` of this namespace.
   */
  invoke(name: string, params: readonly unknown[] = []): CallResult {
    let methodName = this.path === "" ? name : `${this.path}.${name}`;
    let session = this.#session;

    if (this.path === "system") {
      // A call on `system` closes the scope its property access opened.
      session.leaveBatchScope();
    }

    if (methodName === MULTICALL) {
      session.resetBatchScope();
      return runBatch(session, params);
    } else if (session.batchDepth > 0) {
      return new CallDescriptor(methodName, params);
    }
    return session.execute(methodName, params);
  }

  // Calls this namespace itself as a method of its parent.
  apply(params: readonly unknown[]): CallResult {
    if (this.#parent === undefined || this.#name === undefined) {
      throw new TypeError("The client root is not a remote method.");
    }
    return this.#parent.invoke(this.#name, params);
  }
}

/**
 * A remote server, as seen through a namespace tree. Use `proxy()` (or `createClient()`) for
 * the `client.a.b.op(x)` syntax.
 */
export class RpcClient extends Namespace {
  constructor(url: string, options: ClientOptions = {}) {
    super(new ClientSession(url, options));
  }

  get url(): string {
    return this.session.url;
  }

  // The most recent request body sent by any namespace of this client.
  get lastRequest(): Uint8Array | undefined {
    return this.session.lastRequest;
  }

  get lastResponse(): Uint8Array | undefined {
    return this.session.lastResponse;
  }

  proxy(): RemoteProxy {
    return proxyOf(this);
  }
}

/**
 * Property access yields the child namespace; calling runs the method of that name.
 */
export interface RemoteProxy {
  (...params: unknown[]): CallResult;
  readonly [name: string]: RemoteProxy;
}

let proxies = new WeakMap<Namespace, RemoteProxy>();
let namespaces = new WeakMap<object, Namespace>();

function proxyOf(node: Namespace): RemoteProxy {
  let proxy = proxies.get(node);
  if (proxy !== undefined) {
    return proxy;
  }

  // The target is a function so the proxy can be called.
  proxy = new Proxy(() => {}, {
    get(_target, property) {
      // `then` is looked up by `await`; a namespace must not look like a promise.
      if (typeof property === "symbol" || property === "then") {
        return undefined;
      }
      return proxyOf(node.child(property));
    },
    apply(_target, _thisArg, args: unknown[]) {
      return node.apply(args);
    },
  }) as RemoteProxy;

  proxies.set(node, proxy);
  namespaces.set(proxy, node);
  return proxy;
}

// The namespace node behind a proxy returned by `createClient()`.
export function namespaceOf(proxy: RemoteProxy): Namespace | undefined {
  return namespaces.get(proxy);
}

export function createClient(url: string, options: ClientOptions = {}): RemoteProxy {
  return new RpcClient(url, options).proxy();
}

export function xmlrpcClient(url: string, options: ClientOptions = {}): RemoteProxy {
  return createClient(url, { ...options, version: "xmlrpc" });
}

export function cborClient(url: string, options: ClientOptions = {}): RemoteProxy {
  return createClient(url, { ...options, version: "cbor" });
}
