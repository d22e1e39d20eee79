// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { MULTICALL, createBuiltins } from "./builtins.js";
import {
  type OutputOptions, type ProtocolVersion, type RpcCodec, type RpcRequest,
  createCodec, detectVersion,
} from "./codec.js";
import { Dispatcher, type Result, toFault } from "./dispatcher.js";
import { ErrorCode, RpcError } from "./errors.js";
import { type Documentor, HtmlDocumentor, buildManifest } from "./introspection.js";
import {
  MethodRegistry, type MethodEntry, type Procedure, type ProcedureDefinition, type Service,
  type ServiceCollection, isServiceCollection,
} from "./registry.js";
import { type RpcFault, type RpcValue, fault } from "./values.js";

export interface ServerOptions extends OutputOptions {
  /**
   * Serves the page returned for requests without a payload, and the data behind
   * `system.describeMethods`. Pass `false` to disable: payload-less requests then get a fault.
   * Defaults to an `HtmlDocumentor` built from `name` and `css`.
   */
  documentor?: Documentor | false;

  // Title of the default documentation page.
  name?: string;

  // Stylesheet URL for the default documentation page.
  css?: string;

  /**
   * Called with every error thrown while running a procedure, before it is sent to the client as
   * a fault. Use this to log.
   */
  onProcedureError?: (error: unknown, methodName: string) => void;
}

export interface RpcReply {
  contentType: string;
  body: Uint8Array | string;
}

/**
 * Exposes registered procedures to clients. `run()` takes a raw request body and produces the
 * reply; the HTTP adapters in this package are thin wrappers around it.
 */
export class RpcServer {
  #options: OutputOptions;
  #registry = new MethodRegistry();
  #documentor?: Documentor;
  #builtins: MethodRegistry;
  #dispatcher: Dispatcher;
  #codecs = new Map<ProtocolVersion, RpcCodec>();

  constructor(services?: Service | ServiceCollection, options: ServerOptions = {}) {
    let { documentor, name, css, onProcedureError, ...output } = options;
    this.#options = { ...output, version: output.version ?? "auto" };
    if (this.#options.version !== "auto") {
      // Unknown dialects fail at construction.
      this.#codecFor(this.#options.version ?? "xmlrpc");
    }

    if (services !== undefined) {
      if (isServiceCollection(services)) {
        this.#registry.addServices(services);
      } else {
        this.#registry.addService(services);
      }
    }

    if (documentor !== false) {
      this.#documentor = documentor ??
          new HtmlDocumentor({ name, css, version: this.#options.version });
    }

    this.#builtins = createBuiltins({
      registry: this.#registry,
      manifest: () => this.#documentor?.getManifest() ?? buildManifest(this.#registry.snapshot()),
    });
    this.#dispatcher = new Dispatcher(this.#registry, this.#builtins, { onProcedureError });
  }

  addService(service: Service, serviceName?: string | number,
             descriptions?: Record<string, string>): MethodEntry[] {
    return this.#registry.addService(service, serviceName, descriptions);
  }

  addMethod(name: string, invoke: Procedure, description?: string): MethodEntry {
    return this.#registry.addMethod(name, invoke, description);
  }

  add(definition: ProcedureDefinition): MethodEntry {
    return this.#registry.add(definition);
  }

  // The `system.*` procedures the server provides itself.
  builtinMethods(): MethodEntry[] {
    return this.#builtins.snapshot();
  }

  /**
   * Calls a procedure in-process, bypassing the codec. Errors propagate as thrown.
   */
  call(methodName: string, params: readonly RpcValue[] = []): Promise<unknown> {
    return this.#dispatcher.call(methodName, params);
  }

  dispatch(methodName: string, params: readonly RpcValue[]): Promise<Result<RpcValue, RpcFault>> {
    if (methodName === MULTICALL) {
      return this.#dispatcher.dispatchBatch(params);
    }
    return this.#dispatcher.dispatch(methodName, params);
  }

  /**
   * Decodes one request body, dispatches it and encodes the reply in the dialect the request
   * used.
   */
  async handle(body: Uint8Array): Promise<RpcReply> {
    let codec = this.#codecFor(
        this.#options.version === "auto" || this.#options.version === undefined
            ? detectVersion(body) : this.#options.version);

    let request: RpcRequest;
    try {
      request = codec.decodeRequest(body);
    } catch (err) {
      if (!(err instanceof RpcError)) throw err;
      return this.#reply(codec, toFault(err));
    }

    let result = await this.dispatch(request.methodName, request.params);
    return this.#reply(codec, result.ok ? result.value : result.error);
  }

  /**
   * Handles a request as received over HTTP. Hands the documentor a snapshot of the registry
   * first, so documentation reflects the procedures registered at this point. Without a body,
   * answers with the documentation page.
   */
  async run(body?: Uint8Array): Promise<RpcReply> {
    this.#documentor?.setMethodData(this.#registry.snapshot());

    if (body !== undefined && body.length > 0) {
      return await this.handle(body);
    }

    if (this.#documentor === undefined) {
      let version = this.#options.version === "auto" || this.#options.version === undefined
          ? "xmlrpc" : this.#options.version;
      return this.#reply(this.#codecFor(version),
                         fault(ErrorCode.NoRequestPayload, "No request payload found."));
    }
    return {
      contentType: "text/html; charset=utf-8",
      body: await this.#documentor.handle(this),
    };
  }

  /**
   * Changes one output option for later replies.
   */
  setOutputOption<K extends keyof OutputOptions>(key: K, value: OutputOptions[K]): void {
    let options: OutputOptions = { ...this.#options };
    options[key] = value;
    if (options.version !== undefined && options.version !== "auto") {
      createCodec(options);
    }
    this.#options = options;
    this.#codecs.clear();
  }

  #codecFor(version: ProtocolVersion): RpcCodec {
    let codec = this.#codecs.get(version);
    if (codec === undefined) {
      codec = createCodec({ ...this.#options, version });
      this.#codecs.set(version, codec);
    }
    return codec;
  }

  #reply(codec: RpcCodec, value: RpcValue | RpcFault): RpcReply {
    return { contentType: codec.contentType, body: codec.encodeResponse(value) };
  }
}
