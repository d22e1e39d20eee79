// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import type { IncomingMessage, ServerResponse, OutgoingHttpHeader, OutgoingHttpHeaders } from "node:http";
import { TransportError } from "./errors.js";
import type { RpcServer } from "./server.js";

/**
 * Posts one encoded request and resolves with the encoded response. Retry, pooling and TLS policy
 * are the transport's business; the client only ever makes one `post()` per round trip.
 */
export interface RpcTransport {
  post(url: string, body: Uint8Array, contentType: string): Promise<Uint8Array>;
}

type FetchFunc = (input: string, init: RequestInit) => Promise<Response>;

export interface FetchTransportOptions {
  // Extra request headers, e.g. for authentication.
  headers?: Record<string, string>;
  // Deadline for the whole round trip. No deadline by default.
  timeoutMs?: number;
  // Replaces the global `fetch`, e.g. to route requests in-process.
  fetch?: FetchFunc;
}

export class FetchTransport implements RpcTransport {
  #headers: Record<string, string>;
  #timeoutMs?: number;
  #fetch: FetchFunc;

  constructor(options: FetchTransportOptions = {}) {
    this.#headers = options.headers ?? {};
    this.#timeoutMs = options.timeoutMs;
    this.#fetch = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async post(url: string, body: Uint8Array, contentType: string): Promise<Uint8Array> {
    let response: Response;
    try {
      response = await this.#fetch(url, {
        method: "POST",
        headers: {
          ...this.#headers,
          "Content-Type": contentType,
        },
        body,
        signal: this.#timeoutMs === undefined ? undefined : AbortSignal.timeout(this.#timeoutMs),
      });
    } catch (err) {
      throw new TransportError(`Could not access ${url}`, { cause: err });
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new TransportError(
          `Could not access ${url}: ${response.status} ${response.statusText}`);
    }

    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (err) {
      throw new TransportError(`Could not read the response from ${url}`, { cause: err });
    }
  }
}

/**
 * Implements an RPC endpoint using standard Fetch API types to represent HTTP requests and
 * responses. A POST with a body is dispatched; a GET (or an empty POST) gets the documentation
 * page, or a fault when documentation is disabled.
 *
 * @param request The request received from the client.
 * @param server The server whose procedures are exposed.
 * @returns The HTTP response to return to the client. Note that the returned object has mutable
 *     headers, so you can modify them using e.g. `response.headers.set("Foo", "bar")`.
 */
export async function newHttpRpcResponse(request: Request, server: RpcServer): Promise<Response> {
  if (request.method !== "POST" && request.method !== "GET") {
    return new Response("This endpoint only accepts GET and POST requests.", { status: 405 });
  }

  let body = request.method === "POST" ? new Uint8Array(await request.arrayBuffer()) : undefined;
  let reply = await server.run(body);

  return new Response(reply.body, {
    headers: { "Content-Type": reply.contentType },
  });
}

/**
 * Implements an RPC endpoint using traditional Node.js HTTP APIs.
 *
 * @param request The request received from the client.
 * @param response The response object, to which the response should be written.
 * @param server The server whose procedures are exposed.
 * @param options You can pass headers to set on the response.
 */
export async function nodeHttpRpcResponse(
    request: IncomingMessage, response: ServerResponse,
    server: RpcServer,
    options?: {
      headers?: OutgoingHttpHeaders | OutgoingHttpHeader[],
    }): Promise<void> {
  if (request.method !== "POST" && request.method !== "GET") {
    response.writeHead(405, "This endpoint only accepts GET and POST requests.");
    response.end();
    return;
  }

  let body = await new Promise<Uint8Array>((resolve, reject) => {
    let chunks: Buffer[] = [];
    request.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });
    request.on("end", () => {
      resolve(new Uint8Array(Buffer.concat(chunks)));
    });
    request.on("error", reject);
  });

  let reply = await server.run(body.length === 0 ? undefined : body);

  const headers = {
    ...options?.headers,
    "Content-Type": reply.contentType,
  };
  response.writeHead(200, headers);
  if (typeof reply.body === "string") {
    response.end(reply.body);
  } else {
    response.end(Buffer.from(reply.body.buffer, reply.body.byteOffset, reply.body.byteLength));
  }
}
