// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { ConfigurationError } from "./errors.js";
import type { RpcFault, RpcValue } from "./values.js";
import { XmlRpcCodec } from "./xmlrpc-codec.js";
import { CborRpcCodec } from "./cbor-codec.js";

export type ProtocolVersion = "xmlrpc" | "cbor";

export type Verbosity = "pretty" | "newlines_only" | "no_white_space";

export type Escaping = "markup" | "non-ascii" | "non-print";

/**
 * Encoding options shared by clients and servers.
 */
export interface OutputOptions {
  // Whitespace in XML output. Default "pretty". Ignored by the binary dialect.
  verbosity?: Verbosity;
  // Which characters are escaped in XML text. Default ["markup"].
  escaping?: readonly Escaping[];
  // Protocol dialect. Clients default to "xmlrpc"; servers default to "auto", which answers each
  // request in the dialect it arrived in.
  version?: ProtocolVersion | "auto";
  // Character encoding declared in XML output. "us-ascii" implies "non-ascii" escaping.
  encoding?: "utf-8" | "us-ascii";
}

export interface RpcRequest {
  methodName: string;
  params: RpcValue[];
}

/**
 * Encodes and decodes single procedure-call envelopes. A batch travels as an ordinary call to
 * `system.multiCall`, so codecs know nothing about batching.
 */
export interface RpcCodec {
  readonly version: ProtocolVersion;
  readonly contentType: string;

  encodeRequest(methodName: string, params: readonly unknown[]): Uint8Array;
  decodeRequest(body: Uint8Array): RpcRequest;

  // A value that passes `isFault()` is encoded as a fault response.
  encodeResponse(value: unknown): Uint8Array;
  decodeResponse(body: Uint8Array): RpcValue | RpcFault;
}

export function createCodec(options: OutputOptions = {}): RpcCodec {
  let version = options.version ?? "xmlrpc";
  switch (version) {
    case "xmlrpc":
      return new XmlRpcCodec(options);
    case "cbor":
      return new CborRpcCodec();
    default:
      throw new ConfigurationError(`No codec available for protocol "${version}".`);
  }
}

const LESS_THAN = 0x3c;

/**
 * Picks the codec for an incoming request body: XML documents start with `<` once leading
 * whitespace is skipped, everything else is taken to be CBOR.
 */
export function detectVersion(body: Uint8Array): ProtocolVersion {
  for (let byte of body) {
    if (byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d || byte === 0xef ||
        byte === 0xbb || byte === 0xbf) {
      // whitespace or a UTF-8 byte order mark
      continue;
    }
    return byte === LESS_THAN ? "xmlrpc" : "cbor";
  }
  return "xmlrpc";
}
