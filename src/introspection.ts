// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import type { OutputOptions } from "./codec.js";
import type { MethodEntry } from "./registry.js";
import { createXmlBuilder } from "./xmlrpc-codec.js";

export interface MethodDescription {
  name: string;
  purpose: string;
  signatures: string[][];
}

export interface IntrospectionManifest {
  version: "1.0";
  methods: MethodDescription[];
}

export function buildManifest(entries: readonly MethodEntry[]): IntrospectionManifest {
  return {
    version: "1.0",
    methods: entries.map(entry => ({
      name: entry.name,
      purpose: entry.description.trim(),
      signatures: (entry.signatures ?? []).map(signature => [...signature]),
    })),
  };
}

/**
 * Renders a manifest in the xmlrpc-epi introspection format:
 * `<introspection version="1.0"><methodList><methodDescription name="...">`, with a
 * `<purpose>` and, where known, the `<signatures>` of each method.
 */
export function renderIntrospectionXml(
    manifest: IntrospectionManifest, options: OutputOptions = {}): string {
  let builder = createXmlBuilder({ verbosity: "no_white_space", ...options });
  let methods = manifest.methods.map(method => {
    let signatures = method.signatures
        .filter(signature => signature.length > 0)
        .map(([returns, ...params]) => ({
          returns: { value: { "@_type": returns } },
          params: params.length > 0 ? { value: params.map(type => ({ "@_type": type })) } : "",
        }));
    return {
      "@_name": method.name,
      purpose: method.purpose,
      ...(signatures.length > 0 ? { signatures: { signature: signatures } } : {}),
    };
  });
  return builder.build({
    "?xml": { "@_version": "1.0" },
    introspection: {
      "@_version": manifest.version,
      methodList: methods.length > 0 ? { methodDescription: methods } : "",
    },
  });
}

// The subset of RpcServer the documentation page needs.
export interface DocumentedServer {
  // The server's own `system.*` procedures.
  builtinMethods(): readonly MethodEntry[];
}

/**
 * Produces the introspection data and the page served when a request arrives without a payload.
 * `setMethodData()` is called with a snapshot of the registry each time the server runs, so
 * procedures added after that are not described until the next run.
 */
export interface Documentor {
  setMethodData(methods: readonly MethodEntry[]): void;
  getManifest(): IntrospectionManifest;
  getIntrospectionXml(): string;
  handle(server: DocumentedServer): Promise<string>;
}

export interface HtmlDocumentorOptions {
  // Page title. Default "Simple RPC Server".
  name?: string;
  // URL of a stylesheet to link from the page.
  css?: string;
  // The server's protocol dialect, used to describe it on the page.
  version?: OutputOptions["version"];
}

const PROTOCOL_DESCRIPTIONS: Record<NonNullable<OutputOptions["version"]>, string> = {
  xmlrpc: "This server implements the XML-RPC specification.",
  cbor: "This server implements XML-RPC semantics over CBOR.",
  auto: "This server accepts XML-RPC and CBOR requests and answers in the same dialect.",
};

// Renders a heading such as `string echo(string)` from the first known signature.
function describeMethod(entry: MethodEntry): string {
  let [first = []] = entry.signatures ?? [];
  if (first.length === 0) {
    return `${entry.name}()`;
  }
  let [returns, ...params] = first;
  return `${returns} ${entry.name}(${params.join(", ")})`;
}

export class HtmlDocumentor implements Documentor {
  #name: string;
  #css?: string;
  #version: NonNullable<OutputOptions["version"]>;
  #methods: readonly MethodEntry[] = [];

  constructor(options: HtmlDocumentorOptions = {}) {
    this.#name = options.name ?? "Simple RPC Server";
    this.#css = options.css;
    this.#version = options.version ?? "auto";
  }

  setMethodData(methods: readonly MethodEntry[]): void {
    this.#methods = methods;
  }

  getManifest(): IntrospectionManifest {
    return buildManifest(this.#methods);
  }

  getIntrospectionXml(): string {
    return renderIntrospectionXml(this.getManifest());
  }

  /**
   * Renders the page from the last method data, followed by the built-ins it doesn't shadow.
   */
  async handle(server: DocumentedServer): Promise<string> {
    let documented = new Set(this.#methods.map(entry => entry.name));
    let entries = [
      ...this.#methods,
      ...server.builtinMethods().filter(entry => !documented.has(entry.name)),
    ];
    let sections = entries.map(entry => ({
      h2: describeMethod(entry),
      p: entry.description.trim(),
    }));

    let builder = createXmlBuilder({ verbosity: "newlines_only" });
    let head: Record<string, unknown> = { title: this.#name };
    if (this.#css !== undefined) {
      head.link = { "@_rel": "stylesheet", "@_type": "text/css", "@_href": this.#css };
    }
    return "<!DOCTYPE html>\n" + builder.build({
      html: {
        head,
        body: {
          h1: this.#name,
          p: PROTOCOL_DESCRIPTIONS[this.#version],
          section: sections,
        },
      },
    });
  }
}
