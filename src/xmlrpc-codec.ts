// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import type { OutputOptions, RpcCodec, RpcRequest } from "./codec.js";
import { CodecError } from "./errors.js";
import {
  type RpcFault, type RpcStruct, type RpcValue,
  RpcBinary, RpcDateTime, isFault, isPlainObject, normalizeValue,
} from "./values.js";

type XmlElement = { tag: string; children: unknown[] };

const MARKUP: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  "\"": "&quot;",
  "'": "&apos;",
};

const INT_MAX = 2 ** 31 - 1;
const INT_MIN = -(2 ** 31);

/**
 * Builds a text escaper for the given escaping rules. The result is used both for text nodes and
 * attribute values, so the documentation renderer shares it.
 */
export function createEscaper(options: OutputOptions = {}): (text: string) => string {
  let escaping = new Set(options.escaping ?? ["markup"]);
  let markup = escaping.has("markup");
  let nonAscii = escaping.has("non-ascii") || options.encoding === "us-ascii";
  let nonPrint = escaping.has("non-print");

  return (text: string) => {
    let escaped = markup ? text.replace(/[&<>"']/g, ch => MARKUP[ch] ?? ch) : text;
    if (!nonAscii && !nonPrint) {
      return escaped;
    }

    let out = "";
    for (let ch of escaped) {
      let code = ch.codePointAt(0) ?? 0;
      if ((nonAscii && code > 0x7e) ||
          (nonPrint && code < 0x20 && code !== 0x09 && code !== 0x0a && code !== 0x0d)) {
        out += `&#${code};`;
      } else {
        out += ch;
      }
    }
    return out;
  };
}

export function createXmlBuilder(options: OutputOptions = {}): XMLBuilder {
  let escape = createEscaper(options);
  let verbosity = options.verbosity ?? "pretty";
  return new XMLBuilder({
    ignoreAttributes: false,
    format: verbosity !== "no_white_space",
    indentBy: verbosity === "pretty" ? "  " : "",
    suppressEmptyNode: true,
    processEntities: false,
    tagValueProcessor: (_name: string, value: unknown) => escape(String(value)),
    attributeValueProcessor: (_name: string, value: unknown) => escape(String(value)),
  });
}

function elementsOf(nodes: unknown): XmlElement[] {
  let result: XmlElement[] = [];
  if (!Array.isArray(nodes)) {
    return result;
  }
  for (let node of nodes) {
    if (!isPlainObject(node)) continue;
    for (let [tag, children] of Object.entries(node)) {
      if (tag === "#text" || tag === ":@") continue;
      result.push({ tag, children: Array.isArray(children) ? children : [] });
    }
  }
  return result;
}

function textOf(children: unknown[]): string {
  let text = "";
  for (let node of children) {
    if (isPlainObject(node) && "#text" in node) {
      text += String(node["#text"]);
    }
  }
  return text;
}

function child(element: XmlElement, tag: string): XmlElement | undefined {
  return elementsOf(element.children).find(el => el.tag === tag);
}

function toXmlValue(value: RpcValue): Record<string, unknown> {
  if (value === null) {
    return { nil: "" };
  } else if (typeof value === "boolean") {
    return { boolean: value ? "1" : "0" };
  } else if (typeof value === "number") {
    if (Number.isInteger(value) && value >= INT_MIN && value <= INT_MAX) {
      return { int: String(value) };
    }
    return { double: String(value) };
  } else if (typeof value === "string") {
    return { string: value };
  } else if (value instanceof RpcBinary) {
    return { base64: value.toBase64() };
  } else if (value instanceof RpcDateTime) {
    return { "dateTime.iso8601": value.value };
  } else if (Array.isArray(value)) {
    return { array: { data: value.length > 0 ? { value: value.map(toXmlValue) } : "" } };
  }

  let members = Object.entries(value).map(([name, member]) => ({
    name,
    value: toXmlValue(member),
  }));
  return { struct: members.length > 0 ? { member: members } : "" };
}

function parseInteger(text: string): number {
  let trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new CodecError(`Invalid integer value: ${text}`);
  }
  let value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    throw new CodecError(`Integer out of range: ${trimmed}`);
  }
  return value;
}

function decodeValue(children: unknown[]): RpcValue {
  let [typed] = elementsOf(children);
  if (typed === undefined) {
    // An untyped <value> holds a string.
    return textOf(children);
  }

  let text = textOf(typed.children);
  // Apache-style extension types arrive as <ex:nil/>, <ex:i8>.
  switch (typed.tag.replace(/^ex:/, "")) {
    case "i4":
    case "i8":
    case "int":
      return parseInteger(text);
    case "boolean": {
      let flag = text.trim();
      if (flag === "1" || flag === "true") return true;
      if (flag === "0" || flag === "false") return false;
      throw new CodecError(`Invalid boolean value: ${text}`);
    }
    case "string":
      return text;
    case "double": {
      let number = Number(text.trim());
      if (text.trim() === "" || Number.isNaN(number)) {
        throw new CodecError(`Invalid double value: ${text}`);
      }
      return number;
    }
    case "dateTime.iso8601":
      try {
        return new RpcDateTime(text);
      } catch (err) {
        throw new CodecError(`Invalid dateTime value: ${text}`, { cause: err });
      }
    case "base64":
      return RpcBinary.fromBase64(text);
    case "nil":
      return null;
    case "array": {
      let data = child(typed, "data");
      if (data === undefined) {
        throw new CodecError("Array value is missing its <data> element.");
      }
      return elementsOf(data.children)
          .filter(el => el.tag === "value")
          .map(el => decodeValue(el.children));
    }
    case "struct": {
      let struct: RpcStruct = {};
      for (let member of elementsOf(typed.children)) {
        if (member.tag !== "member") continue;
        let name = child(member, "name");
        let value = child(member, "value");
        if (name === undefined || value === undefined) {
          throw new CodecError("Struct member is missing its <name> or <value>.");
        }
        Object.defineProperty(struct, textOf(name.children), {
          value: decodeValue(value.children),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return struct;
    }
    default:
      throw new CodecError(`Unknown XML-RPC type <${typed.tag}>.`);
  }
}

function decodeParams(envelope: XmlElement): RpcValue[] {
  let params = child(envelope, "params");
  if (params === undefined) {
    return [];
  }
  return elementsOf(params.children)
      .filter(el => el.tag === "param")
      .map(param => {
        let value = child(param, "value");
        if (value === undefined) {
          throw new CodecError("Parameter is missing its <value> element.");
        }
        return decodeValue(value.children);
      });
}

/**
 * XML-RPC codec. Outgoing values are validated with `normalizeValue()`, so a `Uint8Array` goes
 * out as `<base64>` and a `Date` as `<dateTime.iso8601>`; incoming ones come back as `RpcBinary`
 * and `RpcDateTime`.
 */
export class XmlRpcCodec implements RpcCodec {
  readonly version = "xmlrpc";
  readonly contentType = "text/xml";

  #builder: XMLBuilder;
  #parser: XMLParser;
  #encoding: string;

  constructor(options: OutputOptions = {}) {
    this.#builder = createXmlBuilder(options);
    this.#encoding = options.encoding ?? "utf-8";
    this.#parser = new XMLParser({
      preserveOrder: true,
      ignoreAttributes: true,
      ignoreDeclaration: true,
      ignorePiTags: true,
      parseTagValue: false,
      trimValues: false,
      processEntities: true,
      htmlEntities: true,
    });
  }

  encodeRequest(methodName: string, params: readonly unknown[]): Uint8Array {
    let values = params.map(param => normalizeValue(param));
    return this.#build({
      methodCall: {
        methodName,
        params: values.length > 0 ? { param: values.map(value => ({ value: toXmlValue(value) })) } : "",
      },
    });
  }

  decodeRequest(body: Uint8Array): RpcRequest {
    let envelope = this.#parse(body, "methodCall");
    let methodName = child(envelope, "methodName");
    if (methodName === undefined) {
      throw new CodecError("Request is missing its <methodName>.");
    }
    return { methodName: textOf(methodName.children).trim(), params: decodeParams(envelope) };
  }

  encodeResponse(value: unknown): Uint8Array {
    if (isFault(value)) {
      return this.#build({
        methodResponse: {
          fault: {
            value: toXmlValue({ faultCode: value.faultCode, faultString: value.faultString }),
          },
        },
      });
    }
    return this.#build({
      methodResponse: { params: { param: { value: toXmlValue(normalizeValue(value)) } } },
    });
  }

  decodeResponse(body: Uint8Array): RpcValue | RpcFault {
    let envelope = this.#parse(body, "methodResponse");
    let faultElement = child(envelope, "fault");
    if (faultElement !== undefined) {
      let value = child(faultElement, "value");
      let decoded = value === undefined ? null : decodeValue(value.children);
      if (!isFault(decoded)) {
        throw new CodecError("Fault response does not carry a faultCode and faultString.");
      }
      return { faultCode: decoded.faultCode, faultString: decoded.faultString };
    }
    let [result] = decodeParams(envelope);
    return result ?? null;
  }

  #build(document: Record<string, unknown>): Uint8Array {
    let xml: string = this.#builder.build({
      "?xml": { "@_version": "1.0", "@_encoding": this.#encoding },
      ...document,
    });
    return new TextEncoder().encode(xml);
  }

  #parse(body: Uint8Array, rootTag: string): XmlElement {
    let text: string;
    try {
      text = new TextDecoder("utf-8", { fatal: true }).decode(body);
    } catch (err) {
      throw new CodecError("Body is not valid UTF-8.", { cause: err });
    }

    let validation = XMLValidator.validate(text);
    if (validation !== true) {
      throw new CodecError(`Malformed XML: ${validation.err.msg}`);
    }

    let document: unknown = this.#parser.parse(text);
    let root = elementsOf(document).find(el => el.tag === rootTag);
    if (root === undefined) {
      throw new CodecError(`Expected a <${rootTag}> document.`);
    }
    return root;
  }
}
