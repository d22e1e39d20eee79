// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { expect, it, describe } from "vitest"
import { CodecError, ConfigurationError, RpcBinary, RpcDateTime, XmlRpcCodec, createCodec,
         detectVersion } from "../src/index.js"
import { text } from "./test-util.js"

function bytes(xml: string): Uint8Array {
  return new TextEncoder().encode(xml);
}

describe("XML-RPC encoding", () => {
  it("encodes a request without whitespace", () => {
    let codec = new XmlRpcCodec({ verbosity: "no_white_space" });
    expect(text(codec.encodeRequest("echo", [1]))).toBe(
        '<?xml version="1.0" encoding="utf-8"?>' +
        "<methodCall><methodName>echo</methodName>" +
        "<params><param><value><int>1</int></value></param></params></methodCall>");
  });

  it("encodes every value type", () => {
    let codec = new XmlRpcCodec({ verbosity: "no_white_space" });
    let xml = text(codec.encodeResponse({
      flag: true,
      big: 2 ** 40,
      nothing: null,
      list: [],
      blob: new Uint8Array([104, 105]),
      when: new Date(0),
    }));
    expect(xml).toBe(
        '<?xml version="1.0" encoding="utf-8"?><methodResponse><params><param><value><struct>' +
        "<member><name>flag</name><value><boolean>1</boolean></value></member>" +
        "<member><name>big</name><value><double>1099511627776</double></value></member>" +
        "<member><name>nothing</name><value><nil/></value></member>" +
        "<member><name>list</name><value><array><data/></array></value></member>" +
        "<member><name>blob</name><value><base64>aGk=</base64></value></member>" +
        "<member><name>when</name><value><dateTime.iso8601>19700101T00:00:00</dateTime.iso8601>" +
        "</value></member>" +
        "</struct></value></param></params></methodResponse>");
  });

  it("encodes faults", () => {
    let codec = new XmlRpcCodec({ verbosity: "no_white_space" });
    expect(text(codec.encodeResponse({ faultCode: -1, faultString: "Procedure x not found." })))
        .toBe('<?xml version="1.0" encoding="utf-8"?><methodResponse><fault><value><struct>' +
              "<member><name>faultCode</name><value><int>-1</int></value></member>" +
              "<member><name>faultString</name><value><string>Procedure x not found.</string>" +
              "</value></member></struct></value></fault></methodResponse>");
  });

  it("escapes markup and, on request, non-ASCII characters", () => {
    let markupOnly = new XmlRpcCodec({ verbosity: "no_white_space" });
    expect(text(markupOnly.encodeResponse("a<b & ü"))).toContain(
        "<string>a&lt;b &amp; ü</string>");

    let ascii = new XmlRpcCodec({ verbosity: "no_white_space", encoding: "us-ascii" });
    let xml = text(ascii.encodeResponse("a<b & ü"));
    expect(xml.startsWith('<?xml version="1.0" encoding="us-ascii"?>')).toBe(true);
    expect(xml).toContain("<string>a&lt;b &amp; &#252;</string>");
  });

  it("escapes control characters with non-print escaping", () => {
    let codec = new XmlRpcCodec({ verbosity: "no_white_space", escaping: ["markup", "non-print"] });
    expect(text(codec.encodeResponse("a\u0001b\tc"))).toContain("<string>a&#1;b\tc</string>");
  });

  it("refuses values that can't be represented", () => {
    let codec = new XmlRpcCodec();
    expect(() => codec.encodeRequest("f", [Infinity])).toThrowError(
        "Cannot serialize value: Infinity");
  });
});

describe("XML-RPC decoding", () => {
  it("decodes a request with every value type", () => {
    let codec = new XmlRpcCodec();
    let request = codec.decodeRequest(bytes(`<?xml version="1.0"?>
<methodCall>
  <methodName>demo.all</methodName>
  <params>
    <param><value><i4>42</i4></value></param>
    <param><value>untyped &amp; plain</value></param>
    <param><value><boolean>0</boolean></value></param>
    <param><value><double>-1.5</double></value></param>
    <param><value><base64>aGk=</base64></value></param>
    <param><value><dateTime.iso8601>19980717T14:08:55</dateTime.iso8601></value></param>
    <param><value><ex:nil/></value></param>
    <param>
      <value>
        <struct>
          <member><name>list</name><value><array><data>
            <value><string>x</string></value>
            <value><int>2</int></value>
          </data></array></value></member>
        </struct>
      </value>
    </param>
  </params>
</methodCall>`));

    expect(request.methodName).toBe("demo.all");
    expect(request.params).toStrictEqual([
      42,
      "untyped & plain",
      false,
      -1.5,
      new RpcBinary(new Uint8Array([104, 105])),
      new RpcDateTime("19980717T14:08:55"),
      null,
      { list: ["x", 2] },
    ]);
  });

  it("decodes what it encodes, pretty-printed or not", () => {
    for (let verbosity of ["pretty", "newlines_only", "no_white_space"] as const) {
      let codec = new XmlRpcCodec({ verbosity });
      let value = { name: "  spaced  ", items: [1, "two", { three: false }], empty: {} };
      expect(codec.decodeResponse(codec.encodeResponse(value))).toStrictEqual(value);
    }
  });

  it("decodes a fault response", () => {
    let codec = new XmlRpcCodec();
    let body = codec.encodeResponse({ faultCode: -3, faultString: "Cannot recurse system.multiCall" });
    expect(codec.decodeResponse(body)).toStrictEqual(
        { faultCode: -3, faultString: "Cannot recurse system.multiCall" });
  });

  it("rejects integers it can't represent exactly", () => {
    let codec = new XmlRpcCodec();
    let response = (value: string) => bytes(
        `<methodResponse><params><param><value><i8>${value}</i8></value></param></params></methodResponse>`);
    expect(codec.decodeResponse(response("-9007199254740991"))).toBe(-9007199254740991);
    expect(() => codec.decodeResponse(response("9007199254740993"))).toThrowError(
        new CodecError("Integer out of range: 9007199254740993"));
  });

  it("keeps struct members named like Object.prototype properties", () => {
    let codec = new XmlRpcCodec();
    let value = codec.decodeResponse(bytes(
        "<methodResponse><params><param><value><struct><member><name>__proto__</name>" +
        "<value><int>1</int></value></member></struct></value></param></params></methodResponse>"));
    expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
    expect(Object.keys(value ?? {})).toStrictEqual(["__proto__"]);
  });

  it("throws CodecError on malformed documents", () => {
    let codec = new XmlRpcCodec();
    expect(() => codec.decodeRequest(bytes("<methodCall><methodName>x</methodCall>")))
        .toThrowError(CodecError);
    expect(() => codec.decodeRequest(bytes("<methodResponse/>"))).toThrowError(
        "Expected a <methodCall> document.");
    expect(() => codec.decodeResponse(bytes(
        "<methodResponse><params><param><value><int>abc</int></value></param></params>" +
        "</methodResponse>"))).toThrowError("Invalid integer value: abc");
  });
});

describe("dialect selection", () => {
  it("creates codecs by dialect", () => {
    expect(createCodec().version).toBe("xmlrpc");
    expect(createCodec({ version: "cbor" }).contentType).toBe("application/cbor");
    expect(() => createCodec({ version: "auto" })).toThrowError(ConfigurationError);
  });

  it("detects XML by its first significant byte", () => {
    expect(detectVersion(bytes("\uFEFF  <?xml version=\"1.0\"?>"))).toBe("xmlrpc");
    expect(detectVersion(new Uint8Array([0xa2, 0x6a]))).toBe("cbor");
    expect(detectVersion(new Uint8Array())).toBe("xmlrpc");
  });
});
