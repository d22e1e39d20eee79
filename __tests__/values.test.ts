// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { expect, it, describe } from "vitest"
import { ErrorCode, InvalidArgumentError, RpcBinary, RpcDateTime, base64, binary, datetime,
         fault, isFault, normalizeValue, timestamp } from "../src/index.js"

describe("RpcDateTime", () => {
  it("parses the compact XML-RPC form as UTC", () => {
    let value = new RpcDateTime("19980717T14:08:55");
    expect(value.timestamp).toBe(900684535);
  });

  it("parses ISO 8601 with separators and a zone offset", () => {
    expect(new RpcDateTime("1998-07-17T16:08:55+02:00").timestamp).toBe(900684535);
    expect(new RpcDateTime("1998-07-17T14:08:55Z").timestamp).toBe(900684535);
  });

  it("formats timestamps in the compact form", () => {
    expect(datetime(900684535).value).toBe("19980717T14:08:55");
    expect(RpcDateTime.fromDate(new Date(0)).value).toBe("19700101T00:00:00");
  });

  it("rejects text that isn't a date", () => {
    expect(() => new RpcDateTime("yesterday")).toThrowError("Invalid dateTime value: yesterday");
  });
});

describe("conversion helpers", () => {
  it("timestamp() unwraps dateTime values", () => {
    expect(timestamp(datetime(1234))).toBe(1234);
  });

  it("timestamp() rejects anything else", () => {
    let error: unknown;
    try {
      timestamp("19980717T14:08:55");
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(InvalidArgumentError);
    expect(error).toMatchObject({
      message: "Variable is not of type datetime",
      code: ErrorCode.NotATimestamp,
    });
  });

  it("base64() wraps strings as UTF-8 bytes", () => {
    let value = base64("hi");
    expect(value).toBeInstanceOf(RpcBinary);
    expect([...value.bytes]).toStrictEqual([104, 105]);
    expect(value.toBase64()).toBe("aGk=");
  });

  it("binary() unwraps base64 values and rejects strings", () => {
    expect([...binary(RpcBinary.fromBase64("aGk="))]).toStrictEqual([104, 105]);
    expect(() => binary("aGk=")).toThrowError("Variable is not of type base64");
  });

  it("recognizes fault records", () => {
    expect(isFault(fault(-1, "nope"))).toBe(true);
    expect(isFault({ faultCode: "-1", faultString: "nope" })).toBe(false);
    expect(isFault([1])).toBe(false);
  });
});

describe("normalizeValue", () => {
  it("converts native values into the wire model", () => {
    let bytes = new Uint8Array([1, 2, 3]);
    let result = normalizeValue({ a: undefined, b: [bytes], c: new Date(1000) });
    expect(result).toStrictEqual({
      a: null,
      b: [new RpcBinary(bytes)],
      c: new RpcDateTime("19700101T00:00:01"),
    });
  });

  it("rejects values the protocol can't carry", () => {
    expect(() => normalizeValue(NaN)).toThrowError("Cannot serialize value: NaN");
    expect(() => normalizeValue(() => 1)).toThrowError(TypeError);
    expect(() => normalizeValue(new Map())).toThrowError("Cannot serialize value: [object Map]");
  });

  it("rejects cycles", () => {
    let cycle: unknown[] = [];
    cycle.push(cycle);
    expect(() => normalizeValue(cycle)).toThrowError(
        "Serialization exceeded maximum allowed depth. (Does the message contain cycles?)");
  });
});
