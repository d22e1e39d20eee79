// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { ErrorCode, InvalidArgumentError } from "./errors.js";

/**
 * A value that can travel as a procedure parameter or result. Binary blobs and timestamps have
 * their own wrapper types because the wire formats distinguish them from strings and numbers;
 * use `binary()` and `timestamp()` to get native representations back out.
 */
export type RpcValue =
    null | boolean | number | string | RpcBinary | RpcDateTime | RpcValue[] | RpcStruct;

export interface RpcStruct {
  [key: string]: RpcValue;
}

export type RpcFault = {
  faultCode: number;
  faultString: string;
};

const MAX_DEPTH = 64;

export class RpcBinary {
  constructor(readonly bytes: Uint8Array) {}

  toBase64(): string {
    return Buffer.from(this.bytes.buffer, this.bytes.byteOffset, this.bytes.byteLength)
        .toString("base64");
  }

  static fromBase64(text: string): RpcBinary {
    return new RpcBinary(new Uint8Array(Buffer.from(text.replace(/\s+/g, ""), "base64")));
  }
}

// Accepts both the compact XML-RPC form (19980717T14:08:55) and ISO 8601 with separators.
// Values without a zone designator are read as UTC.
const DATETIME_PATTERN =
    /^(\d{4})-?(\d{2})-?(\d{2})T(\d{2}):?(\d{2}):?(\d{2})(?:\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/;

export class RpcDateTime {
  readonly timestamp: number;

  constructor(readonly value: string) {
    let match = DATETIME_PATTERN.exec(value.trim());
    if (!match) {
      throw new InvalidArgumentError(
          `Invalid dateTime value: ${value}`, ErrorCode.NotATimestamp);
    }
    let [, year, month, day, hours, minutes, seconds, zone] = match;
    let millis = Date.UTC(Number(year), Number(month) - 1, Number(day),
                          Number(hours), Number(minutes), Number(seconds));
    if (zone && zone !== "Z") {
      let sign = zone.startsWith("-") ? -1 : 1;
      let digits = zone.slice(1).replace(":", "");
      let offset = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2));
      millis -= sign * offset * 60_000;
    }
    this.timestamp = Math.floor(millis / 1000);
  }

  toDate(): Date {
    return new Date(this.timestamp * 1000);
  }

  static fromDate(date: Date): RpcDateTime {
    if (Number.isNaN(date.getTime())) {
      throw new TypeError("Cannot serialize value: Invalid Date");
    }
    let pad = (n: number, width = 2) => String(n).padStart(width, "0");
    return new RpcDateTime(
        `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
        `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`);
  }

  static fromTimestamp(seconds: number): RpcDateTime {
    return RpcDateTime.fromDate(new Date(seconds * 1000));
  }
}

export function datetime(timestamp: number): RpcDateTime {
  return RpcDateTime.fromTimestamp(timestamp);
}

/**
 * Returns the unix timestamp (in seconds) of a dateTime value.
 */
export function timestamp(value: unknown): number {
  if (value instanceof RpcDateTime) {
    return value.timestamp;
  }
  throw new InvalidArgumentError("Variable is not of type datetime", ErrorCode.NotATimestamp);
}

export function base64(data: Uint8Array | string): RpcBinary {
  return new RpcBinary(typeof data === "string" ? new TextEncoder().encode(data) : data);
}

export function binary(value: unknown): Uint8Array {
  if (value instanceof RpcBinary) {
    return value.bytes;
  } else if (value instanceof Uint8Array) {
    return value;
  }
  throw new InvalidArgumentError("Variable is not of type base64", ErrorCode.NotABinary);
}

export function fault(code: number, message: string): RpcFault {
  return { faultCode: code, faultString: message };
}

export function isFault(value: unknown): value is RpcFault {
  return typeof value === "object" && value !== null &&
      "faultCode" in value && typeof value.faultCode === "number" &&
      "faultString" in value && typeof value.faultString === "string";
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  let proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describe(value: unknown): string {
  try {
    return String(value);
  } catch {
    return "(couldn't stringify value)";
  }
}

/**
 * Converts an outgoing JavaScript value into the wire value model. `Uint8Array` becomes
 * `RpcBinary`, `Date` becomes `RpcDateTime` and `undefined` becomes `null`. Anything the
 * protocol can't represent throws a `TypeError`.
 */
export function normalizeValue(value: unknown, depth: number = 0): RpcValue {
  if (depth >= MAX_DEPTH) {
    throw new TypeError(
        "Serialization exceeded maximum allowed depth. (Does the message contain cycles?)");
  }

  switch (typeof value) {
    case "undefined":
      return null;
    case "boolean":
    case "string":
      return value;
    case "number":
      if (!Number.isFinite(value)) {
        throw new TypeError(`Cannot serialize value: ${value}`);
      }
      return value;
    case "object":
      break;
    default:
      throw new TypeError(`Cannot serialize value: ${describe(value)}`);
  }

  if (value === null || value instanceof RpcBinary || value instanceof RpcDateTime) {
    return value;
  } else if (value instanceof Uint8Array) {
    return new RpcBinary(value);
  } else if (value instanceof ArrayBuffer) {
    return new RpcBinary(new Uint8Array(value));
  } else if (value instanceof Date) {
    return RpcDateTime.fromDate(value);
  } else if (Array.isArray(value)) {
    return value.map(item => normalizeValue(item, depth + 1));
  } else if (isPlainObject(value)) {
    let struct: RpcStruct = {};
    for (let [key, member] of Object.entries(value)) {
      struct[key] = normalizeValue(member, depth + 1);
    }
    return struct;
  }

  throw new TypeError(`Cannot serialize value: ${describe(value)}`);
}
