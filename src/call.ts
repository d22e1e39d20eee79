// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { ErrorCode, InvalidArgumentError } from "./errors.js";
import { isPlainObject } from "./values.js";

/**
 * A `{methodName, params}` mapping accepted by `system.multiCall` alongside `CallDescriptor`s.
 */
export interface CallShape {
  methodName: string;
  params?: readonly unknown[];
}

export function isCallShape(value: unknown): value is CallShape {
  return isPlainObject(value) && typeof value.methodName === "string" &&
      (value.params === undefined || Array.isArray(value.params));
}

// Identifies one `system.multiCall` round trip. Descriptors remember the batch that enrolled
// them, which is how reuse across batches is detected.
export type BatchToken = object;

/**
 * A deferred remote call, created when a method is called inside a batch scope (that is, while
 * building the arguments of `client.system.multiCall(...)`), or explicitly with `encodeCall()`.
 *
 * A descriptor belongs to exactly one batch: it gets its position in the batch request when it
 * is enrolled, and its result once the batch response has been decoded.
 */
export class CallDescriptor {
  #batchIndex?: number;
  #batch?: BatchToken;
  #hasResult = false;
  #result: unknown;
  #listeners: ((value: unknown) => void)[] = [];

  constructor(readonly methodName: string, readonly params: readonly unknown[] = []) {}

  get batchIndex(): number | undefined {
    return this.#batchIndex;
  }

  get isBound(): boolean {
    return this.#hasResult;
  }

  // The bound result, or `undefined` while the batch hasn't completed.
  get bound(): unknown {
    return this.#result;
  }

  result(): unknown {
    if (!this.#hasResult) {
      throw new InvalidArgumentError(
          `The result of ${this.methodName} is not available until its batch has completed.`,
          ErrorCode.InvalidBatchArgument);
    }
    return this.#result;
  }

  /**
   * Registers a callback that receives the result once the batch completes. Returns the
   * descriptor so it can be passed straight to `system.multiCall`.
   */
  bind(callback: (value: unknown) => void): this {
    if (this.#hasResult) {
      callback(this.#result);
    } else {
      this.#listeners.push(callback);
    }
    return this;
  }

  encode(): { methodName: string; params: unknown[] } {
    return { methodName: this.methodName, params: [...this.params] };
  }

  // Throws when the descriptor already belongs to a batch other than `batch`.
  checkEnrollable(batch: BatchToken): void {
    if (this.#batch !== undefined && this.#batch !== batch) {
      throw new InvalidArgumentError(
          `Call to ${this.methodName} was already sent in an earlier batch.`,
          ErrorCode.InvalidBatchArgument);
    }
  }

  // Assigns the descriptor's position in `batch`. Returns false when it already has a position
  // in that same batch.
  enroll(batch: BatchToken, index: number): boolean {
    if (this.#batch === batch) {
      return false;
    }
    this.checkEnrollable(batch);
    this.#batch = batch;
    this.#batchIndex = index;
    return true;
  }

  resolve(value: unknown): void {
    this.#hasResult = true;
    this.#result = value;
    let listeners = this.#listeners;
    this.#listeners = [];
    for (let listener of listeners) {
      listener(value);
    }
  }
}

export function encodeCall(methodName: string, ...params: unknown[]): CallDescriptor {
  return new CallDescriptor(methodName, params);
}
