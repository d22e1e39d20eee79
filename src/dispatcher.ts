// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { MULTICALL } from "./builtins.js";
import { ErrorCode, ProcedureNotFoundError, RecursiveBatchError, RpcError } from "./errors.js";
import type { MethodRegistry } from "./registry.js";
import {
  type RpcFault, type RpcValue,
  RpcBinary, RpcDateTime, fault, isFault, normalizeValue,
} from "./values.js";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface DispatcherHooks {
  /**
   * Called with every error thrown by a procedure (or by the dispatcher on its behalf) before it
   * is turned into a fault. This is the place to log.
   */
  onProcedureError?: (error: unknown, methodName: string) => void;
}

export function toFault(error: unknown): RpcFault {
  if (error instanceof RpcError) {
    return fault(error.code, error.message);
  } else if (error instanceof Error) {
    return fault(ErrorCode.ApplicationError, error.message);
  }
  return fault(ErrorCode.ApplicationError, String(error));
}

type BatchCall = { methodName: string; params: RpcValue[] };

function asBatchCall(value: RpcValue): BatchCall | undefined {
  if (value === null || typeof value !== "object" || Array.isArray(value) ||
      value instanceof RpcBinary || value instanceof RpcDateTime) {
    return undefined;
  }
  let { methodName, params = [] } = value;
  if (typeof methodName !== "string" || !Array.isArray(params)) {
    return undefined;
  }
  return { methodName, params };
}

function namesMultiCall(value: RpcValue): boolean {
  return asBatchCall(value)?.methodName === MULTICALL;
}

/**
 * Resolves procedure names against the application registry, then the built-in `system.*`
 * registry, and turns failures into faults at the boundary.
 */
export class Dispatcher {
  #registry: MethodRegistry;
  #builtins: MethodRegistry;
  #hooks: DispatcherHooks;

  constructor(registry: MethodRegistry, builtins: MethodRegistry, hooks: DispatcherHooks = {}) {
    this.#registry = registry;
    this.#builtins = builtins;
    this.#hooks = hooks;
  }

  /**
   * Invokes a procedure and returns whatever it returns. Throws `ProcedureNotFoundError` for
   * unknown names and propagates anything the procedure throws.
   */
  async call(methodName: string, params: readonly RpcValue[] = []): Promise<unknown> {
    let entry = this.#registry.get(methodName);
    if (entry === undefined && methodName.startsWith("system.")) {
      entry = this.#builtins.get(methodName);
    }
    if (entry === undefined) {
      throw new ProcedureNotFoundError(methodName);
    }
    return await entry.invoke(...params);
  }

  /**
   * Invokes a procedure and captures the outcome. A procedure may also return a fault record
   * (see `fault()`) to fail without throwing.
   */
  async dispatch(methodName: string, params: readonly RpcValue[]): Promise<Result<RpcValue, RpcFault>> {
    try {
      let value = await this.call(methodName, params);
      if (isFault(value)) {
        return { ok: false, error: fault(value.faultCode, value.faultString) };
      }
      // Convert here so a result the codec can't carry fails this call alone.
      return { ok: true, value: normalizeValue(value) };
    } catch (err) {
      this.#hooks.onProcedureError?.(err, methodName);
      return { ok: false, error: toFault(err) };
    }
  }

  /**
   * Runs the calls of one `system.multiCall` request in order. Each call is isolated: its
   * success is wrapped in a one-element array, its failure becomes a fault record at the same
   * position. The batch as a whole fails only when its parameters are malformed or when any
   * element is itself a `system.multiCall`, in which case nothing runs.
   */
  async dispatchBatch(params: readonly RpcValue[]): Promise<Result<RpcValue[], RpcFault>> {
    let [calls] = params;
    if (params.length !== 1 || !Array.isArray(calls)) {
      return {
        ok: false,
        error: fault(ErrorCode.IllegalBatchParams, `Illegal or no params set for ${MULTICALL}`),
      };
    }

    if (calls.some(namesMultiCall)) {
      let error = new RecursiveBatchError();
      this.#hooks.onProcedureError?.(error, MULTICALL);
      return { ok: false, error: toFault(error) };
    }

    let results: RpcValue[] = [];
    for (let [index, element] of calls.entries()) {
      let call = asBatchCall(element);
      if (call === undefined) {
        results.push(fault(ErrorCode.InvalidBatchArgument, `Argument ${index} is not a valid call`));
        continue;
      }
      let result = await this.dispatch(call.methodName, call.params);
      results.push(result.ok ? [result.value] : result.error);
    }
    return { ok: true, value: results };
  }
}
