// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import {
  ErrorCode, InvalidArgumentError, ProcedureNotFoundError, RecursiveBatchError,
} from "./errors.js";
import type { IntrospectionManifest } from "./introspection.js";
import { MethodRegistry, type MethodEntry } from "./registry.js";
import type { RpcValue } from "./values.js";

export const MULTICALL = "system.multiCall";

export interface BuiltinContext {
  // The application's procedures.
  registry: MethodRegistry;
  // The introspection data, as last captured for documentation.
  manifest(): IntrospectionManifest;
}

function methodNameParam(params: RpcValue[]): string {
  let [name] = params;
  if (typeof name !== "string") {
    throw new InvalidArgumentError("Expected a method name.", ErrorCode.InvalidParams);
  }
  return name;
}

/**
 * The `system.*` procedures the server provides on its own, kept in a registry of their own so
 * they never shadow application procedures. `system.multiCall` is listed here for introspection;
 * the server runs batches itself before dispatch ever looks a name up.
 */
export function createBuiltins(context: BuiltinContext): MethodRegistry {
  let builtins = new MethodRegistry();

  let lookup = (name: string): MethodEntry => {
    let entry = context.registry.get(name) ?? builtins.get(name);
    if (entry === undefined) {
      throw new ProcedureNotFoundError(name);
    }
    return entry;
  };

  builtins.add({
    name: "system.listMethods",
    description: "Lists the names of every procedure this server provides.",
    signatures: [["array"]],
    invoke: () => {
      let names = context.registry.names();
      for (let name of builtins.names()) {
        if (!context.registry.has(name)) names.push(name);
      }
      return names;
    },
  });

  builtins.add({
    name: "system.methodHelp",
    description: "Returns the description of a procedure.",
    signatures: [["string", "string"]],
    invoke: (...params) => lookup(methodNameParam(params)).description,
  });

  builtins.add({
    name: "system.methodSignature",
    description: "Returns the known signatures of a procedure, or \"undef\" when none are known.",
    signatures: [["array", "string"], ["string", "string"]],
    invoke: (...params) => {
      let signatures = lookup(methodNameParam(params)).signatures;
      return signatures && signatures.length > 0 ? signatures.map(signature => [...signature]) : "undef";
    },
  });

  builtins.add({
    name: "system.describeMethods",
    description: "Returns the introspection manifest of every documented procedure.",
    signatures: [["struct"]],
    invoke: () => {
      let manifest = context.manifest();
      return { version: manifest.version, methods: manifest.methods.map(method => ({ ...method })) };
    },
  });

  builtins.add({
    name: "system.getCapabilities",
    description: "Lists the protocol extensions this server supports.",
    signatures: [["struct"]],
    invoke: () => ({
      xmlrpc: { specUrl: "http://www.xmlrpc.com/spec", specVersion: 1 },
      faults_interop: {
        specUrl: "http://xmlrpc-epi.sourceforge.net/specs/rfc.fault_codes.php",
        specVersion: 20010516,
      },
      introspection: {
        specUrl: "http://xmlrpc-epi.sourceforge.net/specs/rfc.introspection.php",
        specVersion: 20010516,
      },
      multicall: { specUrl: "http://www.xmlrpc.com/discuss/msgReader$1208", specVersion: 1 },
    }),
  });

  builtins.add({
    name: MULTICALL,
    description: "Runs several calls in one request. Takes an array of {methodName, params} " +
        "structs and returns, in order, a one-element array with each result or a fault struct.",
    signatures: [["array", "array"]],
    invoke: () => {
      // Only reachable from inside a batch: a top-level multiCall never gets here.
      throw new RecursiveBatchError();
    },
  });

  return builtins;
}
