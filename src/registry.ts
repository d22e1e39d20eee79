// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { ErrorCode, InvalidArgumentError } from "./errors.js";
import { type RpcValue, isPlainObject } from "./values.js";

export type Procedure = (...params: RpcValue[]) => unknown;

/**
 * Explicit description of one procedure. This is the way to attach documentation and
 * signatures to a procedure, since the runtime can't see doc comments.
 */
export interface ProcedureDefinition {
  name: string;
  invoke: Procedure;
  description?: string;
  // Each signature lists the return type followed by the parameter types, as in
  // `system.methodSignature`.
  signatures?: readonly (readonly string[])[];
}

export interface MethodEntry {
  readonly name: string;
  readonly invoke: Procedure;
  readonly description: string;
  readonly signatures?: readonly (readonly string[])[];
}

/**
 * Anything that can be registered:
 *
 * - a `ProcedureDefinition`;
 * - a named function, registered under its own name;
 * - an object (class instance or plain object), whose methods are each registered, except
 *   `constructor` and names starting with `_`.
 */
export type Service = ProcedureDefinition | Procedure | object;

/**
 * Several services at once. Under string keys, each service's procedures are prefixed with
 * `key + "."`; numeric keys (including array indices) add no prefix.
 */
export type ServiceCollection = readonly Service[] | { readonly [namespace: string]: Service };

export function defineProcedure(definition: ProcedureDefinition): ProcedureDefinition {
  return definition;
}

export function isProcedureDefinition(value: unknown): value is ProcedureDefinition {
  return isPlainObject(value) && typeof value.name === "string" &&
      typeof value.invoke === "function";
}

/**
 * Tells a keyed collection apart from a single plain-object service. A collection is an array,
 * or a plain object whose values are all services: objects, procedure definitions, or named
 * functions filed under a key other than their own name. A plain object whose functions sit
 * under their own names (`{ping: () => "pong"}`) is a single service. Objects that mix the two
 * are ambiguous and rejected with `UnknownServiceType`.
 */
export function isServiceCollection(value: unknown): value is ServiceCollection {
  if (Array.isArray(value)) {
    return true;
  }
  if (!isPlainObject(value) || isProcedureDefinition(value)) {
    return false;
  }

  let services: string[] = [];
  let methods: string[] = [];
  for (let [key, member] of Object.entries(value)) {
    if (typeof member === "object" && member !== null) {
      services.push(key);
    } else if (typeof member === "function") {
      if (member.name !== "" && member.name !== key) {
        services.push(key);
      } else {
        methods.push(key);
      }
    }
  }

  if (services.length > 0 && methods.length > 0) {
    throw new InvalidArgumentError(
        `Unknown service type: ${methods.join(", ")} look like methods, ` +
        `${services.join(", ")} like services`, ErrorCode.UnknownServiceType);
  }
  return services.length > 0;
}

function isNumericKey(key: string | number): boolean {
  return typeof key === "number" || /^\d+$/.test(key);
}

// Lists callable members along the prototype chain, most derived first. Getters are not invoked.
function discoverMethods(service: object): Map<string, Function> {
  let methods = new Map<string, Function>();
  let current: object | null = service;
  while (current !== null && current !== Object.prototype && current !== Function.prototype) {
    for (let key of Object.getOwnPropertyNames(current)) {
      if (key === "constructor" || key.startsWith("_") || methods.has(key)) continue;
      let descriptor = Object.getOwnPropertyDescriptor(current, key);
      if (descriptor !== undefined && typeof descriptor.value === "function") {
        methods.set(key, descriptor.value);
      }
    }
    current = Object.getPrototypeOf(current);
  }
  return methods;
}

/**
 * Maps public procedure names to their targets. Registering a name that already exists replaces
 * the earlier target.
 */
export class MethodRegistry {
  #methods = new Map<string, MethodEntry>();

  add(definition: ProcedureDefinition): MethodEntry {
    let entry: MethodEntry = {
      name: definition.name,
      invoke: definition.invoke,
      description: definition.description ?? "",
      signatures: definition.signatures,
    };
    this.#methods.set(entry.name, entry);
    return entry;
  }

  addMethod(name: string, invoke: Procedure, description?: string): MethodEntry {
    return this.add({ name, invoke, description });
  }

  /**
   * Registers every public procedure of `service`, prefixed with `serviceName + "."` unless the
   * name is missing or numeric. `descriptions` supplies documentation for object methods, keyed
   * by method name.
   */
  addService(service: Service, serviceName?: string | number,
             descriptions: Record<string, string> = {}): MethodEntry[] {
    let prefix = serviceName === undefined || isNumericKey(serviceName) ? "" : `${serviceName}.`;

    if (isProcedureDefinition(service)) {
      return [this.add({ ...service, name: prefix + service.name })];
    }

    if (typeof service === "function") {
      if (service.name === "") {
        throw new InvalidArgumentError(
            `Unknown service type ${prefix}(anonymous function)`, ErrorCode.UnknownServiceType);
      }
      let procedure = service;
      return [this.add({
        name: prefix + service.name,
        invoke: (...params) => Reflect.apply(procedure, undefined, params),
        description: descriptions[service.name],
      })];
    }

    if (typeof service !== "object" || service === null) {
      throw new InvalidArgumentError(
          `Unknown service type ${prefix}${String(service)}`, ErrorCode.UnknownServiceType);
    }

    let entries: MethodEntry[] = [];
    for (let [key, method] of discoverMethods(service)) {
      entries.push(this.add({
        name: prefix + key,
        invoke: (...params) => Reflect.apply(method, service, params),
        description: descriptions[key],
      }));
    }
    return entries;
  }

  addServices(services: ServiceCollection): MethodEntry[] {
    let entries: MethodEntry[] = [];
    for (let [key, service] of Object.entries(services)) {
      entries.push(...this.addService(service, key));
    }
    return entries;
  }

  get(name: string): MethodEntry | undefined {
    return this.#methods.get(name);
  }

  has(name: string): boolean {
    return this.#methods.has(name);
  }

  names(): string[] {
    return [...this.#methods.keys()];
  }

  // A copy of the current entries. Later registrations don't show up in it.
  snapshot(): MethodEntry[] {
    return [...this.#methods.values()];
  }
}
