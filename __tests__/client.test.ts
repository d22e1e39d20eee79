// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { expect, it, describe } from "vitest"
import { CallDescriptor, type CallResult, type ClientOptions, CodecError, ConfigurationError,
         ErrorCode, RemoteProcedureFault, RpcBinary, RpcClient, RpcDateTime, RpcServer,
         type RpcTransport, XmlRpcCodec, cborClient, createClient, encodeCall, namespaceOf,
         xmlrpcClient } from "../src/index.js"
import { Calculator, LoopbackTransport, echo } from "./test-util.js"

const ENDPOINT = "http://rpc.test/endpoint";

function newServer() {
  let server = new RpcServer({ math: new Calculator() }, { documentor: false });
  server.addService(echo);
  server.addMethod("a.b.op", (value) => value);
  server.addMethod("bytes", () => new Uint8Array([1, 2]));
  server.addMethod("epoch", () => new Date(86_400_000));
  return server;
}

function newClient(options: ClientOptions = {}) {
  let transport = new LoopbackTransport(newServer());
  return { client: createClient(ENDPOINT, { transport, ...options }), transport };
}

function deferred(result: CallResult): CallDescriptor {
  if (result instanceof CallDescriptor) {
    return result;
  }
  throw new Error("Expected a deferred call.");
}

describe("namespaces", () => {
  it("returns the identical namespace for repeated access", () => {
    let { client } = newClient();
    expect(Object.is(client.a.b, client.a.b)).toBe(true);
    expect(Object.is(namespaceOf(client.a.b), namespaceOf(client.a.b))).toBe(true);
    expect(namespaceOf(client.a.b)?.path).toBe("a.b");
  });

  it("qualifies method names with the namespace path", async () => {
    let { client, transport } = newClient();
    expect(await client.a.b.op(7)).toBe(7);
    expect(transport.requests).toHaveLength(1);
    expect(transport.requests[0].url).toBe(ENDPOINT);
    expect(transport.requests[0].contentType).toBe("text/xml");
    expect(new XmlRpcCodec().decodeRequest(transport.requests[0].body)).toStrictEqual({
      methodName: "a.b.op",
      params: [7],
    });
  });

  it("is not mistaken for a promise", async () => {
    let { client } = newClient();
    let math = client.math;
    expect(Object.is(await math, math)).toBe(true);
  });

  it("can't call the root itself", () => {
    let { client } = newClient();
    expect(() => client()).toThrowError("The client root is not a remote method.");
  });

  it("records the last request and response", async () => {
    let server = newServer();
    let client = new RpcClient(ENDPOINT, { transport: new LoopbackTransport(server) });
    let remote = client.proxy();
    expect(client.lastRequest).toBeUndefined();
    await remote.math.add(2, 3);
    let codec = new XmlRpcCodec();
    expect(codec.decodeRequest(client.lastRequest ?? new Uint8Array()).methodName).toBe("math.add");
    expect(codec.decodeResponse(client.lastResponse ?? new Uint8Array())).toBe(5);
  });

  it("pins the dialect with xmlrpcClient", async () => {
    let transport = new LoopbackTransport(newServer());
    let client = xmlrpcClient(ENDPOINT, { transport, version: "cbor" });
    expect(await client.echo("x")).toBe("x");
    expect(transport.requests[0].contentType).toBe("text/xml");
  });

  it("rejects dialects it can't encode", () => {
    expect(() => createClient(ENDPOINT, { version: "auto" })).toThrowError(ConfigurationError);
  });
});

describe("faults", () => {
  it("returns fault records by default", async () => {
    let { client } = newClient();
    expect(await client.nope()).toStrictEqual(
        { faultCode: ErrorCode.MethodNotFound, faultString: "Procedure nope not found." });
  });

  it("throws them with throwExceptions", async () => {
    let { client } = newClient({ throwExceptions: true });
    let error: unknown;
    try {
      await client.math.divide(1, 0);
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(RemoteProcedureFault);
    expect(error).toMatchObject({ code: ErrorCode.ApplicationError, message: "Division by zero" });
  });
});

describe("system.multiCall", () => {
  it("defers calls made while building the batch", async () => {
    let { client, transport } = newClient();
    let results = await client.system.multiCall(
        client.math.add(1, 2), client.echo("x"), client.nope());
    expect(results).toStrictEqual([
      3,
      "x",
      { faultCode: ErrorCode.MethodNotFound, faultString: "Procedure nope not found." },
    ]);
    expect(transport.requests).toHaveLength(1);
    expect(new XmlRpcCodec().decodeRequest(transport.requests[0].body)).toStrictEqual({
      methodName: "system.multiCall",
      params: [[
        { methodName: "math.add", params: [1, 2] },
        { methodName: "echo", params: ["x"] },
        { methodName: "nope", params: [] },
      ]],
    });
  });

  it("binds results to their descriptors", async () => {
    let { client } = newClient();
    let multiCall = client.system.multiCall;
    let sum = deferred(client.math.add(20, 22));
    let greeting = deferred(client.echo("hi"));
    let seen: unknown[] = [];
    sum.bind(value => seen.push(value));

    expect(sum.batchIndex).toBeUndefined();
    expect(() => sum.result()).toThrowError(
        "The result of math.add is not available until its batch has completed.");

    await multiCall(sum, greeting);
    expect(sum.batchIndex).toBe(0);
    expect(greeting.batchIndex).toBe(1);
    expect(sum.result()).toBe(42);
    expect(greeting.result()).toBe("hi");
    expect(seen).toStrictEqual([42]);
  });

  it("accepts one array of calls and {methodName, params} mappings", async () => {
    let { client } = newClient();
    let results = await client.system.multiCall([
      { methodName: "echo", params: ["m"] },
      { methodName: "math.add", params: [2, 2] },
      encodeCall("echo", "e"),
    ]);
    expect(results).toStrictEqual(["m", 4, "e"]);
  });

  it("sends a descriptor passed twice only once", async () => {
    let { client, transport } = newClient();
    let multiCall = client.system.multiCall;
    let call = client.echo(5);
    expect(await multiCall(call, call)).toStrictEqual([5, 5]);
    let request = new XmlRpcCodec().decodeRequest(transport.requests[0].body);
    expect(request.params).toStrictEqual([[{ methodName: "echo", params: [5] }]]);
  });

  it("rejects invalid arguments before sending anything", () => {
    let { client, transport } = newClient();
    let error: unknown;
    try {
      client.system.multiCall(client.echo(1), 5);
    } catch (err) {
      error = err;
    }
    expect(error).toMatchObject({
      code: ErrorCode.InvalidBatchArgument,
      message: "Argument 1 is not a valid call",
    });
    expect(transport.requests).toHaveLength(0);
  });

  it("rejects descriptors from an earlier batch", async () => {
    let { client, transport } = newClient();
    let multiCall = client.system.multiCall;
    let call = client.echo(1);
    await multiCall(call);
    expect(() => client.system.multiCall(call)).toThrowError(
        "Call to echo was already sent in an earlier batch.");
    expect(transport.requests).toHaveLength(1);
  });

  it("keeps system calls inside a batch deferred", async () => {
    let { client } = newClient();
    let results = await client.system.multiCall(client.system.listMethods(), client.echo(2));
    expect(Array.isArray(results)).toBe(true);
    let [methods, value] = Array.isArray(results) ? results : [];
    expect(methods).toContain("math.add");
    expect(value).toBe(2);
  });

  it("sends plain system calls right away", async () => {
    let { client, transport } = newClient();
    let methods = await client.system.listMethods();
    expect(methods).toContain("echo");
    expect(await client.echo(3)).toBe(3);
    expect(transport.requests).toHaveLength(2);
  });

  it("keeps batch scopes apart between clients", async () => {
    let first = newClient();
    let second = newClient();
    let multiCall = first.client.system.multiCall;
    expect(await second.client.echo(1)).toBe(1);
    expect(await multiCall()).toStrictEqual([]);
  });

  it("returns the fault when the batch fails as a whole", async () => {
    let { client } = newClient();
    let multiCall = client.system.multiCall;
    let call = deferred(client.echo(1));
    let result = await multiCall(call, { methodName: "system.multiCall", params: [[]] });
    expect(result).toStrictEqual({
      faultCode: ErrorCode.RecursiveBatch,
      faultString: "Cannot recurse system.multiCall",
    });
    expect(call.isBound).toBe(false);
  });

  it("decodes binary and dateTime results", async () => {
    let { client } = newClient();
    expect(await client.system.multiCall(client.bytes(), client.epoch())).toStrictEqual([
      new Uint8Array([1, 2]),
      86400,
    ]);

    let raw = newClient({ autoDecode: false }).client;
    expect(await raw.system.multiCall(raw.bytes(), raw.epoch())).toStrictEqual([
      new RpcBinary(new Uint8Array([1, 2])),
      new RpcDateTime("19700102T00:00:00"),
    ]);

    expect(await client.bytes()).toStrictEqual(new RpcBinary(new Uint8Array([1, 2])));
  });

  it("works over CBOR", async () => {
    let transport = new LoopbackTransport(newServer());
    let client = cborClient(ENDPOINT, { transport });
    expect(await client.system.multiCall(client.math.add(1, 1), client.echo([true]))).toStrictEqual(
        [2, [true]]);
    expect(transport.requests[0].contentType).toBe("application/cbor");
  });

  it("fails when the server answers with the wrong number of results", async () => {
    let codec = new XmlRpcCodec();
    let transport: RpcTransport = {
      post: async () => codec.encodeResponse([[1]]),
    };
    let client = createClient(ENDPOINT, { transport });
    await expect(client.system.multiCall(client.echo(1), client.echo(2)))
        .rejects.toThrowError(CodecError);
  });
});
