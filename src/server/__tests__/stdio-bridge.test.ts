import { PassThrough } from "node:stream";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { FakeTransport, quietConsole } from "../../__tests__/helpers.js";
import { RpcErrorCode, TransportError, successResponse } from "../../protocol/jsonrpc.js";
import { StdioBridge, createForwardingHandler } from "../stdio-bridge.js";

async function runBridge(transport: FakeTransport, lines: string[]): Promise<unknown[]> {
  const input = new PassThrough();
  const output = new PassThrough();
  const written: string[] = [];
  output.on("data", (chunk: Buffer) => written.push(chunk.toString("utf-8")));

  const bridge = new StdioBridge({ transport, input, output });
  const running = bridge.run();
  for (const line of lines) input.write(`${line}\n`);
  input.end();
  await running;
  await bridge.close();
  await new Promise((resolve) => setImmediate(resolve));

  return written
    .join("")
    .split("\n")
    .filter(Boolean)
    .map((line): unknown => JSON.parse(line));
}

describe("StdioBridge", () => {
  beforeEach(() => quietConsole());
  afterEach(() => vi.restoreAllMocks());

  it("forwards requests and writes the endpoint's responses", async () => {
    const transport = new FakeTransport((request) => successResponse(request.id ?? null, { tools: [] }));

    const responses = await runBridge(transport, ['{"jsonrpc":"2.0","id":5,"method":"tools/list"}']);

    expect(transport.requests).toEqual([{ jsonrpc: "2.0", id: 5, method: "tools/list" }]);
    expect(responses).toEqual([{ jsonrpc: "2.0", id: 5, result: { tools: [] } }]);
    expect(transport.closed).toBe(true);
  });

  it("answers transport failures with an error envelope for the same id", async () => {
    const transport = new FakeTransport(() => {
      throw new TransportError(RpcErrorCode.AUTH_FAILED, "Authentication failed. Check your API key.");
    });

    const responses = await runBridge(transport, ['{"jsonrpc":"2.0","id":"req-1","method":"tools/list"}']);

    expect(responses).toEqual([
      {
        jsonrpc: "2.0",
        id: "req-1",
        error: { code: -32001, message: "Authentication failed. Check your API key." },
      },
    ]);
  });

  it("answers a malformed line with a parse error and keeps forwarding", async () => {
    const transport = new FakeTransport((request) => successResponse(request.id ?? null, {}));

    const responses = await runBridge(transport, ["not json at all", '{"jsonrpc":"2.0","id":2,"method":"ping"}']);

    expect(responses).toEqual([
      { jsonrpc: "2.0", id: null, error: { code: -32700, message: "Parse error" } },
      { jsonrpc: "2.0", id: 2, result: {} },
    ]);
    expect(transport.requests).toHaveLength(1);
  });

  it("forwards notifications but writes nothing back", async () => {
    const transport = new FakeTransport(() => null);

    const responses = await runBridge(transport, ['{"jsonrpc":"2.0","method":"notifications/initialized"}']);

    expect(transport.requests.map((r) => r.method)).toEqual(["notifications/initialized"]);
    expect(responses).toEqual([]);
  });
});

describe("createForwardingHandler", () => {
  it("rethrows failures that are not protocol errors", async () => {
    const transport = new FakeTransport(() => {
      throw new RangeError("bug");
    });

    await expect(
      createForwardingHandler(transport)({ jsonrpc: "2.0", id: 1, method: "ping" }),
    ).rejects.toBeInstanceOf(RangeError);
  });
});
