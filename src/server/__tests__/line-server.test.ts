import { PassThrough } from "node:stream";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { quietConsole } from "../../__tests__/helpers.js";
import { successResponse, type JsonRpcRequest } from "../../protocol/jsonrpc.js";
import { LineServer, type RequestHandler } from "../line-server.js";

/** Feed `lines` to a server, close its input and collect every line it wrote. */
async function serve(lines: string[], handler: RequestHandler): Promise<unknown[]> {
  const input = new PassThrough();
  const output = new PassThrough();
  const written: string[] = [];
  output.on("data", (chunk: Buffer) => written.push(chunk.toString("utf-8")));

  const server = new LineServer({ input, output, handler });
  const running = server.run();
  for (const line of lines) input.write(`${line}\n`);
  input.end();
  await running;
  await new Promise((resolve) => setImmediate(resolve));

  return written
    .join("")
    .split("\n")
    .filter(Boolean)
    .map((line): unknown => JSON.parse(line));
}

const echoMethod: RequestHandler = async (request) => successResponse(request.id ?? null, request.method);

describe("LineServer", () => {
  beforeEach(() => quietConsole());
  afterEach(() => vi.restoreAllMocks());

  it("answers each request on its own line, in order", async () => {
    const responses = await serve(
      ['{"jsonrpc":"2.0","id":1,"method":"first"}', '{"jsonrpc":"2.0","id":2,"method":"second"}'],
      echoMethod,
    );

    expect(responses).toEqual([
      { jsonrpc: "2.0", id: 1, result: "first" },
      { jsonrpc: "2.0", id: 2, result: "second" },
    ]);
  });

  it("answers a malformed line with a parse error and keeps reading", async () => {
    const responses = await serve(["{this is not json", '{"jsonrpc":"2.0","id":7,"method":"after"}'], echoMethod);

    expect(responses).toEqual([
      { jsonrpc: "2.0", id: null, error: { code: -32700, message: "Parse error" } },
      { jsonrpc: "2.0", id: 7, result: "after" },
    ]);
  });

  it("answers valid JSON that is not a request with invalid request", async () => {
    const responses = await serve(['{"jsonrpc":"2.0","id":4}', "[1,2,3]"], echoMethod);

    expect(responses).toEqual([
      { jsonrpc: "2.0", id: 4, error: { code: -32600, message: "Invalid Request" } },
      { jsonrpc: "2.0", id: null, error: { code: -32600, message: "Invalid Request" } },
    ]);
  });

  it("handles notifications without answering them", async () => {
    const seen: JsonRpcRequest[] = [];
    const responses = await serve(
      ['{"jsonrpc":"2.0","method":"notifications/initialized"}', '{"jsonrpc":"2.0","id":1,"method":"ping"}'],
      async (request) => {
        seen.push(request);
        return successResponse(request.id ?? null, {});
      },
    );

    expect(seen.map((r) => r.method)).toEqual(["notifications/initialized", "ping"]);
    expect(responses).toEqual([{ jsonrpc: "2.0", id: 1, result: {} }]);
  });

  it("turns a handler failure into an internal error", async () => {
    const responses = await serve(['{"jsonrpc":"2.0","id":"abc","method":"explode"}'], async () => {
      throw new Error("kaboom");
    });

    expect(responses).toEqual([
      { jsonrpc: "2.0", id: "abc", error: { code: -32603, message: "Internal error: kaboom" } },
    ]);
  });

  it("ignores blank lines", async () => {
    const responses = await serve(["", "   ", '{"jsonrpc":"2.0","id":1,"method":"x"}'], echoMethod);

    expect(responses).toHaveLength(1);
  });
});
