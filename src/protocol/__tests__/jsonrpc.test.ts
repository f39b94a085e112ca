import { describe, it, expect } from "vitest";
import { RpcErrorCode, TransportError, errorResponse, isFailure, parseResponse, requestSchema } from "../jsonrpc.js";

describe("parseResponse", () => {
  it("accepts a success envelope, including a null result", () => {
    expect(parseResponse({ jsonrpc: "2.0", id: 3, result: null })).toEqual({ jsonrpc: "2.0", id: 3, result: null });
  });

  it("accepts a failure envelope", () => {
    const response = parseResponse({ jsonrpc: "2.0", id: null, error: { code: -32700, message: "Parse error" } });

    expect(response).not.toBeNull();
    expect(response && isFailure(response)).toBe(true);
  });

  it("rejects objects that are not responses", () => {
    expect(parseResponse({ jsonrpc: "2.0", id: 1 })).toBeNull();
    expect(parseResponse({ jsonrpc: "1.0", id: 1, result: {} })).toBeNull();
    expect(parseResponse({ jsonrpc: "2.0", id: 1, error: { message: "no code" } })).toBeNull();
    expect(parseResponse([1, 2, 3])).toBeNull();
    expect(parseResponse("hello")).toBeNull();
  });
});

describe("requestSchema", () => {
  it("treats a message without id as a notification", () => {
    const parsed = requestSchema.parse({ jsonrpc: "2.0", method: "notifications/initialized" });
    expect(parsed.id).toBeUndefined();
  });

  it("rejects a request without a method", () => {
    expect(requestSchema.safeParse({ jsonrpc: "2.0", id: 1 }).success).toBe(false);
  });
});

describe("TransportError", () => {
  it("builds the standard transport failures", () => {
    expect(TransportError.connectionFailed("http://x/mcp", "ECONNREFUSED")).toMatchObject({
      code: RpcErrorCode.CONNECTION_FAILED,
      message: "Failed to connect to http://x/mcp: ECONNREFUSED",
    });
    expect(TransportError.timeout(30000).code).toBe(-32004);
    expect(TransportError.invalidResponse("oops").code).toBe(-32006);
  });

  it("is what errorResponse carries on the wire", () => {
    const err = TransportError.timeout(5);
    expect(errorResponse(7, err.code, err.message)).toEqual({
      jsonrpc: "2.0",
      id: 7,
      error: { code: -32004, message: "Request timed out after 5ms" },
    });
  });
});
