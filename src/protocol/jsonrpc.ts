// ============================================
// JSON-RPC 2.0 envelopes, error codes and errors
// ============================================

import { z } from "zod";

export const JSONRPC_VERSION = "2.0";

/** MCP protocol revision announced during `initialize`. */
export const MCP_PROTOCOL_VERSION = "2024-11-05";

export const RpcErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  CONFIGURATION_ERROR: -32000,
  AUTH_FAILED: -32001,
  ENDPOINT_NOT_FOUND: -32002,
  CONNECTION_FAILED: -32003,
  TIMEOUT: -32004,
  HTTP_ERROR: -32005,
  INVALID_RESPONSE: -32006,
} as const;

export type RpcErrorCode = (typeof RpcErrorCode)[keyof typeof RpcErrorCode];

export type RpcId = number | string | null;

export interface JsonRpcRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  id?: RpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcErrorBody {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccess {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RpcId;
  result: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RpcId;
  error: JsonRpcErrorBody;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

// ---- Schemas ----

const idSchema = z.union([z.number(), z.string(), z.null()]);

export const requestSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: idSchema.optional(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

const errorBodySchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

// `result` may legitimately be any JSON value, so presence is checked by key.
const successSchema = z
  .object({ jsonrpc: z.literal(JSONRPC_VERSION), id: idSchema, result: z.unknown() })
  .refine((value) => "result" in value, { message: "missing result" });

const failureSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: idSchema,
  error: errorBodySchema,
});

/**
 * Validate an already-decoded value as a response envelope.
 * Returns null when the value is not a JSON-RPC response.
 */
export function parseResponse(value: unknown): JsonRpcResponse | null {
  const failure = failureSchema.safeParse(value);
  if (failure.success) return failure.data;

  const success = successSchema.safeParse(value);
  if (success.success) {
    return { jsonrpc: JSONRPC_VERSION, id: success.data.id, result: success.data.result };
  }
  return null;
}

export function isFailure(response: JsonRpcResponse): response is JsonRpcFailure {
  return "error" in response;
}

export function errorResponse(id: RpcId, code: number, message: string): JsonRpcFailure {
  return { jsonrpc: JSONRPC_VERSION, id, error: { code, message } };
}

export function successResponse(id: RpcId, result: unknown): JsonRpcSuccess {
  return { jsonrpc: JSONRPC_VERSION, id, result };
}

// ---- Errors ----

/** A failure reported by the remote end in a well-formed `error` envelope. */
export class ProtocolError extends Error {
  constructor(
    public readonly code: number,
    message: string,
  ) {
    super(message);
    this.name = "ProtocolError";
  }
}

/** A failure of the transport itself: unreachable, timed out, undecodable. */
export class TransportError extends ProtocolError {
  constructor(code: RpcErrorCode, message: string) {
    super(code, message);
    this.name = "TransportError";
  }

  static connectionFailed(target: string, detail?: string): TransportError {
    return new TransportError(
      RpcErrorCode.CONNECTION_FAILED,
      `Failed to connect to ${target}${detail ? `: ${detail}` : ""}`,
    );
  }

  static timeout(ms: number): TransportError {
    return new TransportError(RpcErrorCode.TIMEOUT, `Request timed out after ${ms}ms`);
  }

  static invalidResponse(detail: string): TransportError {
    return new TransportError(RpcErrorCode.INVALID_RESPONSE, `Invalid JSON response from server: ${detail}`);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
