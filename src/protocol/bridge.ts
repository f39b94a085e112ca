// ============================================
// Protocol Bridge — JSON-RPC calls over a pluggable transport
// ============================================
//
// Owns the request id sequence (1, 2, 3, ...) and turns response envelopes
// into results or thrown errors. Nothing is retried: a failed call surfaces
// to the caller immediately.
// ============================================

import { z } from "zod";
import {
  JSONRPC_VERSION,
  MCP_PROTOCOL_VERSION,
  ProtocolError,
  RpcErrorCode,
  isFailure,
  type JsonRpcRequest,
} from "./jsonrpc.js";
import type { Transport } from "./transport.js";

export interface ClientInfo {
  name: string;
  version: string;
}

export interface ServerInfo {
  name?: string;
  version?: string;
  [key: string]: unknown;
}

const initializeResultSchema = z
  .object({
    protocolVersion: z.string().optional(),
    capabilities: z.record(z.unknown()).optional(),
    serverInfo: z.object({ name: z.string().optional(), version: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export type InitializeResult = z.infer<typeof initializeResultSchema>;

const listToolsResultSchema = z.object({
  tools: z.array(z.record(z.unknown())).default([]),
});

export class ProtocolBridge {
  private lastId = 0;
  private initialized = false;
  private serverInfo: ServerInfo = {};
  private capabilities: Record<string, unknown> = {};

  constructor(private readonly transport: Transport) {}

  get transportName(): string {
    return this.transport.name;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  get server(): ServerInfo {
    return this.serverInfo;
  }

  get serverCapabilities(): Record<string, unknown> {
    return this.capabilities;
  }

  /** Issue one JSON-RPC call and return its `result`. */
  async send(method: string, params?: Record<string, unknown>): Promise<unknown> {
    const request: JsonRpcRequest = {
      jsonrpc: JSONRPC_VERSION,
      id: ++this.lastId,
      method,
    };
    if (params) request.params = params;

    const response = await this.transport.exchange(request);
    if (isFailure(response)) {
      throw new ProtocolError(response.error.code, response.error.message);
    }
    return response.result;
  }

  async initialize(client: ClientInfo): Promise<InitializeResult> {
    const raw = await this.send("initialize", {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: { tools: {} },
      clientInfo: client,
    });
    const result = initializeResultSchema.safeParse(raw ?? {});
    if (!result.success) {
      throw new ProtocolError(RpcErrorCode.INVALID_RESPONSE, "Malformed initialize result");
    }

    this.initialized = true;
    this.serverInfo = result.data.serverInfo ?? {};
    this.capabilities = result.data.capabilities ?? {};
    return result.data;
  }

  /** Every tool the server exposes. Admin/debug view; the agent discovers instead. */
  async listTools(): Promise<Record<string, unknown>[]> {
    const parsed = listToolsResultSchema.safeParse((await this.send("tools/list")) ?? {});
    if (!parsed.success) {
      throw new ProtocolError(RpcErrorCode.INVALID_RESPONSE, "Malformed tools/list result");
    }
    return parsed.data.tools;
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    return this.send("tools/call", { name, arguments: args });
  }

  /** True when the server answers `ping`. */
  async ping(): Promise<boolean> {
    try {
      await this.send("ping");
      return true;
    } catch (err) {
      if (err instanceof ProtocolError) return false;
      throw err;
    }
  }

  async close(): Promise<void> {
    await this.transport.close();
  }
}
