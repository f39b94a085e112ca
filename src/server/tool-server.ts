// ============================================
// Local Tool Server — MCP-style tools over JSON-RPC
// ============================================
//
// Answers initialize, tools/list, tools/call and ping from a ToolRegistry.
// `tool_search` is served here rather than registered as a tool: it ranks
// the registry and returns matching definitions for the client to merge.
// ============================================

import { z } from "zod";
import { TOOL_SEARCH_DESCRIPTOR, TOOL_SEARCH_NAME } from "../core/tool-context.js";
import {
  MCP_PROTOCOL_VERSION,
  RpcErrorCode,
  describeError,
  errorResponse,
  successResponse,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from "../protocol/jsonrpc.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { ToolCallResult } from "../tools/types.js";

export interface ServerIdentity {
  name: string;
  version: string;
}

const callParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
});

const searchArgsSchema = z.object({
  query: z.string().trim().min(1),
  category: z.string().optional(),
  max_results: z.number().int().positive().optional(),
});

function textResult(text: string, isError = false): ToolCallResult {
  const result: ToolCallResult = { content: [{ type: "text", text }] };
  if (isError) result.isError = true;
  return result;
}

export class ToolServer {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly identity: ServerIdentity,
  ) {}

  /** Dispatch one request. Unknown notifications are ignored. */
  async handle(request: JsonRpcRequest): Promise<JsonRpcResponse | null> {
    const id = request.id ?? null;

    try {
      switch (request.method) {
        case "initialize":
          return successResponse(id, {
            protocolVersion: MCP_PROTOCOL_VERSION,
            capabilities: { tools: {} },
            serverInfo: this.identity,
          });

        case "notifications/initialized":
          return null;

        case "ping":
          return successResponse(id, {});

        case "tools/list":
          return successResponse(id, { tools: this.listTools() });

        case "tools/call": {
          const params = callParamsSchema.safeParse(request.params ?? {});
          if (!params.success) {
            return errorResponse(id, RpcErrorCode.INVALID_PARAMS, "Invalid params: tools/call needs a tool name");
          }
          const result = await this.callTool(params.data.name, params.data.arguments ?? {});
          return successResponse(id, result);
        }

        default:
          if (request.id === undefined) return null;
          return errorResponse(id, RpcErrorCode.METHOD_NOT_FOUND, `Method not found: ${request.method}`);
      }
    } catch (err) {
      console.error(`[Server] ${request.method} failed: ${describeError(err)}`);
      return errorResponse(id, RpcErrorCode.INTERNAL_ERROR, `Internal error: ${describeError(err)}`);
    }
  }

  private listTools(): Record<string, unknown>[] {
    const search = {
      name: TOOL_SEARCH_DESCRIPTOR.name,
      description: TOOL_SEARCH_DESCRIPTOR.description,
      inputSchema: TOOL_SEARCH_DESCRIPTOR.parameters,
    };
    return [search, ...this.registry.getDefinitions().map((def) => ({ ...def }))];
  }

  private async callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    console.error(`[Server] tools/call ${name}`);

    if (name !== TOOL_SEARCH_NAME) {
      return this.registry.call(name, args);
    }

    const parsed = searchArgsSchema.safeParse(args);
    if (!parsed.success) {
      return textResult("Error: tool_search needs a non-empty 'query' string", true);
    }

    const hits = this.registry.search(parsed.data.query, {
      category: parsed.data.category,
      maxResults: parsed.data.max_results,
    });
    console.error(`[Server] tool_search "${parsed.data.query}" -> ${hits.map((h) => h.name).join(", ") || "(none)"}`);
    return textResult(JSON.stringify({ tools: hits }));
  }
}
