// ============================================
// Tool System — Type Definitions
// ============================================

/** JSON Schema definition advertised through tools/list and tool_search. */
export interface ToolDefinition {
  name: string;
  description: string;
  /** Coarse grouping used by tool_search's category filter. */
  category: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
  inputExamples?: Record<string, unknown>[];
}

/** Interface that each built-in tool must implement. */
export interface Tool {
  definition: ToolDefinition;
  /** Throwing reports a tool failure (`isError: true`), not a protocol error. */
  execute(input: Record<string, unknown>): Promise<string>;
}

/** Result of running a tool, in MCP `tools/call` shape. */
export interface ToolCallResult {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}
