// ============================================
// toolscout — Shared Types
// ============================================
// Conversation and tool shapes shared by the orchestrator, the chat
// gateway client and the tool protocol layer.

export type Role = "system" | "user" | "assistant" | "tool";

/** A tool call emitted by the model. `arguments` is serialized JSON. */
export interface ToolCall {
  id: string;
  name: string;
  arguments: string;
}

export interface SystemMessage {
  role: "system";
  content: string;
}

export interface UserMessage {
  role: "user";
  content: string;
}

export interface AssistantMessage {
  role: "assistant";
  content: string | null;
  tool_calls?: ToolCall[];
}

export interface ToolMessage {
  role: "tool";
  tool_call_id: string;
  name: string;
  content: string;
}

/** One transcript entry, replayed verbatim to the model every turn. */
export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

/** JSON schema describing the arguments a tool accepts. */
export type JsonSchema = Record<string, unknown>;

/** Schema and metadata of one callable tool, as offered to the model. */
export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: JsonSchema;
  examples?: unknown[];
}

/** Normalized outcome of one tool execution. */
export interface ToolOutcome {
  text: string;
  isError: boolean;
}
