// ============================================
// Chat Model Adapter
// ============================================
//
// Uniform interface for the chat endpoint the orchestrator talks to. The
// gateway implementation speaks the OpenAI-compatible
// /v1/chat/completions dialect with function-calling tools.
// ============================================

import { z } from "zod";
import { describeError } from "../protocol/jsonrpc.js";
import type { Message, ToolCall, ToolDescriptor } from "../types.js";
import { ChatError } from "./errors.js";

// ---- Response types ----

export interface ChatCompletion {
  content: string | null;
  toolCalls: ToolCall[];
  model: string;
  tokensUsed?: number;
}

// ---- Abstract base ----

export abstract class ChatModel {
  constructor(public readonly model: string) {}

  /** Send the full transcript plus the tools currently on offer. */
  abstract chat(messages: readonly Message[], tools: readonly ToolDescriptor[]): Promise<ChatCompletion>;
}

// ---- Wire format ----

const wireToolCallSchema = z.object({
  id: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: z.union([z.string(), z.record(z.unknown())]).optional(),
  }),
});

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z.array(wireToolCallSchema).nullable().optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .default([]),
  usage: z.object({ total_tokens: z.number().optional() }).optional(),
});

const errorBodySchema = z.object({
  error: z.union([
    z.object({ message: z.string().optional(), type: z.string().optional() }),
    z.string(),
  ]),
});

/** Tool descriptor in function-calling format. */
export function toWireTool(tool: ToolDescriptor): Record<string, unknown> {
  const fn: Record<string, unknown> = {
    name: tool.name,
    description: tool.description,
    parameters: tool.parameters,
  };
  if (tool.examples) fn.input_examples = tool.examples;
  return { type: "function", function: fn };
}

/** Transcript message in chat-completions format. */
export function toWireMessage(message: Message): Record<string, unknown> {
  if (message.role === "assistant" && message.tool_calls && message.tool_calls.length > 0) {
    return {
      role: "assistant",
      content: message.content,
      tool_calls: message.tool_calls.map((call) => ({
        id: call.id,
        type: "function",
        function: { name: call.name, arguments: call.arguments },
      })),
    };
  }
  if (message.role === "assistant") {
    return { role: "assistant", content: message.content };
  }
  return { ...message };
}

// ---- Gateway adapter ----

export interface GatewayChatModelOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export class GatewayChatModel extends ChatModel {
  private readonly endpoint: string;
  private readonly apiKey: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GatewayChatModelOptions) {
    super(options.model);
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/v1/chat/completions`;
    this.apiKey = options.apiKey;
    this.temperature = options.temperature;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async chat(messages: readonly Message[], tools: readonly ToolDescriptor[]): Promise<ChatCompletion> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: messages.map(toWireMessage),
      temperature: this.temperature,
    };
    if (tools.length > 0) {
      body.tools = tools.map(toWireTool);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      text = await res.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new ChatError(`Chat request timed out after ${this.timeoutMs}ms`);
      }
      throw new ChatError(`Failed to reach ${this.endpoint}: ${describeError(err)}`);
    } finally {
      clearTimeout(timer);
    }

    if (!res.ok) {
      throw new ChatError(this.describeFailure(res.status, text), res.status);
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch {
      throw new ChatError("Chat endpoint returned a non-JSON body", res.status);
    }

    const parsed = completionSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new ChatError("Chat endpoint returned an unexpected response shape", res.status);
    }

    const choice = parsed.data.choices[0];
    if (!choice) {
      throw new ChatError("No response from model", res.status);
    }

    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((call, i) => ({
      id: call.id || `call_${i}`,
      name: call.function.name,
      arguments:
        typeof call.function.arguments === "string"
          ? call.function.arguments
          : JSON.stringify(call.function.arguments ?? {}),
    }));

    return {
      content: choice.message.content ?? null,
      toolCalls,
      model: this.model,
      tokensUsed: parsed.data.usage?.total_tokens,
    };
  }

  private describeFailure(status: number, text: string): string {
    const fallback = `Chat API error ${status}: ${text}`;

    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch {
      return fallback;
    }

    const parsed = errorBodySchema.safeParse(decoded);
    if (!parsed.success) return fallback;

    const error = parsed.data.error;
    if (typeof error === "string") return error;
    return `[${error.type ?? "unknown_error"}] ${error.message ?? `HTTP ${status}`}`;
  }
}
