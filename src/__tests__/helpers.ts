// Shared in-process stand-ins for the tests. Nothing here touches the network.

import { vi } from "vitest";
import { ChatModel, type ChatCompletion } from "../core/llm-adapter.js";
import { TransportError, type JsonRpcRequest, type JsonRpcResponse } from "../protocol/jsonrpc.js";
import type { Transport } from "../protocol/transport.js";
import type { Message, ToolDescriptor } from "../types.js";

type Responder = (request: JsonRpcRequest) => Promise<JsonRpcResponse | null> | JsonRpcResponse | null;

/** Records every request and answers through `respond`. */
export class FakeTransport implements Transport {
  readonly name = "fake";
  readonly requests: JsonRpcRequest[] = [];
  closed = false;

  constructor(private readonly respond: Responder) {}

  async exchange(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    this.requests.push(request);
    const response = await this.respond(request);
    if (!response) throw TransportError.invalidResponse("no response");
    return response;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export type ScriptStep = ChatCompletion | Error;

export interface RecordedChat {
  messages: Message[];
  tools: string[];
}

/** A chat model that plays back a fixed script, or a step function. */
export class ScriptedModel extends ChatModel {
  readonly calls: RecordedChat[] = [];

  constructor(private readonly script: ScriptStep[] | ((index: number) => ScriptStep)) {
    super("test-model");
  }

  async chat(messages: readonly Message[], tools: readonly ToolDescriptor[]): Promise<ChatCompletion> {
    const index = this.calls.length;
    this.calls.push({ messages: [...messages], tools: tools.map((tool) => tool.name) });

    const step = Array.isArray(this.script) ? this.script[index] : this.script(index);
    if (step === undefined) throw new Error(`script exhausted at call ${index + 1}`);
    if (step instanceof Error) throw step;
    return step;
  }
}

export function textReply(content: string, tokensUsed = 10): ChatCompletion {
  return { content, toolCalls: [], model: "test-model", tokensUsed };
}

export function callTools(...calls: Array<[id: string, name: string, args: Record<string, unknown>]>): ChatCompletion {
  return {
    content: null,
    toolCalls: calls.map(([id, name, args]) => ({ id, name, arguments: JSON.stringify(args) })),
    model: "test-model",
    tokensUsed: 5,
  };
}

/** Keep component logs out of the test output. */
export function quietConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
}
