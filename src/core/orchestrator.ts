// ============================================
// Orchestrator — one user turn of tool-augmented chat
// ============================================
//
// Alternates model calls and tool execution until the model answers in
// plain text or the iteration ceiling is hit:
//   1. Snapshot the log, append the user message
//   2. Call the model with the transcript and the current tool context
//   3. No tool calls → append the reply, done
//   4. Otherwise run each call in order, appending one tool message per call
//   5. Merge anything `tool_search` discovered, then back to 2
// A failed model call rolls the log back to the snapshot.
// ============================================

import { ProtocolError, describeError } from "../protocol/jsonrpc.js";
import type { ToolCall, ToolOutcome } from "../types.js";
import type { ConversationState } from "./conversation.js";
import { ToolNotInContextError } from "./errors.js";
import type { ChatCompletion, ChatModel } from "./llm-adapter.js";
import { parseSearchResult, type ToolContext } from "./tool-context.js";
import type { ToolInvoker } from "./tool-invoker.js";

export const DEFAULT_MAX_ITERATIONS = 10;

export type TurnStatus = "completed" | "rolled_back" | "ceiling_reached";

export interface TurnResult {
  status: TurnStatus;
  /** Final assistant text; null unless the turn completed. */
  reply: string | null;
  modelCalls: number;
  toolCalls: number;
  tokensUsed: number;
  /** The model failure that caused a rollback. */
  error?: Error;
}

export interface OrchestratorOptions {
  model: ChatModel;
  invoker: ToolInvoker;
  context: ToolContext;
  conversation: ConversationState;
  /** Maximum model calls per user turn. */
  maxIterations?: number;
}

/** Decode serialized tool arguments; anything but a JSON object becomes {}. */
export function parseArguments(raw: string): Record<string, unknown> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return {};
  }
  return isRecord(decoded) ? decoded : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function preview(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export class Orchestrator {
  private readonly model: ChatModel;
  private readonly invoker: ToolInvoker;
  private readonly context: ToolContext;
  private readonly conversation: ConversationState;
  private readonly maxIterations: number;

  constructor(options: OrchestratorOptions) {
    this.model = options.model;
    this.invoker = options.invoker;
    this.context = options.context;
    this.conversation = options.conversation;
    this.maxIterations = Math.max(1, options.maxIterations ?? DEFAULT_MAX_ITERATIONS);
  }

  async runTurn(userText: string): Promise<TurnResult> {
    const turnStart = this.conversation.snapshot();
    this.conversation.append({ role: "user", content: userText });

    let modelCalls = 0;
    let toolCalls = 0;
    let tokensUsed = 0;

    while (modelCalls < this.maxIterations) {
      const tools = this.context.currentDescriptors();

      let completion: ChatCompletion;
      try {
        modelCalls++;
        completion = await this.model.chat(this.conversation.asTranscript(), tools);
      } catch (err) {
        // The failed exchange is dropped entirely, user message included
        this.conversation.rollback(turnStart);
        const error = err instanceof Error ? err : new Error(String(err));
        console.error(`[Orchestrator] Chat error: ${error.message}`);
        return { status: "rolled_back", reply: null, modelCalls, toolCalls, tokensUsed, error };
      }

      tokensUsed += completion.tokensUsed ?? 0;

      if (completion.toolCalls.length === 0) {
        const reply = completion.content ?? "";
        this.conversation.append({ role: "assistant", content: reply });
        console.log(
          `[Orchestrator] Turn completed in ${modelCalls} model call(s), ${tokensUsed} tokens`,
        );
        return { status: "completed", reply, modelCalls, toolCalls, tokensUsed };
      }

      console.log(`[Orchestrator] Calling ${completion.toolCalls.length} tool(s)...`);
      this.conversation.append({
        role: "assistant",
        content: completion.content,
        tool_calls: completion.toolCalls,
      });

      // Discoveries wait for the batch to finish so siblings cannot use them
      const discovered: unknown[] = [];

      for (const call of completion.toolCalls) {
        const outcome = await this.execute(call);
        toolCalls++;

        if (call.name === this.context.bootstrapName && !outcome.isError) {
          discovered.push(...parseSearchResult(outcome.text));
        }

        this.conversation.append({
          role: "tool",
          tool_call_id: call.id,
          name: call.name,
          content: outcome.text,
        });
      }

      if (discovered.length > 0) {
        const merged = this.context.mergeDiscovered(discovered);
        const names = [...merged.added, ...merged.updated];
        if (names.length > 0) {
          console.log(`[Tool] Discovered ${names.length} tool(s): ${names.join(", ")} ${this.context.stats()}`);
        } else {
          console.log("[Tool] No new tools found");
        }
      }
    }

    console.warn(`[Orchestrator] Max iterations (${this.maxIterations}) reached.`);
    return { status: "ceiling_reached", reply: null, modelCalls, toolCalls, tokensUsed };
  }

  private async execute(call: ToolCall): Promise<ToolOutcome> {
    const args = parseArguments(call.arguments);
    console.log(`[Tool] ${call.name}(${preview(JSON.stringify(args), 60)})`);

    try {
      const outcome = await this.invoker.invoke(call.name, args);
      console.log(`[Tool] ${call.name} -> ${outcome.isError ? "ERROR: " : ""}${preview(outcome.text, 100)}`);
      return outcome;
    } catch (err) {
      if (err instanceof ProtocolError || err instanceof ToolNotInContextError) {
        const text = `Tool error: ${describeError(err)}`;
        console.error(`[Tool] ${call.name} -> ${text}`);
        return { text, isError: true };
      }
      throw err;
    }
  }
}
