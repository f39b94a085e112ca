// ============================================
// Tool Invoker — executes one tool call through the bridge
// ============================================

import { z } from "zod";
import { ProtocolError, RpcErrorCode } from "../protocol/jsonrpc.js";
import type { ProtocolBridge } from "../protocol/bridge.js";
import type { ToolOutcome } from "../types.js";
import { ToolNotInContextError } from "./errors.js";
import type { ToolContext } from "./tool-context.js";

const contentBlockSchema = z
  .object({ type: z.string(), text: z.string().optional() })
  .passthrough();

const callToolResultSchema = z
  .object({
    content: z.array(contentBlockSchema).default([]),
    isError: z.boolean().optional(),
  })
  .passthrough();

/** Join every text block in order; fall back to the raw result as JSON. */
export function extractText(result: z.infer<typeof callToolResultSchema>): string {
  const texts = result.content
    .filter((block) => block.type === "text")
    .map((block) => block.text ?? "");
  return texts.length > 0 ? texts.join("\n") : JSON.stringify(result);
}

export class ToolInvoker {
  constructor(
    private readonly bridge: ProtocolBridge,
    private readonly context: ToolContext,
  ) {}

  /**
   * Run `name` with `args`. Throws `ToolNotInContextError` without touching
   * the transport when the tool is unknown; protocol and transport failures
   * propagate. A tool that reports its own failure comes back with
   * `isError: true`.
   */
  async invoke(name: string, args: Record<string, unknown>): Promise<ToolOutcome> {
    if (!this.context.contains(name)) {
      throw new ToolNotInContextError(name);
    }

    const raw = await this.bridge.callTool(name, args);
    const parsed = callToolResultSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new ProtocolError(RpcErrorCode.INVALID_RESPONSE, `Malformed tools/call result for ${name}`);
    }

    return {
      text: extractText(parsed.data),
      isError: parsed.data.isError === true,
    };
  }
}
