// ============================================
// Tool Context — the descriptors currently offered to the model
// ============================================
//
// Starts with only `tool_search` in context and grows as the model
// discovers tools. The bootstrap descriptor is never discovered, removed
// or duplicated.
// ============================================

import { z } from "zod";
import type { JsonSchema, ToolDescriptor } from "../types.js";

export const TOOL_SEARCH_NAME = "tool_search";

export const TOOL_SEARCH_DESCRIPTOR: ToolDescriptor = {
  name: TOOL_SEARCH_NAME,
  description:
    "Search for available tools by natural language query. Returns tool specifications that will be " +
    "added to your available tools. Use this FIRST when you need to perform an action you haven't used before.",
  parameters: {
    type: "object",
    properties: {
      query: {
        type: "string",
        description:
          "Natural language description of the capability you're looking for " +
          "(e.g., 'calculate math expressions', 'read files', 'get the time')",
      },
      category: {
        type: "string",
        description: "Optional category filter: utilities, file-system, shell, system, other",
      },
      max_results: {
        type: "integer",
        description: "Maximum number of tools to return (default: 5)",
        default: 5,
      },
    },
    required: ["query"],
  },
};

const EMPTY_SCHEMA: JsonSchema = { type: "object", properties: {} };

const discoveredToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: z.record(z.unknown()).optional(),
  parameters: z.record(z.unknown()).optional(),
  inputExamples: z.array(z.unknown()).optional(),
});

const searchResultSchema = z.union([
  z.object({ tools: z.array(z.unknown()) }),
  z.array(z.unknown()),
]);

export interface MergeResult {
  /** Names that were not in context before. */
  added: string[];
  /** Names already in context whose descriptor changed. */
  updated: string[];
}

/** Drop transport-internal keys such as `_score` or `_server`. */
export function stripPrivateKeys(raw: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(raw).filter(([key]) => !key.startsWith("_")));
}

/**
 * Extract the raw descriptor list from a `tool_search` result text.
 * Accepts `{"tools":[...]}` or a bare array; anything else yields [].
 */
export function parseSearchResult(text: string): unknown[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    return [];
  }
  const parsed = searchResultSchema.safeParse(decoded);
  if (!parsed.success) return [];
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.tools;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toDescriptor(raw: unknown): ToolDescriptor | null {
  if (!isRecord(raw)) return null;
  const parsed = discoveredToolSchema.safeParse(stripPrivateKeys(raw));
  if (!parsed.success) return null;

  const tool = parsed.data;
  const descriptor: ToolDescriptor = {
    name: tool.name,
    description: tool.description ?? "",
    parameters: tool.inputSchema ?? tool.parameters ?? EMPTY_SCHEMA,
  };
  if (tool.inputExamples) descriptor.examples = tool.inputExamples;
  return descriptor;
}

export class ToolContext {
  private readonly discovered = new Map<string, ToolDescriptor>();

  constructor(private readonly bootstrap: ToolDescriptor = TOOL_SEARCH_DESCRIPTOR) {}

  get bootstrapName(): string {
    return this.bootstrap.name;
  }

  /** Number of descriptors in context, bootstrap included. */
  get size(): number {
    return 1 + this.discovered.size;
  }

  /** Bootstrap first, then discovered tools in insertion order. */
  currentDescriptors(): ToolDescriptor[] {
    return [this.bootstrap, ...this.discovered.values()];
  }

  contains(name: string): boolean {
    return name === this.bootstrap.name || this.discovered.has(name);
  }

  mergeDiscovered(rawList: readonly unknown[]): MergeResult {
    const result: MergeResult = { added: [], updated: [] };

    for (const raw of rawList) {
      const descriptor = toDescriptor(raw);
      if (!descriptor || descriptor.name === this.bootstrap.name) continue;

      const existing = this.discovered.get(descriptor.name);
      if (!existing) {
        result.added.push(descriptor.name);
      } else if (JSON.stringify(existing) !== JSON.stringify(descriptor)) {
        result.updated.push(descriptor.name);
      } else {
        continue;
      }
      // Map.set on an existing key keeps its original position
      this.discovered.set(descriptor.name, descriptor);
    }

    return result;
  }

  /** Forget every discovered tool; `tool_search` stays. */
  clear(): void {
    this.discovered.clear();
  }

  stats(): string {
    return `[${this.size} tools in context]`;
  }
}
