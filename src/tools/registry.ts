// ============================================
// Tool Registry — name → tool, dispatch and keyword search
// ============================================

import type { Tool, ToolCallResult, ToolDefinition } from "./types.js";

export const DEFAULT_SEARCH_RESULTS = 5;
export const MAX_SEARCH_RESULTS = 20;

export interface SearchOptions {
  category?: string;
  maxResults?: number;
}

/** A definition annotated for `tool_search`; the client strips the `_` keys. */
export type SearchHit = ToolDefinition & { _score: number; _category: string };

function keywords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length >= 2);
}

export class ToolRegistry {
  private tools = new Map<string, Tool>();

  register(tool: Tool): void {
    this.tools.set(tool.definition.name, tool);
  }

  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((t) => t.definition);
  }

  getToolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  async call(name: string, input: Record<string, unknown>): Promise<ToolCallResult> {
    const tool = this.tools.get(name);

    if (!tool) {
      return { content: [{ type: "text", text: `Unknown tool: ${name}` }], isError: true };
    }

    try {
      const output = await tool.execute(input);
      return { content: [{ type: "text", text: output }] };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { content: [{ type: "text", text: `Error: ${message}` }], isError: true };
    }
  }

  /**
   * Rank tools against a natural-language query.
   *
   * Scoring per query word: +3 when it names the tool outright, +2 when it
   * appears in the tool name or equals the category, +1 when it appears in
   * the description. Zero-score tools are dropped; ties keep registration
   * order.
   */
  search(query: string, options: SearchOptions = {}): SearchHit[] {
    const words = keywords(query);
    const category = options.category?.toLowerCase();
    const limit = Math.min(
      MAX_SEARCH_RESULTS,
      Math.max(1, Math.floor(options.maxResults ?? DEFAULT_SEARCH_RESULTS)),
    );

    const scored = this.getDefinitions()
      .filter((def) => !category || def.category.toLowerCase() === category)
      .map((def) => {
        let score = 0;
        const name = def.name.toLowerCase();
        const cat = def.category.toLowerCase();
        const desc = def.description.toLowerCase();

        for (const word of words) {
          if (word === name) score += 3;
          else if (name.includes(word)) score += 2;
          if (word === cat) score += 2;
          if (desc.includes(word)) score += 1;
        }

        return { def, score };
      })
      .filter(({ score }) => score > 0)
      .sort((a, b) => b.score - a.score);

    return scored.slice(0, limit).map(({ def, score }) => ({ ...def, _score: score, _category: def.category }));
  }
}
