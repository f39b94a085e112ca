import { describe, it, expect } from "vitest";
import { ToolRegistry } from "../registry.js";
import type { Tool } from "../types.js";

function tool(name: string, category: string, description: string, run?: () => Promise<string>): Tool {
  return {
    definition: { name, description, category, inputSchema: { type: "object", properties: {} } },
    execute: run ?? (async () => `${name} ran`),
  };
}

function registry(): ToolRegistry {
  const r = new ToolRegistry();
  r.register(tool("read_file", "file-system", "Read the contents of a text file"));
  r.register(tool("list_dir", "file-system", "List the entries of a directory"));
  r.register(tool("calculator", "utilities", "Evaluate arithmetic expressions"));
  r.register(tool("get_time", "system", "Get the current time"));
  return r;
}

describe("ToolRegistry", () => {
  it("keeps tools in registration order", () => {
    const r = registry();

    expect(r.getToolNames()).toEqual(["read_file", "list_dir", "calculator", "get_time"]);
    expect(r.getDefinitions().map((d) => d.category)).toEqual(["file-system", "file-system", "utilities", "system"]);
  });

  it("replaces a tool registered twice under the same name", async () => {
    const r = registry();
    r.register(tool("get_time", "system", "Get the time", async () => "noon"));

    expect(r.getToolNames()).toHaveLength(4);
    expect(await r.call("get_time", {})).toEqual({ content: [{ type: "text", text: "noon" }] });
  });

  it("wraps tool output as a text result", async () => {
    expect(await registry().call("get_time", {})).toEqual({ content: [{ type: "text", text: "get_time ran" }] });
  });

  it("reports thrown errors as error results", async () => {
    const r = new ToolRegistry();
    r.register(
      tool("flaky", "other", "Always fails", async () => {
        throw new Error("disk on fire");
      }),
    );

    expect(await r.call("flaky", {})).toEqual({
      content: [{ type: "text", text: "Error: disk on fire" }],
      isError: true,
    });
  });

  it("reports unknown tools as error results", async () => {
    expect(await registry().call("nope", {})).toEqual({
      content: [{ type: "text", text: "Unknown tool: nope" }],
      isError: true,
    });
  });
});

describe("ToolRegistry.search", () => {
  it("ranks by keyword overlap and annotates each hit", () => {
    const hits = registry().search("read a file");

    // read_file: "read" +2 (name) +1 (description), "file" +2 +1; list_dir: nothing
    expect(hits.map((h) => [h.name, h._score, h._category])).toEqual([["read_file", 6, "file-system"]]);
  });

  it("scores an exact name above partial matches", () => {
    const hits = registry().search("calculator");

    expect(hits).toHaveLength(1);
    expect(hits[0]._score).toBe(3);
  });

  it("counts a category word", () => {
    const hits = registry().search("system time");

    expect(hits.map((h) => [h.name, h._score])).toEqual([["get_time", 5]]);
  });

  it("filters by category", () => {
    const hits = registry().search("the", { category: "file-system" });

    expect(hits.map((h) => h.name)).toEqual(["read_file", "list_dir"]);
  });

  it("limits the number of results", () => {
    const hits = registry().search("the", { maxResults: 1 });

    expect(hits.map((h) => h.name)).toEqual(["read_file"]);
  });

  it("returns nothing for a query with no overlap", () => {
    expect(registry().search("translate japanese")).toEqual([]);
    expect(registry().search("")).toEqual([]);
  });
});
