import { describe, it, expect } from "vitest";
import {
  TOOL_SEARCH_DESCRIPTOR,
  TOOL_SEARCH_NAME,
  ToolContext,
  parseSearchResult,
  stripPrivateKeys,
} from "../tool-context.js";

const calculator = {
  name: "calculator",
  description: "Evaluate arithmetic",
  inputSchema: { type: "object", properties: { expression: { type: "string" } }, required: ["expression"] },
  _score: 4,
  _category: "utilities",
};

const echo = {
  name: "echo",
  description: "Echo a message back",
  inputSchema: { type: "object", properties: { message: { type: "string" } } },
};

describe("ToolContext", () => {
  it("starts with only the bootstrap descriptor", () => {
    const context = new ToolContext();

    expect(context.size).toBe(1);
    expect(context.currentDescriptors()).toEqual([TOOL_SEARCH_DESCRIPTOR]);
    expect(context.contains(TOOL_SEARCH_NAME)).toBe(true);
    expect(context.stats()).toBe("[1 tools in context]");
  });

  it("adds discovered tools after the bootstrap, stripping private keys", () => {
    const context = new ToolContext();

    const result = context.mergeDiscovered([calculator, echo]);

    expect(result).toEqual({ added: ["calculator", "echo"], updated: [] });
    expect(context.currentDescriptors().map((d) => d.name)).toEqual(["tool_search", "calculator", "echo"]);
    expect(context.currentDescriptors()[1]).toEqual({
      name: "calculator",
      description: "Evaluate arithmetic",
      parameters: calculator.inputSchema,
    });
    expect(context.stats()).toBe("[3 tools in context]");
  });

  it("is idempotent when the same list is merged twice", () => {
    const context = new ToolContext();
    context.mergeDiscovered([calculator, echo]);
    const afterFirst = context.currentDescriptors();

    const second = context.mergeDiscovered([calculator, echo]);

    expect(second).toEqual({ added: [], updated: [] });
    expect(context.currentDescriptors()).toEqual(afterFirst);
  });

  it("reports a changed descriptor as updated and keeps its position", () => {
    const context = new ToolContext();
    context.mergeDiscovered([calculator, echo]);

    const result = context.mergeDiscovered([{ ...calculator, description: "Evaluate math" }]);

    expect(result).toEqual({ added: [], updated: ["calculator"] });
    expect(context.currentDescriptors().map((d) => d.name)).toEqual(["tool_search", "calculator", "echo"]);
    expect(context.currentDescriptors()[1].description).toBe("Evaluate math");
  });

  it("never lets discovery replace or duplicate the bootstrap", () => {
    const context = new ToolContext();

    const result = context.mergeDiscovered([{ name: "tool_search", description: "impostor" }]);

    expect(result).toEqual({ added: [], updated: [] });
    expect(context.currentDescriptors()).toEqual([TOOL_SEARCH_DESCRIPTOR]);
  });

  it("skips entries without a usable name", () => {
    const context = new ToolContext();

    const result = context.mergeDiscovered([{ description: "nameless" }, { name: "" }, "calculator", null, 42]);

    expect(result.added).toEqual([]);
    expect(context.size).toBe(1);
  });

  it("falls back to `parameters`, then to an empty object schema", () => {
    const context = new ToolContext();

    context.mergeDiscovered([
      { name: "a", parameters: { type: "object", properties: { x: { type: "number" } } } },
      { name: "b" },
    ]);

    const [, a, b] = context.currentDescriptors();
    expect(a.parameters).toEqual({ type: "object", properties: { x: { type: "number" } } });
    expect(b).toEqual({ name: "b", description: "", parameters: { type: "object", properties: {} } });
  });

  it("carries input examples over as descriptor examples", () => {
    const context = new ToolContext();

    context.mergeDiscovered([{ ...echo, inputExamples: [{ message: "hi" }] }]);

    expect(context.currentDescriptors()[1].examples).toEqual([{ message: "hi" }]);
  });

  it("keeps the bootstrap after clear()", () => {
    const context = new ToolContext();
    context.mergeDiscovered([calculator]);

    context.clear();

    expect(context.currentDescriptors()).toEqual([TOOL_SEARCH_DESCRIPTOR]);
    expect(context.contains("calculator")).toBe(false);
    expect(context.contains("tool_search")).toBe(true);
  });
});

describe("parseSearchResult", () => {
  it("reads a tools wrapper object", () => {
    expect(parseSearchResult(JSON.stringify({ tools: [echo] }))).toEqual([echo]);
  });

  it("reads a bare array", () => {
    expect(parseSearchResult(JSON.stringify([echo]))).toEqual([echo]);
  });

  it("yields nothing for text that is not a search result", () => {
    expect(parseSearchResult("No tools matched")).toEqual([]);
    expect(parseSearchResult(JSON.stringify({ result: [] }))).toEqual([]);
  });
});

describe("stripPrivateKeys", () => {
  it("drops underscore-prefixed keys only", () => {
    expect(stripPrivateKeys({ name: "x", _score: 1, _server: "local", description: "d" })).toEqual({
      name: "x",
      description: "d",
    });
  });
});
