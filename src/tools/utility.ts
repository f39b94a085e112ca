// ============================================
// Tools: echo, get_time
// ============================================

import type { Tool } from "./types.js";

export function createEchoTool(): Tool {
  return {
    definition: {
      name: "echo",
      description: "Echo a message back. Useful for checking that tool calls work end to end.",
      category: "other",
      inputSchema: {
        type: "object",
        properties: {
          message: { type: "string", description: "Message to echo back" },
        },
        required: ["message"],
      },
    },

    async execute(input) {
      return typeof input.message === "string" ? input.message : JSON.stringify(input.message ?? "");
    },
  };
}

export function createTimeTool(now: () => Date = () => new Date()): Tool {
  return {
    definition: {
      name: "get_time",
      description: "Get the current date and time (ISO 8601, UTC) on the tool server.",
      category: "system",
      inputSchema: {
        type: "object",
        properties: {},
      },
    },

    async execute() {
      return now().toISOString();
    },
  };
}
