// ============================================
// Tool: calculator — Evaluate an arithmetic expression
// ============================================

import { evaluate, formatNumber } from "./expression.js";
import type { Tool } from "./types.js";

export function createCalculatorTool(): Tool {
  return {
    definition: {
      name: "calculator",
      description:
        "Perform mathematical calculations. Supports + - * / % ^, parentheses, pi, e and " +
        "sqrt, abs, sin, cos, tan, log, log10, exp, pow, min, max, round, floor, ceil.",
      category: "utilities",
      inputSchema: {
        type: "object",
        properties: {
          expression: {
            type: "string",
            description: "Mathematical expression to evaluate (e.g., '2 + 2', 'sin(pi/2)', 'sqrt(16)')",
          },
        },
        required: ["expression"],
      },
      inputExamples: [{ expression: "2 + 2" }, { expression: "sqrt(144) + pi" }],
    },

    async execute(input) {
      const expression = typeof input.expression === "string" ? input.expression.trim() : "";
      if (!expression) {
        throw new Error("Expression is required");
      }
      return formatNumber(evaluate(expression));
    },
  };
}
