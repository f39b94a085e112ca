// ============================================
// Tool: run_command — Execute an allow-listed shell command
// ============================================

import { execSync } from "node:child_process";
import type { Tool } from "./types.js";

const TIMEOUT_MS = 30_000;
const MAX_OUTPUT = 64 * 1024; // 64 KB

export const ALLOWED_PREFIXES = ["echo", "date", "whoami", "pwd", "ls", "uname"];

export function isAllowedCommand(command: string): boolean {
  const normalized = command.trim().toLowerCase();
  // Chaining, substitution or a line break could smuggle a second command past the prefix check
  if (/[;&|`$<>]/.test(normalized) || /[\u0000-\u001f\u007f]/.test(normalized)) return false;
  return ALLOWED_PREFIXES.some(
    (prefix) => normalized === prefix || normalized.startsWith(`${prefix} `),
  );
}

/** execSync attaches the captured streams to the error it throws. */
function outputOf(err: unknown, key: "stdout" | "stderr"): string {
  if (typeof err !== "object" || err === null || !(key in err)) return "";
  const value: unknown = Reflect.get(err, key);
  return typeof value === "string" ? value : "";
}

export function createRunCommandTool(workDir: string): Tool {
  return {
    definition: {
      name: "run_command",
      description: `Run a read-only shell command and return its output. Allowed commands: ${ALLOWED_PREFIXES.join(", ")}. Timeout: 30 seconds.`,
      category: "shell",
      inputSchema: {
        type: "object",
        properties: {
          command: { type: "string", description: "The shell command to execute" },
        },
        required: ["command"],
      },
    },

    async execute(input) {
      const command = typeof input.command === "string" ? input.command : "";

      if (!isAllowedCommand(command)) {
        throw new Error(`Command not allowed: ${command || "(empty)"}. Allowed: ${ALLOWED_PREFIXES.join(", ")}`);
      }

      try {
        const output = execSync(command, {
          cwd: workDir,
          timeout: TIMEOUT_MS,
          maxBuffer: MAX_OUTPUT,
          encoding: "utf-8",
          stdio: ["ignore", "pipe", "pipe"],
        });

        return output || "(no output)";
      } catch (err: unknown) {
        const stderr = outputOf(err, "stderr");
        const stdout = outputOf(err, "stdout");
        const message = err instanceof Error ? err.message : String(err);
        throw new Error(`Command failed:\n${stderr || stdout || message}`);
      }
    },
  };
}
