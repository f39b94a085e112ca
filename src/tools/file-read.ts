// ============================================
// Tool: read_file — Read a file below the server root
// ============================================

import * as fs from "node:fs";
import * as path from "node:path";
import type { Tool } from "./types.js";

const MAX_SIZE = 256 * 1024; // 256 KB

export function safePath(rootDir: string, filePath: string): string {
  const root = path.resolve(rootDir);
  const resolved = path.resolve(root, filePath);
  if (resolved !== root && !resolved.startsWith(root + path.sep)) {
    throw new Error("Path traversal blocked: file must be within the server root");
  }
  return resolved;
}

export function createFileReadTool(rootDir: string): Tool {
  return {
    definition: {
      name: "read_file",
      description: "Read the contents of a text file. The path is relative to the tool server's root directory.",
      category: "file-system",
      inputSchema: {
        type: "object",
        properties: {
          path: { type: "string", description: "Relative file path to read" },
        },
        required: ["path"],
      },
    },

    async execute(input) {
      const relative = typeof input.path === "string" ? input.path : "";
      if (!relative) {
        throw new Error("Path is required");
      }
      const filePath = safePath(rootDir, relative);

      if (!fs.existsSync(filePath)) {
        throw new Error(`File not found: ${relative}`);
      }

      const stat = fs.statSync(filePath);
      if (!stat.isFile()) {
        throw new Error(`Not a file: ${relative}`);
      }
      if (stat.size > MAX_SIZE) {
        throw new Error(`File too large (${stat.size} bytes, max ${MAX_SIZE})`);
      }

      return fs.readFileSync(filePath, "utf-8");
    },
  };
}
