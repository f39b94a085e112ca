// ============================================
// Built-in tool set of the local server
// ============================================

import { createCalculatorTool } from "./calculator.js";
import { createFileReadTool } from "./file-read.js";
import { ToolRegistry } from "./registry.js";
import { createRunCommandTool } from "./run-command.js";
import { createEchoTool, createTimeTool } from "./utility.js";

export function createLocalRegistry(rootDir: string): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(createCalculatorTool());
  registry.register(createEchoTool());
  registry.register(createTimeTool());
  registry.register(createFileReadTool(rootDir));
  registry.register(createRunCommandTool(rootDir));
  return registry;
}
