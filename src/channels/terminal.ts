// ============================================
// Terminal Session — interactive chat with dynamic tool discovery
// ============================================

import * as readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { ConversationState } from "../core/conversation.js";
import type { Orchestrator, TurnResult } from "../core/orchestrator.js";
import type { ToolContext } from "../core/tool-context.js";
import type { ProtocolBridge } from "../protocol/bridge.js";
import { describeError } from "../protocol/jsonrpc.js";
import { LineReader } from "../protocol/line-reader.js";

export const SYSTEM_PROMPT = `You are a helpful assistant with access to tools through a tool gateway.

CRITICAL: You start with ONLY the \`tool_search\` tool. You MUST use it to discover other tools!

When a user asks you to do something:
1. FIRST use \`tool_search\` with a natural language query to find relevant tools
   Example: tool_search(query="calculate math expressions")
   Example: tool_search(query="read file contents")
2. The search will return tool specifications that will be added to your available tools
3. THEN call the discovered tools to complete the task

IMPORTANT:
- If you don't know what tools are available, use tool_search first!
- After tool_search, you'll have access to the discovered tools
- You cannot use a tool unless you've discovered it via tool_search first`;

const HELP_TEXT = [
  "Commands:",
  "  quit      - Exit the chat",
  "  clear     - Clear conversation and tool context",
  "  context   - Show tools currently in context",
  "  all-tools - Show all available server tools (admin)",
  "",
  "How it works:",
  "  1. The model starts with only 'tool_search' available",
  "  2. When you ask for something, it searches for relevant tools",
  "  3. Discovered tools are added to context automatically",
  "  4. The model then uses the discovered tools",
  "",
  "Example prompts:",
  "  - 'Calculate 2^10 + sqrt(144)'",
  "  - 'What's the current date and time?'",
  "  - 'Search for file tools'",
];

export interface TerminalSessionOptions {
  orchestrator: Orchestrator;
  conversation: ConversationState;
  context: ToolContext;
  bridge: ProtocolBridge;
  modelName: string;
  input?: Readable;
  output?: Writable;
  print?: (line: string) => void;
}

/** What the session should do after one line of input. */
export type InputOutcome = "quit" | "continue";

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export class TerminalSession {
  private readonly print: (line: string) => void;

  constructor(private readonly options: TerminalSessionOptions) {
    this.print = options.print ?? ((line) => console.log(line));
  }

  async start(): Promise<void> {
    this.printWelcome();

    const rl = readline.createInterface({
      input: this.options.input ?? process.stdin,
      output: this.options.output ?? process.stdout,
    });
    // Lines typed or piped in while a turn runs are queued, not dropped
    const reader = new LineReader(rl);
    let open = true;
    rl.on("close", () => {
      open = false;
    });
    // Ctrl+C ends the session the same way Ctrl+D does
    rl.on("SIGINT", () => rl.close());

    try {
      for (;;) {
        if (open) {
          rl.setPrompt(`\n${this.options.context.stats()} You: `);
          rl.prompt();
        }
        const answer = await reader.next();
        if (answer === null) break;

        try {
          if ((await this.handleInput(answer)) === "quit") break;
        } catch (err) {
          console.error(`[Terminal] Turn failed: ${describeError(err)}`);
        }
      }
    } finally {
      if (open) rl.close();
    }
    this.print("\nGoodbye!");
  }

  /** Run a REPL command, or send anything else to the model as a user turn. */
  async handleInput(raw: string): Promise<InputOutcome> {
    const text = raw.trim();
    if (!text) return "continue";

    switch (text.toLowerCase()) {
      case "quit":
      case "exit":
      case "q":
        return "quit";

      case "clear":
        this.options.conversation.reset();
        this.options.context.clear();
        this.print("Conversation and tool context cleared");
        this.print(`Context reset: ${this.options.context.stats()}`);
        return "continue";

      case "context":
        this.printContext();
        return "continue";

      case "all-tools":
        await this.printAllTools();
        return "continue";

      case "help":
        for (const line of HELP_TEXT) this.print(line);
        return "continue";

      default:
        this.printTurn(await this.options.orchestrator.runTurn(text));
        return "continue";
    }
  }

  private printWelcome(): void {
    const server = this.options.bridge.server;
    this.print("=".repeat(70));
    this.print("Tool-augmented chat with dynamic tool discovery");
    this.print("=".repeat(70));
    this.print(`Model:       ${this.options.modelName}`);
    this.print(`Tool server: ${server.name ?? this.options.bridge.transportName}`);
    this.print("-".repeat(70));
    this.print("Commands: 'quit', 'clear', 'context', 'all-tools', 'help'");
    this.print(`Initial context: ${this.options.context.stats()}  (tool_search only)`);
    this.print("Try: 'Calculate the square root of 144'");
  }

  private printContext(): void {
    const tools = this.options.context.currentDescriptors();
    this.print(`Current Tool Context (${tools.length} tools):`);
    for (const tool of tools) {
      const marker = tool.name === this.options.context.bootstrapName ? "?" : "*";
      this.print(`  ${marker} ${tool.name}`);
      if (tool.description) this.print(`     ${truncate(tool.description, 50)}`);
    }
  }

  private async printAllTools(): Promise<void> {
    this.print("Fetching all server tools (admin view)...");
    let tools: Record<string, unknown>[];
    try {
      tools = await this.options.bridge.listTools();
    } catch (err) {
      this.print(`Could not list tools: ${describeError(err)}`);
      return;
    }

    this.print(`Total available: ${tools.length}`);
    for (const tool of tools) {
      const name = typeof tool.name === "string" ? tool.name : "unknown";
      const description = typeof tool.description === "string" ? tool.description : "";
      const inContext = this.options.context.contains(name) ? "x" : " ";
      this.print(`  [${inContext}] ${name}`);
      if (description) this.print(`       ${truncate(description, 50)}`);
    }
  }

  private printTurn(result: TurnResult): void {
    switch (result.status) {
      case "completed":
        this.print(`Assistant: ${result.reply ?? ""}`);
        break;
      case "rolled_back":
        this.print(`Chat error: ${result.error?.message ?? "unknown error"} (turn discarded)`);
        break;
      case "ceiling_reached":
        this.print(`Stopped after ${result.modelCalls} model calls without a final answer.`);
        break;
    }
  }
}
