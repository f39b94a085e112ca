#!/usr/bin/env node
// ============================================
// toolscout — Entry Point
// ============================================

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { config as dotenvConfig } from "dotenv";
import { TerminalSession, SYSTEM_PROMPT } from "./channels/terminal.js";
import { loadConfig, type ToolscoutConfig } from "./config/config.js";
import { ConversationState } from "./core/conversation.js";
import { GatewayChatModel } from "./core/llm-adapter.js";
import { Orchestrator } from "./core/orchestrator.js";
import { ToolContext, parseSearchResult } from "./core/tool-context.js";
import { ToolInvoker } from "./core/tool-invoker.js";
import { ProtocolBridge } from "./protocol/bridge.js";
import { HttpTransport } from "./protocol/http-transport.js";
import { describeError } from "./protocol/jsonrpc.js";
import { SubprocessTransport } from "./protocol/stream-transport.js";
import type { Transport } from "./protocol/transport.js";
import { LineServer } from "./server/line-server.js";
import { StdioBridge } from "./server/stdio-bridge.js";
import { ToolServer } from "./server/tool-server.js";
import { createLocalRegistry } from "./tools/local.js";

// ---- Package info ----

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PKG_PATH = path.resolve(__dirname, "../package.json");

function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(PKG_PATH, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

// ---- ASCII banner ----

const BANNER = `
  _              _                     _
 | |_ ___   ___ | |___  ___ ___  _   _| |_
 | __/ _ \\ / _ \\| / __|/ __/ _ \\| | | | __|
 | || (_) | (_) | \\__ \\ (_| (_) | |_| | |_
  \\__\\___/ \\___/|_|___/\\___\\___/ \\__,_|\\__|
`;

// ---- Helpers ----

function printBanner(): void {
  console.log(BANNER);
  console.log(`  Tool-augmented chat with on-demand tool discovery  v${getVersion()}`);
  console.log();
}

function fatal(message: string): never {
  console.error(`[toolscout] ${message}`);
  process.exit(1);
}

function requireApiKey(config: ToolscoutConfig): void {
  if (!config.apiKey) {
    fatal(
      "No TOOLSCOUT_API_KEY found.\n" +
        "Add TOOLSCOUT_API_KEY to your .env file (see .env.example).\n",
    );
  }
}

function createTransport(config: ToolscoutConfig): Transport {
  if (config.transport === "stdio") {
    // Without an explicit command, run this CLI's own local tool server
    const command = config.toolServerCommand || process.execPath;
    const args = config.toolServerCommand
      ? config.toolServerArgs
      : [...process.execArgv, process.argv[1], "serve"];
    return SubprocessTransport.spawn(command, args, config.rpcTimeoutMs);
  }
  return new HttpTransport({
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    timeoutMs: config.rpcTimeoutMs,
  });
}

/** Open the tool channel and run the initialize handshake, or exit. */
async function connect(config: ToolscoutConfig): Promise<ProtocolBridge> {
  const bridge = new ProtocolBridge(createTransport(config));
  try {
    const result = await bridge.initialize({ name: "toolscout", version: getVersion() });
    const server = result.serverInfo?.name ?? bridge.transportName;
    console.log(`[toolscout] Connected to ${server} via ${config.transport}`);
  } catch (err) {
    await bridge.close();
    fatal(`Could not initialize tool server ${bridge.transportName}: ${describeError(err)}`);
  }
  return bridge;
}

function closeOnSignal(close: () => Promise<void>): void {
  const shutdown = () => {
    close()
      .catch((err: unknown) => console.error(`[toolscout] Shutdown error: ${describeError(err)}`))
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

// ---- Chat command (default) ----

async function runChat(config: ToolscoutConfig): Promise<void> {
  printBanner();
  requireApiKey(config);

  const bridge = await connect(config);
  closeOnSignal(() => bridge.close());

  const context = new ToolContext();
  const conversation = new ConversationState(SYSTEM_PROMPT);
  const model = new GatewayChatModel({
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    model: config.model,
    temperature: config.temperature,
    timeoutMs: config.chatTimeoutMs,
  });
  const orchestrator = new Orchestrator({
    model,
    invoker: new ToolInvoker(bridge, context),
    context,
    conversation,
    maxIterations: config.maxIterations,
  });

  const session = new TerminalSession({
    orchestrator,
    conversation,
    context,
    bridge,
    modelName: config.model,
  });

  try {
    await session.start();
  } finally {
    await bridge.close();
  }
}

// ---- Search command ----

async function runSearch(config: ToolscoutConfig, query: string): Promise<void> {
  if (!query) fatal('Usage: toolscout search "<query>"');
  requireApiKey(config);

  const bridge = await connect(config);
  try {
    const context = new ToolContext();
    const outcome = await new ToolInvoker(bridge, context).invoke(context.bootstrapName, { query });
    if (outcome.isError) {
      console.error(`[toolscout] tool_search failed: ${outcome.text}`);
      process.exitCode = 1;
      return;
    }

    const merged = context.mergeDiscovered(parseSearchResult(outcome.text));
    if (merged.added.length === 0) {
      console.log(`No tools found for "${query}"`);
      return;
    }
    console.log(`Found ${merged.added.length} tool(s) for "${query}":\n`);
    for (const tool of context.currentDescriptors()) {
      if (tool.name === context.bootstrapName) continue;
      console.log(`  ${tool.name}`);
      if (tool.description) console.log(`    ${tool.description}`);
    }
    console.log();
  } finally {
    await bridge.close();
  }
}

// ---- Tools command ----

async function runTools(config: ToolscoutConfig): Promise<void> {
  requireApiKey(config);

  const bridge = await connect(config);
  try {
    const tools = await bridge.listTools();
    console.log(`Server exposes ${tools.length} tool(s):\n`);
    for (const tool of tools) {
      const name = typeof tool.name === "string" ? tool.name : "unknown";
      const description = typeof tool.description === "string" ? tool.description : "";
      console.log(`  ${name}`);
      if (description) console.log(`    ${description}`);
    }
    console.log();
  } finally {
    await bridge.close();
  }
}

// ---- Bridge command: stdio ↔ HTTP ----

async function runBridge(config: ToolscoutConfig): Promise<void> {
  requireApiKey(config);

  const bridge = new StdioBridge({
    transport: new HttpTransport({
      baseUrl: config.baseUrl,
      apiKey: config.apiKey,
      timeoutMs: config.bridgeTimeoutMs,
    }),
    input: process.stdin,
    output: process.stdout,
    debug: config.debug,
  });
  closeOnSignal(() => bridge.close());

  await bridge.run();
  await bridge.close();
}

// ---- Serve command: local tool server on stdio ----

async function runServe(config: ToolscoutConfig): Promise<void> {
  const registry = createLocalRegistry(config.toolServerRoot);
  const toolServer = new ToolServer(registry, { name: "toolscout-local", version: getVersion() });
  const server = new LineServer({
    input: process.stdin,
    output: process.stdout,
    handler: (request) => toolServer.handle(request),
    tag: "Server",
    debug: config.debug,
  });

  console.error(
    `[Server] Serving ${registry.getToolNames().length} tool(s) from ${config.toolServerRoot}: ` +
      registry.getToolNames().join(", "),
  );
  closeOnSignal(async () => server.stop());
  await server.run();
}

// ---- CLI dispatch ----

function printHelp(): void {
  printBanner();
  console.log("Usage:");
  console.log("  toolscout [chat]          Start an interactive chat session");
  console.log('  toolscout search "<q>"    Run tool_search once and print the matches');
  console.log("  toolscout tools           List every tool the server exposes");
  console.log("  toolscout bridge          Forward JSON-RPC lines on stdio to the HTTP endpoint");
  console.log("  toolscout serve           Run the local tool server on stdio");
  console.log("  toolscout version         Show version");
  console.log("  toolscout help            Show this help message");
  console.log();
}

async function main(): Promise<void> {
  // Load .env from the current working directory
  dotenvConfig();

  const args = process.argv.slice(2);
  const command = args[0]?.toLowerCase();
  const config = loadConfig();

  switch (command) {
    case undefined:
    case "chat":
      await runChat(config);
      break;

    case "search":
      await runSearch(config, args.slice(1).join(" ").trim());
      break;

    case "tools":
      await runTools(config);
      break;

    case "bridge":
      await runBridge(config);
      break;

    case "serve":
      await runServe(config);
      break;

    case "version":
    case "--version":
    case "-v":
      console.log(`toolscout v${getVersion()}`);
      break;

    case "help":
    case "--help":
    case "-h":
      printHelp();
      break;

    default:
      console.error(`[toolscout] Unknown command: ${command}\n`);
      printHelp();
      process.exitCode = 1;
      break;
  }
}

main().catch((err) => {
  console.error("[toolscout] Fatal error:", err);
  process.exit(1);
});
