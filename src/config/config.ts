// ============================================
// toolscout Configuration
// ============================================

export type ToolTransportKind = "http" | "stdio";

export interface ToolscoutConfig {
  /** Gateway base URL serving both /v1/chat/completions and /mcp */
  baseUrl: string;

  /** Bearer token sent on every gateway request */
  apiKey: string;

  /** Chat model identifier (e.g. openai/gpt-4o) */
  model: string;

  /** Sampling temperature forwarded to the chat endpoint */
  temperature: number;

  /** Maximum model calls within one user turn */
  maxIterations: number;

  /** How tool calls reach the tool server */
  transport: ToolTransportKind;

  /** Executable for the stdio transport; empty means this CLI's own `serve` */
  toolServerCommand: string;

  /** Arguments for the stdio tool server, whitespace separated in the env */
  toolServerArgs: string[];

  /** Timeout for one JSON-RPC exchange in milliseconds */
  rpcTimeoutMs: number;

  /** Timeout for one chat completion in milliseconds */
  chatTimeoutMs: number;

  /** Timeout for requests forwarded by the stdio bridge */
  bridgeTimeoutMs: number;

  /** Root directory for the local server's file tools */
  toolServerRoot: string;

  /** Emit debug lines on stderr */
  debug: boolean;
}

const DEFAULT_BASE_URL = "http://localhost:8080";
const DEFAULT_MODEL = "openai/gpt-4o";
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_ITERATIONS = 10;
const DEFAULT_RPC_TIMEOUT_MS = 30_000;
const DEFAULT_CHAT_TIMEOUT_MS = 120_000;
const DEFAULT_BRIDGE_TIMEOUT_MS = 60_000; // tool execution behind the gateway can be slow

/**
 * Load configuration from environment variables.
 * Call dotenv.config() before invoking this function.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ToolscoutConfig {
  const transport = env(source, "TOOL_TRANSPORT", "http").toLowerCase();

  return {
    baseUrl: env(source, "TOOLSCOUT_URL", DEFAULT_BASE_URL).replace(/\/+$/, ""),
    apiKey: env(source, "TOOLSCOUT_API_KEY", ""),
    model: env(source, "LLM_MODEL", DEFAULT_MODEL),
    temperature: envFloat(source, "LLM_TEMPERATURE", DEFAULT_TEMPERATURE),
    maxIterations: Math.max(1, envInt(source, "MAX_ITERATIONS", DEFAULT_MAX_ITERATIONS)),
    transport: transport === "stdio" ? "stdio" : "http",
    toolServerCommand: env(source, "TOOL_SERVER_COMMAND", ""),
    toolServerArgs: env(source, "TOOL_SERVER_ARGS", "").split(/\s+/).filter(Boolean),
    rpcTimeoutMs: envInt(source, "RPC_TIMEOUT_MS", DEFAULT_RPC_TIMEOUT_MS),
    chatTimeoutMs: envInt(source, "CHAT_TIMEOUT_MS", DEFAULT_CHAT_TIMEOUT_MS),
    bridgeTimeoutMs: envInt(source, "BRIDGE_TIMEOUT_MS", DEFAULT_BRIDGE_TIMEOUT_MS),
    toolServerRoot: env(source, "TOOL_SERVER_ROOT", process.cwd()),
    debug: env(source, "TOOLSCOUT_DEBUG", "0") === "1",
  };
}

/** Read a string env var with a fallback default. */
function env(source: NodeJS.ProcessEnv, key: string, fallback: string): string {
  return source[key]?.trim() || fallback;
}

/** Read a positive integer env var with a fallback default. */
function envInt(source: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = source[key]?.trim();
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

function envFloat(source: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = source[key]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}
