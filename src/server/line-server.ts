// ============================================
// Line Server — read, dispatch, respond over a stream pair
// ============================================
//
// One JSON-RPC message per line in, at most one response per line out.
// Requests are handled strictly one at a time, in arrival order.
// ============================================

import type { Readable, Writable } from "node:stream";
import {
  RpcErrorCode,
  describeError,
  errorResponse,
  requestSchema,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type RpcId,
} from "../protocol/jsonrpc.js";
import { LineReader } from "../protocol/line-reader.js";

/** Answers one request. Null means "no response" (notifications). */
export type RequestHandler = (request: JsonRpcRequest) => Promise<JsonRpcResponse | null>;

export interface LineServerOptions {
  input: Readable;
  output: Writable;
  handler: RequestHandler;
  /** Component tag for stderr logs, e.g. "Server" or "Bridge". */
  tag?: string;
  debug?: boolean;
}

function recoverId(value: unknown): RpcId {
  if (typeof value !== "object" || value === null || !("id" in value)) return null;
  const { id } = value;
  return typeof id === "number" || typeof id === "string" ? id : null;
}

export class LineServer {
  private readonly reader: LineReader;
  private readonly output: Writable;
  private readonly handler: RequestHandler;
  private readonly tag: string;
  private readonly debug: boolean;

  constructor(options: LineServerOptions) {
    this.reader = new LineReader(options.input);
    this.output = options.output;
    this.handler = options.handler;
    this.tag = options.tag ?? "Server";
    this.debug = options.debug ?? false;
  }

  /** Serve until the input stream ends. */
  async run(): Promise<void> {
    for (;;) {
      const line = await this.reader.next();
      if (line === null) break;

      const trimmed = line.trim();
      if (!trimmed) continue;

      const response = await this.process(trimmed);
      if (response) {
        await this.write(response);
      }
    }
    this.log(`Input closed, shutting down`);
  }

  stop(): void {
    this.reader.close();
  }

  /** Decode and dispatch one raw line, returning the response to write, if any. */
  async process(line: string): Promise<JsonRpcResponse | null> {
    let decoded: unknown;
    try {
      decoded = JSON.parse(line);
    } catch {
      this.log(`Parse error on line: ${line.slice(0, 100)}`);
      return errorResponse(null, RpcErrorCode.PARSE_ERROR, "Parse error");
    }

    const parsed = requestSchema.safeParse(decoded);
    if (!parsed.success) {
      return errorResponse(recoverId(decoded), RpcErrorCode.INVALID_REQUEST, "Invalid Request");
    }

    const request: JsonRpcRequest = parsed.data;
    const isNotification = request.id === undefined;
    this.debugLog(`<- ${request.method}${isNotification ? " (notification)" : ` #${String(request.id)}`}`);

    try {
      const response = await this.handler(request);
      return isNotification ? null : response;
    } catch (err) {
      console.error(`[${this.tag}] Handler failed for ${request.method}: ${describeError(err)}`);
      if (isNotification) return null;
      return errorResponse(request.id ?? null, RpcErrorCode.INTERNAL_ERROR, `Internal error: ${describeError(err)}`);
    }
  }

  private write(response: JsonRpcResponse): Promise<void> {
    return new Promise((resolve, reject) => {
      this.output.write(`${JSON.stringify(response)}\n`, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private log(message: string): void {
    console.error(`[${this.tag}] ${message}`);
  }

  private debugLog(message: string): void {
    if (this.debug) this.log(message);
  }
}
