// ============================================
// Stream transport — one JSON line out, one JSON line back
// ============================================

import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import {
  TransportError,
  describeError,
  parseResponse,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from "./jsonrpc.js";
import { LineReader } from "./line-reader.js";
import type { Transport } from "./transport.js";

export interface StreamTransportOptions {
  /** Stream the request lines are written to (the server's stdin). */
  input: Writable;
  /** Stream the response lines are read from (the server's stdout). */
  output: Readable;
  timeoutMs: number;
  name?: string;
}

export class StreamTransport implements Transport {
  readonly name: string;
  private readonly input: Writable;
  private readonly reader: LineReader;
  private readonly timeoutMs: number;

  constructor(options: StreamTransportOptions) {
    this.name = options.name ?? "stdio";
    this.input = options.input;
    this.reader = new LineReader(options.output);
    this.timeoutMs = options.timeoutMs;
  }

  async exchange(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    if (this.reader.closed || this.input.writableEnded || this.input.destroyed) {
      throw TransportError.connectionFailed(this.name, "stream is closed");
    }

    await this.writeLine(JSON.stringify(request));

    const deadline = Date.now() + this.timeoutMs;
    for (;;) {
      const remaining = Math.max(0, deadline - Date.now());
      const line = await this.reader.next(remaining, () => TransportError.timeout(this.timeoutMs));

      if (line === null) {
        throw TransportError.connectionFailed(this.name, "tool server closed its output stream");
      }

      const trimmed = line.trim();
      if (!trimmed) continue;

      const response = this.decode(trimmed);
      if (!response) {
        console.error(`[Transport] Skipping malformed line from ${this.name}: ${trimmed.slice(0, 100)}`);
        continue;
      }
      if (request.id !== undefined && response.id !== request.id && response.id !== null) {
        console.error(`[Transport] Skipping response for unexpected id ${String(response.id)}`);
        continue;
      }
      return response;
    }
  }

  async close(): Promise<void> {
    this.reader.close();
    if (!this.input.writableEnded) {
      this.input.end();
    }
  }

  private decode(line: string): JsonRpcResponse | null {
    try {
      return parseResponse(JSON.parse(line));
    } catch {
      return null;
    }
  }

  private writeLine(line: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.input.write(`${line}\n`, (err) => {
        if (err) {
          reject(TransportError.connectionFailed(this.name, describeError(err)));
        } else {
          resolve();
        }
      });
    });
  }
}

/** The parts of a spawned tool server process the transport relies on. */
export interface ToolServerProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly exitCode: number | null;
  readonly killed: boolean;
  kill(): boolean;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export type SpawnToolServer = (command: string, args: string[]) => ToolServerProcess;

const spawnWithPipes: SpawnToolServer = (command, args) =>
  spawn(command, args, { stdio: ["pipe", "pipe", "inherit"] });

/**
 * Stream transport over a spawned tool server. The child's stderr is
 * inherited so its logs reach the terminal.
 */
export class SubprocessTransport extends StreamTransport {
  private constructor(
    private readonly child: ToolServerProcess,
    name: string,
    timeoutMs: number,
  ) {
    super({ input: child.stdin, output: child.stdout, timeoutMs, name });
  }

  static spawn(
    command: string,
    args: string[],
    timeoutMs: number,
    spawnProcess: SpawnToolServer = spawnWithPipes,
  ): SubprocessTransport {
    const child = spawnProcess(command, args);
    const name = [command, ...args].join(" ");

    child.on("error", (err) => {
      console.error(`[Transport] Tool server "${name}" failed: ${err.message}`);
    });
    // EPIPE after the child exits surfaces on the next exchange as a closed stream
    child.stdin.on("error", (err) => {
      console.error(`[Transport] Tool server input closed: ${err.message}`);
    });

    return new SubprocessTransport(child, name, timeoutMs);
  }

  async close(): Promise<void> {
    await super.close();
    if (this.child.exitCode === null && !this.child.killed) {
      this.child.kill();
    }
  }
}
