// ============================================
// Stdio Bridge — line-oriented clients to the HTTP tool endpoint
// ============================================
//
// Lets a client that only speaks JSON-RPC over stdin/stdout reach the
// gateway's /mcp endpoint. Each request is forwarded as-is; transport
// failures come back as error envelopes carrying the request's id. stdout
// is the protocol channel, so every log line goes to stderr.
// ============================================

import type { Readable, Writable } from "node:stream";
import { ProtocolError, describeError, errorResponse } from "../protocol/jsonrpc.js";
import type { Transport } from "../protocol/transport.js";
import { LineServer, type RequestHandler } from "./line-server.js";

export interface StdioBridgeOptions {
  transport: Transport;
  input: Readable;
  output: Writable;
  debug?: boolean;
}

/** Forward each request through `transport`, mapping its failures to envelopes. */
export function createForwardingHandler(transport: Transport, debug = false): RequestHandler {
  return async (request) => {
    try {
      const response = await transport.exchange(request);
      if (debug) console.error(`[Bridge] -> ${request.method} answered`);
      return response;
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err;

      if (request.id === undefined) {
        // Notifications get no reply; an endpoint answering them with an empty body is normal
        if (debug) console.error(`[Bridge] Notification ${request.method} not acknowledged: ${err.message}`);
      } else {
        console.error(`[Bridge] ${request.method} failed (${err.code}): ${describeError(err)}`);
      }
      return errorResponse(request.id ?? null, err.code, err.message);
    }
  };
}

export class StdioBridge {
  private readonly server: LineServer;

  constructor(private readonly options: StdioBridgeOptions) {
    this.server = new LineServer({
      input: options.input,
      output: options.output,
      handler: createForwardingHandler(options.transport, options.debug),
      tag: "Bridge",
      debug: options.debug,
    });
  }

  async run(): Promise<void> {
    console.error(`[Bridge] Forwarding to ${this.options.transport.name}`);
    await this.server.run();
  }

  async close(): Promise<void> {
    this.server.stop();
    await this.options.transport.close();
  }
}
