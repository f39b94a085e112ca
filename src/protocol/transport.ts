import type { JsonRpcRequest, JsonRpcResponse } from "./jsonrpc.js";

/**
 * One physical channel to a tool server. Implementations turn every
 * transport-level failure into a `TransportError`; protocol-level errors
 * come back as ordinary failure envelopes.
 */
export interface Transport {
  /** Short label used in logs and error messages. */
  readonly name: string;

  /** Send one request envelope and wait for its response envelope. */
  exchange(request: JsonRpcRequest): Promise<JsonRpcResponse>;

  /** Release the channel. Safe to call more than once. */
  close(): Promise<void>;
}
