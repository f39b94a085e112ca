// ============================================
// HTTP transport — one POST per JSON-RPC call
// ============================================

import {
  RpcErrorCode,
  TransportError,
  describeError,
  parseResponse,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from "./jsonrpc.js";
import type { Transport } from "./transport.js";

export interface HttpTransportOptions {
  /** Gateway base URL; requests go to `${baseUrl}${path}`. */
  baseUrl: string;
  apiKey: string;
  /** Endpoint path (default: /mcp). */
  path?: string;
  timeoutMs: number;
  /** Injected for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

export class HttpTransport implements Transport {
  readonly name: string;
  private readonly endpoint: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpTransportOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}${options.path ?? "/mcp"}`;
    this.name = this.endpoint;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async exchange(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify(request),
        signal: controller.signal,
      });
      text = await res.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw TransportError.timeout(this.timeoutMs);
      }
      throw TransportError.connectionFailed(this.endpoint, describeError(err));
    } finally {
      clearTimeout(timer);
    }

    // Status is mapped before the body is looked at
    if (res.status === 401) {
      throw new TransportError(RpcErrorCode.AUTH_FAILED, "Authentication failed. Check your API key.");
    }
    if (res.status === 404) {
      throw new TransportError(
        RpcErrorCode.ENDPOINT_NOT_FOUND,
        `MCP endpoint not found at ${this.endpoint}. Ensure the gateway is running.`,
      );
    }
    if (!res.ok) {
      throw new TransportError(RpcErrorCode.HTTP_ERROR, `HTTP error: ${res.status} ${res.statusText}`.trim());
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch (err) {
      throw TransportError.invalidResponse(describeError(err));
    }

    const response = parseResponse(decoded);
    if (!response) {
      throw TransportError.invalidResponse("body is not a JSON-RPC response");
    }
    return response;
  }

  async close(): Promise<void> {
    // Stateless: every call is its own request.
  }

  private headers(): Record<string, string> {
    const h: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
    };
    if (this.apiKey) {
      h["Authorization"] = `Bearer ${this.apiKey}`;
    }
    return h;
  }
}
