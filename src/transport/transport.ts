/**
 * Transport abstraction for the board's Local API.
 *
 * A transport performs exactly one request per call and reports either the
 * device's HTTP answer or a {@link ConnectionFailedError}. It never retries
 * and never interprets status codes; the client does that.
 */
import type { Result } from "option-t/plain_result";
import type { ConnectionFailedError } from "../errors.ts";

/** Path of the message resource on the board. */
export const MESSAGE_PATH = "/local-api/message";

/** Header carrying the Local API key. */
export const API_KEY_HEADER = "X-Vestaboard-Local-Api-Key";

/** Configuration for the fetch based HTTP transport. */
export interface HttpTransportConfig {
  type: "http";
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

/** Configuration for the in-memory board. */
export interface MockTransportConfig {
  type: "mock";
  apiKey: string;
}

/** Discriminated union of all supported transport configuration objects. */
export type TransportConfig = HttpTransportConfig | MockTransportConfig;

export type HttpMethod = "GET" | "POST";

export interface BoardRequest {
  method: HttpMethod;
  path: string;
  /** Serialized as JSON when present. */
  body?: unknown;
}

export interface BoardResponse {
  status: number;
  /** Parsed JSON, the raw text when it isn't JSON, or `null` when empty. */
  body: unknown;
}

/** Minimal contract implemented by every transport. */
export interface BoardTransport {
  readonly config: TransportConfig;
  request(
    request: BoardRequest,
  ): Promise<Result<BoardResponse, ConnectionFailedError>>;
}
