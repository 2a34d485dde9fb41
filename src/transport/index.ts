// Transport module exports and factory

import type { BoardConfig } from "../config.ts";
import { HttpTransport } from "./http-transport.ts";
import { MockTransport } from "./mock-transport.ts";
import type { BoardTransport } from "./transport.ts";

/**
 * Create the transport selected by `config.transport`.
 *
 * @param baseUrl - Normalized Local API base URL (see `baseUrlFor`).
 */
export function createTransport(
  config: BoardConfig,
  baseUrl: string,
): BoardTransport {
  switch (config.transport) {
    case "mock":
      return new MockTransport({ apiKey: config.apiKey, type: "mock" });
    case "http":
      return new HttpTransport({
        apiKey: config.apiKey,
        baseUrl,
        timeoutMs: config.timeoutMs,
        type: "http",
      });
  }
}

export { type FetchFn, HttpTransport } from "./http-transport.ts";
export { MockTransport, type MockTransportOptions } from "./mock-transport.ts";
export type {
  BoardRequest,
  BoardResponse,
  BoardTransport,
  HttpMethod,
  HttpTransportConfig,
  MockTransportConfig,
  TransportConfig,
} from "./transport.ts";
export { API_KEY_HEADER, MESSAGE_PATH } from "./transport.ts";
