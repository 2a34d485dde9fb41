/**
 * HTTP transport for the board's Local API.
 *
 * Uses the global `fetch` with `AbortSignal.timeout`, so every request is
 * bounded by `timeoutMs`. Network errors and timeouts are reported as
 * {@link ConnectionFailedError}; any HTTP answer is returned as-is.
 */
import { createErr, createOk, type Result } from "option-t/plain_result";
import { ConnectionFailedError } from "../errors.ts";
import {
  API_KEY_HEADER,
  type BoardRequest,
  type BoardResponse,
  type BoardTransport,
  type HttpTransportConfig,
} from "./transport.ts";

export type FetchFn = typeof fetch;

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

function parseBody(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class HttpTransport implements BoardTransport {
  private readonly fetchFn: FetchFn;

  /**
   * @param fetchFn - Injected for tests; defaults to the global `fetch`.
   */
  constructor(
    public readonly config: HttpTransportConfig,
    fetchFn: FetchFn = fetch,
  ) {
    this.fetchFn = fetchFn;
  }

  async request(
    request: BoardRequest,
  ): Promise<Result<BoardResponse, ConnectionFailedError>> {
    const url = `${this.config.baseUrl}${request.path}`;
    const headers: Record<string, string> = {
      [API_KEY_HEADER]: this.config.apiKey,
    };
    if (request.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    try {
      const response = await this.fetchFn(url, {
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        headers,
        method: request.method,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      const text = await response.text();
      return createOk({ body: parseBody(text), status: response.status });
    } catch (error) {
      if (isTimeout(error)) {
        return createErr(
          new ConnectionFailedError(
            `Board at ${this.config.baseUrl} did not respond within ${this.config.timeoutMs} ms`,
            { cause: error },
          ),
        );
      }
      const reason = error instanceof Error ? error.message : String(error);
      return createErr(
        new ConnectionFailedError(
          `Could not reach board at ${this.config.baseUrl}: ${reason}`,
          { cause: error },
        ),
      );
    }
  }
}
