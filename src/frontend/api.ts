// Browser-side calls to the board API served next to the page.
// Every call resolves to a Result; nothing here throws.

import { createErr, createOk, isOk, type Result } from "option-t/plain_result";
import { type BoardGrid, validateGrid } from "../board/grid.ts";
import type { ApiErrorBody, ApiErrorKind } from "../server/api.ts";

export interface UiError {
  kind: ApiErrorKind | "ServerUnavailable";
  message: string;
  hint: string;
}

export type ApiResult<T> = Result<T, UiError>;

export interface StatusData {
  configured: boolean;
  host: string;
  transport: string;
}

export interface MessageData {
  message: string;
}

export interface SentData {
  message: string;
  lines: string[];
  truncated: boolean;
  grid: BoardGrid;
}

export interface SnapshotData {
  grid: BoardGrid;
  lines: string[];
  text: string;
}

export interface MetalsData {
  message: string;
  lines: string[];
}

type Guard<T> = (value: unknown) => value is T;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isGrid(value: unknown): value is BoardGrid {
  return isOk(validateGrid(value));
}

const isStatus: Guard<StatusData> = (v): v is StatusData =>
  isRecord(v) &&
  typeof v.configured === "boolean" &&
  typeof v.host === "string" &&
  typeof v.transport === "string";

const isMessage: Guard<MessageData> = (v): v is MessageData =>
  isRecord(v) && typeof v.message === "string";

const isSent: Guard<SentData> = (v): v is SentData =>
  isMessage(v) &&
  isRecord(v) &&
  isStringArray(v.lines) &&
  typeof v.truncated === "boolean" &&
  isGrid(v.grid);

const isSnapshot: Guard<SnapshotData> = (v): v is SnapshotData =>
  isRecord(v) &&
  isGrid(v.grid) &&
  isStringArray(v.lines) &&
  typeof v.text === "string";

const isMetals: Guard<MetalsData> = (v): v is MetalsData =>
  isMessage(v) && isRecord(v) && isStringArray(v.lines);

function isErrorBody(value: unknown): value is ApiErrorBody {
  return (
    isRecord(value) &&
    typeof value.kind === "string" &&
    typeof value.message === "string" &&
    typeof value.hint === "string"
  );
}

const SERVER_HINT = "Make sure the console server is still running.";

function serverUnavailable(message: string): UiError {
  return { hint: SERVER_HINT, kind: "ServerUnavailable", message };
}

export interface ApiClientOptions {
  fetchFn?: typeof fetch;
  baseUrl?: string;
}

export function createApiClient(options: ApiClientOptions = {}) {
  const { fetchFn = fetch, baseUrl = "" } = options;

  async function call<T>(
    method: "GET" | "POST",
    path: string,
    guard: Guard<T>,
    body?: unknown,
  ): Promise<ApiResult<T>> {
    let payload: unknown;
    try {
      const res = await fetchFn(`${baseUrl}/api${path}`, {
        body: body === undefined ? undefined : JSON.stringify(body),
        headers:
          body === undefined
            ? undefined
            : { "Content-Type": "application/json" },
        method,
      });
      payload = await res.json();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return createErr(serverUnavailable(`Request failed: ${reason}`));
    }

    if (isRecord(payload) && payload.ok === true && guard(payload.data)) {
      return createOk(payload.data);
    }
    if (
      isRecord(payload) &&
      payload.ok === false &&
      isErrorBody(payload.error)
    ) {
      return createErr(payload.error);
    }
    return createErr(
      serverUnavailable("Unexpected response from the console server"),
    );
  }

  return {
    metals: () => call("POST", "/metals", isMetals),
    read: () => call("GET", "/read", isSnapshot),
    sendRaw: (codes: BoardGrid) => call("POST", "/raw", isMessage, { codes }),
    sendText: (text: string) => call("POST", "/send", isSent, { text }),
    status: () => call("GET", "/status", isStatus),
    test: () => call("POST", "/test", isMessage),
  };
}

export type ApiClient = ReturnType<typeof createApiClient>;

/** Message and hint on one line, as shown in status boxes. */
export function describeUiError(error: UiError): string {
  return `Error: ${error.message}. ${error.hint}`;
}
