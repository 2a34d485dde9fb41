/**
 * JSON routes behind the web form.
 *
 * `handleApiRequest` is transport-free: it takes a parsed request and
 * returns status + envelope, so it can be exercised without a server.
 * Board failures never escape as exceptions; each maps to an envelope with
 * the failure kind, its message and an actionable hint.
 */
import { isErr, unwrapErr, unwrapOk } from "option-t/plain_result";
import type { BoardClient } from "../client.ts";
import {
  BOARD_ERROR_HINTS,
  type BoardError,
  type BoardErrorKind,
} from "../errors.ts";
import type { MetalsSource } from "../metals/kitco.ts";

/** Failure kinds produced by the API layer itself. */
export type RequestErrorKind = "BadRequest" | "NotFound" | "MethodNotAllowed";

export type ApiErrorKind = BoardErrorKind | RequestErrorKind;

export interface ApiErrorBody {
  kind: ApiErrorKind;
  message: string;
  hint: string;
}

export type ApiEnvelope<T> =
  | { ok: true; data: T }
  | { ok: false; error: ApiErrorBody };

export interface ApiRequest {
  method: string;
  /** Path without query string, e.g. `/api/send`. */
  path: string;
  /** Parsed JSON body; `undefined` when absent. */
  body: unknown;
}

export interface ApiResponse {
  status: number;
  body: ApiEnvelope<unknown>;
}

export interface ApiContext {
  client: BoardClient;
  metals: MetalsSource;
}

export const API_PREFIX = "/api";

const STATUS_BY_KIND: Record<ApiErrorKind, number> = {
  AuthFailed: 502,
  BadRequest: 400,
  ConnectionFailed: 502,
  FormatError: 422,
  InvalidGrid: 422,
  MethodNotAllowed: 405,
  NotConfigured: 503,
  NotFound: 404,
};

const REQUEST_HINTS: Record<RequestErrorKind, string> = {
  BadRequest: "Check the request body and try again.",
  MethodNotAllowed: "Use the documented method for this route.",
  NotFound: "Available routes: status, test, send, read, raw, metals.",
};

function success(data: unknown): ApiResponse {
  return { body: { data, ok: true }, status: 200 };
}

export function failure(kind: RequestErrorKind, message: string): ApiResponse {
  return {
    body: { error: { hint: REQUEST_HINTS[kind], kind, message }, ok: false },
    status: STATUS_BY_KIND[kind],
  };
}

function boardFailure(error: BoardError): ApiResponse {
  return {
    body: {
      error: {
        hint: BOARD_ERROR_HINTS[error.kind],
        kind: error.kind,
        message: error.message,
      },
      ok: false,
    },
    status: STATUS_BY_KIND[error.kind],
  };
}

function field(body: unknown, key: string): unknown {
  return typeof body === "object" && body !== null && key in body
    ? Reflect.get(body, key)
    : undefined;
}

type Handler = (ctx: ApiContext, body: unknown) => Promise<ApiResponse>;

interface Route {
  method: "GET" | "POST";
  handler: Handler;
}

const routes: Record<string, Route> = {
  "/metals": {
    handler: async ({ client, metals }) => {
      const result = await client.displayMetalsPrices(metals);
      if (isErr(result)) return boardFailure(unwrapErr(result));
      const { lines } = unwrapOk(result);
      return success({ lines, message: "Metals prices sent to the board" });
    },
    method: "POST",
  },
  "/raw": {
    handler: async ({ client }, body) => {
      const codes = field(body, "codes");
      if (codes === undefined) {
        return failure("BadRequest", 'Missing "codes" grid');
      }
      const result = await client.sendRaw(codes);
      if (isErr(result)) return boardFailure(unwrapErr(result));
      return success({ message: "Raw message sent successfully" });
    },
    method: "POST",
  },
  "/read": {
    handler: async ({ client }) => {
      const result = await client.readMessage();
      if (isErr(result)) return boardFailure(unwrapErr(result));
      return success(unwrapOk(result));
    },
    method: "GET",
  },
  "/send": {
    handler: async ({ client }, body) => {
      const text = field(body, "text");
      if (typeof text !== "string") {
        return failure("BadRequest", 'Missing "text"');
      }
      if (text.trim() === "") {
        return failure("BadRequest", "Please enter a message");
      }
      const result = await client.sendMessage(text);
      if (isErr(result)) return boardFailure(unwrapErr(result));
      return success(unwrapOk(result));
    },
    method: "POST",
  },
  "/status": {
    handler: async ({ client }) =>
      success({
        configured: client.configured,
        host: client.config.host,
        transport: client.config.transport,
      }),
    method: "GET",
  },
  "/test": {
    handler: async ({ client }) => {
      const result = await client.testConnection();
      if (isErr(result)) return boardFailure(unwrapErr(result));
      return success({
        message: `Successfully connected to board at ${client.config.host}`,
      });
    },
    method: "POST",
  },
};

/** True for paths this module answers. */
export function isApiPath(path: string): boolean {
  return path === API_PREFIX || path.startsWith(`${API_PREFIX}/`);
}

export async function handleApiRequest(
  ctx: ApiContext,
  request: ApiRequest,
): Promise<ApiResponse> {
  const route = routes[request.path.slice(API_PREFIX.length)];
  if (!route) {
    return failure("NotFound", `No route for ${request.path}`);
  }
  if (route.method !== request.method) {
    return failure(
      "MethodNotAllowed",
      `${request.path} expects ${route.method}, got ${request.method}`,
    );
  }
  return route.handler(ctx, request.body);
}
