/**
 * Vite plugin mounting the board API into the dev and preview servers.
 *
 * The board client lives here, on the Node side: the browser never sees
 * the API key and never talks to the board directly.
 */
import type { Logger, Plugin } from "vite";
import { BoardClient } from "../client.ts";
import { type BoardConfig, maskApiKey } from "../config.ts";
import { createKitcoSource, type MetalsSource } from "../metals/kitco.ts";
import {
  type ApiContext,
  type ApiResponse,
  failure,
  handleApiRequest,
  isApiPath,
} from "./api.ts";

export interface BoardApiOptions {
  config: BoardConfig;
  /** Defaults to the Kitco chart pages. */
  metals?: MetalsSource;
}

/** The parts of `IncomingMessage` the middleware reads. */
export interface MiddlewareRequest extends AsyncIterable<Uint8Array | string> {
  method?: string;
  url?: string;
}

/** The parts of `ServerResponse` the middleware writes. */
export interface MiddlewareResponse {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body: string): unknown;
}

export type BoardApiMiddleware = (
  req: MiddlewareRequest,
  res: MiddlewareResponse,
  next: (err?: unknown) => void,
) => void;

const MAX_BODY_BYTES = 64 * 1024;

type BodyResult =
  | { ok: true; body: unknown }
  | { ok: false; response: ApiResponse };

async function readJsonBody(req: MiddlewareRequest): Promise<BodyResult> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf =
      typeof chunk === "string"
        ? Buffer.from(chunk, "utf8")
        : Buffer.from(chunk);
    size += buf.length;
    if (size > MAX_BODY_BYTES) {
      return {
        ok: false,
        response: failure("BadRequest", "Request body too large"),
      };
    }
    chunks.push(buf);
  }
  const text = Buffer.concat(chunks).toString("utf8");
  if (text.trim() === "") return { body: undefined, ok: true };
  try {
    return { body: JSON.parse(text), ok: true };
  } catch {
    return {
      ok: false,
      response: failure("BadRequest", "Body is not valid JSON"),
    };
  }
}

function send(res: MiddlewareResponse, response: ApiResponse): void {
  res.statusCode = response.status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(response.body));
}

/** Connect-style middleware answering `/api/*`; other paths fall through. */
export function createBoardApiMiddleware(
  ctx: ApiContext,
  logger: Logger,
): BoardApiMiddleware {
  const handle = async (
    req: MiddlewareRequest,
    res: MiddlewareResponse,
  ): Promise<void> => {
    const method = req.method ?? "GET";
    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    const parsed = await readJsonBody(req);
    const response = parsed.ok
      ? await handleApiRequest(ctx, { body: parsed.body, method, path })
      : parsed.response;

    if (response.body.ok) {
      logger.info(`[board] ${method} ${path} -> ${response.status}`, {
        timestamp: true,
      });
    } else {
      const { kind, message } = response.body.error;
      logger.warn(
        `[board] ${method} ${path} -> ${response.status} ${kind}: ${message}`,
        { timestamp: true },
      );
    }
    send(res, response);
  };

  return (req, res, next) => {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;
    if (!isApiPath(path)) {
      next();
      return;
    }
    handle(req, res).catch(next);
  };
}

function describeConfig(client: BoardClient): string {
  const { config } = client;
  if (!client.configured) {
    return "board not configured: set VESTABOARD_HOST and VESTABOARD_API_KEY in .env.local";
  }
  return `board at ${config.host} (key ${maskApiKey(config.apiKey)}, ${config.transport} transport, ${config.timeoutMs} ms timeout)`;
}

/** Serve the board API from `vite` and `vite preview`. */
export function boardApi(options: BoardApiOptions): Plugin {
  const ctx: ApiContext = {
    client: new BoardClient(options.config),
    metals: options.metals ?? createKitcoSource(),
  };

  return {
    configurePreviewServer(server) {
      const { logger } = server.config;
      logger.info(`[board] ${describeConfig(ctx.client)}`);
      server.middlewares.use(createBoardApiMiddleware(ctx, logger));
    },
    configureServer(server) {
      const { logger } = server.config;
      logger.info(`[board] ${describeConfig(ctx.client)}`);
      server.middlewares.use(createBoardApiMiddleware(ctx, logger));
    },
    name: "board-api",
  };
}
