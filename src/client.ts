/**
 * Board client: the only component that talks to the device.
 *
 * Each operation performs at most one Local API request (two for the
 * metals board: the quote fetch, then the write) and resolves to a
 * `Result`. Nothing here throws across the boundary; every failure is one
 * of the {@link BoardError} kinds.
 */
import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import {
  type FormattedMessage,
  formatMessage,
  layoutLines,
} from "./board/formatter.ts";
import {
  type BoardGrid,
  gridToLines,
  gridToText,
  validateGrid,
} from "./board/grid.ts";
import { type BoardConfig, baseUrlFor, isConfigured } from "./config.ts";
import {
  AuthFailedError,
  type BoardError,
  ConnectionFailedError,
  NotConfiguredError,
} from "./errors.ts";
import { formatMetalsBoard, type MetalsSource } from "./metals/kitco.ts";
import { createTransport } from "./transport/index.ts";
import {
  type BoardRequest,
  type BoardResponse,
  type BoardTransport,
  MESSAGE_PATH,
} from "./transport/transport.ts";

export type BoardResult<T> = Result<T, BoardError>;

export interface SentMessage extends FormattedMessage {
  /** Summary for the status line. */
  message: string;
}

export interface BoardSnapshot {
  grid: BoardGrid;
  /** Decoded rows, full width. */
  lines: string[];
  /** Decoded text, trimmed, blank rows dropped. */
  text: string;
}

const SUMMARY_LIMIT = 50;

function summarize(text: string): string {
  const shown =
    text.length > SUMMARY_LIMIT ? `${text.slice(0, SUMMARY_LIMIT)}...` : text;
  return `Message sent successfully: ${shown}`;
}

/** Read responses are `{ "message": grid }`; some firmware sends the grid. */
function extractGrid(body: unknown): unknown {
  if (typeof body === "object" && body !== null && "message" in body) {
    return body.message;
  }
  return body;
}

export class BoardClient {
  private readonly transport: BoardTransport | null;
  private readonly notConfiguredReason: string | null;

  /**
   * @param transport - Injected for tests; by default one is created from
   *   `config.transport`. Ignored when the config is incomplete.
   */
  constructor(
    public readonly config: BoardConfig,
    transport?: BoardTransport,
  ) {
    const baseUrl = baseUrlFor(config.host);
    if (!isConfigured(config)) {
      this.notConfiguredReason =
        "Board client is not configured: host and API key are required";
      this.transport = null;
    } else if (baseUrl === null) {
      this.notConfiguredReason = `Board client is not configured: "${config.host}" is not a valid host`;
      this.transport = null;
    } else {
      this.notConfiguredReason = null;
      this.transport = transport ?? createTransport(config, baseUrl);
    }
  }

  /** False when every operation will fail with `NotConfigured`. */
  get configured(): boolean {
    return this.transport !== null;
  }

  /** Confirm the board is reachable and accepts the API key. */
  async testConnection(): Promise<BoardResult<void>> {
    const response = await this.call({ method: "GET", path: MESSAGE_PATH });
    if (isErr(response)) return response;
    return createOk(undefined);
  }

  /** Format `text` (see `formatMessage`) and write it to the board. */
  async sendMessage(text: string): Promise<BoardResult<SentMessage>> {
    const notConfigured = this.checkConfigured();
    if (notConfigured) return notConfigured;

    const formatted = formatMessage(text);
    if (isErr(formatted)) return formatted;
    const message = unwrapOk(formatted);

    const written = await this.write(message.grid);
    if (isErr(written)) return written;
    return createOk({ ...message, message: summarize(text) });
  }

  /** Current board content. */
  async readMessage(): Promise<BoardResult<BoardSnapshot>> {
    const response = await this.call({ method: "GET", path: MESSAGE_PATH });
    if (isErr(response)) return response;

    const grid = validateGrid(extractGrid(unwrapOk(response).body));
    if (isErr(grid)) {
      return createErr(
        new ConnectionFailedError("Board sent an unexpected response", {
          cause: unwrapErr(grid),
        }),
      );
    }
    const codes = unwrapOk(grid);
    return createOk({
      grid: codes,
      lines: gridToLines(codes),
      text: gridToText(codes),
    });
  }

  /** Write a 6×22 grid of codes verbatim. Validated before any request. */
  async sendRaw(codes: unknown): Promise<BoardResult<void>> {
    const notConfigured = this.checkConfigured();
    if (notConfigured) return notConfigured;

    const grid = validateGrid(codes);
    if (isErr(grid)) return grid;
    return this.write(unwrapOk(grid));
  }

  /** Fetch spot prices and post them as a left-aligned board. */
  async displayMetalsPrices(
    source: MetalsSource,
  ): Promise<BoardResult<FormattedMessage>> {
    const notConfigured = this.checkConfigured();
    if (notConfigured) return notConfigured;

    const prices = await source.fetchPrices();
    if (isErr(prices)) return prices;

    const layout = layoutLines(formatMetalsBoard(unwrapOk(prices)), {
      align: "left",
    });
    if (isErr(layout)) return layout;
    const board = unwrapOk(layout);

    const written = await this.write(board.grid);
    if (isErr(written)) return written;
    return createOk(board);
  }

  private checkConfigured(): Result<never, NotConfiguredError> | null {
    return this.transport === null
      ? createErr(new NotConfiguredError(this.notConfiguredReason ?? undefined))
      : null;
  }

  private async write(grid: BoardGrid): Promise<BoardResult<void>> {
    const response = await this.call({
      body: grid,
      method: "POST",
      path: MESSAGE_PATH,
    });
    if (isErr(response)) return response;
    return createOk(undefined);
  }

  /** One request; non-2xx answers become typed errors. */
  private async call(
    request: BoardRequest,
  ): Promise<BoardResult<BoardResponse>> {
    if (this.transport === null) {
      return createErr(
        new NotConfiguredError(this.notConfiguredReason ?? undefined),
      );
    }
    const result = await this.transport.request(request);
    if (isErr(result)) return result;

    const response = unwrapOk(result);
    if (response.status === 401 || response.status === 403) {
      return createErr(new AuthFailedError(response.status));
    }
    if (response.status < 200 || response.status >= 300) {
      return createErr(
        new ConnectionFailedError(
          `Board answered ${request.method} ${request.path} with HTTP ${response.status}`,
        ),
      );
    }
    return createOk(response);
  }
}
