// In-memory board for tests and demo mode.
// Answers the Local API message endpoint and keeps the last grid written.

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import { type BoardGrid, blankGrid, validateGrid } from "../board/grid.ts";
import { ConnectionFailedError } from "../errors.ts";
import {
  type BoardRequest,
  type BoardResponse,
  type BoardTransport,
  MESSAGE_PATH,
  type MockTransportConfig,
} from "./transport.ts";

/** Options controlling simulation behaviour of {@link MockTransport}. */
export interface MockTransportOptions {
  /** Key the simulated board accepts. Defaults to the configured key. */
  acceptedKey?: string;
  /** When true every request fails as if the host were unreachable. */
  unreachable?: boolean;
  /** Board content before the first write. Defaults to blank. */
  initialGrid?: BoardGrid;
  /** When set, `GET` answers with this body instead of the stored grid. */
  readBody?: unknown;
  /** Status returned for every request, overriding the simulation. */
  forceStatus?: number;
}

/**
 * Simulated board that echoes state: a successful `POST` is what the next
 * `GET` returns.
 */
export class MockTransport implements BoardTransport {
  private readonly options: MockTransportOptions;
  private grid: BoardGrid;

  /** Every request received, in order. */
  public readonly requests: BoardRequest[] = [];

  constructor(
    public readonly config: MockTransportConfig,
    options: MockTransportOptions = {},
  ) {
    this.options = { acceptedKey: config.apiKey, ...options };
    this.grid = options.initialGrid ?? blankGrid();
  }

  /** Current simulated board content. */
  get currentGrid(): BoardGrid {
    return this.grid.map((row) => [...row]);
  }

  async request(
    request: BoardRequest,
  ): Promise<Result<BoardResponse, ConnectionFailedError>> {
    this.requests.push(request);
    if (this.options.unreachable) {
      return createErr(
        new ConnectionFailedError("Could not reach board at mock: unreachable"),
      );
    }
    return createOk(this.respond(request));
  }

  private respond(request: BoardRequest): BoardResponse {
    if (this.options.forceStatus !== undefined) {
      return { body: null, status: this.options.forceStatus };
    }
    if (this.config.apiKey !== this.options.acceptedKey) {
      return { body: { error: "Unauthorized" }, status: 401 };
    }
    if (request.path !== MESSAGE_PATH) {
      return { body: { error: "Not Found" }, status: 404 };
    }
    if (request.method === "GET") {
      return {
        body: this.options.readBody ?? { message: this.currentGrid },
        status: 200,
      };
    }
    const parsed = validateGrid(request.body);
    if (isErr(parsed)) {
      return { body: { error: "Bad Request" }, status: 400 };
    }
    this.grid = unwrapOk(parsed);
    return { body: null, status: 201 };
  }
}
