/**
 * Unified error types for board operations.
 *
 * Every failure that leaves the client is one of these, discriminated by
 * `kind`. Raw network exceptions are attached as `cause` and never
 * surfaced directly.
 */

/** Failure kinds reported by the board client. */
export type BoardErrorKind =
  | "NotConfigured"
  | "ConnectionFailed"
  | "AuthFailed"
  | "FormatError"
  | "InvalidGrid";

/** Actionable follow-up shown next to the error message. */
export const BOARD_ERROR_HINTS: Record<BoardErrorKind, string> = {
  AuthFailed:
    "Check your API key. Use the Local API key, not the enablement token.",
  ConnectionFailed:
    "Check that the board is powered on and reachable at the configured host.",
  FormatError: "Remove unsupported characters and try again.",
  InvalidGrid: "Provide exactly 6 rows of 22 codes between 0 and 71.",
  NotConfigured:
    "Set VESTABOARD_HOST and VESTABOARD_API_KEY in .env.local and restart.",
};

/** Base error class for board-related errors. */
export abstract class BoardError extends Error {
  abstract readonly kind: BoardErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BoardError";
  }

  get hint(): string {
    return BOARD_ERROR_HINTS[this.kind];
  }
}

/** Host or API key is missing or still a placeholder. */
export class NotConfiguredError extends BoardError {
  readonly kind = "NotConfigured";

  constructor(message = "Board client is not configured") {
    super(message);
    this.name = "NotConfiguredError";
  }
}

/** Board unreachable, timed out, or answered with something unusable. */
export class ConnectionFailedError extends BoardError {
  readonly kind = "ConnectionFailed";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionFailedError";
  }
}

/** The board rejected the API key. */
export class AuthFailedError extends BoardError {
  readonly kind = "AuthFailed";

  constructor(status: number) {
    super(`Board rejected the API key (HTTP ${status})`);
    this.name = "AuthFailedError";
  }
}

/** Text contains characters the board cannot display. */
export class BoardFormatError extends BoardError {
  readonly kind = "FormatError";

  constructor(message: string) {
    super(message);
    this.name = "BoardFormatError";
  }
}

/** A raw grid has the wrong shape or an out-of-range code. */
export class InvalidGridError extends BoardError {
  readonly kind = "InvalidGrid";

  constructor(message: string) {
    super(`Invalid grid: ${message}`);
    this.name = "InvalidGridError";
  }
}

/** Message followed by its hint, as shown to the user. */
export function describeBoardError(error: BoardError): string {
  return `${error.message}. ${error.hint}`;
}
