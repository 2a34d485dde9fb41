import { createErr, createOk, type Result } from "option-t/plain_result";
import { InvalidGridError } from "../errors.ts";
import { BLANK, decodeCode, isValidCode, MAX_CODE } from "./charset.ts";

export const ROWS = 6;
export const COLUMNS = 22;

/** Board content: exactly {@link ROWS} rows of {@link COLUMNS} codes. */
export type BoardGrid = number[][];

/** A grid of blank tiles. */
export function blankGrid(): BoardGrid {
  return Array.from({ length: ROWS }, () =>
    Array.from({ length: COLUMNS }, () => BLANK),
  );
}

/**
 * Validate an untrusted value as a board grid.
 * Returns a fresh copy so callers can't mutate what was validated.
 */
export function validateGrid(
  value: unknown,
): Result<BoardGrid, InvalidGridError> {
  if (!Array.isArray(value)) {
    return createErr(new InvalidGridError("expected an array of rows"));
  }
  if (value.length !== ROWS) {
    return createErr(
      new InvalidGridError(`expected ${ROWS} rows, got ${value.length}`),
    );
  }
  const grid: BoardGrid = [];
  for (const [r, row] of value.entries()) {
    if (!Array.isArray(row)) {
      return createErr(new InvalidGridError(`row ${r} is not an array`));
    }
    if (row.length !== COLUMNS) {
      return createErr(
        new InvalidGridError(
          `row ${r} has ${row.length} columns, expected ${COLUMNS}`,
        ),
      );
    }
    const codes: number[] = [];
    for (const [c, code] of row.entries()) {
      if (!isValidCode(code)) {
        return createErr(
          new InvalidGridError(
            `code ${String(code)} at row ${r}, column ${c} is outside 0-${MAX_CODE}`,
          ),
        );
      }
      codes.push(code);
    }
    grid.push(codes);
  }
  return createOk(grid);
}

/** Decode each row to its display glyphs (full width). */
export function gridToLines(grid: BoardGrid): string[] {
  return grid.map((row) => row.map(decodeCode).join(""));
}

/**
 * Readable text of a grid: rows trimmed, blank rows dropped.
 * Used to compare what was sent with what the board shows.
 */
export function gridToText(grid: BoardGrid): string {
  return gridToLines(grid)
    .map((line) => line.trim())
    .filter((line) => line !== "")
    .join("\n");
}
