/**
 * Text to grid formatting.
 *
 * Policy for {@link formatMessage}:
 *  1. Tabs become spaces, CRLF becomes LF, text is uppercased.
 *  2. `{NN}` with a valid code is a single literal cell (e.g. `{63}` red).
 *     `{0}` is a blank that wrapping never splits on or collapses.
 *  3. Each LF-separated paragraph is word-wrapped greedily to 22 cells.
 *     Runs of spaces collapse; words longer than a row are hard-split.
 *     An empty paragraph is one blank line.
 *  4. Lines past the sixth are dropped and `truncated` is set.
 *  5. Lines are centered horizontally, the block vertically. Odd padding
 *     goes right and below.
 */
import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import { BoardFormatError } from "../errors.ts";
import { BLANK, decodeCode, encodeChar, isValidCode } from "./charset.ts";
import { type BoardGrid, blankGrid, COLUMNS, ROWS } from "./grid.ts";

export interface FormattedMessage {
  grid: BoardGrid;
  /** Visible text of each placed line, before padding. */
  lines: string[];
  /** True when the text needed more than {@link ROWS} lines. */
  truncated: boolean;
}

export type Alignment = "left" | "center";

export interface LayoutOptions {
  align?: Alignment;
}

const CODE_ESCAPE = /^\{(\d{1,2})\}/;

// Cell for an escaped `{0}`; placed as BLANK.
const LITERAL_BLANK = -1;

/** Encode one line of text into cells, collecting unsupported characters. */
function encodeLine(line: string, unsupported: Set<string>): number[] {
  const cells: number[] = [];
  let i = 0;
  while (i < line.length) {
    const escape = CODE_ESCAPE.exec(line.slice(i));
    if (escape) {
      const code = Number(escape[1]);
      if (isValidCode(code)) {
        cells.push(code === BLANK ? LITERAL_BLANK : code);
        i += escape[0].length;
        continue;
      }
    }
    const cp = line.codePointAt(i) ?? 0;
    const ch = String.fromCodePoint(cp);
    const code = encodeChar(ch);
    if (code === undefined) {
      unsupported.add(ch);
    } else {
      cells.push(code);
    }
    i += ch.length;
  }
  return cells;
}

function normalize(text: string): string[] {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/\t/g, " ")
    .toUpperCase()
    .split("\n");
}

function encodeParagraphs(
  paragraphs: string[],
): Result<number[][], BoardFormatError> {
  const unsupported = new Set<string>();
  const encoded = paragraphs.map((p) => encodeLine(p, unsupported));
  if (unsupported.size > 0) {
    const list = [...unsupported].map((ch) => JSON.stringify(ch)).join(", ");
    return createErr(new BoardFormatError(`Unsupported characters: ${list}`));
  }
  return createOk(encoded);
}

/** Greedy word wrap of one paragraph's cells to {@link COLUMNS}. */
export function wrapCells(cells: number[]): number[][] {
  const words: number[][] = [];
  let word: number[] = [];
  for (const cell of cells) {
    if (cell === BLANK) {
      if (word.length > 0) words.push(word);
      word = [];
    } else {
      word.push(cell);
    }
  }
  if (word.length > 0) words.push(word);

  const lines: number[][] = [];
  let line: number[] = [];
  for (const w of words) {
    if (w.length > COLUMNS) {
      if (line.length > 0) lines.push(line);
      let rest = w;
      while (rest.length > COLUMNS) {
        lines.push(rest.slice(0, COLUMNS));
        rest = rest.slice(COLUMNS);
      }
      line = rest;
    } else if (line.length === 0) {
      line = [...w];
    } else if (line.length + 1 + w.length <= COLUMNS) {
      line.push(BLANK, ...w);
    } else {
      lines.push(line);
      line = [...w];
    }
  }
  // Also covers the empty paragraph: one blank line.
  if (line.length > 0 || lines.length === 0) lines.push(line);
  return lines;
}

function place(lines: number[][], align: Alignment): BoardGrid {
  const grid = blankGrid();
  const top = Math.floor((ROWS - lines.length) / 2);
  for (const [i, cells] of lines.entries()) {
    const left =
      align === "center" ? Math.floor((COLUMNS - cells.length) / 2) : 0;
    const row = grid[top + i];
    if (!row) continue;
    for (const [j, code] of cells.entries()) {
      row[left + j] = code === LITERAL_BLANK ? BLANK : code;
    }
  }
  return grid;
}

function cellsToText(cells: number[]): string {
  return cells.map(decodeCode).join("");
}

/** Format free text into a centered board grid. */
export function formatMessage(
  text: string,
): Result<FormattedMessage, BoardFormatError> {
  const encoded = encodeParagraphs(normalize(text));
  if (isErr(encoded)) return encoded;

  const wrapped = unwrapOk(encoded).flatMap(wrapCells);
  const kept = wrapped.slice(0, ROWS);
  return createOk({
    grid: place(kept, "center"),
    lines: kept.map(cellsToText),
    truncated: wrapped.length > ROWS,
  });
}

/**
 * Place pre-composed lines verbatim: spacing kept, no wrapping. Each line
 * is cut at {@link COLUMNS} cells and only the first {@link ROWS} lines
 * are used.
 */
export function layoutLines(
  lines: string[],
  options: LayoutOptions = {},
): Result<FormattedMessage, BoardFormatError> {
  const { align = "left" } = options;
  const encoded = encodeParagraphs(lines.map((l) => l.toUpperCase()));
  if (isErr(encoded)) return encoded;

  const all = unwrapOk(encoded);
  const kept = all.slice(0, ROWS).map((cells) => cells.slice(0, COLUMNS));
  return createOk({
    grid: place(kept, align),
    lines: kept.map(cellsToText),
    truncated:
      all.length > ROWS || all.some((cells) => cells.length > COLUMNS),
  });
}
