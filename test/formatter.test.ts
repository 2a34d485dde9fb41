import fc from "fast-check";
import { isErr, isOk, unwrapErr, unwrapOk } from "option-t/plain_result";
import { describe, expect, it } from "vitest";
import { formatMessage, layoutLines, wrapCells } from "../src/board/formatter.ts";
import {
  blankGrid,
  COLUMNS,
  gridToLines,
  gridToText,
  ROWS,
} from "../src/board/grid.ts";

function format(text: string) {
  const result = formatMessage(text);
  if (isErr(result)) throw unwrapErr(result);
  return unwrapOk(result);
}

describe("formatMessage", () => {
  it("uppercases and centers a short message", () => {
    const { grid, lines, truncated } = format("Hello World");
    expect(lines).toEqual(["HELLO WORLD"]);
    expect(truncated).toBe(false);
    expect(grid[2]).toEqual([
      0, 0, 0, 0, 0, 8, 5, 12, 12, 15, 0, 23, 15, 18, 12, 4, 0, 0, 0, 0, 0, 0,
    ]);
    for (const r of [0, 1, 3, 4, 5]) {
      expect(grid[r]).toEqual(blankGrid()[r]);
    }
  });

  it("word-wraps greedily at 22 columns", () => {
    const { grid, lines } = format(
      "the quick brown fox jumps over the lazy dog",
    );
    expect(lines).toEqual([
      "THE QUICK BROWN FOX",
      "JUMPS OVER THE LAZY",
      "DOG",
    ]);
    // three lines: one blank row above, two below
    expect(gridToLines(grid)[3]).toBe(`${" ".repeat(9)}DOG${" ".repeat(10)}`);
    expect(gridToText(grid)).toBe(
      "THE QUICK BROWN FOX\nJUMPS OVER THE LAZY\nDOG",
    );
  });

  it("hard-splits words longer than a row", () => {
    expect(format("HI ABCDEFGHIJKLMNOPQRSTUVWXYZ").lines).toEqual([
      "HI",
      "ABCDEFGHIJKLMNOPQRSTUV",
      "WXYZ",
    ]);
  });

  it("keeps the first six lines and flags truncation", () => {
    const { grid, lines, truncated } = format("1\n2\n3\n4\n5\n6\n7\n8");
    expect(lines).toEqual(["1", "2", "3", "4", "5", "6"]);
    expect(truncated).toBe(true);
    expect(gridToText(grid)).toBe("1\n2\n3\n4\n5\n6");
  });

  it("keeps blank paragraphs as blank lines", () => {
    const { grid, lines } = format("A\n\nB");
    expect(lines).toEqual(["A", "", "B"]);
    const rows = gridToLines(grid);
    expect(rows[1].trim()).toBe("A");
    expect(rows[2].trim()).toBe("");
    expect(rows[3].trim()).toBe("B");
  });

  it("collapses spaces and normalizes tabs and CRLF", () => {
    expect(format("  A   B  ").lines).toEqual(["A B"]);
    expect(format("a\tb\r\nc").lines).toEqual(["A B", "C"]);
  });

  it("formats empty text as a blank board", () => {
    const { grid, lines, truncated } = format("");
    expect(grid).toEqual(blankGrid());
    expect(lines).toEqual([""]);
    expect(truncated).toBe(false);
  });

  it("treats {NN} as a single tile", () => {
    const { grid, lines } = format("{63} hi {66}");
    expect(lines).toEqual(["🟥 HI 🟩"]);
    expect(grid[2].slice(8, 14)).toEqual([63, 0, 8, 9, 0, 66]);
  });

  it("keeps escaped blanks as literal cells", () => {
    const { grid, lines } = format("A{0}{0}{0}B");
    expect(lines).toEqual(["A   B"]);
    expect(grid[2].slice(8, 13)).toEqual([1, 0, 0, 0, 2]);
    expect(grid.flat().every((code) => code >= 0)).toBe(true);
  });

  it("reports unsupported characters once each, in order", () => {
    const result = formatMessage("héllo ~ é ~");
    expect(isErr(result)).toBe(true);
    const error = unwrapErr(result);
    expect(error.kind).toBe("FormatError");
    expect(error.message).toBe('Unsupported characters: "É", "~"');
  });

  it("rejects out-of-range escapes", () => {
    expect(unwrapErr(formatMessage("{99}")).message).toBe(
      'Unsupported characters: "{", "}"',
    );
  });

  it("always yields a full grid of valid codes", () => {
    const alphabet = [..."ABCXYZabcxyz0189 .,!?-'\n"];
    fc.assert(
      fc.property(
        fc
          .array(fc.constantFrom(...alphabet), { maxLength: 300 })
          .map((chars) => chars.join("")),
        (text) => {
          const { grid, lines, truncated } = format(text);
          expect(grid).toHaveLength(ROWS);
          for (const row of grid) {
            expect(row).toHaveLength(COLUMNS);
            for (const code of row) {
              expect(code >= 0 && code <= 71).toBe(true);
            }
          }
          expect(lines.length).toBeLessThanOrEqual(ROWS);
          for (const line of lines) {
            expect(line.length).toBeLessThanOrEqual(COLUMNS);
          }
          if (!truncated) {
            const visible = text.replace(/\s/g, "").length;
            const placed = grid.flat().filter((c) => c !== 0).length;
            expect(placed).toBe(visible);
          }
        },
      ),
    );
  });

  it("never throws on arbitrary input", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 200 }), (text) => {
        const result = formatMessage(text);
        if (!isOk(result)) {
          expect(unwrapErr(result).kind).toBe("FormatError");
        }
      }),
    );
  });
});

describe("wrapCells", () => {
  it("returns one empty line for no cells", () => {
    expect(wrapCells([])).toEqual([[]]);
  });

  it("fits a 22-cell word on one line", () => {
    const word = Array.from({ length: 22 }, () => 1);
    expect(wrapCells(word)).toEqual([word]);
  });
});

describe("layoutLines", () => {
  it("keeps spacing and aligns left", () => {
    const result = layoutLines(["Gold  bid:1.00", "", "x"]);
    const { grid, lines, truncated } = unwrapOk(result);
    expect(lines).toEqual(["GOLD  BID:1.00", "", "X"]);
    expect(truncated).toBe(false);
    const rows = gridToLines(grid);
    expect(rows[1]).toBe(`GOLD  BID:1.00${" ".repeat(8)}`);
    expect(rows[3]).toBe(`X${" ".repeat(21)}`);
  });

  it("centers when asked", () => {
    const { grid } = unwrapOk(layoutLines(["AB"], { align: "center" }));
    expect(grid[2][10]).toBe(1);
    expect(grid[2][11]).toBe(2);
  });

  it("cuts long lines and extra rows", () => {
    const { lines, truncated } = unwrapOk(
      layoutLines(["ABCDEFGHIJKLMNOPQRSTUVWXYZ", "1", "2", "3", "4", "5", "6"]),
    );
    expect(lines).toEqual(["ABCDEFGHIJKLMNOPQRSTUV", "1", "2", "3", "4", "5"]);
    expect(truncated).toBe(true);
  });

  it("rejects unsupported characters", () => {
    expect(unwrapErr(layoutLines(["a_b"])).kind).toBe("FormatError");
  });
});
