// Vestaboard character codes.
// The table lives in charset.json; this module builds the lookups once.

import charset from "./charset.json";

/** Largest code the board accepts. Codes 0..MAX_CODE are valid. */
export const MAX_CODE: number = charset.maxCode;

/** Code of the blank tile. */
export const BLANK = 0;

/** Named colour and fill tiles, addressable in text as `{NN}`. */
export type TileName =
  | "red"
  | "orange"
  | "yellow"
  | "green"
  | "blue"
  | "violet"
  | "white"
  | "black"
  | "filled";

const glyphByCode = new Map<number, string>();
const codeByGlyph = new Map<string, number>();
const tileByCode = new Map<number, string>();

for (const entry of charset.characters) {
  glyphByCode.set(entry.code, entry.glyph);
  if ("tile" in entry && typeof entry.tile === "string") {
    tileByCode.set(entry.code, entry.tile);
  } else {
    codeByGlyph.set(entry.glyph, entry.code);
  }
}

/** True for an integer the board accepts as a character code. */
export function isValidCode(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_CODE
  );
}

/**
 * Code for a single printable character, or `undefined` when the board has
 * no glyph for it. Letters are matched case-insensitively.
 */
export function encodeChar(ch: string): number | undefined {
  return codeByGlyph.get(ch.toUpperCase());
}

/** Display glyph for a code; in-range codes without a glyph render blank. */
export function decodeCode(code: number): string {
  return glyphByCode.get(code) ?? " ";
}

/** Colour/fill tile name for a code, if it is one. */
export function tileName(code: number): TileName | undefined {
  const name = tileByCode.get(code);
  return isTileName(name) ? name : undefined;
}

function isTileName(value: string | undefined): value is TileName {
  switch (value) {
    case "red":
    case "orange":
    case "yellow":
    case "green":
    case "blue":
    case "violet":
    case "white":
    case "black":
    case "filled":
      return true;
    default:
      return false;
  }
}
