/**
 * The eight basic terminal colors plus "default", keyed by their markup letter.
 * @module
 */

export type Color =
  | "default"
  | "black"
  | "red"
  | "green"
  | "yellow"
  | "blue"
  | "magenta"
  | "cyan"
  | "white";

/** Foreground SGR code of each color; backgrounds are +10, bright foregrounds +60. */
const FOREGROUND_BASE: Record<Color, number> = {
  default: 39,
  black: 30,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  white: 37,
};

const BY_LETTER: ReadonlyMap<string, Color> = new Map<string, Color>([
  ["d", "default"],
  ["k", "black"],
  ["r", "red"],
  ["g", "green"],
  ["y", "yellow"],
  ["b", "blue"],
  ["m", "magenta"],
  ["c", "cyan"],
  ["w", "white"],
]);

export const COLOR_LETTERS: readonly string[] = [...BY_LETTER.keys()];

export function colorFromLetter(letter: string): Color | undefined {
  return BY_LETTER.get(letter);
}

export function foregroundCode(color: Color, bright = false): number {
  return FOREGROUND_BASE[color] + (bright ? 60 : 0);
}

export function backgroundCode(color: Color): number {
  return FOREGROUND_BASE[color] + 10;
}
