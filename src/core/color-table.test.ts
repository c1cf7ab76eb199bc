import { describe, expect, it } from "vitest";
import { backgroundCode, COLOR_LETTERS, colorFromLetter, foregroundCode } from "./color-table.js";

describe("color table", () => {
  it("maps every letter to its color", () => {
    expect(COLOR_LETTERS.map((letter) => colorFromLetter(letter))).toEqual([
      "default",
      "black",
      "red",
      "green",
      "yellow",
      "blue",
      "magenta",
      "cyan",
      "white",
    ]);
  });

  it("has no entry for other letters", () => {
    expect(colorFromLetter("x")).toBeUndefined();
    expect(colorFromLetter("R")).toBeUndefined();
    expect(colorFromLetter("")).toBeUndefined();
  });

  it("gives foreground base codes", () => {
    expect(foregroundCode("black")).toBe(30);
    expect(foregroundCode("red")).toBe(31);
    expect(foregroundCode("white")).toBe(37);
    expect(foregroundCode("default")).toBe(39);
  });

  it("shifts bright foregrounds by 60", () => {
    expect(foregroundCode("black", true)).toBe(90);
    expect(foregroundCode("cyan", true)).toBe(96);
    expect(foregroundCode("default", true)).toBe(99);
  });

  it("derives backgrounds by adding 10", () => {
    expect(backgroundCode("black")).toBe(40);
    expect(backgroundCode("blue")).toBe(44);
    expect(backgroundCode("default")).toBe(49);
  });
});
