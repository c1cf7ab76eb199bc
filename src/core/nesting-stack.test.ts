import { describe, expect, it } from "vitest";
import { MAX_DEPTH, NestingStack } from "./nesting-stack.js";
import { mergeStyle, ROOT_STYLE } from "./style-state.js";

describe("NestingStack", () => {
  it("starts empty with the root state on top", () => {
    const stack = new NestingStack();
    expect(stack.depth).toBe(0);
    expect(stack.isEmpty).toBe(true);
    expect(stack.top).toBe(ROOT_STYLE);
  });

  it("defaults to MAX_DEPTH frames", () => {
    expect(new NestingStack().capacity).toBe(MAX_DEPTH);
    expect(MAX_DEPTH).toBe(5);
  });

  it("pushes and pops in LIFO order", () => {
    const stack = new NestingStack();
    const red = mergeStyle(ROOT_STYLE, { fg: "red" });
    const bold = mergeStyle(red, { bold: true });

    expect(stack.push(red)).toBe(true);
    expect(stack.push(bold)).toBe(true);
    expect(stack.depth).toBe(2);
    expect(stack.top).toBe(bold);

    expect(stack.pop()).toBe(true);
    expect(stack.top).toBe(red);
    expect(stack.pop()).toBe(true);
    expect(stack.top).toBe(ROOT_STYLE);
  });

  it("refuses to pop the root", () => {
    const stack = new NestingStack();
    expect(stack.pop()).toBe(false);
    expect(stack.depth).toBe(0);
  });

  it("refuses to push past its capacity", () => {
    const stack = new NestingStack(2);
    expect(stack.push(ROOT_STYLE)).toBe(true);
    expect(stack.push(ROOT_STYLE)).toBe(true);
    expect(stack.isFull).toBe(true);

    const extra = mergeStyle(ROOT_STYLE, { dim: true });
    expect(stack.push(extra)).toBe(false);
    expect(stack.depth).toBe(2);
    expect(stack.top).toBe(ROOT_STYLE);
  });

  it("rejects invalid capacity", () => {
    expect(() => new NestingStack(0)).toThrow(RangeError);
    expect(() => new NestingStack(1.5)).toThrow(RangeError);
  });
});
