import { ROOT_STYLE, type StyleState } from "./style-state.js";

/** Open tags allowed at once, not counting the implicit root. */
export const MAX_DEPTH = 5;

/**
 * Fixed-capacity stack of style states. The root state is implicit: it is
 * what `top` returns when nothing is open, and it can never be popped.
 */
export class NestingStack {
  private readonly frames: (StyleState | undefined)[];
  private length = 0;

  constructor(readonly capacity: number = MAX_DEPTH) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError("NestingStack capacity must be a positive integer");
    }
    this.frames = new Array<StyleState | undefined>(capacity);
  }

  get depth(): number {
    return this.length;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  get isFull(): boolean {
    return this.length === this.capacity;
  }

  get top(): StyleState {
    return this.frames[this.length - 1] ?? ROOT_STYLE;
  }

  /** Returns false (and leaves the stack untouched) when full. */
  push(state: StyleState): boolean {
    if (this.isFull) return false;
    this.frames[this.length] = state;
    this.length++;
    return true;
  }

  /** Returns false when only the root remains. */
  pop(): boolean {
    if (this.isEmpty) return false;
    this.length--;
    this.frames[this.length] = undefined;
    return true;
  }
}
