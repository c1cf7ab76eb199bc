/**
 * Tag grammar scanner.
 *
 * Walks the markup one code point at a time through an explicit state
 * machine and reports what it finds to a {@link MarkupSink}. It never builds
 * output itself, so rendering and stripping share one grammar and one set of
 * diagnostics.
 *
 * Grammar:
 *   - `\\` and `\[` are escapes for a literal `\` and `[`.
 *   - `[` + one or more directives + `]` opens a tag. Directives are `!` bold,
 *     `-` dim, `#` italic, `_` underline, `*` bright, a color letter for the
 *     foreground and `:` + color letter for the background.
 *   - `[/]` closes the innermost open tag.
 * @module
 */

import { MarkupSyntaxError } from "../errors.js";
import { colorFromLetter } from "./color-table.js";
import { NestingStack } from "./nesting-stack.js";
import { mergeStyle, type StyleState, type TagDirective } from "./style-state.js";

/** Receives scanner events in input order. */
export interface MarkupSink {
  /** A run of literal text, escapes already resolved. Never empty. */
  text(chunk: string): void;
  /** A tag opened; `style` is the merged state now in effect. */
  open(style: StyleState, depth: number): void;
  /** A tag closed; `style` is the enclosing state, the root one at depth 0. */
  close(style: StyleState, depth: number): void;
}

type ScanState = "literal" | "escape" | "tag-start" | "close-tag" | "tag-body" | "background";

class MarkupScanner {
  private offset = 0;
  private readonly stack = new NestingStack();
  private directive: TagDirective = {};

  constructor(
    private readonly input: string,
    private readonly sink: MarkupSink,
  ) {}

  run(): void {
    let state: ScanState | null = "literal";
    while (state !== null) {
      state = this.step(state);
    }
  }

  private step(state: ScanState): ScanState | null {
    switch (state) {
      case "literal":
        return this.literal();
      case "escape":
        return this.escape();
      case "tag-start":
        return this.tagStart();
      case "close-tag":
        return this.closeTag();
      case "tag-body":
        return this.tagBody();
      case "background":
        return this.background();
      default: {
        const exhaustive: never = state;
        throw new Error(`Unhandled scan state: ${String(exhaustive)}`);
      }
    }
  }

  /** Next code point, or undefined at end of input. */
  private peek(): string | undefined {
    const codePoint = this.input.codePointAt(this.offset);
    return codePoint === undefined ? undefined : String.fromCodePoint(codePoint);
  }

  private consume(ch: string): void {
    this.offset += ch.length;
  }

  private literal(): ScanState | null {
    const start = this.offset;
    for (;;) {
      const ch = this.peek();
      switch (ch) {
        case undefined:
          this.flush(start);
          if (!this.stack.isEmpty) {
            throw MarkupSyntaxError.of("unbalanced-opening-tag", this.offset);
          }
          return null;
        case "\\":
          this.flush(start);
          this.consume(ch);
          return "escape";
        case "[":
          this.flush(start);
          this.consume(ch);
          return "tag-start";
        default:
          this.consume(ch);
      }
    }
  }

  private flush(start: number): void {
    if (this.offset > start) {
      this.sink.text(this.input.slice(start, this.offset));
    }
  }

  private escape(): ScanState {
    const ch = this.peek();
    switch (ch) {
      case undefined:
        throw MarkupSyntaxError.of("incomplete-escape", this.offset);
      case "\\":
      case "[":
        this.sink.text(ch);
        this.consume(ch);
        return "literal";
      default:
        throw MarkupSyntaxError.of("invalid-escape", this.offset);
    }
  }

  private tagStart(): ScanState {
    const ch = this.peek();
    switch (ch) {
      case undefined:
        throw MarkupSyntaxError.of("unterminated-opening-tag", this.offset);
      case "/":
        this.consume(ch);
        return "close-tag";
      case "]":
        throw MarkupSyntaxError.of("empty-opening-tag", this.offset);
      default:
        // Not consumed: the body state reads it as its first directive.
        this.directive = {};
        return "tag-body";
    }
  }

  private closeTag(): ScanState {
    const ch = this.peek();
    switch (ch) {
      case "]":
        if (!this.stack.pop()) {
          throw MarkupSyntaxError.of("unbalanced-closing-tag", this.offset);
        }
        this.consume(ch);
        this.sink.close(this.stack.top, this.stack.depth);
        return "literal";
      default:
        throw MarkupSyntaxError.of("malformed-closing-tag", this.offset);
    }
  }

  private tagBody(): ScanState {
    for (;;) {
      const ch = this.peek();
      if (ch === undefined) {
        throw MarkupSyntaxError.of("unterminated-opening-tag", this.offset);
      }
      switch (ch) {
        case "]":
          this.openTag();
          this.consume(ch);
          return "literal";
        case ":":
          this.consume(ch);
          return "background";
        case "!":
          this.directive.bold = true;
          break;
        case "-":
          this.directive.dim = true;
          break;
        case "#":
          this.directive.italic = true;
          break;
        case "_":
          this.directive.underline = true;
          break;
        case "*":
          this.directive.bright = true;
          break;
        default: {
          const color = colorFromLetter(ch);
          if (color === undefined) {
            throw MarkupSyntaxError.unknownColorLetter(ch, this.offset);
          }
          this.directive.fg = color;
        }
      }
      this.consume(ch);
    }
  }

  private background(): ScanState {
    const ch = this.peek();
    if (ch === undefined) {
      throw MarkupSyntaxError.of("missing-color-letter", this.offset);
    }
    const color = colorFromLetter(ch);
    if (color === undefined) {
      throw MarkupSyntaxError.unknownColorLetter(ch, this.offset);
    }
    this.directive.bg = color;
    this.consume(ch);
    return "tag-body";
  }

  private openTag(): void {
    const style = mergeStyle(this.stack.top, this.directive);
    if (!this.stack.push(style)) {
      throw MarkupSyntaxError.of("max-depth-exceeded", this.offset);
    }
    this.sink.open(style, this.stack.depth);
  }
}

/**
 * Scan `markup`, reporting text and tag transitions to `sink`.
 *
 * Throws {@link MarkupSyntaxError} on the first grammar violation; events
 * already delivered to the sink before that point should be discarded.
 */
export function scanMarkup(markup: string, sink: MarkupSink): void {
  new MarkupScanner(markup, sink).run();
}
