/**
 * Public entry points over the tag scanner: rendering to SGR sequences,
 * stripping to plain text, structured parsing and terminal-aware formatting.
 * @module
 */

import { type FormatOptions, resolveFormatOptions } from "../types/config.js";
import { type MarkupSink, scanMarkup } from "./markup-parser.js";
import { renderSgr } from "./sgr.js";
import type { StyleState } from "./style-state.js";
import { hasTerminalSupport } from "./terminal-support.js";

export type MarkupSegment =
  | { kind: "text"; text: string }
  | { kind: "open" | "close"; style: StyleState; depth: number };

/**
 * Render markup to text with SGR escape sequences.
 *
 * Every tag transition emits a full sequence starting with a reset, so
 * closing a tag restores exactly the enclosing style and closing the
 * outermost one emits `ESC[0m`.
 *
 * @throws {MarkupSyntaxError} on the first grammar violation
 */
export function render(input: string): string {
  let out = "";
  scanMarkup(input, {
    text(chunk) {
      out += chunk;
    },
    open(style) {
      out += renderSgr(style);
    },
    close(style) {
      out += renderSgr(style);
    },
  });
  return out;
}

/**
 * Remove tags and resolve escapes. Fails exactly where {@link render} does.
 *
 * @throws {MarkupSyntaxError} on the first grammar violation
 */
export function strip(input: string): string {
  let out = "";
  scanMarkup(input, {
    text(chunk) {
      out += chunk;
    },
    open() {},
    close() {},
  });
  return out;
}

class SegmentCollector implements MarkupSink {
  readonly segments: MarkupSegment[] = [];

  text(chunk: string): void {
    const last = this.segments[this.segments.length - 1];
    if (last?.kind === "text") {
      last.text += chunk;
    } else {
      this.segments.push({ kind: "text", text: chunk });
    }
  }

  open(style: StyleState, depth: number): void {
    this.segments.push({ kind: "open", style, depth });
  }

  close(style: StyleState, depth: number): void {
    this.segments.push({ kind: "close", style, depth });
  }
}

/**
 * Parse markup into text runs and tag transitions. Adjacent text (escapes
 * included) is merged into one segment.
 *
 * @throws {MarkupSyntaxError} on the first grammar violation
 */
export function parseMarkup(input: string): MarkupSegment[] {
  const collector = new SegmentCollector();
  scanMarkup(input, collector);
  return collector.segments;
}

/**
 * Render or strip depending on `options.when`: `"always"` renders, `"never"`
 * strips and `"auto"` renders only when the terminal supports styling.
 * Syntax errors are raised in every mode.
 *
 * @throws {ConfigError} when the options are invalid
 * @throws {MarkupSyntaxError} on the first grammar violation
 */
export function format(input: string, options?: FormatOptions): string {
  const { when, probe } = resolveFormatOptions(options);
  switch (when) {
    case "always":
      return render(input);
    case "never":
      return strip(input);
    case "auto":
      return hasTerminalSupport(probe) ? render(input) : strip(input);
  }
}
