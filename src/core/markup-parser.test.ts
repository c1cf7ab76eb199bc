import { describe, expect, it } from "vitest";
import { type MarkupSink, scanMarkup } from "./markup-parser.js";
import type { StyleState } from "./style-state.js";

interface Recording {
  /** `text:<chunk>`, `open:<depth>` or `close:<depth>` per event. */
  log: string[];
  /** The style handed to each open and close, in order. */
  styles: StyleState[];
  error?: unknown;
}

function record(input: string): Recording {
  const recording: Recording = { log: [], styles: [] };
  const sink: MarkupSink = {
    text(chunk) {
      recording.log.push(`text:${chunk}`);
    },
    open(style, depth) {
      recording.log.push(`open:${depth}`);
      recording.styles.push(style);
    },
    close(style, depth) {
      recording.log.push(`close:${depth}`);
      recording.styles.push(style);
    },
  };
  try {
    scanMarkup(input, sink);
  } catch (error) {
    recording.error = error;
  }
  return recording;
}

describe("scanMarkup", () => {
  it("delivers literal runs as single chunks", () => {
    expect(record("hello world").log).toEqual(["text:hello world"]);
  });

  it("delivers each resolved escape as its own chunk", () => {
    expect(record("a\\[b\\\\c").log).toEqual(["text:a", "text:[", "text:b", "text:\\", "text:c"]);
  });

  it("reports opens and closes with the depth after the transition", () => {
    expect(record("[!]a[:c]b[/][/]").log).toEqual([
      "open:1",
      "text:a",
      "open:2",
      "text:b",
      "close:1",
      "close:0",
    ]);
  });

  it("hands the merged state to open and the enclosing state to close", () => {
    const { styles } = record("[!]a[:c]b[/][/]");
    expect(styles[1]).toEqual({
      bold: true,
      dim: false,
      italic: false,
      underline: false,
      bright: false,
      bg: "cyan",
    });
    expect(styles[2]).toEqual(styles[0]);
    expect(styles[2]).toEqual({
      bold: true,
      dim: false,
      italic: false,
      underline: false,
      bright: false,
    });
  });

  it("never emits empty text chunks", () => {
    expect(record("[r][/][g][/]").log).toEqual(["open:1", "close:0", "open:1", "close:0"]);
  });

  it("stops at the first error after delivering what it had scanned", () => {
    const { log, error } = record("ok [r]x[q]");
    expect(error).toBeInstanceOf(Error);
    expect(log).toEqual(["text:ok ", "open:1", "text:x"]);
  });

  it("starts every call from an empty stack", () => {
    expect(record("[r]").error).toBeInstanceOf(Error);
    expect(record("[/]").error).toBeInstanceOf(Error);
    expect(record("[r]x[/]").error).toBeUndefined();
  });
});
