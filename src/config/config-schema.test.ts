import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import {
  DEFAULT_FORMAT_OPTIONS,
  parseColorMode,
  resolveCliConfig,
  resolveFormatOptions,
} from "../types/config.js";

describe("format options validation", () => {
  it("applies defaults when nothing is given", () => {
    expect(resolveFormatOptions()).toEqual(DEFAULT_FORMAT_OPTIONS);
    expect(resolveFormatOptions({})).toEqual({ when: "auto" });
  });

  it("keeps a valid mode", () => {
    expect(resolveFormatOptions({ when: "never" }).when).toBe("never");
  });

  it("keeps a probe", () => {
    const probe = { isTTY: true, env: { TERM: "xterm" } };
    expect(resolveFormatOptions({ probe }).probe).toEqual(probe);
  });

  it("rejects an unknown mode", () => {
    const options = JSON.parse('{ "when": "sometimes" }');
    expect(() => resolveFormatOptions(options)).toThrow(ConfigError);
    expect(() => resolveFormatOptions(options)).toThrow("Invalid configuration");
  });

  it("rejects unknown keys", () => {
    const options = JSON.parse('{ "color": true }');
    expect(() => resolveFormatOptions(options)).toThrow("Invalid configuration");
  });

  it("rejects a malformed probe", () => {
    const options = JSON.parse('{ "probe": { "isTTY": "yes", "env": {} } }');
    expect(() => resolveFormatOptions(options)).toThrow(ConfigError);
  });

  it("keeps the zod issue as the cause", () => {
    const options = JSON.parse('{ "when": 1 }');
    let caught: unknown;
    try {
      resolveFormatOptions(options);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.cause !== undefined).toBe(true);
  });
});

describe("parseColorMode", () => {
  it("accepts the three modes", () => {
    expect(parseColorMode("auto", "--when")).toBe("auto");
    expect(parseColorMode("always", "--when")).toBe("always");
    expect(parseColorMode("never", "--when")).toBe("never");
  });

  it("names the source of a bad value", () => {
    expect(() => parseColorMode("ALWAYS", "SGRTAG_WHEN")).toThrow(
      'Invalid configuration: SGRTAG_WHEN must be one of auto, always, never (got "ALWAYS")',
    );
  });
});

describe("cli config validation", () => {
  it("accepts a complete config", () => {
    const config = { tool: "strip" as const, input: "x", when: "never" as const, verbose: false };
    expect(resolveCliConfig(config)).toEqual(config);
  });

  it("rejects an unknown tool", () => {
    const config = JSON.parse('{ "tool": "paint", "input": "x", "when": "never", "verbose": false }');
    expect(() => resolveCliConfig(config)).toThrow(ConfigError);
  });
});
