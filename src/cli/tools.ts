/**
 * The three command-line tools. Each takes one positional argument and
 * writes its result to stdout without a trailing newline; markup errors are
 * written to stdout as `ERROR: <message>` with exit code 1.
 * @module
 */

import { LogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { escape } from "../core/escape.js";
import { format, strip } from "../core/markup.js";
import { terminalSupport } from "../core/terminal-support.js";
import {
  ConfigError,
  errorMessage,
  MarkupSyntaxError,
  toSgrTagError,
  UsageError,
} from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { CliConfig, ToolName } from "../types/config.js";
import { parseToolArgs, usage } from "./args.js";

export interface ToolIO {
  stdout(text: string): void;
  stderr(text: string): void;
  env: Record<string, string | undefined>;
  /** Whether stdout is a terminal; consulted by `--when auto`. */
  isTTY?: boolean;
  /** Overrides the stderr JSON logger the tool would otherwise create. */
  logger?: Logger;
}

export function nodeToolIO(): ToolIO {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
    isTTY: process.stdout.isTTY,
  };
}

function transform(config: CliConfig, io: ToolIO): string {
  switch (config.tool) {
    case "render":
      return format(config.input, {
        when: config.when,
        probe: { isTTY: io.isTTY, env: io.env },
      });
    case "escape":
      return escape(config.input);
    case "strip":
      return strip(config.input);
  }
}

/** Run `tool` with the arguments that follow the executable name; returns the exit code. */
export function runTool(tool: ToolName, argv: readonly string[], io: ToolIO): number {
  let config: CliConfig;
  try {
    const parsed = parseToolArgs(tool, argv, io.env);
    if (parsed.kind === "help") {
      io.stdout(usage(tool));
      return 0;
    }
    config = parsed.config;
  } catch (err) {
    if (err instanceof UsageError || err instanceof ConfigError) {
      io.stderr(`Error: ${err.message}\nRun with --help for usage.\n`);
      return 1;
    }
    throw err;
  }

  const logger =
    io.logger ??
    new StructuredLogger({
      component: `sgrtag-${tool}`,
      level: config.verbose ? LogLevel.DEBUG : LogLevel.WARN,
      writer: (line) => io.stderr(`${line}\n`),
    });

  try {
    const output = transform(config, io);
    if (config.tool === "render" && config.when === "auto") {
      logger.info("detected terminal support", {
        support: terminalSupport({ isTTY: io.isTTY, env: io.env }),
      });
    }
    logger.debug?.("transformed input", {
      tool,
      when: config.when,
      inputLength: config.input.length,
      outputLength: output.length,
    });
    io.stdout(output);
    return 0;
  } catch (err) {
    if (err instanceof MarkupSyntaxError) {
      logger.debug?.("markup rejected", { error: err });
      io.stdout(`ERROR: ${err.message}`);
      return 1;
    }
    logger.error("unexpected failure", { error: toSgrTagError(err) });
    io.stdout(`ERROR: ${errorMessage(err)}`);
    return 1;
  }
}
