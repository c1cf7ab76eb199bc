import type { z } from "zod";
import {
  cliConfigSchema,
  colorModeSchema,
  formatOptionsSchema,
  toolNameSchema,
} from "../config/config-schema.js";
import { ConfigError } from "../errors.js";

/** When `format` emits SGR codes. */
export type ColorMode = z.infer<typeof colorModeSchema>;

/** The facts terminal detection looks at; defaults to `process.stdout` and `process.env`. */
export interface TerminalProbe {
  isTTY?: boolean;
  env: Record<string, string | undefined>;
}

/** Options for {@link format}. */
export interface FormatOptions {
  when?: ColorMode; // default: "auto"
  probe?: TerminalProbe; // default: the current process
}

/** Format options with defaults applied. */
export type ResolvedFormatOptions = Required<Pick<FormatOptions, "when">> &
  Pick<FormatOptions, "probe">;

export const DEFAULT_FORMAT_OPTIONS: ResolvedFormatOptions = {
  when: "auto",
};

export type ToolName = z.infer<typeof toolNameSchema>;

/** What a command-line tool run resolved to. */
export type CliConfig = z.infer<typeof cliConfigSchema>;

/** Environment variable that overrides the render tool's default color mode. */
export const WHEN_ENV_VAR = "SGRTAG_WHEN";

export function resolveFormatOptions(options?: FormatOptions): ResolvedFormatOptions {
  const validation = formatOptionsSchema.safeParse(options ?? {});
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }
  const { when, probe } = validation.data;
  return { when: when ?? DEFAULT_FORMAT_OPTIONS.when, ...(probe && { probe }) };
}

/** Validate a user-supplied color mode (flag or environment value). */
export function parseColorMode(value: string, source: string): ColorMode {
  const validation = colorModeSchema.safeParse(value);
  if (!validation.success) {
    throw new ConfigError(
      `Invalid configuration: ${source} must be one of auto, always, never (got "${value}")`,
      { cause: validation.error },
    );
  }
  return validation.data;
}

export function resolveCliConfig(config: CliConfig): CliConfig {
  const validation = cliConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }
  return validation.data;
}
