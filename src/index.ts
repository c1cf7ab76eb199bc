/**
 * sgrtag public API barrel.
 *
 * Re-exports the markup functions, their building blocks, the error types
 * and the logging/configuration pieces the command-line tools are made of.
 * @module
 */

export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export type { ParsedArgs } from "./cli/args.js";
export { parseToolArgs, usage } from "./cli/args.js";
export type { ToolIO } from "./cli/tools.js";
export { nodeToolIO, runTool } from "./cli/tools.js";
export {
  cliConfigSchema,
  colorModeSchema,
  formatOptionsSchema,
  terminalProbeSchema,
  toolNameSchema,
} from "./config/config-schema.js";
// Core
export type { Color } from "./core/color-table.js";
export {
  backgroundCode,
  COLOR_LETTERS,
  colorFromLetter,
  foregroundCode,
} from "./core/color-table.js";
export { escape, markup } from "./core/escape.js";
export type { MarkupSegment } from "./core/markup.js";
export { format, parseMarkup, render, strip } from "./core/markup.js";
export type { MarkupSink } from "./core/markup-parser.js";
export { scanMarkup } from "./core/markup-parser.js";
export { MAX_DEPTH, NestingStack } from "./core/nesting-stack.js";
export { ESC, renderSgr, SGR_RESET, sgrCodes } from "./core/sgr.js";
export type { StyleState, TagDirective } from "./core/style-state.js";
export { mergeStyle, ROOT_STYLE } from "./core/style-state.js";
export type { TerminalSupport } from "./core/terminal-support.js";
export {
  defaultTerminalProbe,
  hasTerminalSupport,
  terminalSupport,
} from "./core/terminal-support.js";
// Errors
export type { MarkupErrorReason } from "./errors.js";
export {
  ConfigError,
  errorMessage,
  MarkupSyntaxError,
  SgrTagError,
  toSgrTagError,
  UsageError,
} from "./errors.js";
export type { Logger } from "./interfaces/logger.js";
// Configuration
export type {
  CliConfig,
  ColorMode,
  FormatOptions,
  ResolvedFormatOptions,
  TerminalProbe,
  ToolName,
} from "./types/config.js";
export {
  DEFAULT_FORMAT_OPTIONS,
  parseColorMode,
  resolveCliConfig,
  resolveFormatOptions,
  WHEN_ENV_VAR,
} from "./types/config.js";
// Utilities
export { stripAnsi } from "./utils/ansi-strip.js";
