import { UsageError } from "../errors.js";
import {
  type CliConfig,
  type ColorMode,
  parseColorMode,
  resolveCliConfig,
  type ToolName,
  WHEN_ENV_VAR,
} from "../types/config.js";

export type ParsedArgs = { kind: "help" } | { kind: "run"; config: CliConfig };

const DESCRIPTIONS: Record<ToolName, string> = {
  render: "Render bracket-tag markup to ANSI SGR escape sequences.",
  escape: "Escape text so that it renders verbatim inside markup.",
  strip: "Remove the tags from markup, keeping only its text.",
};

export function usage(tool: ToolName): string {
  const when =
    tool === "render"
      ? `    --when <mode>   auto, always or never (default: always, or $${WHEN_ENV_VAR})\n`
      : "";
  return `
  sgrtag-${tool} — ${DESCRIPTIONS[tool]}

  Usage: sgrtag-${tool} [options] [--] <${tool === "escape" ? "text" : "markup"}>

  Options:
${when}    --verbose, -v   Debug logging on stderr
    --help, -h      Show this help
`;
}

function defaultColorMode(tool: ToolName, env: Record<string, string | undefined>): ColorMode {
  // Only the render tool ever emits codes.
  if (tool !== "render") return "never";
  const fromEnv = env[WHEN_ENV_VAR];
  return fromEnv ? parseColorMode(fromEnv, WHEN_ENV_VAR) : "always";
}

const COMMON_OPTIONS: ReadonlySet<string> = new Set(["--", "--help", "-h", "--verbose", "-v"]);

/** Only exact option names count; any other argument, dash-led or not, is input. */
function isOption(tool: ToolName, arg: string): boolean {
  return COMMON_OPTIONS.has(arg) || (tool === "render" && arg === "--when");
}

/**
 * Parse the arguments that follow the executable name.
 *
 * Throws {@link UsageError} for a malformed command line and
 * {@link ConfigError} for an invalid color mode.
 */
export function parseToolArgs(
  tool: ToolName,
  argv: readonly string[],
  env: Record<string, string | undefined>,
): ParsedArgs {
  const positionals: string[] = [];
  let when: ColorMode | undefined;
  let verbose = false;
  let optionsEnded = false;

  let cursor = 0;
  const next = (): string | undefined => argv[cursor++];

  for (let arg = next(); arg !== undefined; arg = next()) {
    if (optionsEnded || !isOption(tool, arg)) {
      positionals.push(arg);
      continue;
    }
    switch (arg) {
      case "--":
        optionsEnded = true;
        break;
      case "--help":
      case "-h":
        return { kind: "help" };
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--when": {
        const value = next();
        if (value === undefined) {
          throw new UsageError("--when requires a value");
        }
        when = parseColorMode(value, "--when");
        break;
      }
    }
  }

  const [input, extra] = positionals;
  if (input === undefined) {
    throw new UsageError(`Missing ${tool === "escape" ? "text" : "markup"} argument`);
  }
  if (extra !== undefined) {
    throw new UsageError(`Unexpected argument: ${extra}`);
  }

  return {
    kind: "run",
    config: resolveCliConfig({
      tool,
      input,
      when: when ?? defaultColorMode(tool, env),
      verbose,
    }),
  };
}
