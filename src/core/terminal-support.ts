import type { TerminalProbe } from "../types/config.js";

/** How much styling the connected terminal appears to accept. */
export type TerminalSupport = "none" | "basic-color" | "true-color";

export function defaultTerminalProbe(): TerminalProbe {
  return { isTTY: process.stdout.isTTY, env: process.env };
}

/**
 * Classify the terminal standard output is connected to.
 *
 * Anything that is not a TTY, a `TERM=dumb` terminal and a set `NO_COLOR`
 * get no styling. `COLORTERM=truecolor` (or `24bit`) is reported separately
 * even though markup only ever emits basic colors.
 */
export function terminalSupport(probe: TerminalProbe = defaultTerminalProbe()): TerminalSupport {
  if (probe.isTTY !== true) return "none";

  const { TERM, NO_COLOR, COLORTERM } = probe.env;
  if (TERM === "dumb") return "none";
  if (NO_COLOR !== undefined && NO_COLOR !== "") return "none";
  if (COLORTERM === "truecolor" || COLORTERM === "24bit") return "true-color";
  return "basic-color";
}

export function hasTerminalSupport(probe?: TerminalProbe): boolean {
  return terminalSupport(probe) !== "none";
}
