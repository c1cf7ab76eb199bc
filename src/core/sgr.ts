import { backgroundCode, foregroundCode } from "./color-table.js";
import type { StyleState } from "./style-state.js";

export const ESC = "\x1b";

/** What the root state renders to: a bare reset. */
export const SGR_RESET = `${ESC}[0m`;

/**
 * Ordered SGR parameters for a state. Always starts with the reset (0) so
 * every sequence stands on its own, regardless of what came before it.
 */
export function sgrCodes(state: StyleState): number[] {
  const codes = [0];
  if (state.bold) codes.push(1);
  if (state.dim) codes.push(2);
  if (state.italic) codes.push(3);
  if (state.underline) codes.push(4);
  if (state.fg !== undefined) codes.push(foregroundCode(state.fg, state.bright));
  if (state.bg !== undefined) codes.push(backgroundCode(state.bg));
  return codes;
}

export function renderSgr(state: StyleState): string {
  return `${ESC}[${sgrCodes(state).join(";")}m`;
}
