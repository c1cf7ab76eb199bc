import type { Color } from "./color-table.js";

/** Every attribute in effect at one nesting level. */
export interface StyleState {
  readonly bold: boolean;
  readonly dim: boolean;
  readonly italic: boolean;
  readonly underline: boolean;
  readonly bright: boolean;
  readonly fg?: Color;
  readonly bg?: Color;
}

/**
 * What a single opening tag asks for. A missing field means "not mentioned";
 * tags only ever add, so no field is explicitly false.
 */
export interface TagDirective {
  bold?: true;
  dim?: true;
  italic?: true;
  underline?: true;
  bright?: true;
  fg?: Color;
  bg?: Color;
}

export const ROOT_STYLE: StyleState = Object.freeze({
  bold: false,
  dim: false,
  italic: false,
  underline: false,
  bright: false,
});

export function mergeStyle(parent: StyleState, directive: TagDirective): StyleState {
  return {
    bold: parent.bold || directive.bold === true,
    dim: parent.dim || directive.dim === true,
    italic: parent.italic || directive.italic === true,
    underline: parent.underline || directive.underline === true,
    bright: parent.bright || directive.bright === true,
    fg: directive.fg ?? parent.fg,
    bg: directive.bg ?? parent.bg,
  };
}
