/**
 * Strip ANSI control sequences from already rendered text.
 * Matches CSI sequences (SGR colors/styles, cursor movement, erase) introduced
 * by either `ESC [` or the single-byte C1 CSI.
 */
// biome-ignore lint/suspicious/noControlCharactersInRegex: intentional ANSI escape matching
const CSI_PATTERN = /(?:\u001B\[|\u009B)[0-?]*[ -/]*[@-~]/g;

export function stripAnsi(rendered: string): string {
  return rendered.replace(CSI_PATTERN, "");
}
