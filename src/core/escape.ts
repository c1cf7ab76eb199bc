const SPECIAL_CHARS = /[\\[]/g;

/** Backslash-escape `\` and `[` so `text` renders verbatim. */
export function escape(text: string): string {
  return text.replace(SPECIAL_CHARS, (ch) => `\\${ch}`);
}

/**
 * Template tag for building markup around untrusted values: the template
 * itself is markup, every interpolated value is escaped.
 *
 *     markup`[!r]${fileName}[/] not found`
 */
export function markup(strings: TemplateStringsArray, ...values: unknown[]): string {
  let out = strings[0] ?? "";
  values.forEach((value, i) => {
    out += escape(String(value)) + (strings[i + 1] ?? "");
  });
  return out;
}
