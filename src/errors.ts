export class SgrTagError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SgrTagError";
    this.code = code;
  }
}

// ── Markup errors ──

/** Every way a markup string can be rejected. The message text is fixed per reason. */
export type MarkupErrorReason =
  | "empty-opening-tag"
  | "unterminated-opening-tag"
  | "missing-color-letter"
  | "unknown-color-letter"
  | "incomplete-escape"
  | "invalid-escape"
  | "unbalanced-closing-tag"
  | "malformed-closing-tag"
  | "unbalanced-opening-tag"
  | "max-depth-exceeded";

const FIXED_MESSAGES: Record<Exclude<MarkupErrorReason, "unknown-color-letter">, string> = {
  "empty-opening-tag": "Empty opening tag",
  "unterminated-opening-tag": "Expecting `]` to terminate the opening tag",
  "missing-color-letter": "Expecting color letter",
  "incomplete-escape": "Incomplete escape sequence at end of string",
  "invalid-escape": "Invalid escape sequence",
  "unbalanced-closing-tag": "Unbalanced closing tag",
  "malformed-closing-tag": "Expecting `]` after `[/`",
  "unbalanced-opening-tag": "Unbalanced opening tag",
  "max-depth-exceeded": "Maximum nesting depth exceeded",
};

export class MarkupSyntaxError extends SgrTagError {
  readonly reason: MarkupErrorReason;
  /** UTF-16 index of the rejected character, or the input length if the input ended early. */
  readonly offset: number;

  constructor(reason: MarkupErrorReason, message: string, offset: number) {
    super(message, "MARKUP_SYNTAX");
    this.name = "MarkupSyntaxError";
    this.reason = reason;
    this.offset = offset;
  }

  static of(
    reason: Exclude<MarkupErrorReason, "unknown-color-letter">,
    offset: number,
  ): MarkupSyntaxError {
    return new MarkupSyntaxError(reason, FIXED_MESSAGES[reason], offset);
  }

  static unknownColorLetter(letter: string, offset: number): MarkupSyntaxError {
    return new MarkupSyntaxError(
      "unknown-color-letter",
      `Unknown color letter \`${letter}\``,
      offset,
    );
  }
}

// ── Ambient errors ──

export class ConfigError extends SgrTagError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

export class UsageError extends SgrTagError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "USAGE", options);
    this.name = "UsageError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to SgrTagError (preserves cause chain). */
export function toSgrTagError(value: unknown): SgrTagError {
  if (value instanceof SgrTagError) return value;
  if (value instanceof Error) return new SgrTagError(value.message, "UNKNOWN", { cause: value });
  return new SgrTagError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
