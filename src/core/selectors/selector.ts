import type { KeyboardLayout } from "../../types/keyboard";

/**
 * Callback tokens that start with this marker are selector actions
 * (navigation, no-op, confirm). Anything else is a literal value.
 */
export const ACTION_MARKER = "$";

export const NOOP_TOKEN = `${ACTION_MARKER}noop`;

/** Telegram rejects callback_data longer than this many bytes. */
export const MAX_TOKEN_BYTES = 64;

export type SelectorState = "idle" | "active" | "complete";

export type IgnoredReason = "stale" | "bounds" | "noop";

export type SelectorOutcome =
  | { type: "ignored"; reason: IgnoredReason }
  | { type: "updated"; keyboard: KeyboardLayout }
  | { type: "selected"; value: string; keyboard: KeyboardLayout };

export interface Selector {
  readonly kind: string;
  readonly state: SelectorState;
  render(): KeyboardLayout;
  handleSelectorEvent(token: string): SelectorOutcome;
}

export type SelectorErrorCode = "SELECTOR_NOT_LOADED";

export class SelectorError extends Error {
  readonly code: SelectorErrorCode;

  constructor(code: SelectorErrorCode, message: string) {
    super(message);
    this.name = "SelectorError";
    this.code = code;
  }
}

export function isActionToken(token: string): boolean {
  return token.startsWith(ACTION_MARKER);
}

/**
 * Whether a value can be carried verbatim as a literal callback token.
 */
export function isEncodableLiteral(value: string): boolean {
  return (
    value.length > 0 &&
    !isActionToken(value) &&
    Buffer.byteLength(value, "utf8") <= MAX_TOKEN_BYTES
  );
}

export function ignored(reason: IgnoredReason): SelectorOutcome {
  return { type: "ignored", reason };
}
