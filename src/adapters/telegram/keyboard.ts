import { InlineKeyboard } from "grammy";
import type { InlineKeyboardButton } from "grammy/types";
import type { KeyboardLayout } from "../../types/keyboard";

/** Telegram rejects callback_data longer than this many bytes. */
export const CALLBACK_DATA_MAX_BYTES = 64;

export function validateCallbackData(data: string): void {
  const size = Buffer.byteLength(data, "utf8");
  if (size === 0 || size > CALLBACK_DATA_MAX_BYTES) {
    throw new Error(
      `Callback data must be 1-${CALLBACK_DATA_MAX_BYTES} bytes, got ${size}: ${data}`
    );
  }
}

export function toInlineKeyboard(layout: KeyboardLayout): InlineKeyboard {
  const rows: InlineKeyboardButton[][] = layout.map((row) =>
    row.map((button) => {
      validateCallbackData(button.token);
      return { text: button.label, callback_data: button.token };
    })
  );
  return new InlineKeyboard(rows);
}
