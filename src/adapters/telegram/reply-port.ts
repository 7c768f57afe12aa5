import { GrammyError } from "grammy";
import type { InlineKeyboardMarkup } from "grammy/types";
import type { KeyboardLayout } from "../../types/keyboard";
import type { MessageId, ReplyPort } from "../../types/transport";
import { toInlineKeyboard } from "./keyboard";

/** The slice of the Bot API a reply port calls. grammY's `Api` satisfies it. */
export interface TelegramReplyApi {
  sendMessage(
    chatId: number,
    text: string,
    other?: { reply_markup?: InlineKeyboardMarkup }
  ): Promise<{ message_id: number }>;
  editMessageReplyMarkup(
    chatId: number,
    messageId: number,
    other?: { reply_markup?: InlineKeyboardMarkup }
  ): Promise<unknown>;
  answerCallbackQuery(callbackQueryId: string, other?: { text?: string }): Promise<unknown>;
}

export function isMessageNotModified(error: unknown): boolean {
  return error instanceof GrammyError && error.description.includes("message is not modified");
}

/**
 * Reply capability for one inbound update. `acknowledge` answers the
 * update's callback query at most once and does nothing for other updates.
 */
export function createTelegramReplyPort(
  api: TelegramReplyApi,
  chatId: number,
  callbackQueryId?: string
): ReplyPort {
  let acknowledged = false;

  return {
    sendText: async (text: string) => {
      await api.sendMessage(chatId, text);
    },
    sendKeyboard: async (text: string, keyboard: KeyboardLayout): Promise<MessageId> => {
      const message = await api.sendMessage(chatId, text, {
        reply_markup: toInlineKeyboard(keyboard),
      });
      return message.message_id;
    },
    editKeyboard: async (messageId: MessageId, keyboard: KeyboardLayout) => {
      try {
        await api.editMessageReplyMarkup(chatId, messageId, {
          reply_markup: toInlineKeyboard(keyboard),
        });
      } catch (error) {
        if (isMessageNotModified(error)) return;
        throw error;
      }
    },
    acknowledge: async (text?: string) => {
      if (!callbackQueryId || acknowledged) return;
      acknowledged = true;
      await api.answerCallbackQuery(callbackQueryId, text ? { text } : undefined);
    },
  };
}
