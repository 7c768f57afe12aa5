/**
 * grammY update -> transport event.
 *
 * Each mapper returns null for updates that carry no sender, which the
 * handlers skip.
 */

import type {
  CallbackEvent,
  CommandEvent,
  CommandName,
  MessageEvent,
} from "../../types/transport";
import { createTelegramReplyPort, type TelegramReplyApi } from "./reply-port";

export interface TelegramInboundContext {
  from?: { id: number };
  chat?: { id: number };
  message?: { text?: string };
  callbackQuery?: {
    id: string;
    data?: string;
    message?: { message_id: number };
  };
  api: TelegramReplyApi;
}

function senderOf(ctx: TelegramInboundContext): { userId: number; chatId: number } | null {
  const userId = ctx.from?.id;
  if (userId === undefined) return null;
  return { userId, chatId: ctx.chat?.id ?? userId };
}

export function mapCommandEvent(
  ctx: TelegramInboundContext,
  name: CommandName
): CommandEvent | null {
  const sender = senderOf(ctx);
  if (!sender) return null;

  return {
    kind: "command",
    name,
    userId: sender.userId,
    reply: createTelegramReplyPort(ctx.api, sender.chatId),
  };
}

/** Non-text messages (photos, stickers, voice) map with `text` undefined. */
export function mapMessageEvent(ctx: TelegramInboundContext): MessageEvent | null {
  const sender = senderOf(ctx);
  if (!sender || !ctx.message) return null;

  return {
    kind: "message",
    text: ctx.message.text,
    userId: sender.userId,
    reply: createTelegramReplyPort(ctx.api, sender.chatId),
  };
}

export function mapCallbackEvent(ctx: TelegramInboundContext): CallbackEvent | null {
  const sender = senderOf(ctx);
  const query = ctx.callbackQuery;
  if (!sender || !query?.data || !query.message) return null;

  return {
    kind: "callback",
    token: query.data,
    sourceMessageId: query.message.message_id,
    userId: sender.userId,
    reply: createTelegramReplyPort(ctx.api, sender.chatId, query.id),
  };
}
