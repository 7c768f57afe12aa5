import { mapCallbackEvent, type TelegramInboundContext } from "../adapters/telegram/event-mapper";
import { forwardEvent, type EventDispatcher } from "./dispatch";

export function createCallbackHandler(dispatcher: EventDispatcher) {
  return async (ctx: TelegramInboundContext): Promise<void> => {
    const event = mapCallbackEvent(ctx);
    if (!event) {
      console.warn("[Callback] Ignoring callback query without data or source message");
      if (ctx.callbackQuery) {
        await ctx.api.answerCallbackQuery(ctx.callbackQuery.id);
      }
      return;
    }
    await forwardEvent(dispatcher, event);
  };
}
