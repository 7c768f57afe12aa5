import { mapMessageEvent, type TelegramInboundContext } from "../adapters/telegram/event-mapper";
import { forwardEvent, type EventDispatcher } from "./dispatch";

/**
 * Handles every non-command message, text or not.
 */
export function createMessageHandler(dispatcher: EventDispatcher) {
  return async (ctx: TelegramInboundContext): Promise<void> => {
    const event = mapMessageEvent(ctx);
    if (!event) return;
    await forwardEvent(dispatcher, event);
  };
}
