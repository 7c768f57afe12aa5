/**
 * Command handlers: /start, /help, /register (/registrar), /restart, /auth, /logout
 */

import { mapCommandEvent, type TelegramInboundContext } from "../adapters/telegram/event-mapper";
import type { CommandName } from "../types/transport";
import { forwardEvent, type EventDispatcher } from "./dispatch";

export interface BotCommandSpec {
  /** Telegram command names that trigger this transport command. */
  triggers: string[];
  name: CommandName;
  description: string;
}

export const BOT_COMMANDS: readonly BotCommandSpec[] = [
  { triggers: ["start"], name: "start", description: "Start over and show help" },
  { triggers: ["help"], name: "help", description: "Show available commands" },
  { triggers: ["auth"], name: "auth", description: "Log in with the shared password" },
  {
    triggers: ["register", "registrar"],
    name: "register",
    description: "Register a new consult",
  },
  { triggers: ["restart"], name: "restart", description: "Discard the current entry" },
  { triggers: ["logout"], name: "logout", description: "Log out" },
];

export function createCommandHandler(dispatcher: EventDispatcher, name: CommandName) {
  return async (ctx: TelegramInboundContext): Promise<void> => {
    const event = mapCommandEvent(ctx, name);
    if (!event) return;
    await forwardEvent(dispatcher, event);
  };
}
