export { BOT_COMMANDS, createCommandHandler, type BotCommandSpec } from "./commands";
export { createMessageHandler } from "./message";
export { createCallbackHandler } from "./callback";
export { forwardEvent, type EventDispatcher } from "./dispatch";
