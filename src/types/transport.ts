import type { KeyboardLayout } from "./keyboard";

export type UserId = number;
export type MessageId = number;

export type CommandName =
  | "start"
  | "help"
  | "register"
  | "restart"
  | "auth"
  | "logout";

/**
 * Outbound capability handed in with every inbound event.
 */
export interface ReplyPort {
  sendText(text: string): Promise<void>;
  /** Sends a message carrying an inline keyboard and returns its id. */
  sendKeyboard(text: string, keyboard: KeyboardLayout): Promise<MessageId>;
  editKeyboard(messageId: MessageId, keyboard: KeyboardLayout): Promise<void>;
  acknowledge(text?: string): Promise<void>;
}

export interface CommandEvent {
  kind: "command";
  name: CommandName;
  userId: UserId;
  reply: ReplyPort;
}

export interface MessageEvent {
  kind: "message";
  /** Undefined for non-text payloads (photos, stickers, voice). */
  text: string | undefined;
  userId: UserId;
  reply: ReplyPort;
}

export interface CallbackEvent {
  kind: "callback";
  token: string;
  sourceMessageId: MessageId;
  userId: UserId;
  reply: ReplyPort;
}

export type TransportEvent = CommandEvent | MessageEvent | CallbackEvent;
