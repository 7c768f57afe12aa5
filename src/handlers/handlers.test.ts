import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { TelegramReplyApi } from "../adapters/telegram/reply-port";
import type { DispatchResult } from "../core/session/session-router";
import type { TransportEvent } from "../types/transport";
import { createCallbackHandler } from "./callback";
import { BOT_COMMANDS, createCommandHandler } from "./commands";
import { forwardEvent, type EventDispatcher } from "./dispatch";
import { createMessageHandler } from "./message";

function fakeApi() {
  const api = {
    sendMessage: vi.fn(async () => ({ message_id: 1 })),
    editMessageReplyMarkup: vi.fn(async () => true),
    answerCallbackQuery: vi.fn(async () => true),
  };
  const port: TelegramReplyApi = api;
  return { api, port };
}

function recordingDispatcher(result: DispatchResult) {
  const events: TransportEvent[] = [];
  const dispatcher: EventDispatcher = {
    dispatch: async (event) => {
      events.push(event);
      return result;
    },
  };
  return { events, dispatcher };
}

describe("handlers", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("registrar is an alias of register", () => {
    const register = BOT_COMMANDS.find((spec) => spec.name === "register");
    expect(register?.triggers).toEqual(["register", "registrar"]);
    expect(BOT_COMMANDS.map((spec) => spec.name)).toEqual([
      "start",
      "help",
      "auth",
      "register",
      "restart",
      "logout",
    ]);
  });

  test("command handler dispatches a command event", async () => {
    const { port } = fakeApi();
    const { events, dispatcher } = recordingDispatcher("handled");

    await createCommandHandler(dispatcher, "auth")({ from: { id: 5 }, chat: { id: 5 }, api: port });

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ kind: "command", name: "auth", userId: 5 });
  });

  test("message handler skips updates without a sender", async () => {
    const { port } = fakeApi();
    const { events, dispatcher } = recordingDispatcher("handled");

    await createMessageHandler(dispatcher)({ message: { text: "hi" }, api: port });

    expect(events).toEqual([]);
  });

  test("a dropped callback is still answered", async () => {
    const { api, port } = fakeApi();
    const { dispatcher } = recordingDispatcher("dropped");

    await createCallbackHandler(dispatcher)({
      from: { id: 5 },
      chat: { id: 5 },
      callbackQuery: { id: "query-9", data: "CALC1", message: { message_id: 100 } },
      api: port,
    });

    expect(api.answerCallbackQuery).toHaveBeenCalledTimes(1);
    expect(api.answerCallbackQuery).toHaveBeenCalledWith("query-9", undefined);
  });

  test("an unmappable callback is answered and not dispatched", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const { api, port } = fakeApi();
    const { events, dispatcher } = recordingDispatcher("handled");

    await createCallbackHandler(dispatcher)({
      from: { id: 5 },
      callbackQuery: { id: "query-3" },
      api: port,
    });

    expect(events).toEqual([]);
    expect(api.answerCallbackQuery).toHaveBeenCalledWith("query-3");
  });

  test("forwardEvent logs dropped events", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const { dispatcher } = recordingDispatcher("dropped");
    const event: TransportEvent = {
      kind: "message",
      text: "hello",
      userId: 5,
      reply: {
        sendText: async () => {},
        sendKeyboard: async () => 1,
        editKeyboard: async () => {},
        acknowledge: async () => {},
      },
    };

    await expect(forwardEvent(dispatcher, event)).resolves.toBe("dropped");
    expect(log).toHaveBeenCalledWith("[Dispatch] Dropped message from 5: no session");
  });
});
