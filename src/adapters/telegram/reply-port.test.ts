import { GrammyError } from "grammy";
import { describe, expect, test, vi } from "vitest";
import { createTelegramReplyPort, type TelegramReplyApi } from "./reply-port";

function fakeApi(overrides: Partial<TelegramReplyApi> = {}) {
  const api = {
    sendMessage: vi.fn(async () => ({ message_id: 321 })),
    editMessageReplyMarkup: vi.fn(async () => true),
    answerCallbackQuery: vi.fn(async () => true),
  };
  const port: TelegramReplyApi = { ...api, ...overrides };
  return { api, port };
}

function notModifiedError(): GrammyError {
  return new GrammyError(
    "Call to 'editMessageReplyMarkup' failed!",
    {
      ok: false,
      error_code: 400,
      description: "Bad Request: message is not modified",
    },
    "editMessageReplyMarkup",
    {}
  );
}

describe("createTelegramReplyPort", () => {
  test("sendText posts to the chat", async () => {
    const { api, port } = fakeApi();
    const reply = createTelegramReplyPort(port, 100);

    await reply.sendText("hello");

    expect(api.sendMessage).toHaveBeenCalledWith(100, "hello");
  });

  test("sendKeyboard attaches the inline keyboard and returns the message id", async () => {
    const { api, port } = fakeApi();
    const reply = createTelegramReplyPort(port, 100);

    const messageId = await reply.sendKeyboard("Pick one", [[{ label: "A", token: "A" }]]);

    expect(messageId).toBe(321);
    expect(api.sendMessage).toHaveBeenCalledWith(100, "Pick one", {
      reply_markup: expect.objectContaining({
        inline_keyboard: [[{ text: "A", callback_data: "A" }]],
      }),
    });
  });

  test("editKeyboard ignores 'message is not modified'", async () => {
    const { port } = fakeApi({
      editMessageReplyMarkup: async () => {
        throw notModifiedError();
      },
    });
    const reply = createTelegramReplyPort(port, 100);

    await expect(reply.editKeyboard(55, [[{ label: "A", token: "$noop" }]])).resolves.toBeUndefined();
  });

  test("editKeyboard rethrows other failures", async () => {
    const failure = new Error("network down");
    const { port } = fakeApi({
      editMessageReplyMarkup: async () => {
        throw failure;
      },
    });
    const reply = createTelegramReplyPort(port, 100);

    await expect(reply.editKeyboard(55, [])).rejects.toBe(failure);
  });

  test("acknowledge answers the callback query once", async () => {
    const { api, port } = fakeApi();
    const reply = createTelegramReplyPort(port, 100, "query-1");

    await reply.acknowledge("This selection is no longer active.");
    await reply.acknowledge();

    expect(api.answerCallbackQuery).toHaveBeenCalledTimes(1);
    expect(api.answerCallbackQuery).toHaveBeenCalledWith("query-1", {
      text: "This selection is no longer active.",
    });
  });

  test("acknowledge without a callback query does nothing", async () => {
    const { api, port } = fakeApi();
    const reply = createTelegramReplyPort(port, 100);

    await reply.acknowledge();

    expect(api.answerCallbackQuery).not.toHaveBeenCalled();
  });
});
