import { Bot, GrammyError, type Context } from "grammy";
import { sequentialize } from "@grammyjs/runner";
import { apiThrottler } from "@grammyjs/transformer-throttler";
import Bottleneck from "bottleneck";
import {
  BOT_COMMANDS,
  createCallbackHandler,
  createCommandHandler,
  createMessageHandler,
  type EventDispatcher,
} from "../handlers";

export function createTelegramBot(token: string): Bot<Context> {
  return new Bot<Context>(token);
}

/** Per-user key for `sequentialize`; updates without a sender run unordered. */
export function sequentializeKey(ctx: { from?: { id: number } }): string | undefined {
  return ctx.from?.id.toString();
}

export function registerBotMiddleware(bot: Bot<Context>): void {
  const throttler = apiThrottler({
    global: {
      maxConcurrent: 25,
      minTime: 40,
    },
    group: {
      maxConcurrent: 1,
      minTime: 3100,
      reservoir: 19,
      reservoirRefreshAmount: 19,
      reservoirRefreshInterval: 60000,
      highWater: 50,
      strategy: Bottleneck.strategy.OVERFLOW,
    },
    out: {
      maxConcurrent: 1,
      minTime: 1050,
      highWater: 100,
      strategy: Bottleneck.strategy.OVERFLOW,
    },
  });

  bot.api.config.use(throttler);

  bot.api.config.use(async (prev, method, payload, signal) => {
    try {
      return await prev(method, payload, signal);
    } catch (err) {
      if (err instanceof GrammyError && err.error_code === 429) {
        const retry = err.parameters?.retry_after ?? 30;
        console.warn(`[Telegram] 429 rate limit despite throttle. Waiting ${retry}s`);
        await new Promise((resolve) => setTimeout(resolve, retry * 1000));
        return prev(method, payload, signal);
      }
      throw err;
    }
  });

  bot.use(sequentialize(sequentializeKey));
}

export async function registerBotCommands(
  bot: Bot<Context>,
  dispatcher: EventDispatcher
): Promise<void> {
  await bot.api.setMyCommands(
    BOT_COMMANDS.map((spec) => ({
      command: spec.triggers[0] ?? spec.name,
      description: spec.description,
    }))
  );

  for (const spec of BOT_COMMANDS) {
    bot.command(spec.triggers, createCommandHandler(dispatcher, spec.name));
  }
}

export function registerBotHandlers(bot: Bot<Context>, dispatcher: EventDispatcher): void {
  bot.on("message", createMessageHandler(dispatcher));
  bot.on("callback_query:data", createCallbackHandler(dispatcher));

  bot.catch((err) => {
    console.error("[Telegram] Bot error:", err);
  });
}
