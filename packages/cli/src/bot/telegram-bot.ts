/**
 * Telegram transport for the chat commands.
 *
 * telegraf only delivers text updates and sends replies here; which command
 * runs is decided by the dispatcher.
 */

import { Telegraf } from "telegraf";
import { message } from "telegraf/filters";
import {
  createNullLogger,
  describeError,
  type Logger,
  type Notifier,
} from "@jules-monitor/core";
import { create as createTelegramNotifier } from "@jules-monitor/plugin-notifier-telegram";
import type { Dispatcher } from "./dispatch.js";

export interface TelegramBotDeps {
  token: string;
  logger?: Logger;
}

export interface TelegramBot {
  /** Shares the bot's API client. */
  readonly notifier: Notifier;
  /** Dispatch one text message and send its replies to the same chat. */
  handleText(chatId: string, text: string): Promise<void>;
  /** Long-poll for updates. Resolves once the bot has stopped. */
  launch(dispatcher: Dispatcher): Promise<void>;
  stop(reason: string): void;
}

export function createTelegramBot(deps: TelegramBotDeps): TelegramBot {
  const logger = deps.logger ?? createNullLogger();
  const bot = new Telegraf(deps.token);
  const notifier = createTelegramNotifier({
    token: deps.token,
    telegram: bot.telegram,
    logger,
  });

  let dispatcher: Dispatcher | null = null;
  let running = false;

  async function handleText(chatId: string, text: string): Promise<void> {
    if (!dispatcher) return;
    const response = await dispatcher.dispatch(chatId, text);
    if (!response) return;
    for (const reply of response.replies) {
      await notifier.sendMessage(chatId, reply.text, { formatted: reply.formatted });
    }
  }

  bot.on(message("text"), (ctx) => handleText(String(ctx.chat.id), ctx.message.text));

  bot.catch((err, ctx) => {
    logger.error(`Failed to handle update ${ctx.update.update_id}: ${describeError(err)}`);
  });

  return {
    notifier,
    handleText,

    async launch(next: Dispatcher): Promise<void> {
      dispatcher = next;
      running = true;
      logger.info("Bot is polling for updates");
      try {
        await bot.launch();
      } finally {
        running = false;
      }
    },

    stop(reason: string): void {
      if (!running) return;
      running = false;
      bot.stop(reason);
    },
  };
}
