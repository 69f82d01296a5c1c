import { Telegram } from "telegraf";
import {
  createNullLogger,
  describeError,
  type Logger,
  type Notifier,
  type PluginModule,
  type SendMessageOptions,
} from "@jules-monitor/core";

export const manifest = {
  name: "telegram",
  slot: "notifier" as const,
  description: "Notifier plugin: Telegram Bot API",
  version: "0.1.0",
};

export interface TelegramNotifierConfig {
  token: string;
  /** Reuse the bot's own client instead of opening a second one. */
  telegram?: Pick<Telegram, "sendMessage">;
  logger?: Logger;
}

/** Telegram rejects messages over 4096 characters. */
export const TELEGRAM_MESSAGE_LIMIT = 4000;

/**
 * Longest prefix of HTML `text`, at most `maxLen` long, that ends outside any
 * tag, entity or open element. Falls back to `maxLen` when no such prefix
 * exists.
 */
export function htmlSafeCut(text: string, maxLen: number): number {
  let depth = 0;
  let safe = 0;
  let i = 0;
  while (i < maxLen && i < text.length) {
    const ch = text[i];
    if (ch === "<" || ch === "&") {
      const end = text.indexOf(ch === "<" ? ">" : ";", i);
      if (end === -1 || end >= maxLen) break;
      if (ch === "<") depth += text[i + 1] === "/" ? -1 : 1;
      i = end + 1;
    } else {
      i += 1;
    }
    if (depth === 0) safe = i;
  }
  return safe > 0 ? safe : maxLen;
}

/**
 * Split text into chunks of at most `maxLen` characters, cutting at the last
 * newline inside the window when there is one. A line longer than the window
 * is cut hard; with `html` set, the cut avoids breaking markup.
 */
export function splitMessage(
  text: string,
  maxLen = TELEGRAM_MESSAGE_LIMIT,
  html = false,
): string[] {
  if (text.length <= maxLen) return [text];
  const chunks: string[] = [];
  let remaining = text;
  while (remaining.length > maxLen) {
    const newline = remaining.lastIndexOf("\n", maxLen);
    if (newline > 0) {
      chunks.push(remaining.slice(0, newline));
      remaining = remaining.slice(newline + 1);
    } else {
      const cut = html ? htmlSafeCut(remaining, maxLen) : maxLen;
      chunks.push(remaining.slice(0, cut));
      remaining = remaining.slice(cut);
    }
  }
  if (remaining.length > 0) chunks.push(remaining);
  return chunks;
}

export function create(config: TelegramNotifierConfig): Notifier {
  const telegram = config.telegram ?? new Telegram(config.token);
  const logger = config.logger ?? createNullLogger();

  return {
    name: "telegram",

    async sendMessage(
      destination: string,
      text: string,
      options: SendMessageOptions = {},
    ): Promise<void> {
      const formatted = options.formatted ?? true;
      for (const chunk of splitMessage(text, TELEGRAM_MESSAGE_LIMIT, formatted)) {
        try {
          await telegram.sendMessage(
            destination,
            chunk,
            formatted ? { parse_mode: "HTML" } : {},
          );
        } catch (err) {
          logger.error(`Failed to deliver message to ${destination}: ${describeError(err)}`);
          throw err;
        }
      }
    },
  };
}

export default { manifest, create } satisfies PluginModule<Notifier, TelegramNotifierConfig>;
