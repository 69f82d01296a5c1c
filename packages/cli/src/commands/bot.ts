import type { Command } from "commander";
import { createLifecycleController, describeError } from "@jules-monitor/core";
import { createDispatcher } from "../bot/dispatch.js";
import { createRoutes } from "../bot/handlers.js";
import { createTelegramBot } from "../bot/telegram-bot.js";
import { openRuntime } from "../lib/runtime.js";

export function registerBot(program: Command): void {
  program
    .command("bot")
    .description("Run the Telegram bot that monitors Jules sessions")
    .option("-c, --config <path>", "Path to jules-monitor.yaml")
    .action(async (opts: { config?: string }) => {
      const runtime = openRuntime({ configPath: opts.config });
      const { config, logger, source } = runtime;
      const operatorChatId = config.credentials.operatorChatId;

      const bot = createTelegramBot({
        token: config.credentials.telegramToken,
        logger: logger.child("bot"),
      });

      const controller = createLifecycleController({
        source,
        notifier: bot.notifier,
        destination: operatorChatId,
        logger: logger.child("monitor"),
        pollIntervalMs: config.monitor.pollIntervalSeconds * 1000,
        durationMs: config.monitor.durationMinutes * 60_000,
        pageSize: config.monitor.pageSize,
      });

      const dispatcher = createDispatcher({
        operatorChatId,
        routes: createRoutes({
          source,
          controller,
          monitor: config.monitor,
          logger: logger.child("commands"),
        }),
        logger: logger.child("commands"),
      });

      const onSignal = (signal: NodeJS.Signals): void => {
        logger.info(`Received ${signal}, shutting down`);
        bot.stop(signal);
        controller.stop().catch((err: unknown) => {
          logger.error(`Failed to stop monitoring: ${describeError(err)}`);
        });
      };
      process.once("SIGINT", onSignal);
      process.once("SIGTERM", onSignal);

      try {
        logger.info(`Bot started. Operator chat: ${operatorChatId}`);
        await bot.launch(dispatcher);
      } finally {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
        await controller.stop();
        await controller.whenIdle();
        logger.info("Bot stopped");
        runtime.close();
      }
    });
}
