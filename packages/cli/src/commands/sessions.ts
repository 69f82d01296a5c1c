import chalk from "chalk";
import ora from "ora";
import type { Command } from "commander";
import { describeError } from "@jules-monitor/core";
import { formatSessionRow, header } from "../lib/format.js";
import { openRuntime } from "../lib/runtime.js";

export function registerSessions(program: Command): void {
  program
    .command("sessions")
    .description("List recent Jules sessions")
    .option("-l, --limit <n>", "Number of sessions to show (1-100)", "10")
    .option("-c, --config <path>", "Path to jules-monitor.yaml")
    .action(async (opts: { limit: string; config?: string }) => {
      const limit = Number(opts.limit);
      if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
        console.error(chalk.red(`Invalid --limit: ${opts.limit} (expected 1-100)`));
        process.exit(1);
      }

      const runtime = openRuntime({ configPath: opts.config });
      const spinner = ora("Fetching sessions").start();
      try {
        const { sessions } = await runtime.source.listSessions({ pageSize: limit });
        spinner.stop();

        if (sessions.length === 0) {
          console.log(chalk.dim("No sessions found."));
          return;
        }

        console.log(header(`Recent Sessions (${sessions.length})`));
        for (const session of sessions) {
          console.log(formatSessionRow(session));
        }
      } catch (err) {
        spinner.fail("Failed to fetch sessions");
        console.error(chalk.red(describeError(err)));
        process.exit(1);
      } finally {
        runtime.close();
      }
    });
}
