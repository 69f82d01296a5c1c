import chalk from "chalk";
import ora from "ora";
import type { Command } from "commander";
import { describeError } from "@jules-monitor/core";
import { formatActivityLine, formatSessionDetail } from "../lib/format.js";
import { openRuntime } from "../lib/runtime.js";

export function registerInfo(program: Command): void {
  program
    .command("info")
    .description("Show one session and its recent activities")
    .argument("<session>", "Session id (with or without the sessions/ prefix)")
    .option("--activities <n>", "Number of activities to show, 0 to skip", "10")
    .option("-c, --config <path>", "Path to jules-monitor.yaml")
    .action(async (sessionId: string, opts: { activities: string; config?: string }) => {
      const activityCount = Number(opts.activities);
      if (!Number.isInteger(activityCount) || activityCount < 0) {
        console.error(chalk.red(`Invalid --activities: ${opts.activities}`));
        process.exit(1);
      }

      const runtime = openRuntime({ configPath: opts.config });
      const spinner = ora(`Fetching session ${sessionId}`).start();
      try {
        const session = await runtime.source.getSession(sessionId);
        spinner.stop();
        console.log(chalk.bold(`\n${session.title}`));
        for (const line of formatSessionDetail(session)) console.log(line);

        if (activityCount === 0) return;

        const { activities } = await runtime.source.listActivities(session.id, {
          pageSize: activityCount,
        });
        console.log(chalk.bold("\nActivities:"));
        if (activities.length === 0) {
          console.log(chalk.dim("  (none)"));
        }
        for (const activity of activities) console.log(formatActivityLine(activity));
      } catch (err) {
        spinner.fail(`Session ${sessionId} not found or error occurred`);
        console.error(chalk.red(describeError(err)));
        process.exit(1);
      } finally {
        runtime.close();
      }
    });
}
