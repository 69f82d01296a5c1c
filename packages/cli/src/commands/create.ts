import chalk from "chalk";
import ora from "ora";
import type { Command } from "commander";
import { MalformedInputError, describeError, type CreateSessionRequest } from "@jules-monitor/core";
import { parseCreateArgs } from "../bot/handlers.js";
import { openRuntime } from "../lib/runtime.js";

export function registerCreate(program: Command): void {
  program
    .command("create")
    .description("Create a Jules session for a GitHub repository")
    .argument("<repo>", "Repository as owner/repo")
    .argument("<prompt...>", "Task for Jules")
    .option("-b, --branch <name>", "Starting branch", "main")
    .option("-c, --config <path>", "Path to jules-monitor.yaml")
    .action(
      async (repo: string, promptWords: string[], opts: { branch: string; config?: string }) => {
        let request: CreateSessionRequest;
        try {
          request = parseCreateArgs(`${repo} ${promptWords.join(" ")}`);
        } catch (err) {
          if (err instanceof MalformedInputError) {
            console.error(chalk.red(err.message));
            process.exit(1);
          }
          throw err;
        }

        const runtime = openRuntime({ configPath: opts.config });
        const spinner = ora(`Creating session for ${repo}`).start();
        try {
          const created = await runtime.source.createSession({ ...request, branch: opts.branch });
          spinner.succeed(`Session ${chalk.green(created.id)} created`);
          console.log(`  URL:    ${chalk.dim(created.url)}`);
          console.log(`  State:  ${created.status}`);
          console.log();
          console.log(`SESSION=${created.id}`);
        } catch (err) {
          spinner.fail("Failed to create session");
          console.error(chalk.red(describeError(err)));
          process.exit(1);
        } finally {
          runtime.close();
        }
      },
    );
}
