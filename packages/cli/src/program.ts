import { Command } from "commander";
import { registerBot } from "./commands/bot.js";
import { registerCreate } from "./commands/create.js";
import { registerInfo } from "./commands/info.js";
import { registerSessions } from "./commands/sessions.js";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();
  program
    .name("jules-monitor")
    .description("Watch Jules sessions and report state changes to Telegram")
    .version(VERSION);

  registerBot(program);
  registerSessions(program);
  registerInfo(program);
  registerCreate(program);
  return program;
}
