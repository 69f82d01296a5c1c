/**
 * Runtime factory for the CLI.
 *
 * Loads config, opens the log files and creates the session source. Every
 * command goes through here so that the bot and the one-shot commands share
 * the same logging and API audit trail.
 */

import { join } from "node:path";
import chalk from "chalk";
import {
  ConfigurationError,
  LogWriter,
  createLogger,
  loadConfig,
  type Logger,
  type MonitorConfig,
  type SessionSource,
} from "@jules-monitor/core";
import { create as createJulesSource } from "@jules-monitor/plugin-source-jules";

export const APP_LOG_FILE = "app.jsonl";
export const API_AUDIT_LOG_FILE = "jules_api.log";

export interface RuntimeOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export interface Runtime {
  config: MonitorConfig;
  logger: Logger;
  source: SessionSource;
  close(): void;
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const config = loadConfig({ configPath: options.configPath, env: options.env });

  const appLog = new LogWriter({ filePath: join(config.logging.dir, APP_LOG_FILE) });
  const auditLog = new LogWriter({ filePath: join(config.logging.dir, API_AUDIT_LOG_FILE) });
  const logger = createLogger("jules-monitor", { writer: appLog, level: config.logging.level });

  const source = createJulesSource({
    apiKey: config.credentials.julesToken,
    baseUrl: config.api.baseUrl,
    readTimeoutMs: config.api.readTimeoutMs,
    createTimeoutMs: config.api.createTimeoutMs,
    auditLog,
    logger: logger.child("jules"),
  });

  return {
    config,
    logger,
    source,
    close() {
      appLog.close();
      auditLog.close();
    },
  };
}

/** createRuntime for commands: a configuration problem ends the process with code 1. */
export function openRuntime(options: RuntimeOptions = {}): Runtime {
  try {
    return createRuntime(options);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(chalk.red(err.message));
      process.exit(1);
    }
    throw err;
  }
}
