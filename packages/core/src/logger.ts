/**
 * Leveled logger: one colored line on the console, one structured entry in the
 * JSONL log (when a writer is attached).
 */

import chalk from "chalk";
import type { LogWriter } from "./log-writer.js";
import type { LogLevel } from "./types.js";

export interface Logger {
  readonly source: string;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Same sinks and level, different source tag. */
  child(source: string): Logger;
}

export interface LoggerOptions {
  writer?: LogWriter;
  /** Entries below this level are dropped. Defaults to "info". */
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function levelLabel(level: LogLevel): string {
  switch (level) {
    case "debug":
      return chalk.gray("DEBUG");
    case "info":
      return chalk.green("INFO ");
    case "warn":
      return chalk.yellow("WARN ");
    case "error":
      return chalk.red("ERROR");
  }
}

/** Render an unknown thrown value for a log line. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createLogger(source: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const writer = options.writer;

  function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < threshold) return;

    const ts = new Date().toISOString();
    const line = `${chalk.dim(ts)} ${levelLabel(level)} ${chalk.cyan(`[${source}]`)} ${message}`;
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }

    if (writer) {
      const sessionId = typeof data?.["sessionId"] === "string" ? data["sessionId"] : null;
      writer.append({
        ts,
        level,
        source,
        sessionId,
        message,
        ...(data ? { data } : {}),
      });
    }
  }

  return {
    source,
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),
    child: (childSource) => createLogger(childSource, options),
  };
}

/** Logger that drops everything. Default for library callers that pass none. */
export function createNullLogger(): Logger {
  const noop = (): void => {};
  const logger: Logger = {
    source: "null",
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
