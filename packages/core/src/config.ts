/**
 * Configuration loader: credentials from the environment, tunables from an
 * optional jules-monitor.yaml validated with Zod.
 *
 * Minimal setup that just works: export TG_TOKEN, JULES_TOKEN and
 * ADMIN_CHAT_ID. A config file is only needed to change the defaults:
 *   monitor:
 *     pollIntervalSeconds: 60
 *     durationMinutes: 60
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { Credentials, MonitorConfig } from "./types.js";

export const DEFAULT_API_BASE_URL = "https://jules.googleapis.com/v1alpha";

// =============================================================================
// ZOD SCHEMAS
// =============================================================================

const MonitorSettingsSchema = z.object({
  pollIntervalSeconds: z.number().int().positive().default(60),
  durationMinutes: z.number().int().positive().default(60),
  pageSize: z.number().int().min(1).max(100).default(10),
});

const ApiSettingsSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_API_BASE_URL),
  readTimeoutMs: z.number().int().positive().default(10_000),
  createTimeoutMs: z.number().int().positive().default(30_000),
});

const LoggingSettingsSchema = z.object({
  dir: z.string().default("~/.jules-monitor/logs"),
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

const FileConfigSchema = z.object({
  monitor: MonitorSettingsSchema.default({}),
  api: ApiSettingsSchema.default({}),
  logging: LoggingSettingsSchema.default({}),
});

const CREDENTIAL_VARS = {
  telegramToken: "TG_TOKEN",
  julesToken: "JULES_TOKEN",
  operatorChatId: "ADMIN_CHAT_ID",
} as const satisfies Record<keyof Credentials, string>;

// =============================================================================
// CONFIG LOADING
// =============================================================================

/** Expand ~ to home directory */
export function expandHome(filepath: string): string {
  if (filepath.startsWith("~/")) {
    return join(homedir(), filepath.slice(2));
  }
  return filepath;
}

/** Search for config file in standard locations */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  const searchPaths = [
    resolve(startDir, "jules-monitor.yaml"),
    resolve(startDir, "jules-monitor.yml"),
    resolve(homedir(), ".config", "jules-monitor", "config.yaml"),
  ];

  for (const path of searchPaths) {
    if (existsSync(path)) {
      return path;
    }
  }

  return null;
}

function readCredentials(env: NodeJS.ProcessEnv): Credentials {
  const missing: string[] = [];

  function read(name: string): string {
    const value = env[name]?.trim();
    if (!value) {
      missing.push(name);
      return "";
    }
    return value;
  }

  const credentials: Credentials = {
    telegramToken: read(CREDENTIAL_VARS.telegramToken),
    julesToken: read(CREDENTIAL_VARS.julesToken),
    operatorChatId: read(CREDENTIAL_VARS.operatorChatId),
  };

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing environment variables: ${missing.join(", ")}. Please check your .env file.`,
    );
  }

  return credentials;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export interface LoadConfigOptions {
  /** Explicit YAML path. When omitted the standard locations are searched. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Directory searched first for jules-monitor.yaml. */
  cwd?: string;
}

/** Validate a raw config object and merge in the credentials from env. */
export function validateConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
  configPath: string | null = null,
): MonitorConfig {
  const parsed = FileConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigurationError(`Invalid config${configPath ? ` in ${configPath}` : ""}:\n${details}`);
  }

  const file = parsed.data;
  return {
    configPath,
    credentials: readCredentials(env),
    monitor: file.monitor,
    api: file.api,
    logging: { ...file.logging, dir: expandHome(file.logging.dir) },
  };
}

/** Load the optional YAML file and the credentials. */
export function loadConfig(options: LoadConfigOptions = {}): MonitorConfig {
  const env = options.env ?? process.env;
  const path = options.configPath ?? findConfigFile(options.cwd);

  if (options.configPath && !existsSync(options.configPath)) {
    throw new ConfigurationError(`Config file not found: ${options.configPath}`);
  }

  let raw: unknown = {};
  if (path) {
    try {
      raw = parseYaml(readFileSync(path, "utf-8"));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Cannot read config ${path}: ${reason}`);
    }
  }

  return validateConfig(raw, env, path);
}
