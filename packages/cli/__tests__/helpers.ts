import { vi } from "vitest";
import type { Logger, MonitorConfig, SessionSource } from "@jules-monitor/core";

export function makeLogger(): Logger {
  const logger: Logger = {
    source: "test",
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

export function makeSource() {
  return {
    name: "fake",
    listSessions: vi.fn(),
    getSession: vi.fn(),
    listActivities: vi.fn(),
    createSession: vi.fn(),
  } satisfies SessionSource;
}

export function makeConfig(): MonitorConfig {
  return {
    configPath: null,
    credentials: {
      telegramToken: "test-telegram-token",
      julesToken: "test-jules-token",
      operatorChatId: "100",
    },
    monitor: { pollIntervalSeconds: 60, durationMinutes: 60, pageSize: 10 },
    api: {
      baseUrl: "https://jules.googleapis.com/v1alpha",
      readTimeoutMs: 10_000,
      createTimeoutMs: 30_000,
    },
    logging: { dir: "/tmp/jules-monitor-test-logs", level: "info" },
  };
}
