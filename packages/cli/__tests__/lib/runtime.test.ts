import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import chalk from "chalk";
import { createRuntime, openRuntime, API_AUDIT_LOG_FILE, APP_LOG_FILE } from "../../src/lib/runtime.js";

const ENV = { TG_TOKEN: "test-telegram-token", JULES_TOKEN: "test-jules-token", ADMIN_CHAT_ID: "100" };

let tmpDir: string;
let configPath: string;

beforeEach(() => {
  chalk.level = 0;
  tmpDir = mkdtempSync(join(tmpdir(), "jm-runtime-test-"));
  configPath = join(tmpDir, "jules-monitor.yaml");
  writeFileSync(
    configPath,
    [
      "api:",
      "  baseUrl: http://localhost:9999/v1",
      "logging:",
      `  dir: ${join(tmpDir, "logs")}`,
      "  level: warn",
    ].join("\n"),
  );
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
  rmSync(tmpDir, { recursive: true, force: true });
});

describe("createRuntime", () => {
  it("combines the config file with the credentials", () => {
    const runtime = createRuntime({ configPath, env: ENV });

    expect(runtime.config.configPath).toBe(configPath);
    expect(runtime.config.credentials.operatorChatId).toBe("100");
    expect(runtime.config.logging.level).toBe("warn");
    expect(runtime.config.monitor.pollIntervalSeconds).toBe(60);
    expect(runtime.source.name).toBe("jules");
    expect(runtime.logger.source).toBe("jules-monitor");
    runtime.close();
  });

  it("writes app log entries at or above the configured level", () => {
    const runtime = createRuntime({ configPath, env: ENV });

    runtime.logger.info("dropped");
    runtime.logger.warn("kept");
    runtime.close();

    const lines = readFileSync(join(tmpDir, "logs", APP_LOG_FILE), "utf-8").trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: "warn", message: "kept" });
  });

  it("points the source at the configured API and its audit log", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ sessions: [] }), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);
    const runtime = createRuntime({ configPath, env: ENV });

    await runtime.source.listSessions({ pageSize: 3 });
    runtime.close();

    expect(String(fetchMock.mock.calls[0][0])).toBe(
      "http://localhost:9999/v1/sessions?pageSize=3",
    );
    expect(fetchMock.mock.calls[0][1].headers["X-Goog-Api-Key"]).toBe("test-jules-token");
    const audit = readFileSync(join(tmpDir, "logs", API_AUDIT_LOG_FILE), "utf-8").trim();
    expect(JSON.parse(audit)).toMatchObject({ endpoint: "list_sessions", response: { sessions: [] } });
  });
});

describe("openRuntime", () => {
  beforeEach(() => {
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  it("exits with the message when credentials are missing", () => {
    expect(() => openRuntime({ configPath, env: { TG_TOKEN: "test-telegram-token" } })).toThrow(
      "process.exit(1)",
    );
    expect(console.error).toHaveBeenCalledWith(
      "Missing environment variables: JULES_TOKEN, ADMIN_CHAT_ID. Please check your .env file.",
    );
  });

  it("exits when an explicit config file is missing", () => {
    const missing = join(tmpDir, "nope.yaml");
    expect(() => openRuntime({ configPath: missing, env: ENV })).toThrow("process.exit(1)");
    expect(console.error).toHaveBeenCalledWith(`Config file not found: ${missing}`);
  });
});
