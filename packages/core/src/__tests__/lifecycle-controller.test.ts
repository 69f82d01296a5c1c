import { describe, it, expect, beforeEach, vi } from "vitest";
import { createLifecycleController } from "../lifecycle-controller.js";
import type { Logger } from "../logger.js";
import type { Notifier, SessionSource } from "../types.js";

const OPERATOR_CHAT = "4242";

let source: SessionSource;
let notifier: Notifier;
let clock: number;

function abortError(): Error {
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}

/** Sleep that only ends when the run is aborted. */
function blockingSleep(_ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(abortError());
      return;
    }
    signal.addEventListener("abort", () => reject(abortError()), { once: true });
  });
}

function makeLogger(): Logger {
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

beforeEach(() => {
  clock = 1_000_000;

  source = {
    name: "mock",
    listSessions: vi.fn().mockResolvedValue({ sessions: [] }),
    getSession: vi.fn(),
    listActivities: vi.fn(),
    createSession: vi.fn(),
  };

  notifier = {
    name: "mock",
    sendMessage: vi.fn().mockResolvedValue(undefined),
  };
});

describe("toggle", () => {
  it("starts when idle and stops when running", async () => {
    const sleep = vi.fn(blockingSleep);
    const controller = createLifecycleController({
      source,
      notifier,
      destination: OPERATOR_CHAT,
      now: () => clock,
      sleep,
    });

    expect(await controller.toggle()).toBe("started");
    expect(controller.isActive()).toBe(true);
    await vi.waitFor(() => expect(sleep).toHaveBeenCalledOnce());

    expect(await controller.toggle()).toBe("stopped");
    expect(controller.isActive()).toBe(false);
    expect(controller.status()).toEqual({ active: false, startedAt: null, deadline: null });
  });

  it("never runs two loops when toggled twice back to back", async () => {
    const controller = createLifecycleController({
      source,
      notifier,
      destination: OPERATOR_CHAT,
      now: () => clock,
      sleep: blockingSleep,
    });

    const results = await Promise.all([controller.toggle(), controller.toggle()]);

    expect(results).toEqual(["started", "stopped"]);
    expect(controller.isActive()).toBe(false);
    expect(vi.mocked(source.listSessions).mock.calls.length).toBeLessThanOrEqual(1);
  });

  it("stops during a poll that only ends when its signal aborts", async () => {
    vi.mocked(source.listSessions).mockImplementation(
      (options) =>
        new Promise((_resolve, reject) => {
          options?.signal?.addEventListener("abort", () => reject(abortError()), { once: true });
        }),
    );
    const controller = createLifecycleController({
      source,
      notifier,
      destination: OPERATOR_CHAT,
      now: () => clock,
      sleep: blockingSleep,
    });

    expect(await controller.toggle()).toBe("started");
    await vi.waitFor(() => expect(source.listSessions).toHaveBeenCalledOnce());

    expect(await controller.toggle()).toBe("stopped");
    expect(controller.isActive()).toBe(false);
  });

  it("sends no finished notice when stopped by hand", async () => {
    const controller = createLifecycleController({
      source,
      notifier,
      destination: OPERATOR_CHAT,
      now: () => clock,
      sleep: blockingSleep,
    });

    await controller.toggle();
    await controller.toggle();
    await controller.whenIdle();

    expect(notifier.sendMessage).not.toHaveBeenCalled();
  });
});

describe("start / stop", () => {
  it("start is a no-op while a loop is active", async () => {
    const sleep = vi.fn(blockingSleep);
    const controller = createLifecycleController({
      source,
      notifier,
      destination: OPERATOR_CHAT,
      now: () => clock,
      sleep,
    });

    expect(await controller.start()).toBe("started");
    await vi.waitFor(() => expect(sleep).toHaveBeenCalledOnce());
    expect(await controller.start()).toBe("already-active");

    expect(source.listSessions).toHaveBeenCalledOnce();
    await controller.stop();
  });

  it("stop reports not-active when nothing runs", async () => {
    const controller = createLifecycleController({
      source,
      notifier,
      destination: OPERATOR_CHAT,
    });

    expect(await controller.stop()).toBe("not-active");
  });

  it("exposes start time and deadline while running", async () => {
    const controller = createLifecycleController({
      source,
      notifier,
      destination: OPERATOR_CHAT,
      now: () => clock,
      sleep: blockingSleep,
    });

    await controller.start();

    expect(controller.status()).toEqual({
      active: true,
      startedAt: new Date(1_000_000),
      deadline: new Date(1_000_000 + 3_600_000),
    });
    await controller.stop();
  });
});

describe("expiry", () => {
  it("clears the run state by itself and allows a new start", async () => {
    const controller = createLifecycleController({
      source,
      notifier,
      destination: OPERATOR_CHAT,
      durationMs: 120_000,
      pollIntervalMs: 60_000,
      now: () => clock,
      sleep: async (ms) => {
        clock += ms;
      },
    });

    await controller.start();
    await controller.whenIdle();

    expect(controller.isActive()).toBe(false);
    expect(controller.status().startedAt).toBeNull();
    expect(notifier.sendMessage).toHaveBeenCalledOnce();
    expect(notifier.sendMessage).toHaveBeenCalledWith(
      OPERATOR_CHAT,
      "Monitoring finished (2 minutes completed).",
      { formatted: false },
    );

    expect(await controller.toggle()).toBe("started");
    await controller.whenIdle();
  });
});

describe("state store", () => {
  it("survives a stop and restart", async () => {
    vi.mocked(source.listSessions).mockResolvedValue({
      sessions: [{ id: "2", title: "Task 2", status: "AWAITING_PLAN_APPROVAL" }],
    });
    const sleep = vi.fn(blockingSleep);
    const controller = createLifecycleController({
      source,
      notifier,
      destination: OPERATOR_CHAT,
      now: () => clock,
      sleep,
    });

    await controller.toggle();
    await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(1));
    await controller.toggle();

    await controller.toggle();
    await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(2));
    await controller.toggle();

    expect(controller.store.get("2")).toBe("AWAITING_PLAN_APPROVAL");
    expect(notifier.sendMessage).toHaveBeenCalledOnce();
  });
});

describe("failures", () => {
  it("clears the run state when the loop crashes", async () => {
    const logger = makeLogger();
    const controller = createLifecycleController({
      source,
      notifier,
      destination: OPERATOR_CHAT,
      logger,
      now: () => clock,
      sleep: () => Promise.reject(new Error("timer exploded")),
    });

    await controller.start();
    await controller.whenIdle();

    expect(controller.isActive()).toBe(false);
    expect(logger.error).toHaveBeenCalledWith("Monitoring loop crashed: timer exploded");
  });
});
