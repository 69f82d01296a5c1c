import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Logger } from "@jules-monitor/core";

const { tokenRef, onMock, catchMock, launchMock, stopMock, sendMessageMock } = vi.hoisted(() => ({
  tokenRef: { current: "" },
  onMock: vi.fn(),
  catchMock: vi.fn(),
  launchMock: vi.fn(),
  stopMock: vi.fn(),
  sendMessageMock: vi.fn(),
}));

vi.mock("telegraf", () => ({
  Telegraf: class {
    telegram = { sendMessage: sendMessageMock };
    on = onMock;
    catch = catchMock;
    launch = launchMock;
    stop = stopMock;
    constructor(token: string) {
      tokenRef.current = token;
    }
  },
  Telegram: class {},
}));

vi.mock("telegraf/filters", () => ({
  message: (type: string) => `message:${type}`,
}));

import { plain, html, type Dispatcher } from "../../src/bot/dispatch.js";
import { createTelegramBot } from "../../src/bot/telegram-bot.js";

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

function makeDispatcher() {
  return { dispatch: vi.fn() } satisfies Dispatcher;
}

beforeEach(() => {
  onMock.mockReset();
  catchMock.mockReset();
  launchMock.mockReset();
  launchMock.mockResolvedValue(undefined);
  stopMock.mockReset();
  sendMessageMock.mockReset();
  sendMessageMock.mockResolvedValue({ message_id: 1 });
});

describe("createTelegramBot", () => {
  it("creates the client with the token and listens for text", () => {
    createTelegramBot({ token: "test-token" });

    expect(tokenRef.current).toBe("test-token");
    expect(onMock).toHaveBeenCalledOnce();
    expect(onMock.mock.calls[0][0]).toBe("message:text");
  });

  it("ignores messages until launched", async () => {
    const bot = createTelegramBot({ token: "test-token" });

    await bot.handleText("100", "/start");

    expect(sendMessageMock).not.toHaveBeenCalled();
  });

  it("sends every reply back to the chat with its format", async () => {
    const bot = createTelegramBot({ token: "test-token" });
    const dispatcher = makeDispatcher();
    dispatcher.dispatch.mockResolvedValue({
      replies: [...plain("one").replies, ...html("<b>two</b>").replies],
    });
    await bot.launch(dispatcher);

    await bot.handleText("100", "/list");

    expect(dispatcher.dispatch).toHaveBeenCalledWith("100", "/list");
    expect(sendMessageMock).toHaveBeenNthCalledWith(1, "100", "one", {});
    expect(sendMessageMock).toHaveBeenNthCalledWith(2, "100", "<b>two</b>", {
      parse_mode: "HTML",
    });
  });

  it("sends nothing for ignored messages", async () => {
    const bot = createTelegramBot({ token: "test-token" });
    const dispatcher = makeDispatcher();
    dispatcher.dispatch.mockResolvedValue(null);
    await bot.launch(dispatcher);

    await bot.handleText("100", "good morning");

    expect(sendMessageMock).not.toHaveBeenCalled();
  });

  it("feeds telegraf text updates to the dispatcher", async () => {
    const bot = createTelegramBot({ token: "test-token" });
    const dispatcher = makeDispatcher();
    dispatcher.dispatch.mockResolvedValue(plain("ok"));
    await bot.launch(dispatcher);

    const handler = onMock.mock.calls[0][1];
    await handler({ chat: { id: 100 }, message: { text: "/start" } });

    expect(dispatcher.dispatch).toHaveBeenCalledWith("100", "/start");
    expect(sendMessageMock).toHaveBeenCalledWith("100", "ok", {});
  });

  it("logs update errors", () => {
    const logger = makeLogger();
    createTelegramBot({ token: "test-token", logger });

    const onError = catchMock.mock.calls[0][0];
    onError(new Error("bad update"), { update: { update_id: 9 } });

    expect(logger.error).toHaveBeenCalledWith("Failed to handle update 9: bad update");
  });

  it("stops a running bot once", async () => {
    let release = (): void => {};
    launchMock.mockImplementation(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );
    stopMock.mockImplementation(() => release());
    const bot = createTelegramBot({ token: "test-token" });

    const launched = bot.launch(makeDispatcher());
    bot.stop("SIGINT");
    bot.stop("SIGTERM");
    await launched;

    expect(stopMock).toHaveBeenCalledOnce();
    expect(stopMock).toHaveBeenCalledWith("SIGINT");
  });

  it("does not stop a bot that never launched", () => {
    createTelegramBot({ token: "test-token" }).stop("SIGINT");
    expect(stopMock).not.toHaveBeenCalled();
  });
});
