/**
 * Chat command handlers. Each one turns a request into replies; none of them
 * talks to Telegram directly.
 */

import {
  FetchError,
  MalformedInputError,
  bold,
  code,
  type CreateSessionRequest,
  createNullLogger,
  describeError,
  escapeHtml,
  formatDuration,
  formatInterval,
  type LifecycleController,
  type Logger,
  type MonitorSettings,
  type SessionActivity,
  type SessionSnapshot,
  type SessionSource,
  type StopResult,
  type ToggleResult,
} from "@jules-monitor/core";
import { htmlSafeCut } from "@jules-monitor/plugin-notifier-telegram";
import { html, plain, type BotResponse, type Route } from "./dispatch.js";

export const LIST_PAGE_SIZE = 10;
export const ACTIVITIES_PAGE_SIZE = 10;
export const MAX_REPLY_LENGTH = 4000;

export const CREATE_USAGE = "Usage: /create <owner/repo> <prompt>";
export const INFO_USAGE = "Usage: /info <session_id>";
export const MONITOR_USAGE = "Usage: /monitor [start|stop|status]";
export const NOT_ACTIVE_REPLY = "Monitoring is not active.";
export const INVALID_REPO_REPLY = "Invalid repo format. Use owner/repo (e.g., octo-org/octo-repo)";

export interface HandlerDeps {
  source: SessionSource;
  controller: Pick<LifecycleController, "toggle" | "start" | "stop" | "status">;
  monitor: Pick<MonitorSettings, "pollIntervalSeconds" | "durationMinutes">;
  logger?: Logger;
}

function forTheNext(durationMinutes: number): string {
  return durationMinutes === 60 ? "the next hour" : `the next ${formatDuration(durationMinutes)}`;
}

export function startedReply(monitor: HandlerDeps["monitor"]): string {
  return (
    `Monitoring started. I will check for changes ${formatInterval(monitor.pollIntervalSeconds)} ` +
    `for ${forTheNext(monitor.durationMinutes)}.`
  );
}

export function greeting(monitor: HandlerDeps["monitor"]): string {
  return [
    "Hello! I am the Jules Monitoring Bot.",
    "Commands:",
    "/list - List recent sessions",
    `/monitor - Start or stop monitoring sessions for ${formatDuration(monitor.durationMinutes)}`,
    "/monitor status - Show whether monitoring is running",
    "/create <owner/repo> <prompt> - Create a new session",
    "/info <session_id> - Show one session",
  ].join("\n");
}

/** "octo-org/octo-repo Fix the build" -> owner, repo, prompt. */
export function parseCreateArgs(args: string): CreateSessionRequest {
  const match = /^(\S+)\s+([\s\S]+)$/.exec(args);
  if (!match) throw new MalformedInputError(CREATE_USAGE);

  const [, repoRef, prompt] = match;
  const slash = repoRef.indexOf("/");
  if (slash <= 0 || slash === repoRef.length - 1) {
    throw new MalformedInputError(INVALID_REPO_REPLY);
  }
  return {
    repoOwner: repoRef.slice(0, slash),
    repoName: repoRef.slice(slash + 1),
    prompt: prompt.trim(),
  };
}

/** Shorten an HTML reply, preferring a line boundary and never cutting through markup. */
export function truncate(text: string, max = MAX_REPLY_LENGTH): string {
  if (text.length <= max) return text;
  const newline = text.lastIndexOf("\n", max);
  const cut = newline > 0 ? newline : htmlSafeCut(text, max);
  return `${text.slice(0, cut)}...`;
}

export function createRoutes(deps: HandlerDeps): Route[] {
  const { source, controller, monitor } = deps;
  const logger = deps.logger ?? createNullLogger();

  function logFailure(what: string, err: unknown): void {
    // FetchErrors were already logged by the source with their details.
    if (!(err instanceof FetchError)) logger.error(`${what}: ${describeError(err)}`);
  }

  function monitorReply(result: ToggleResult | StopResult): BotResponse {
    switch (result) {
      case "started":
        return plain(startedReply(monitor));
      case "stopped":
        return plain("Monitoring stopped.");
      case "already-active":
        return plain("Monitoring is already active.");
      case "not-active":
        return plain(NOT_ACTIVE_REPLY);
    }
  }

  async function sessionInfo(sessionId: string): Promise<BotResponse> {
    try {
      const session = await source.getSession(sessionId);
      return html(
        [
          `ID: ${code(session.id)}`,
          `Title: ${escapeHtml(session.title)}`,
          `State: ${escapeHtml(session.status)}`,
          `URL: ${escapeHtml(session.url)}`,
          "",
          `Activities: /list_activities_${session.id}`,
        ].join("\n"),
      );
    } catch (err) {
      logFailure(`Failed to fetch session ${sessionId}`, err);
      return plain(`Session ${sessionId} not found or error occurred.`);
    }
  }

  return [
    {
      command: "start",
      public: true,
      handler: async () => plain(greeting(monitor)),
    },
    {
      command: "list",
      handler: async () => {
        let sessions: SessionSnapshot[];
        try {
          ({ sessions } = await source.listSessions({ pageSize: LIST_PAGE_SIZE }));
        } catch (err) {
          logFailure("Failed to list sessions", err);
          return plain("Failed to fetch sessions. Check logs.");
        }
        if (sessions.length === 0) return plain("No sessions found.");

        const entries = sessions.map((s) => `ID: ${code(s.id)}\nTitle: ${escapeHtml(s.title)}`);
        return html([bold("Recent Sessions:"), ...entries].join("\n\n"));
      },
    },
    {
      command: "monitor",
      handler: async (request) => {
        switch (request.args.toLowerCase()) {
          case "":
            return monitorReply(await controller.toggle());
          case "start":
            return monitorReply(await controller.start());
          case "stop":
            return monitorReply(await controller.stop());
          case "status": {
            const { active, deadline } = controller.status();
            return plain(
              active && deadline
                ? `Monitoring is active until ${deadline.toISOString()}.`
                : NOT_ACTIVE_REPLY,
            );
          }
          default:
            throw new MalformedInputError(MONITOR_USAGE);
        }
      },
    },
    {
      command: "create",
      handler: async (request) => {
        const req = parseCreateArgs(request.args);
        try {
          const created = await source.createSession(req);
          return html(
            [
              "Session Created!",
              `ID: ${code(created.id)}`,
              `URL: ${escapeHtml(created.url)}`,
              `State: ${escapeHtml(created.status)}`,
            ].join("\n"),
          );
        } catch (err) {
          logFailure("Failed to create session", err);
          return plain("Failed to create session. Check logs.");
        }
      },
    },
    {
      command: "info",
      handler: async (request) => {
        if (!request.args) throw new MalformedInputError(INFO_USAGE);
        return sessionInfo(request.args);
      },
    },
    {
      pattern: /^\/info_(\d+)$/,
      handler: async (request) => sessionInfo(request.params[0]),
    },
    {
      pattern: /^\/list_activities_(\d+)$/,
      handler: async (request) => {
        const sessionId = request.params[0];
        let activities: SessionActivity[];
        try {
          ({ activities } = await source.listActivities(sessionId, {
            pageSize: ACTIVITIES_PAGE_SIZE,
          }));
        } catch (err) {
          logFailure(`Failed to list activities of ${sessionId}`, err);
          return plain(`Failed to fetch activities for session ${sessionId}.`);
        }
        if (activities.length === 0) return plain("No activities found.");

        const lines = [
          bold(`Activities for ${sessionId}:`),
          ...activities.map((a) => `• ${code(a.type)} at ${escapeHtml(a.createTime)}`),
        ];
        return html(truncate(lines.join("\n")));
      },
    },
  ];
}
