import { z } from "zod";
import {
  DEFAULT_API_BASE_URL,
  FetchError,
  createNullLogger,
  describeError,
  type CreateSessionRequest,
  type CreatedSession,
  type ListOptions,
  type LogWriter,
  type Logger,
  type PluginModule,
  type SessionActivity,
  type SessionDetail,
  type SessionSnapshot,
  type SessionSource,
} from "@jules-monitor/core";

export const manifest = {
  name: "jules",
  slot: "source" as const,
  description: "Session source plugin: Jules REST API",
  version: "0.1.0",
};

export interface JulesSourceConfig {
  apiKey: string;
  baseUrl?: string;
  readTimeoutMs?: number;
  createTimeoutMs?: number;
  /** Receives one { timestamp, endpoint, response } line per successful call. */
  auditLog?: LogWriter;
  logger?: Logger;
}

const DEFAULT_READ_TIMEOUT_MS = 10_000;
const DEFAULT_CREATE_TIMEOUT_MS = 30_000;
const DEFAULT_ACTIVITIES_PAGE_SIZE = 30;
const DEFAULT_SESSIONS_PAGE_SIZE = 10;

// Only the fields we read are declared; the API sends many more.
const RawSessionSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    title: z.string().optional(),
    state: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

const ListSessionsResponseSchema = z
  .object({ sessions: z.array(RawSessionSchema).optional() })
  .passthrough();

const RawActivitySchema = z
  .object({
    type: z.string().optional(),
    createTime: z.string().optional(),
  })
  .passthrough();

const ListActivitiesResponseSchema = z
  .object({ activities: z.array(RawActivitySchema).optional() })
  .passthrough();

type RawSession = z.infer<typeof RawSessionSchema>;

/** "sessions/123" -> "123" */
export function cleanSessionId(sessionId: string): string {
  return sessionId.trim().replace(/^sessions\//, "");
}

export function sessionUrl(sessionId: string): string {
  return `https://jules.google.com/session/${cleanSessionId(sessionId)}`;
}

function rawSessionId(raw: RawSession): string {
  if (raw.id) return cleanSessionId(raw.id);
  if (raw.name) return cleanSessionId(raw.name);
  return "";
}

function toSnapshot(raw: RawSession): SessionSnapshot {
  return {
    id: rawSessionId(raw),
    title: raw.title ?? "No Title",
    status: raw.state ?? "UNKNOWN",
  };
}

async function safeResponseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return "<unreadable response body>";
  }
}

interface RequestSpec {
  /** Audit/log label, e.g. "get_session/123". */
  endpoint: string;
  path: string;
  method?: "GET" | "POST";
  query?: Record<string, string | number>;
  body?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

export function create(config: JulesSourceConfig): SessionSource {
  const baseUrl = (config.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
  const readTimeoutMs = config.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
  const createTimeoutMs = config.createTimeoutMs ?? DEFAULT_CREATE_TIMEOUT_MS;
  const logger = config.logger ?? createNullLogger();
  const auditLog = config.auditLog;

  const headers = {
    "X-Goog-Api-Key": config.apiKey,
    "Content-Type": "application/json",
  };

  async function request(req: RequestSpec): Promise<unknown> {
    const url = new URL(`${baseUrl}${req.path}`);
    for (const [key, value] of Object.entries(req.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), req.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    req.signal?.addEventListener("abort", forwardAbort, { once: true });

    const timedOut = `timed out after ${req.timeoutMs}ms`;
    const failure = (err: unknown, reason: string): FetchError => {
      logger.error(`Error calling ${req.endpoint}: ${reason}`);
      return new FetchError(req.endpoint, reason, undefined, { cause: err });
    };

    // The timeout and the caller's signal cover the body read as well as the headers.
    let data: unknown;
    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method: req.method ?? "GET",
          headers,
          body: req.body === undefined ? undefined : JSON.stringify(req.body),
          signal: controller.signal,
        });
      } catch (err) {
        // Cancelled by the caller: not a remote failure.
        if (req.signal?.aborted) throw err;
        throw failure(err, controller.signal.aborted ? timedOut : describeError(err));
      }

      if (!response.ok) {
        const text = await safeResponseText(response);
        if (req.signal?.aborted) throw req.signal.reason;
        if (controller.signal.aborted) throw failure(undefined, timedOut);
        logger.error(`Error calling ${req.endpoint}: HTTP ${response.status}`, { body: text });
        throw new FetchError(req.endpoint, `HTTP ${response.status}`, response.status);
      }

      try {
        data = await response.json();
      } catch (err) {
        if (req.signal?.aborted) throw err;
        if (controller.signal.aborted) throw failure(err, timedOut);
        logger.error(`Error calling ${req.endpoint}: response is not JSON`);
        throw new FetchError(req.endpoint, "response is not JSON", response.status, {
          cause: err,
        });
      }
    } finally {
      clearTimeout(timeoutId);
      req.signal?.removeEventListener("abort", forwardAbort);
    }

    auditLog?.appendRecord({
      timestamp: new Date().toISOString(),
      endpoint: req.endpoint,
      response: data,
    });
    return data;
  }

  function parse<T>(
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
  ): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      logger.error(`Unexpected response shape from ${endpoint}`);
      throw new FetchError(endpoint, "unexpected response shape");
    }
    return result.data;
  }

  return {
    name: "jules",

    async listSessions(options: ListOptions = {}): Promise<{ sessions: SessionSnapshot[] }> {
      const endpoint = "list_sessions";
      const data = await request({
        endpoint,
        path: "/sessions",
        query: { pageSize: options.pageSize ?? DEFAULT_SESSIONS_PAGE_SIZE },
        timeoutMs: readTimeoutMs,
        signal: options.signal,
      });
      const parsed = parse(endpoint, ListSessionsResponseSchema, data);
      return { sessions: (parsed.sessions ?? []).map(toSnapshot) };
    },

    async getSession(sessionId: string): Promise<SessionDetail> {
      const id = cleanSessionId(sessionId);
      const endpoint = `get_session/${id}`;
      const data = await request({
        endpoint,
        path: `/sessions/${encodeURIComponent(id)}`,
        timeoutMs: readTimeoutMs,
      });
      const raw = parse(endpoint, RawSessionSchema, data);
      const snapshot = toSnapshot(raw);
      if (!snapshot.id) {
        throw new FetchError(endpoint, "response has no session id");
      }
      return { ...snapshot, url: raw.url ?? sessionUrl(snapshot.id) };
    },

    async listActivities(
      sessionId: string,
      options: ListOptions = {},
    ): Promise<{ activities: SessionActivity[] }> {
      const id = cleanSessionId(sessionId);
      const endpoint = `list_activities/${id}`;
      const data = await request({
        endpoint,
        path: `/sessions/${encodeURIComponent(id)}/activities`,
        query: { pageSize: options.pageSize ?? DEFAULT_ACTIVITIES_PAGE_SIZE },
        timeoutMs: readTimeoutMs,
        signal: options.signal,
      });
      const parsed = parse(endpoint, ListActivitiesResponseSchema, data);
      return {
        activities: (parsed.activities ?? []).map((activity) => ({
          type: activity.type ?? "Unknown",
          createTime: activity.createTime ?? "",
        })),
      };
    },

    async createSession(req: CreateSessionRequest): Promise<CreatedSession> {
      const endpoint = "create_session";
      const data = await request({
        endpoint,
        path: "/sessions",
        method: "POST",
        body: {
          sourceContext: {
            source: `sources/github/${req.repoOwner}/${req.repoName}`,
            githubRepoContext: { startingBranch: req.branch ?? "main" },
          },
          prompt: req.prompt,
        },
        timeoutMs: createTimeoutMs,
      });
      const raw = parse(endpoint, RawSessionSchema, data);
      const id = rawSessionId(raw);
      return {
        id,
        url: raw.url ?? sessionUrl(id),
        status: raw.state ?? "UNKNOWN",
      };
    },
  };
}

export default { manifest, create } satisfies PluginModule<SessionSource, JulesSourceConfig>;
