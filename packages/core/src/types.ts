/**
 * Shared types for jules-monitor.
 *
 * Plugins implement SessionSource or Notifier; the core only ever talks to
 * those two interfaces.
 */

// =============================================================================
// SESSIONS
// =============================================================================

export type SessionId = string;

/**
 * Status code reported by the remote API. The set is open-ended, so this stays
 * a string; the well-known values live in SESSION_STATUS.
 */
export type SessionStatus = string;

export const SESSION_STATUS = {
  QUEUED: "QUEUED",
  PLANNING: "PLANNING",
  AWAITING_PLAN_APPROVAL: "AWAITING_PLAN_APPROVAL",
  AWAITING_USER_FEEDBACK: "AWAITING_USER_FEEDBACK",
  IN_PROGRESS: "IN_PROGRESS",
  PAUSED: "PAUSED",
  FAILED: "FAILED",
  COMPLETED: "COMPLETED",
  UNKNOWN: "UNKNOWN",
} as const satisfies Record<string, SessionStatus>;

/** A session as seen by one poll. Never stored; fetched fresh every cycle. */
export interface SessionSnapshot {
  id: SessionId;
  title: string;
  status: SessionStatus;
}

export interface SessionDetail extends SessionSnapshot {
  url: string;
}

export interface SessionActivity {
  type: string;
  createTime: string;
}

export interface CreatedSession {
  id: SessionId;
  url: string;
  status: SessionStatus;
}

export interface CreateSessionRequest {
  repoOwner: string;
  repoName: string;
  prompt: string;
  /** Defaults to "main". */
  branch?: string;
}

export interface ListOptions {
  pageSize?: number;
  /** Aborts the in-flight request (the monitor forwards its stop signal here). */
  signal?: AbortSignal;
}

// =============================================================================
// PLUGIN SLOTS
// =============================================================================

/**
 * Remote source of sessions. Every method rejects with FetchError when the
 * remote side is unreachable or answers with a non-2xx status.
 */
export interface SessionSource {
  readonly name: string;
  listSessions(options?: ListOptions): Promise<{ sessions: SessionSnapshot[] }>;
  getSession(sessionId: SessionId): Promise<SessionDetail>;
  listActivities(
    sessionId: SessionId,
    options?: ListOptions,
  ): Promise<{ activities: SessionActivity[] }>;
  createSession(request: CreateSessionRequest): Promise<CreatedSession>;
}

export interface SendMessageOptions {
  /** Send as HTML markup. Defaults to true. */
  formatted?: boolean;
}

/** Delivers text to a chat destination. */
export interface Notifier {
  readonly name: string;
  sendMessage(destination: string, text: string, options?: SendMessageOptions): Promise<void>;
}

export type PluginSlot = "source" | "notifier";

export interface PluginManifest {
  name: string;
  slot: PluginSlot;
  description: string;
  version: string;
}

export interface PluginModule<T, C = Record<string, unknown>> {
  manifest: PluginManifest;
  create(config: C): T;
}

// =============================================================================
// MONITORING
// =============================================================================

export type TransitionReason = "first-seen-critical" | "status-changed";

export interface SessionChange {
  id: SessionId;
  title: string;
  status: SessionStatus;
  previousStatus: SessionStatus | undefined;
  reason: TransitionReason;
}

export type TransitionDecision =
  | { notify: false }
  | { notify: true; change: SessionChange };

/** How a monitoring run ended. */
export type MonitorOutcome = "expired" | "stopped";

export type ToggleResult = "started" | "stopped" | "already-active";
export type StartResult = "started" | "already-active";
export type StopResult = "stopped" | "not-active";

export interface MonitorStatus {
  active: boolean;
  startedAt: Date | null;
  deadline: Date | null;
}

// =============================================================================
// CONFIG
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface MonitorSettings {
  pollIntervalSeconds: number;
  durationMinutes: number;
  pageSize: number;
}

export interface ApiSettings {
  baseUrl: string;
  readTimeoutMs: number;
  createTimeoutMs: number;
}

export interface LoggingSettings {
  dir: string;
  level: LogLevel;
}

export interface Credentials {
  telegramToken: string;
  julesToken: string;
  /** Chat id of the single operator allowed to issue privileged commands. */
  operatorChatId: string;
}

export interface MonitorConfig {
  /** Path of the YAML file the settings came from, if any. */
  configPath: string | null;
  credentials: Credentials;
  monitor: MonitorSettings;
  api: ApiSettings;
  logging: LoggingSettings;
}
