/**
 * @jules-monitor/core
 *
 * Core library for jules-monitor.
 * Exports all types, config loader, logging and the monitoring services.
 */

// Types: everything plugins and consumers need
export * from "./types.js";

// Errors
export {
  FetchError,
  ConfigurationError,
  AuthorizationError,
  MalformedInputError,
  isAbortError,
} from "./errors.js";

// Config: env credentials + optional YAML
export {
  loadConfig,
  validateConfig,
  findConfigFile,
  expandHome,
  DEFAULT_API_BASE_URL,
} from "./config.js";
export type { LoadConfigOptions } from "./config.js";

// Logging: console + JSONL
export { LogWriter } from "./log-writer.js";
export type { LogEntry, LogWriterOptions } from "./log-writer.js";
export { createLogger, createNullLogger, describeError } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";

// Telegram HTML + monitor message text
export {
  escapeHtml,
  bold,
  code,
  formatChange,
  formatDigest,
  formatDuration,
  formatFinishedNotice,
  formatInterval,
  DIGEST_HEADER,
} from "./format.js";

// Transition evaluator: pure notify/skip decision
export {
  evaluateTransition,
  isCriticalStatus,
  CRITICAL_STATUSES,
} from "./transition-evaluator.js";

// Session state store: last seen status per session
export { SessionStateStore } from "./session-state-store.js";

// Monitoring loop: poll / diff / digest / sleep
export {
  createMonitoringLoop,
  diffSessions,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_RUN_DURATION_MS,
  DEFAULT_PAGE_SIZE,
} from "./monitoring-loop.js";
export type {
  MonitoringLoop,
  MonitoringLoopDeps,
  MonitorRunContext,
  Sleep,
} from "./monitoring-loop.js";

// Lifecycle controller: single-flight toggle
export { createLifecycleController } from "./lifecycle-controller.js";
export type { LifecycleController, LifecycleControllerDeps } from "./lifecycle-controller.js";
