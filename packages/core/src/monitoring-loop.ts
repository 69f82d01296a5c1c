/**
 * Monitoring loop: time-bounded polling of the session source.
 *
 * Each cycle:
 * 1. Fetches the most recent sessions from the source
 * 2. Diffs them against the state store via the transition evaluator
 * 3. Sends every notable change of the cycle as one digest message
 * 4. Sleeps for the poll interval (cancellable)
 *
 * The loop ends when its deadline passes (Expired: it clears the run state and
 * sends a "finished" notice) or when the controller cancels it (Stopped: no
 * notice, the stop request already answered the operator).
 *
 * The loop holds no lock of its own. The lifecycle controller guarantees that
 * only one run exists at a time.
 */

import { setTimeout as delay } from "node:timers/promises";
import { isAbortError } from "./errors.js";
import { formatDigest, formatFinishedNotice } from "./format.js";
import { createNullLogger, describeError, type Logger } from "./logger.js";
import type { SessionStateStore } from "./session-state-store.js";
import { evaluateTransition } from "./transition-evaluator.js";
import type {
  MonitorOutcome,
  Notifier,
  SessionChange,
  SessionSnapshot,
  SessionSource,
} from "./types.js";

export const DEFAULT_POLL_INTERVAL_MS = 60_000;
export const DEFAULT_RUN_DURATION_MS = 3_600_000;
export const DEFAULT_PAGE_SIZE = 10;

/** Handed to a run by the lifecycle controller. */
export interface MonitorRunContext {
  /** Aborted when the controller stops the run. */
  readonly signal: AbortSignal;
  /** Epoch milliseconds after which the run expires. */
  readonly deadline: number;
  isActive(): boolean;
  /** Clears the active flag and the run handle together. Called on expiry only. */
  expire(): void;
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface MonitoringLoopDeps {
  source: SessionSource;
  notifier: Notifier;
  /** Chat that receives digests and the finished notice. */
  destination: string;
  store: SessionStateStore;
  logger?: Logger;
  pollIntervalMs?: number;
  durationMs?: number;
  pageSize?: number;
  /** Clock, for deterministic tests. */
  now?: () => number;
  sleep?: Sleep;
}

export interface MonitoringLoop {
  readonly pollIntervalMs: number;
  readonly durationMs: number;
  /** Poll until the deadline passes or the run is stopped. */
  run(context: MonitorRunContext): Promise<MonitorOutcome>;
  /** One fetch/diff/notify pass. Rejects when the fetch or the delivery fails. */
  pollOnce(signal?: AbortSignal): Promise<SessionChange[]>;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Evaluate a poll result against the store and record every new status.
 * Sessions without an id are skipped; sessions missing from the poll are left
 * untouched.
 */
export function diffSessions(
  sessions: readonly SessionSnapshot[],
  store: SessionStateStore,
  logger: Logger = createNullLogger(),
): SessionChange[] {
  const changes: SessionChange[] = [];

  for (const session of sessions) {
    if (!session.id) continue;

    logger.debug(`Found session ${session.id} (${session.title}) with status: ${session.status}`, {
      sessionId: session.id,
    });

    const decision = evaluateTransition(session, store.get(session.id));
    if (decision.notify) {
      changes.push(decision.change);
    }

    store.set(session.id, session.status);
  }

  return changes;
}

/** Create a MonitoringLoop instance. */
export function createMonitoringLoop(deps: MonitoringLoopDeps): MonitoringLoop {
  const { source, notifier, destination, store } = deps;
  const logger = deps.logger ?? createNullLogger();
  const pollIntervalMs = deps.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const durationMs = deps.durationMs ?? DEFAULT_RUN_DURATION_MS;
  const pageSize = deps.pageSize ?? DEFAULT_PAGE_SIZE;
  const now = deps.now ?? Date.now;
  const sleep = deps.sleep ?? defaultSleep;

  async function pollOnce(signal?: AbortSignal): Promise<SessionChange[]> {
    const { sessions } = await source.listSessions({ pageSize, signal });
    const changes = diffSessions(sessions, store, logger);

    if (changes.length > 0) {
      logger.info(`Sending digest with ${changes.length} change(s)`);
      await notifier.sendMessage(destination, formatDigest(changes), { formatted: true });
    }

    return changes;
  }

  async function run(context: MonitorRunContext): Promise<MonitorOutcome> {
    logger.info(`Starting monitoring loop until ${new Date(context.deadline).toISOString()}`);

    while (now() < context.deadline && context.isActive()) {
      logger.debug("Starting monitoring cycle");
      try {
        await pollOnce(context.signal);
      } catch (err) {
        if (context.signal.aborted) break;
        logger.error(`Error in monitoring loop: ${describeError(err)}`);
      }

      try {
        await sleep(pollIntervalMs, context.signal);
      } catch (err) {
        if (isAbortError(err) || context.signal.aborted) break;
        throw err;
      }
    }

    if (context.signal.aborted || !context.isActive()) {
      logger.info("Monitoring loop stopped");
      return "stopped";
    }

    context.expire();
    logger.info("Monitoring loop expired");
    try {
      await notifier.sendMessage(destination, formatFinishedNotice(durationMs / 60_000), {
        formatted: false,
      });
    } catch (err) {
      logger.error(`Failed to send finished notice: ${describeError(err)}`);
    }
    return "expired";
  }

  return { pollIntervalMs, durationMs, run, pollOnce };
}
