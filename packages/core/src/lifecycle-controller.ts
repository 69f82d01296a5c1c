/**
 * Lifecycle controller: single-flight start/stop of the monitoring loop.
 *
 * Owns the process-wide run state (active flag + run handle) and the session
 * state store, and is the only place either is mutated outside a running loop.
 * Start/stop requests are serialized, so a toggle that arrives while a stop is
 * still tearing down waits for it instead of spawning a second loop.
 */

import { createNullLogger, describeError } from "./logger.js";
import {
  createMonitoringLoop,
  type MonitorRunContext,
  type MonitoringLoop,
  type MonitoringLoopDeps,
} from "./monitoring-loop.js";
import { SessionStateStore } from "./session-state-store.js";
import type { MonitorStatus, StartResult, StopResult, ToggleResult } from "./types.js";

export type LifecycleControllerDeps = Omit<MonitoringLoopDeps, "store"> & {
  /** Defaults to a fresh, empty store. */
  store?: SessionStateStore;
};

export interface LifecycleController {
  readonly store: SessionStateStore;
  readonly loop: MonitoringLoop;
  /** Start when idle, stop when running. */
  toggle(): Promise<ToggleResult>;
  start(): Promise<StartResult>;
  /** Cancels the run and waits until the loop has exited. */
  stop(): Promise<StopResult>;
  isActive(): boolean;
  status(): MonitorStatus;
  /** Resolves once the most recent run has fully ended (finished notice included). */
  whenIdle(): Promise<void>;
}

/** Handle on the one background run. */
interface RunHandle {
  abort: AbortController;
  startedAt: number;
  deadline: number;
  done: Promise<void>;
}

/** Create a LifecycleController instance. */
export function createLifecycleController(deps: LifecycleControllerDeps): LifecycleController {
  const store = deps.store ?? new SessionStateStore();
  const logger = deps.logger ?? createNullLogger();
  const now = deps.now ?? Date.now;
  const loop = createMonitoringLoop({ ...deps, store, now });

  let active = false;
  let current: RunHandle | null = null;
  /** Most recent run, kept after it clears itself so callers can await its teardown. */
  let lastRun: RunHandle | null = null;
  let queue: Promise<unknown> = Promise.resolve();

  /** Run lifecycle operations one after another. */
  function serialize<T>(operation: () => Promise<T> | T): Promise<T> {
    const next = queue.then(operation);
    queue = next.catch(() => undefined);
    return next;
  }

  function clearRun(handle: RunHandle): void {
    if (current !== handle) return;
    active = false;
    current = null;
  }

  function startNow(): StartResult {
    if (active) return "already-active";

    const startedAt = now();
    const handle: RunHandle = {
      abort: new AbortController(),
      startedAt,
      deadline: startedAt + loop.durationMs,
      done: Promise.resolve(),
    };

    const context: MonitorRunContext = {
      signal: handle.abort.signal,
      deadline: handle.deadline,
      isActive: () => active && current === handle,
      expire: () => clearRun(handle),
    };

    active = true;
    current = handle;
    lastRun = handle;
    logger.info("Monitoring started");

    handle.done = loop
      .run(context)
      .then((outcome) => {
        logger.info(`Monitoring run ended: ${outcome}`);
      })
      .catch((err: unknown) => {
        logger.error(`Monitoring loop crashed: ${describeError(err)}`);
      })
      .finally(() => clearRun(handle));

    return "started";
  }

  async function stopNow(): Promise<StopResult> {
    const handle = current;
    if (!active || !handle) return "not-active";

    active = false;
    current = null;
    handle.abort.abort();
    await handle.done;
    logger.info("Monitoring stopped");
    return "stopped";
  }

  return {
    store,
    loop,

    toggle(): Promise<ToggleResult> {
      return serialize(async (): Promise<ToggleResult> => {
        if (!active) return startNow();
        await stopNow();
        return "stopped";
      });
    },

    start(): Promise<StartResult> {
      return serialize(startNow);
    },

    stop(): Promise<StopResult> {
      return serialize(stopNow);
    },

    isActive(): boolean {
      return active;
    },

    status(): MonitorStatus {
      return {
        active,
        startedAt: current ? new Date(current.startedAt) : null,
        deadline: current ? new Date(current.deadline) : null,
      };
    },

    whenIdle(): Promise<void> {
      return lastRun ? lastRun.done : Promise.resolve();
    },
  };
}
