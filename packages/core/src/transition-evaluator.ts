/**
 * Decides whether a session's status warrants a notification.
 *
 * Pure: it never touches the state store. The monitoring loop asks first and
 * records the new status afterwards, whatever the answer.
 */

import {
  SESSION_STATUS,
  type SessionSnapshot,
  type SessionStatus,
  type TransitionDecision,
} from "./types.js";

/** Statuses worth a notification even the first time a session is seen. */
export const CRITICAL_STATUSES: ReadonlySet<SessionStatus> = new Set([
  SESSION_STATUS.AWAITING_PLAN_APPROVAL,
  SESSION_STATUS.AWAITING_USER_FEEDBACK,
]);

export function isCriticalStatus(status: SessionStatus): boolean {
  return CRITICAL_STATUSES.has(status);
}

export function evaluateTransition(
  session: SessionSnapshot,
  previousStatus: SessionStatus | undefined,
): TransitionDecision {
  if (previousStatus === undefined) {
    if (!isCriticalStatus(session.status)) return { notify: false };
    return {
      notify: true,
      change: {
        id: session.id,
        title: session.title,
        status: session.status,
        previousStatus,
        reason: "first-seen-critical",
      },
    };
  }

  if (session.status === previousStatus) return { notify: false };

  return {
    notify: true,
    change: {
      id: session.id,
      title: session.title,
      status: session.status,
      previousStatus,
      reason: "status-changed",
    },
  };
}
