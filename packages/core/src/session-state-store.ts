import type { SessionId, SessionStatus } from "./types.js";

/**
 * Last observed status per session.
 *
 * Lives for the whole process and survives monitor stop/restart. Entries are
 * never removed: a session that drops out of the feed keeps its last status.
 */
export class SessionStateStore {
  private readonly states = new Map<SessionId, SessionStatus>();

  get(sessionId: SessionId): SessionStatus | undefined {
    return this.states.get(sessionId);
  }

  set(sessionId: SessionId, status: SessionStatus): void {
    this.states.set(sessionId, status);
  }

  has(sessionId: SessionId): boolean {
    return this.states.has(sessionId);
  }

  get size(): number {
    return this.states.size;
  }

  /** Copy of the current contents. */
  snapshot(): Map<SessionId, SessionStatus> {
    return new Map(this.states);
  }
}
