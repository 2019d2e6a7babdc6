// PitchScoop - Session store
// Key-value access to recording sessions keyed by (event_id, session_id).
// Every call names the event, so tenant isolation is enforced here rather than
// by callers remembering to filter.

import { IsolationError } from "./errors.js";
import type { PitchSession } from "./types.js";

export interface SessionStore {
  get(eventId: string, sessionId: string): Promise<PitchSession | null>;
  /** Inserts or replaces. The session's own event_id must match `eventId`. */
  put(eventId: string, session: PitchSession): Promise<void>;
  delete(eventId: string, sessionId: string): Promise<boolean>;
  /** Sessions of one event, or of every event when `eventId` is omitted. */
  list(eventId?: string): Promise<PitchSession[]>;
  deleteEvent(eventId: string): Promise<string[]>;
}

/**
 * Process-local SessionStore. Records are cloned on the way in and out so a
 * caller holding a returned object cannot change stored state without put().
 */
export class InMemorySessionStore implements SessionStore {
  private readonly events = new Map<string, Map<string, PitchSession>>();

  async get(eventId: string, sessionId: string): Promise<PitchSession | null> {
    const session = this.events.get(eventId)?.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  async put(eventId: string, session: PitchSession): Promise<void> {
    if (session.event_id !== eventId) {
      throw new IsolationError(
        `Session ${session.session_id} belongs to event "${session.event_id}", not "${eventId}"`,
      );
    }
    let sessions = this.events.get(eventId);
    if (!sessions) {
      sessions = new Map();
      this.events.set(eventId, sessions);
    }
    sessions.set(session.session_id, structuredClone(session));
  }

  async delete(eventId: string, sessionId: string): Promise<boolean> {
    return this.events.get(eventId)?.delete(sessionId) ?? false;
  }

  async list(eventId?: string): Promise<PitchSession[]> {
    const buckets =
      eventId === undefined
        ? [...this.events.values()]
        : [this.events.get(eventId) ?? new Map<string, PitchSession>()];
    const sessions: PitchSession[] = [];
    for (const bucket of buckets) {
      for (const session of bucket.values()) {
        sessions.push(structuredClone(session));
      }
    }
    return sessions;
  }

  async deleteEvent(eventId: string): Promise<string[]> {
    const removed = [...(this.events.get(eventId)?.keys() ?? [])];
    this.events.delete(eventId);
    return removed;
  }
}
