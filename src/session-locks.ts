// PitchScoop - Session locks
// Serializes mutations of one session, and lets an event-wide operation run
// exclusively against every session of that event.
//
// Session tasks for the same (event_id, session_id) run one after another.
// An event task waits for every session task already queued under its event,
// and session tasks queued after it wait for the event task in turn.
// A failed task does not block the ones queued behind it.

const settle = (p: Promise<unknown>): Promise<void> =>
  p.then(
    () => undefined,
    () => undefined,
  );

export class SessionLocks {
  private readonly sessions = new Map<string, Map<string, Promise<void>>>();
  private readonly events = new Map<string, Promise<void>>();

  /** Runs `task` once earlier tasks for this session and its event have settled. */
  async run<T>(eventId: string, sessionId: string, task: () => Promise<T>): Promise<T> {
    let chains = this.sessions.get(eventId);
    if (!chains) {
      chains = new Map();
      this.sessions.set(eventId, chains);
    }
    const previous = chains.get(sessionId) ?? Promise.resolve();
    const gate = this.events.get(eventId) ?? Promise.resolve();
    const run = Promise.all([previous, gate]).then(task);
    const settled = settle(run);
    chains.set(sessionId, settled);
    try {
      return await run;
    } finally {
      const current = this.sessions.get(eventId);
      if (current?.get(sessionId) === settled) {
        current.delete(sessionId);
        if (current.size === 0) this.sessions.delete(eventId);
      }
    }
  }

  /** Runs `task` exclusively against every session of the event. */
  async runEvent<T>(eventId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.events.get(eventId) ?? Promise.resolve();
    const pending = [...(this.sessions.get(eventId)?.values() ?? [])];
    const run = Promise.all([previous, ...pending]).then(task);
    const settled = settle(run);
    this.events.set(eventId, settled);
    try {
      return await run;
    } finally {
      if (this.events.get(eventId) === settled) {
        this.events.delete(eventId);
      }
    }
  }

  /** Number of sessions with queued or running tasks under the event. */
  activeSessions(eventId: string): number {
    return this.sessions.get(eventId)?.size ?? 0;
  }
}
