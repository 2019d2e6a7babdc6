// PitchScoop - Event manager
// Events scope sessions and scores. Lifecycle: upcoming → active → completed.
// The reserved "default" event is never stored; it is always active so a
// practice pitch can be recorded without creating anything first.
// Deleting an event runs under the event-wide lock, after every in-flight
// session operation of that event has settled.

import { v4 as uuidv4 } from "uuid";
import type { AudioStorage } from "./audio-storage.js";
import { NotFoundError, StateError, ValidationError } from "./errors.js";
import type { EventStore } from "./event-store.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ScoreStore } from "./score-store.js";
import { SessionLocks } from "./session-locks.js";
import type { SessionStore } from "./session-store.js";
import { DEFAULT_EVENT_ID, type EventStatus, type EventType, type PitchEvent } from "./types.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_DURATION_MINUTES: Record<EventType, number> = {
  hackathon: 3,
  vc_pitch: 5,
  practice: 10,
};

export const DEFAULT_MAX_PARTICIPANTS = 50;
export const DEFAULT_EVENT_DURATION_MINUTES = 30;

const VALID_TRANSITIONS: Record<EventStatus, EventStatus[]> = {
  upcoming: ["active"],
  active: ["completed"],
  completed: [],
};

export interface CreateEventInput {
  event_name: string;
  event_type: EventType;
  description?: string;
  duration_minutes?: number;
  sponsor_tools?: string[];
  max_participants?: number;
}

export interface EventFilter {
  event_type?: EventType;
  status?: EventStatus;
}

export interface EventDeletionSummary {
  event_id: string;
  sessions_deleted: number;
  scores_deleted: number;
}

export interface EventManagerDeps {
  eventStore: EventStore;
  sessionStore: SessionStore;
  scoreStore: ScoreStore;
  audioStorage: AudioStorage;
  locks?: SessionLocks;
  logger?: Logger;
  now?: () => Date;
}

export type EventDeletedListener = (eventId: string, sessionIds: string[]) => void;

export class EventManager {
  private readonly deps: EventManagerDeps;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly defaultEvent: PitchEvent;
  private readonly locks: SessionLocks;
  private readonly deletedListeners: EventDeletedListener[] = [];

  constructor(deps: EventManagerDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
    this.locks = deps.locks ?? new SessionLocks();
    const bootedAt = this.now().toISOString();
    this.defaultEvent = {
      event_id: DEFAULT_EVENT_ID,
      event_name: "Default Event",
      event_type: "practice",
      status: "active",
      description: "Practice pitches recorded without an explicit event",
      duration_minutes: DEFAULT_EVENT_DURATION_MINUTES,
      sponsor_tools: [],
      max_participants: DEFAULT_MAX_PARTICIPANTS,
      created_at: bootedAt,
      started_at: bootedAt,
      ended_at: null,
    };
  }

  async createEvent(input: CreateEventInput): Promise<PitchEvent> {
    const event: PitchEvent = {
      event_id: uuidv4(),
      event_name: input.event_name,
      event_type: input.event_type,
      status: "upcoming",
      description: input.description ?? "",
      duration_minutes: input.duration_minutes ?? DEFAULT_DURATION_MINUTES[input.event_type],
      sponsor_tools: input.sponsor_tools ?? [],
      max_participants: input.max_participants ?? DEFAULT_MAX_PARTICIPANTS,
      created_at: this.now().toISOString(),
      started_at: null,
      ended_at: null,
    };
    await this.deps.eventStore.put(event);
    this.logger.info("Event created", { event_id: event.event_id, event_type: event.event_type });
    return event;
  }

  /** Stored events newest first. The implicit default event is not listed. */
  async listEvents(filter: EventFilter = {}): Promise<PitchEvent[]> {
    const events = await this.deps.eventStore.list();
    return events
      .filter((e) => filter.event_type === undefined || e.event_type === filter.event_type)
      .filter((e) => filter.status === undefined || e.status === filter.status)
      .sort((a, b) => b.created_at.localeCompare(a.created_at));
  }

  /** @throws NotFoundError EVENT_NOT_FOUND */
  async getEvent(eventId: string): Promise<PitchEvent> {
    if (eventId === DEFAULT_EVENT_ID) {
      return structuredClone(this.defaultEvent);
    }
    const event = await this.deps.eventStore.get(eventId);
    if (!event) {
      throw new NotFoundError("EVENT_NOT_FOUND", `Event not found: ${eventId}`);
    }
    return event;
  }

  /**
   * Returns the event a new recording may be created under.
   * @throws NotFoundError EVENT_NOT_FOUND, StateError EVENT_NOT_ACTIVE
   */
  async ensureRecordable(eventId: string): Promise<PitchEvent> {
    const event = await this.getEvent(eventId);
    if (event.status !== "active") {
      throw new StateError(
        "EVENT_NOT_ACTIVE",
        `Event ${eventId} is ${event.status}; recordings require an active event`,
      );
    }
    return event;
  }

  async startEvent(eventId: string): Promise<PitchEvent> {
    return this.transition(eventId, "active");
  }

  async endEvent(eventId: string): Promise<PitchEvent> {
    return this.transition(eventId, "completed");
  }

  /**
   * Removes the event with every session, audio file and score under it.
   * `confirm` must be exactly true.
   */
  async deleteEvent(eventId: string, confirm: boolean): Promise<EventDeletionSummary> {
    if (!confirm) {
      throw new ValidationError("Event deletion requires confirm_deletion: true");
    }
    this.assertNotDefault(eventId, "deleted");

    return this.locks.runEvent(eventId, async () => {
      await this.getEvent(eventId);
      await this.deps.eventStore.delete(eventId);

      const sessionIds = await this.deps.sessionStore.deleteEvent(eventId);
      const scoresDeleted = await this.deps.scoreStore.deleteForEvent(eventId);
      await this.deps.audioStorage.deleteEvent(eventId);
      for (const listener of this.deletedListeners) {
        listener(eventId, sessionIds);
      }

      this.logger.info("Event deleted", {
        event_id: eventId,
        sessions_deleted: sessionIds.length,
        scores_deleted: scoresDeleted,
      });
      return { event_id: eventId, sessions_deleted: sessionIds.length, scores_deleted: scoresDeleted };
    });
  }

  /** Registers a callback run after an event and everything under it is deleted. */
  onEventDeleted(listener: EventDeletedListener): void {
    this.deletedListeners.push(listener);
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private async transition(eventId: string, to: EventStatus): Promise<PitchEvent> {
    this.assertNotDefault(eventId, to === "active" ? "started" : "ended");
    const event = await this.getEvent(eventId);
    if (!VALID_TRANSITIONS[event.status].includes(to)) {
      throw new StateError(
        "INVALID_EVENT_STATE",
        `Cannot move event ${eventId} from ${event.status} to ${to}`,
      );
    }

    const timestamp = this.now().toISOString();
    const updated: PitchEvent = {
      ...event,
      status: to,
      started_at: to === "active" ? timestamp : event.started_at,
      ended_at: to === "completed" ? timestamp : event.ended_at,
    };
    await this.deps.eventStore.put(updated);
    this.logger.info("Event status changed", { event_id: eventId, from: event.status, to });
    return updated;
  }

  private assertNotDefault(eventId: string, verb: string): void {
    if (eventId === DEFAULT_EVENT_ID) {
      throw new StateError("INVALID_EVENT_STATE", `The default event cannot be ${verb}`);
    }
  }
}
