// PitchScoop - Event store

import type { PitchEvent } from "./types.js";

export interface EventStore {
  get(eventId: string): Promise<PitchEvent | null>;
  put(event: PitchEvent): Promise<void>;
  delete(eventId: string): Promise<boolean>;
  list(): Promise<PitchEvent[]>;
}

export class InMemoryEventStore implements EventStore {
  private readonly events = new Map<string, PitchEvent>();

  async get(eventId: string): Promise<PitchEvent | null> {
    const event = this.events.get(eventId);
    return event ? structuredClone(event) : null;
  }

  async put(event: PitchEvent): Promise<void> {
    this.events.set(event.event_id, structuredClone(event));
  }

  async delete(eventId: string): Promise<boolean> {
    return this.events.delete(eventId);
  }

  async list(): Promise<PitchEvent[]> {
    return [...this.events.values()].map((e) => structuredClone(e));
  }
}
