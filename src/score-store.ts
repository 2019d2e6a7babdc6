// PitchScoop - Score store
// One ScoreResult per (event_id, session_id, judge key). A result without a
// judge_id lives under the reserved "ai" judge key, so rescoring by one judge
// never overwrites another judge's result.

import { IsolationError } from "./errors.js";
import type { ScoreResult } from "./types.js";

export const AI_JUDGE_KEY = "ai";

export function judgeKey(judgeId: string | null | undefined): string {
  return judgeId ? `judge:${judgeId}` : AI_JUDGE_KEY;
}

export interface ScoreStore {
  put(eventId: string, result: ScoreResult): Promise<void>;
  get(eventId: string, sessionId: string, judgeId: string | null): Promise<ScoreResult | null>;
  listForSession(eventId: string, sessionId: string): Promise<ScoreResult[]>;
  listForEvent(eventId: string): Promise<ScoreResult[]>;
  deleteForSession(eventId: string, sessionId: string): Promise<number>;
  deleteForEvent(eventId: string): Promise<number>;
}

export class InMemoryScoreStore implements ScoreStore {
  // event_id → session_id → judge key → result
  private readonly events = new Map<string, Map<string, Map<string, ScoreResult>>>();

  async put(eventId: string, result: ScoreResult): Promise<void> {
    if (result.event_id !== eventId) {
      throw new IsolationError(
        `Score for session ${result.session_id} belongs to event "${result.event_id}", not "${eventId}"`,
      );
    }
    let sessions = this.events.get(eventId);
    if (!sessions) {
      sessions = new Map();
      this.events.set(eventId, sessions);
    }
    let judges = sessions.get(result.session_id);
    if (!judges) {
      judges = new Map();
      sessions.set(result.session_id, judges);
    }
    judges.set(judgeKey(result.judge_id), structuredClone(result));
  }

  async get(eventId: string, sessionId: string, judgeId: string | null): Promise<ScoreResult | null> {
    const result = this.events.get(eventId)?.get(sessionId)?.get(judgeKey(judgeId));
    return result ? structuredClone(result) : null;
  }

  async listForSession(eventId: string, sessionId: string): Promise<ScoreResult[]> {
    const judges = this.events.get(eventId)?.get(sessionId);
    return judges ? [...judges.values()].map((r) => structuredClone(r)) : [];
  }

  async listForEvent(eventId: string): Promise<ScoreResult[]> {
    const sessions = this.events.get(eventId);
    if (!sessions) return [];
    const results: ScoreResult[] = [];
    for (const judges of sessions.values()) {
      for (const result of judges.values()) {
        results.push(structuredClone(result));
      }
    }
    return results;
  }

  async deleteForSession(eventId: string, sessionId: string): Promise<number> {
    const sessions = this.events.get(eventId);
    const judges = sessions?.get(sessionId);
    if (!sessions || !judges) return 0;
    sessions.delete(sessionId);
    return judges.size;
  }

  async deleteForEvent(eventId: string): Promise<number> {
    const sessions = this.events.get(eventId);
    if (!sessions) return 0;
    let count = 0;
    for (const judges of sessions.values()) count += judges.size;
    this.events.delete(eventId);
    return count;
  }
}
