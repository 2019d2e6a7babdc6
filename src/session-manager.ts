// PitchScoop - Session Manager
// Owns the recording lifecycle of a pitch session.
//
// Audio chunks received over the stream are buffered in memory until
// stopRecording() writes them to AudioStorage; the session record itself only
// carries audio metadata. Every mutation of one session runs under that
// session's lock, so frames arriving back to back never overwrite each other.
// The locks are shared with EventManager and PitchScorer, so deleting an event
// or a session cannot interleave with a stop or a score write.

import { v4 as uuidv4 } from "uuid";
import type { AudioStorage } from "./audio-storage.js";
import { NotFoundError, StateError, ValidationError, errorMessage } from "./errors.js";
import type { EventManager } from "./event-manager.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ScoreStore } from "./score-store.js";
import { SessionLocks } from "./session-locks.js";
import type { SessionStore } from "./session-store.js";
import {
  DEFAULT_EVENT_ID,
  SessionStatus,
  type AudioInfo,
  type EventType,
  type FinalTranscript,
  type PitchSession,
  type SessionFilter,
  type SessionSummary,
  type TranscriptSegment,
} from "./types.js";

// ─── Limits ─────────────────────────────────────────────────────────────────────

export const STOP_PLAYBACK_TTL_HOURS = 24;
export const DEFAULT_PLAYBACK_TTL_HOURS = 1;
export const MAX_PLAYBACK_TTL_HOURS = 168;
export const MAX_BUFFERED_AUDIO_BYTES = 50 * 1024 * 1024;

// Must stay free of nested quantifiers: uploads run to tens of megabytes.
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Valid state transitions:
 *
 * READY_TO_RECORD → RECORDING: stream attaches, or the first chunk/segment arrives
 * READY_TO_RECORD → COMPLETED: stopRecording(), with or without an upload
 * RECORDING       → COMPLETED: stopRecording()
 */
const VALID_TRANSITIONS: ReadonlyMap<SessionStatus, readonly SessionStatus[]> = new Map([
  [SessionStatus.READY_TO_RECORD, [SessionStatus.RECORDING, SessionStatus.COMPLETED]],
  [SessionStatus.RECORDING, [SessionStatus.COMPLETED]],
  [SessionStatus.COMPLETED, []],
]);

// ─── Inputs and results ─────────────────────────────────────────────────────────

export interface StartRecordingInput {
  team_name: string;
  pitch_title: string;
  event_id?: string;
}

export interface StartRecordingResult {
  session_id: string;
  event_id: string;
  event_name: string;
  event_type: EventType;
  team_name: string;
  pitch_title: string;
  status: SessionStatus;
  websocket_url: string;
  duration_limit_minutes: number;
  created_at: string;
  instructions: string[];
}

export interface StopRecordingInput {
  session_id: string;
  event_id?: string;
  transcript?: string;
  audio_data_base64?: string;
  audio_content_type?: string;
}

export interface StopRecordingResult {
  session_id: string;
  event_id: string;
  team_name: string;
  pitch_title: string;
  status: SessionStatus;
  completed_at: string;
  duration_seconds: number;
  exceeded_time_limit: boolean;
  transcript: FinalTranscript;
  audio: AudioInfo;
}

export interface SessionListing {
  sessions: SessionSummary[];
  total_count: number;
  filters_applied: SessionFilter;
}

export interface PlaybackUrlResult {
  session_id: string;
  event_id: string;
  playback_url: string;
  expires_at: string;
  expires_in_hours: number;
  audio_size: number;
  content_type: string | undefined;
}

export interface SessionDeletionResult {
  session_id: string;
  event_id: string;
  audio_deleted: boolean;
  scores_deleted: number;
}

export interface SessionManagerDeps {
  sessionStore: SessionStore;
  scoreStore: ScoreStore;
  eventManager: EventManager;
  audioStorage: AudioStorage;
  publicBaseUrl: string;
  locks?: SessionLocks;
  logger?: Logger;
  now?: () => Date;
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

/** total_text joins segment texts with single spaces and trims the result. */
export function buildFinalTranscript(segments: TranscriptSegment[]): FinalTranscript {
  const total_text = segments
    .map((s) => s.text.trim())
    .filter((text) => text.length > 0)
    .join(" ")
    .trim();
  return {
    total_text,
    segments_count: segments.length,
    segments: segments.map((s) => ({ ...s })),
  };
}

export function decodeBase64Audio(encoded: string): Buffer {
  const compact = encoded.replace(/\s+/g, "");
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64.test(compact)) {
    throw new ValidationError("audio_data_base64 is not valid base64");
  }
  return Buffer.from(compact, "base64");
}

export function toWebSocketBase(publicBaseUrl: string): string {
  return publicBaseUrl.replace(/\/+$/, "").replace(/^http/, "ws");
}

// ─── SessionManager ─────────────────────────────────────────────────────────────

export class SessionManager {
  private readonly deps: SessionManagerDeps;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly locks: SessionLocks;
  /** Streamed chunks not yet stored, keyed by event_id then session_id. */
  private readonly audioBuffers = new Map<string, Map<string, Buffer[]>>();

  constructor(deps: SessionManagerDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
    this.locks = deps.locks ?? new SessionLocks();
    deps.eventManager.onEventDeleted((eventId) => this.dropEventBuffers(eventId));
  }

  /**
   * Creates a session in READY_TO_RECORD under an active event.
   * @throws NotFoundError EVENT_NOT_FOUND, StateError EVENT_NOT_ACTIVE
   */
  async startRecording(input: StartRecordingInput): Promise<StartRecordingResult> {
    const eventId = input.event_id ?? DEFAULT_EVENT_ID;
    const sessionId = uuidv4();
    return this.locks.run(eventId, sessionId, () => this.createSession(eventId, sessionId, input));
  }

  private async createSession(
    eventId: string,
    sessionId: string,
    input: StartRecordingInput,
  ): Promise<StartRecordingResult> {
    const event = await this.deps.eventManager.ensureRecordable(eventId);

    const websocketUrl =
      `${toWebSocketBase(this.deps.publicBaseUrl)}/ws/sessions/${sessionId}` +
      `?event_id=${encodeURIComponent(eventId)}`;

    const session: PitchSession = {
      session_id: sessionId,
      event_id: eventId,
      team_name: input.team_name,
      pitch_title: input.pitch_title,
      status: SessionStatus.READY_TO_RECORD,
      websocket_url: websocketUrl,
      duration_limit_minutes: event.duration_minutes,
      created_at: this.now().toISOString(),
      recording_started_at: null,
      completed_at: null,
      transcript_segments: [],
      final_transcript: null,
      audio: { has_audio: false, audio_size: 0 },
    };
    await this.deps.sessionStore.put(eventId, session);

    this.logger.info("Recording session created", {
      event_id: eventId,
      session_id: sessionId,
      team_name: input.team_name,
    });

    return {
      session_id: sessionId,
      event_id: eventId,
      event_name: event.event_name,
      event_type: event.event_type,
      team_name: session.team_name,
      pitch_title: session.pitch_title,
      status: session.status,
      websocket_url: websocketUrl,
      duration_limit_minutes: session.duration_limit_minutes,
      created_at: session.created_at,
      instructions: [
        `Connect to ${websocketUrl} and send audio as binary frames`,
        'Send transcript text as {"type":"transcript_segment","text":"..."} frames',
        `Call pitches.stop_recording with session_id ${sessionId} when the pitch ends`,
      ],
    };
  }

  /**
   * Retrieves a session under its event.
   * @throws NotFoundError SESSION_NOT_FOUND when the pair does not exist.
   */
  async getSession(eventId: string, sessionId: string): Promise<PitchSession> {
    const session = await this.deps.sessionStore.get(eventId, sessionId);
    if (!session) {
      throw new NotFoundError(
        "SESSION_NOT_FOUND",
        `Session not found: ${sessionId} in event ${eventId}`,
      );
    }
    return session;
  }

  /** Full session record; a fresh one-hour playback URL is attached when audio exists. */
  async getSessionDetails(eventId: string, sessionId: string): Promise<PitchSession> {
    const session = await this.getSession(eventId, sessionId);
    if (session.audio.has_audio) {
      const playback = this.deps.audioStorage.getPlaybackUrl(
        eventId,
        sessionId,
        DEFAULT_PLAYBACK_TTL_HOURS * 3600,
      );
      session.audio = { ...session.audio, playback_url: playback.url, expires_at: playback.expires_at };
    }
    return session;
  }

  // ── Streaming ──────────────────────────────────────────────────────────────

  /** Called when a stream connects. Moves READY_TO_RECORD to RECORDING. */
  async attachStream(eventId: string, sessionId: string): Promise<PitchSession> {
    return this.locks.run(eventId, sessionId, () => this.markRecording(eventId, sessionId));
  }

  /** Buffers one audio chunk. Returns the number of bytes buffered so far. */
  async appendAudio(eventId: string, sessionId: string, chunk: Buffer): Promise<number> {
    return this.locks.run(eventId, sessionId, async () => {
      await this.markRecording(eventId, sessionId);
      const buffered = this.bufferedBytes(eventId, sessionId) + chunk.length;
      if (buffered > MAX_BUFFERED_AUDIO_BYTES) {
        throw new ValidationError(
          `Buffered audio for session ${sessionId} exceeds ${MAX_BUFFERED_AUDIO_BYTES} bytes`,
        );
      }
      let sessions = this.audioBuffers.get(eventId);
      if (!sessions) {
        sessions = new Map();
        this.audioBuffers.set(eventId, sessions);
      }
      const chunks = sessions.get(sessionId) ?? [];
      chunks.push(chunk);
      sessions.set(sessionId, chunks);
      return buffered;
    });
  }

  /** Bytes streamed for the session and not yet stored. */
  bufferedBytes(eventId: string, sessionId: string): number {
    const chunks = this.audioBuffers.get(eventId)?.get(sessionId) ?? [];
    return chunks.reduce((sum, c) => sum + c.length, 0);
  }

  /** Appends one transcript segment. Returns the segment count. */
  async addTranscriptSegment(
    eventId: string,
    sessionId: string,
    segment: TranscriptSegment,
  ): Promise<number> {
    return this.locks.run(eventId, sessionId, async () => {
      const session = await this.markRecording(eventId, sessionId);
      session.transcript_segments.push({ ...segment });
      await this.deps.sessionStore.put(eventId, session);
      return session.transcript_segments.length;
    });
  }

  // ── Stop ───────────────────────────────────────────────────────────────────

  /**
   * Finalizes a session: appends the optional closing transcript, stores audio
   * (uploaded base64 wins over streamed chunks) and builds the final transcript.
   * Audio storage failures are reported in audio.audio_error, not thrown.
   * @throws StateError INVALID_SESSION_STATE when already completed.
   */
  async stopRecording(input: StopRecordingInput): Promise<StopRecordingResult> {
    const eventId = input.event_id ?? DEFAULT_EVENT_ID;
    const uploaded =
      input.audio_data_base64 !== undefined ? decodeBase64Audio(input.audio_data_base64) : null;

    return this.locks.run(eventId, input.session_id, async () => {
      const session = await this.getSession(eventId, input.session_id);
      this.assertTransition(session, SessionStatus.COMPLETED, "stop_recording");

      if (input.transcript !== undefined && input.transcript.trim() !== "") {
        session.transcript_segments.push({ text: input.transcript.trim() });
      }

      const streamed = this.audioBuffers.get(eventId)?.get(session.session_id) ?? [];
      const audioData = uploaded ?? (streamed.length > 0 ? Buffer.concat(streamed) : null);
      const contentType =
        input.audio_content_type ?? (uploaded ? "audio/wav" : "audio/webm");
      session.audio = await this.storeAudio(session, audioData, contentType);
      this.dropBuffer(eventId, session.session_id);

      const completedAt = this.now();
      const startedAt = new Date(session.recording_started_at ?? session.created_at);
      const durationSeconds =
        Math.round(Math.max(0, completedAt.getTime() - startedAt.getTime()) / 100) / 10;

      session.status = SessionStatus.COMPLETED;
      session.completed_at = completedAt.toISOString();
      session.final_transcript = buildFinalTranscript(session.transcript_segments);
      await this.deps.sessionStore.put(eventId, session);

      const exceeded = durationSeconds > session.duration_limit_minutes * 60;
      if (exceeded) {
        this.logger.warn("Pitch exceeded its time limit", {
          event_id: eventId,
          session_id: session.session_id,
          duration_seconds: durationSeconds,
          limit_minutes: session.duration_limit_minutes,
        });
      }
      this.logger.info("Recording stopped", {
        event_id: eventId,
        session_id: session.session_id,
        segments: session.final_transcript.segments_count,
        audio_size: session.audio.audio_size,
      });

      return {
        session_id: session.session_id,
        event_id: eventId,
        team_name: session.team_name,
        pitch_title: session.pitch_title,
        status: session.status,
        completed_at: session.completed_at,
        duration_seconds: durationSeconds,
        exceeded_time_limit: exceeded,
        transcript: session.final_transcript,
        audio: session.audio,
      };
    });
  }

  // ── Queries ────────────────────────────────────────────────────────────────

  /** Summaries newest first. Without an event_id the listing spans every event. */
  async listSessions(filter: SessionFilter = {}): Promise<SessionListing> {
    const sessions = await this.deps.sessionStore.list(filter.event_id);
    const team = filter.team_name?.toLowerCase();
    const summaries = sessions
      .filter((s) => team === undefined || s.team_name.toLowerCase() === team)
      .filter((s) => filter.status === undefined || s.status === filter.status)
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .map((s) => this.summarize(s));

    const filtersApplied: SessionFilter = {};
    if (filter.event_id !== undefined) filtersApplied.event_id = filter.event_id;
    if (filter.team_name !== undefined) filtersApplied.team_name = filter.team_name;
    if (filter.status !== undefined) filtersApplied.status = filter.status;

    return { sessions: summaries, total_count: summaries.length, filters_applied: filtersApplied };
  }

  /**
   * Issues a signed playback URL valid for 1..168 hours.
   * @throws NotFoundError AUDIO_NOT_FOUND when the session has no stored audio.
   */
  async getPlaybackUrl(
    eventId: string,
    sessionId: string,
    expiresHours: number = DEFAULT_PLAYBACK_TTL_HOURS,
  ): Promise<PlaybackUrlResult> {
    if (!Number.isInteger(expiresHours) || expiresHours < 1 || expiresHours > MAX_PLAYBACK_TTL_HOURS) {
      throw new ValidationError(
        `expires_hours must be an integer between 1 and ${MAX_PLAYBACK_TTL_HOURS}`,
      );
    }
    const session = await this.getSession(eventId, sessionId);
    if (!session.audio.has_audio) {
      throw new NotFoundError("AUDIO_NOT_FOUND", `No audio recorded for session ${sessionId}`);
    }
    const playback = this.deps.audioStorage.getPlaybackUrl(eventId, sessionId, expiresHours * 3600);
    return {
      session_id: sessionId,
      event_id: eventId,
      playback_url: playback.url,
      expires_at: playback.expires_at,
      expires_in_hours: expiresHours,
      audio_size: session.audio.audio_size,
      content_type: session.audio.content_type,
    };
  }

  /** Removes the session with its audio and every judge's scores for it. */
  async deleteSession(eventId: string, sessionId: string): Promise<SessionDeletionResult> {
    return this.locks.run(eventId, sessionId, async () => {
      await this.getSession(eventId, sessionId);
      const audioDeleted = await this.deps.audioStorage.delete(eventId, sessionId);
      const scoresDeleted = await this.deps.scoreStore.deleteForSession(eventId, sessionId);
      await this.deps.sessionStore.delete(eventId, sessionId);
      this.dropBuffer(eventId, sessionId);

      this.logger.info("Session deleted", {
        event_id: eventId,
        session_id: sessionId,
        scores_deleted: scoresDeleted,
      });
      return { session_id: sessionId, event_id: eventId, audio_deleted: audioDeleted, scores_deleted: scoresDeleted };
    });
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private async markRecording(eventId: string, sessionId: string): Promise<PitchSession> {
    const session = await this.getSession(eventId, sessionId);
    if (session.status === SessionStatus.RECORDING) {
      return session;
    }
    this.assertTransition(session, SessionStatus.RECORDING, "stream");
    session.status = SessionStatus.RECORDING;
    session.recording_started_at = this.now().toISOString();
    await this.deps.sessionStore.put(eventId, session);
    this.logger.info("Recording started", { event_id: eventId, session_id: sessionId });
    return session;
  }

  private async storeAudio(
    session: PitchSession,
    data: Buffer | null,
    contentType: string,
  ): Promise<AudioInfo> {
    if (!data || data.length === 0) {
      return { has_audio: false, audio_size: 0 };
    }
    try {
      const stored = await this.deps.audioStorage.save(
        session.event_id,
        session.session_id,
        data,
        contentType,
      );
      const playback = this.deps.audioStorage.getPlaybackUrl(
        session.event_id,
        session.session_id,
        STOP_PLAYBACK_TTL_HOURS * 3600,
      );
      return {
        has_audio: true,
        audio_size: stored.size,
        content_type: stored.content_type,
        playback_url: playback.url,
        expires_at: playback.expires_at,
      };
    } catch (err) {
      this.logger.error("Audio storage failed", {
        event_id: session.event_id,
        session_id: session.session_id,
        error: errorMessage(err),
      });
      return { has_audio: false, audio_size: 0, audio_error: errorMessage(err) };
    }
  }

  private summarize(session: PitchSession): SessionSummary {
    const summary: SessionSummary = {
      session_id: session.session_id,
      event_id: session.event_id,
      team_name: session.team_name,
      pitch_title: session.pitch_title,
      status: session.status,
      created_at: session.created_at,
      has_audio: session.audio.has_audio,
      transcript_segments: session.transcript_segments.length,
    };
    if (session.completed_at) {
      summary.completed_at = session.completed_at;
      const started = Date.parse(session.recording_started_at ?? session.created_at);
      summary.duration_seconds =
        Math.round(Math.max(0, Date.parse(session.completed_at) - started) / 100) / 10;
    }
    return summary;
  }

  private dropBuffer(eventId: string, sessionId: string): void {
    const sessions = this.audioBuffers.get(eventId);
    if (!sessions) return;
    sessions.delete(sessionId);
    if (sessions.size === 0) this.audioBuffers.delete(eventId);
  }

  private dropEventBuffers(eventId: string): void {
    const dropped = this.audioBuffers.get(eventId)?.size ?? 0;
    this.audioBuffers.delete(eventId);
    if (dropped > 0) {
      this.logger.info("Dropped buffered audio of deleted event", {
        event_id: eventId,
        sessions: dropped,
      });
    }
  }

  /**
   * Validates that a state transition is allowed.
   * @throws StateError INVALID_SESSION_STATE with the current and expected states.
   */
  private assertTransition(session: PitchSession, target: SessionStatus, operation: string): void {
    const allowed = VALID_TRANSITIONS.get(session.status) ?? [];
    if (!allowed.includes(target)) {
      throw new StateError(
        "INVALID_SESSION_STATE",
        `Cannot ${operation} session ${session.session_id} in "${session.status}" state`,
      );
    }
  }
}
