// PitchScoop - Tool registry
// Maps tool names to an argument schema and a handler, and wraps every outcome
// in the { success } envelope served by /mcp/execute.

import { z } from "zod";
import { ValidationError, errorMessage, toErrorBody } from "./errors.js";
import type { EventManager } from "./event-manager.js";
import type { LeaderboardService } from "./leaderboard.js";
import { DEFAULT_LEADERBOARD_LIMIT } from "./leaderboard.js";
import { silentLogger, type LogContext, type Logger } from "./logger.js";
import {
  DEFAULT_BENCHMARK_WPM,
  MAX_BENCHMARK_WPM,
  MAX_COMPARED_SESSIONS,
  MIN_BENCHMARK_WPM,
  MIN_COMPARED_SESSIONS,
  type PitchScorer,
} from "./pitch-scorer.js";
import {
  DEFAULT_PLAYBACK_TTL_HOURS,
  MAX_PLAYBACK_TTL_HOURS,
  type SessionManager,
} from "./session-manager.js";
import { DEFAULT_EVENT_ID, SessionStatus, type ToolResponse } from "./types.js";
import { parseArguments } from "./validation.js";

// ─── Argument schemas ───────────────────────────────────────────────────────────

const id = z.string().trim().min(1);
const eventId = id.default(DEFAULT_EVENT_ID);
const eventType = z.enum(["hackathon", "vc_pitch", "practice"]);
const eventStatus = z.enum(["upcoming", "active", "completed"]);

export const ListSessionsSchema = z.object({
  event_id: id.optional(),
  team_name: id.optional(),
  status: z.nativeEnum(SessionStatus).optional(),
});

const SessionRefSchema = z.object({ session_id: id, event_id: eventId });

// ─── Registry types ─────────────────────────────────────────────────────────────

export interface ToolServices {
  sessionManager: SessionManager;
  pitchScorer: PitchScorer;
  eventManager: EventManager;
  leaderboard: LeaderboardService;
}

export interface ToolDescriptor {
  name: string;
  description: string;
}

interface RegisteredTool extends ToolDescriptor {
  run(args: unknown): Promise<Record<string, unknown>>;
}

export interface ToolExecution {
  statusCode: number;
  body: ToolResponse;
}

function defineTool<S extends z.ZodTypeAny>(
  name: string,
  description: string,
  schema: S,
  handler: (args: z.output<S>) => Promise<Record<string, unknown>>,
): RegisteredTool {
  return {
    name,
    description,
    run: (args) => handler(parseArguments(schema, args, name)),
  };
}

function buildTools(s: ToolServices): RegisteredTool[] {
  return [
    // ── pitches.* ──
    defineTool(
      "pitches.start_recording",
      "Create a recording session for a team's pitch and return its stream URL",
      z.object({ team_name: id, pitch_title: id, event_id: eventId }),
      async (args) => {
        const result = await s.sessionManager.startRecording(args);
        return { ...result, message: `Recording session ready for ${result.team_name}` };
      },
    ),
    defineTool(
      "pitches.stop_recording",
      "Finalize a recording with its transcript and audio",
      SessionRefSchema.extend({
        transcript: z.string().optional(),
        audio_data_base64: z.string().min(1).optional(),
        audio_content_type: id.optional(),
      }),
      async (args) => ({ ...(await s.sessionManager.stopRecording(args)) }),
    ),
    defineTool(
      "pitches.get_session",
      "Get a session with its transcript and a fresh playback URL",
      SessionRefSchema,
      async (args) => ({
        session: await s.sessionManager.getSessionDetails(args.event_id, args.session_id),
      }),
    ),
    defineTool(
      "pitches.list_sessions",
      "List sessions newest first, optionally filtered by event, team or status",
      ListSessionsSchema,
      async (args) => ({ ...(await s.sessionManager.listSessions(args)) }),
    ),
    defineTool(
      "pitches.get_playback_url",
      "Issue a signed, time-limited playback URL for a session's audio",
      SessionRefSchema.extend({
        expires_hours: z
          .number()
          .int()
          .min(1)
          .max(MAX_PLAYBACK_TTL_HOURS)
          .default(DEFAULT_PLAYBACK_TTL_HOURS),
      }),
      async (args) => ({
        ...(await s.sessionManager.getPlaybackUrl(args.event_id, args.session_id, args.expires_hours)),
      }),
    ),
    defineTool(
      "pitches.delete_session",
      "Delete a session with its audio and scores",
      SessionRefSchema,
      async (args) => ({ ...(await s.sessionManager.deleteSession(args.event_id, args.session_id)) }),
    ),

    // ── analysis.* ──
    defineTool(
      "analysis.score_pitch",
      "Score a completed pitch on idea, technical implementation, tool use and delivery",
      SessionRefSchema.extend({
        judge_id: id.optional(),
        scoring_context: z.record(z.unknown()).optional(),
      }),
      async (args) => ({ ...(await s.pitchScorer.scorePitch(args)) }),
    ),
    defineTool(
      "analysis.get_scores",
      "Get stored scores for a session, for one judge or all judges",
      SessionRefSchema.extend({ judge_id: id.optional() }),
      async (args) => ({
        ...(await s.pitchScorer.getScores(args.event_id, args.session_id, args.judge_id)),
      }),
    ),
    defineTool(
      "analysis.analyze_tools",
      "Analyze which sponsor tools a pitch used and how",
      SessionRefSchema.extend({ sponsor_tools: z.array(id).optional() }),
      async (args) => ({ ...(await s.pitchScorer.analyzeToolUsage(args)) }),
    ),
    defineTool(
      "analysis.compare_pitches",
      "Rank several completed pitches from the same event against each other",
      z.object({
        session_ids: z.array(id).min(MIN_COMPARED_SESSIONS).max(MAX_COMPARED_SESSIONS),
        event_id: eventId,
        criteria: z.array(id).optional(),
      }),
      async (args) => ({ ...(await s.pitchScorer.comparePitches(args)) }),
    ),
    defineTool(
      "analysis.analyze_presentation_delivery",
      "Measure speaking pace and filler words of a completed pitch against a words-per-minute benchmark",
      SessionRefSchema.extend({
        benchmark_wpm: z
          .number()
          .int()
          .min(MIN_BENCHMARK_WPM)
          .max(MAX_BENCHMARK_WPM)
          .default(DEFAULT_BENCHMARK_WPM),
      }),
      async (args) => ({ ...(await s.pitchScorer.analyzePresentationDelivery(args)) }),
    ),

    // ── events.* ──
    defineTool(
      "events.create_event",
      "Create an event that scopes sessions and scores",
      z.object({
        event_name: id,
        event_type: eventType,
        description: z.string().optional(),
        duration_minutes: z.number().int().positive().optional(),
        sponsor_tools: z.array(id).optional(),
        max_participants: z.number().int().positive().optional(),
      }),
      async (args) => ({ event: await s.eventManager.createEvent(args) }),
    ),
    defineTool(
      "events.list_events",
      "List events, optionally filtered by type or status",
      z.object({ event_type: eventType.optional(), status: eventStatus.optional() }),
      async (args) => {
        const events = await s.eventManager.listEvents(args);
        return { events, total_count: events.length };
      },
    ),
    defineTool(
      "events.get_event",
      "Get one event",
      z.object({ event_id: id }),
      async (args) => ({ event: await s.eventManager.getEvent(args.event_id) }),
    ),
    defineTool(
      "events.start_event",
      "Open an upcoming event for recordings",
      z.object({ event_id: id }),
      async (args) => ({ event: await s.eventManager.startEvent(args.event_id) }),
    ),
    defineTool(
      "events.end_event",
      "Close an active event",
      z.object({ event_id: id }),
      async (args) => ({ event: await s.eventManager.endEvent(args.event_id) }),
    ),
    defineTool(
      "events.delete_event",
      "Delete an event with all of its sessions, audio and scores",
      z.object({ event_id: id, confirm_deletion: z.boolean() }),
      async (args) => ({
        ...(await s.eventManager.deleteEvent(args.event_id, args.confirm_deletion)),
      }),
    ),

    // ── leaderboard.* ──
    defineTool(
      "leaderboard.generate",
      "Rank an event's scored pitches by mean total score",
      z.object({
        event_id: eventId,
        limit: z.number().int().min(1).max(100).default(DEFAULT_LEADERBOARD_LIMIT),
      }),
      async (args) => ({ ...(await s.leaderboard.generate(args.event_id, args.limit)) }),
    ),
    defineTool(
      "leaderboard.get_team_rank",
      "Get one scored session's rank and position within its event",
      SessionRefSchema,
      async (args) => ({
        ...(await s.leaderboard.getTeamRank(args.event_id, args.session_id)),
      }),
    ),
    defineTool(
      "leaderboard.get_stats",
      "Summarize an event's scores: range, average, median and distribution",
      z.object({ event_id: eventId }),
      async (args) => ({ ...(await s.leaderboard.getStats(args.event_id)) }),
    ),
  ];
}

/** Pulls the ids worth logging out of raw, unvalidated arguments. */
function logContext(tool: string, args: unknown): LogContext {
  const context: LogContext = { tool };
  if (args !== null && typeof args === "object") {
    for (const key of ["event_id", "session_id", "judge_id"]) {
      const value: unknown = Reflect.get(args, key);
      if (typeof value === "string") context[key] = value;
    }
  }
  return context;
}

export class ToolRegistry {
  private readonly tools: Map<string, RegisteredTool>;
  private readonly logger: Logger;

  constructor(services: ToolServices, logger: Logger = silentLogger) {
    this.tools = new Map(buildTools(services).map((t) => [t.name, t]));
    this.logger = logger;
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map(({ name, description }) => ({ name, description }));
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /** Runs a tool and never throws: failures come back as { success: false }. */
  async execute(toolName: string, args: unknown): Promise<ToolExecution> {
    const context = logContext(toolName, args);
    const startedAt = Date.now();
    try {
      const tool = this.tools.get(toolName);
      if (!tool) {
        throw new ValidationError(`Unknown tool: ${toolName}`);
      }
      const payload = await tool.run(args);
      this.logger.debug("Tool executed", { ...context, duration_ms: Date.now() - startedAt });
      return { statusCode: 200, body: { ...payload, success: true } };
    } catch (err) {
      const { statusCode, body } = toErrorBody(err);
      const failureContext: LogContext = { ...context, code: body.code, status: statusCode };
      if (statusCode >= 500) {
        this.logger.error(`Tool failed: ${errorMessage(err)}`, failureContext);
      } else {
        this.logger.warn(`Tool rejected: ${body.message}`, failureContext);
      }
      return { statusCode, body: { success: false, error: body, tool: toolName } };
    }
  }
}
